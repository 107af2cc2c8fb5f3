// IRSim - interpreter for a block-scoped word IR
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	Assignment, Block, Break, Case, Continue, ControlFlowSignal, Expression,
	ExpressionStatement, ForLoop, FunctionCall, FunctionDefinition, Identifier,
	If, Leave, Literal, LiteralKind, Statement, Switch, VariableDeclaration, Word,
} from "./types.ts";

export type { ErrorCode, LimitErrorCode, ValidationError, ValidationResult } from "./errors.ts";

export type { Builtin, BuiltinCall, BuiltinImpl, Dialect, DialectName } from "./dialects/registry.ts";

export type { DataObject, InterpreterState, StateInit } from "./state.ts";

export type { ExecContext, VariableTable } from "./interpreter/types.ts";

export type { InterpreterOptions } from "./zod-schemas.ts";

export type { ResolvedOptions, RunOutcome, RunResult } from "./run.ts";

//==============================================================================
// Words and Literals
//==============================================================================

export {
	ControlFlow, WORD_MASK, WORD_MODULUS, boolWord, parseWord, toHex, toHex32,
	toSigned, toWord, valueOfLiteral,
} from "./types.ts";

//==============================================================================
// Errors
//==============================================================================

export { ErrorCodes, IRSimError, isLimitError } from "./errors.ts";

//==============================================================================
// State, Scopes and Interpreter
//==============================================================================

export {
	NESTING_LIMIT_TRACE, STEP_LIMIT_TRACE, createInterpreterState,
	dumpTraceAndState, incrementStep, readMemory, writeMemory,
} from "./state.ts";

export { ScopeArena } from "./scope.ts";

export { Interpreter } from "./interpreter/interpreter.ts";
export { ExpressionEvaluator } from "./interpreter/expression-evaluator.ts";

//==============================================================================
// Dialects
//==============================================================================

export { createBuiltinRegistry, createDialect, defineBuiltin } from "./dialects/registry.ts";
export { createEvmDialect, evmBuiltins } from "./dialects/evm.ts";
export { createWasmDialect, wasmBuiltins } from "./dialects/wasm.ts";
export { createDialectByName } from "./dialects/index.ts";

//==============================================================================
// Validation, Schemas and Driver
//==============================================================================

export { loadProgram, validateProgram } from "./validator.ts";
export { BlockSchema, InterpreterOptionsSchema, StatementSchema } from "./zod-schemas.ts";
export { callFunction, interpret, resolveOptions } from "./run.ts";

export * from "./builders.ts";
