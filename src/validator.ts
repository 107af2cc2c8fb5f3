// IRSim Program Validator
// Two-phase validation: Zod safeParse for structure, then scoping and arity checks.
// A program that passes never trips the interpreter's invariant assertions; builtins can
// still fail on run-time values (unknown data objects), which runs report as an outcome.

import { z } from "zod/v4";
import { createDialectByName } from "./dialects/index.ts";
import type { Dialect, DialectName } from "./dialects/registry.ts";
import {
	exhaustive,
	invalidResult,
	IRSimError,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.ts";
import type {
	Block,
	Expression,
	ForLoop,
	FunctionCall,
	FunctionDefinition,
	Literal,
	Statement,
	Switch,
	Word,
} from "./types.ts";
import { valueOfLiteral } from "./types.ts";
import { BlockSchema } from "./zod-schemas.ts";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Validation State
//==============================================================================

interface FunctionSignature {
	params: number;
	returns: number;
}

interface ValidationState {
	errors: ValidationError[];
	path: string[];
	dialect: Dialect;
}

/** What is visible at the statement being checked. */
interface Env {
	/** Block-level function tables, innermost last; visible across function boundaries. */
	functions: Map<string, FunctionSignature>[];
	/** Variable scopes of the current function only, innermost last. */
	variables: Set<string>[];
	inLoopBody: boolean;
	inFunction: boolean;
}

function pushPath(state: ValidationState, ...segments: (string | number)[]): void {
	for (const s of segments) state.path.push(String(s));
}

function popPath(state: ValidationState, count = 1): void {
	state.path.splice(state.path.length - count, count);
}

function currentPath(state: ValidationState): string {
	return state.path.length > 0 ? state.path.join(".") : "$";
}

function addError(state: ValidationState, message: string, value?: unknown): void {
	const error: ValidationError = { path: currentPath(state), message };
	if (value !== undefined) error.value = value;
	state.errors.push(error);
}

function within(state: ValidationState, segments: (string | number)[], check: () => void): void {
	pushPath(state, ...segments);
	check();
	popPath(state, segments.length);
}

//==============================================================================
// Name Lookup
//==============================================================================

function lookupFunction(env: Env, name: string): FunctionSignature | undefined {
	for (let i = env.functions.length - 1; i >= 0; i--) {
		const sig = env.functions[i]?.get(name);
		if (sig) return sig;
	}
	return undefined;
}

function isVariable(env: Env, name: string): boolean {
	return env.variables.some((scope) => scope.has(name));
}

function innermost<T>(stack: T[]): T {
	const top = stack[stack.length - 1];
	if (top === undefined) {
		throw new Error("Validator scope stack is empty");
	}
	return top;
}

/**
 * Report a name that would shadow something already visible.
 */
function checkFreshName(state: ValidationState, env: Env, name: string): boolean {
	if (state.dialect.builtin(name)) {
		addError(state, "Name collides with a builtin: " + name);
		return false;
	}
	if (isVariable(env, name) || lookupFunction(env, name)) {
		addError(state, "Name already declared: " + name);
		return false;
	}
	return true;
}

//==============================================================================
// Expressions
//==============================================================================

/**
 * Check an expression and return how many values it produces, or null when
 * that is unknown because of an earlier error.
 */
function checkExpression(state: ValidationState, env: Env, expr: Expression): number | null {
	switch (expr.kind) {
		case "literal":
			checkLiteral(state, expr);
			return 1;
		case "identifier":
			if (!isVariable(env, expr.name)) {
				addError(state, "Undeclared identifier: " + expr.name);
			}
			return 1;
		case "call":
			return checkCall(state, env, expr);
		default:
			return exhaustive(expr);
	}
}

function checkLiteral(state: ValidationState, expr: Literal): Word | null {
	try {
		return valueOfLiteral(expr);
	} catch (err) {
		if (!(err instanceof IRSimError)) throw err;
		addError(state, err.message);
		return null;
	}
}

function checkSingleValued(state: ValidationState, env: Env, expr: Expression, what: string): void {
	const count = checkExpression(state, env, expr);
	if (count !== null && count !== 1) {
		addError(state, what + " must produce exactly one value, got " + String(count));
	}
}

function checkArgs(
	state: ValidationState,
	env: Env,
	call: FunctionCall,
	literalArguments: readonly boolean[],
): void {
	call.args.forEach((argExpr, i) => {
		within(state, ["args", i], () => {
			if (literalArguments[i] === true) {
				if (argExpr.kind !== "literal") {
					addError(state, "Argument " + String(i) + " of " + call.name + " must be a literal");
				}
				return;
			}
			checkSingleValued(state, env, argExpr, "Function argument");
		});
	});
}

function checkCall(state: ValidationState, env: Env, call: FunctionCall): number | null {
	const builtin = state.dialect.builtin(call.name);
	if (builtin) {
		checkArgs(state, env, call, builtin.literalArguments);
		if (call.args.length !== builtin.arity) {
			addError(state, call.name + " expects " + String(builtin.arity) + " arguments, got " + String(call.args.length));
		}
		return builtin.returnsValue ? 1 : 0;
	}

	checkArgs(state, env, call, []);
	const sig = lookupFunction(env, call.name);
	if (!sig) {
		addError(state, "Function not found: " + call.name);
		return null;
	}
	if (call.args.length !== sig.params) {
		addError(state, call.name + " expects " + String(sig.params) + " arguments, got " + String(call.args.length));
	}
	return sig.returns;
}

//==============================================================================
// Statements
//==============================================================================

function checkBlock(state: ValidationState, env: Env, block: Block): void {
	const functions = new Map<string, FunctionSignature>();
	env.functions.push(functions);
	env.variables.push(new Set());

	block.statements.forEach((stmt, i) => {
		if (stmt.kind !== "functionDefinition") return;
		within(state, ["statements", i], () => {
			if (functions.has(stmt.name)) {
				addError(state, "Duplicate function definition: " + stmt.name);
				return;
			}
			if (checkFreshName(state, env, stmt.name)) {
				functions.set(stmt.name, { params: stmt.params.length, returns: stmt.returns.length });
			}
		});
	});

	block.statements.forEach((stmt, i) => {
		within(state, ["statements", i], () => {
			checkStatement(state, env, stmt);
		});
	});

	env.variables.pop();
	env.functions.pop();
}

function checkStatement(state: ValidationState, env: Env, stmt: Statement): void {
	switch (stmt.kind) {
		case "expression":
			within(state, ["expression"], () => {
				const count = checkExpression(state, env, stmt.expression);
				if (count !== null && count !== 0) {
					addError(state, "Expression statement must not produce values, got " + String(count));
				}
			});
			return;
		case "assignment":
			checkAssignment(state, env, stmt.targets, stmt.value);
			return;
		case "variableDeclaration":
			checkDeclaration(state, env, stmt.names, stmt.value);
			return;
		case "if":
			within(state, ["condition"], () => {
				checkSingleValued(state, env, stmt.condition, "Condition");
			});
			within(state, ["body"], () => {
				checkBlock(state, env, stmt.body);
			});
			return;
		case "switch":
			checkSwitch(state, env, stmt);
			return;
		case "functionDefinition":
			checkFunction(state, env, stmt);
			return;
		case "for":
			checkFor(state, env, stmt);
			return;
		case "break":
		case "continue":
			if (!env.inLoopBody) {
				addError(state, "\"" + stmt.kind + "\" is only allowed inside a for-loop body");
			}
			return;
		case "leave":
			if (!env.inFunction) {
				addError(state, "\"leave\" is only allowed inside a function");
			}
			return;
		case "block":
			checkBlock(state, env, stmt);
			return;
		default:
			exhaustive(stmt);
	}
}

function checkValueCount(
	state: ValidationState,
	env: Env,
	value: Expression,
	expected: number,
): void {
	within(state, ["value"], () => {
		const count = checkExpression(state, env, value);
		if (count !== null && count !== expected) {
			addError(state, "Expected " + String(expected) + " values, got " + String(count));
		}
	});
}

function checkAssignment(state: ValidationState, env: Env, targets: string[], value: Expression): void {
	checkValueCount(state, env, value, targets.length);
	const seen = new Set<string>();
	targets.forEach((name, i) => {
		within(state, ["targets", i], () => {
			if (seen.has(name)) addError(state, "Variable assigned twice: " + name);
			seen.add(name);
			if (lookupFunction(env, name) && !isVariable(env, name)) {
				addError(state, "Cannot assign to function: " + name);
			} else if (!isVariable(env, name)) {
				addError(state, "Assignment to undeclared variable: " + name);
			}
		});
	});
}

function checkDeclaration(
	state: ValidationState,
	env: Env,
	names: string[],
	value: Expression | undefined,
): void {
	if (value !== undefined) {
		checkValueCount(state, env, value, names.length);
	}
	const scope = innermost(env.variables);
	names.forEach((name, i) => {
		within(state, ["names", i], () => {
			if (checkFreshName(state, env, name)) scope.add(name);
		});
	});
}

function checkSwitch(state: ValidationState, env: Env, sw: Switch): void {
	within(state, ["expression"], () => {
		checkSingleValued(state, env, sw.expression, "Switch expression");
	});
	const seen = new Set<Word>();
	sw.cases.forEach((c, i) => {
		within(state, ["cases", i], () => {
			if (c.value === undefined) {
				if (i !== sw.cases.length - 1) {
					addError(state, "Default case must be the last case");
				}
			} else {
				const value = checkLiteral(state, c.value);
				if (value !== null && seen.has(value)) {
					addError(state, "Duplicate case value", c.value.value);
				}
				if (value !== null) seen.add(value);
			}
			within(state, ["body"], () => {
				checkBlock(state, env, c.body);
			});
		});
	});
}

function checkFunction(state: ValidationState, env: Env, fn: FunctionDefinition): void {
	const locals = new Set<string>();
	const inner: Env = {
		functions: env.functions,
		variables: [locals],
		inLoopBody: false,
		inFunction: true,
	};
	[...fn.params, ...fn.returns].forEach((name) => {
		if (locals.has(name)) {
			addError(state, "Duplicate parameter or return variable: " + name);
		} else if (checkFreshName(state, inner, name)) {
			locals.add(name);
		}
	});
	within(state, ["body"], () => {
		checkBlock(state, inner, fn.body);
	});
}

function checkFor(state: ValidationState, env: Env, loop: ForLoop): void {
	const outerLoop = env.inLoopBody;
	env.variables.push(new Set());
	env.inLoopBody = false;

	within(state, ["pre"], () => {
		loop.pre.statements.forEach((stmt, i) => {
			within(state, ["statements", i], () => {
				if (stmt.kind === "functionDefinition") {
					addError(state, "Function definitions are not allowed in a for-loop init block");
					return;
				}
				checkStatement(state, env, stmt);
			});
		});
	});
	within(state, ["condition"], () => {
		checkSingleValued(state, env, loop.condition, "Loop condition");
	});
	env.inLoopBody = true;
	within(state, ["body"], () => {
		checkBlock(state, env, loop.body);
	});
	env.inLoopBody = false;
	within(state, ["post"], () => {
		checkBlock(state, env, loop.post);
	});

	env.inLoopBody = outerLoop;
	env.variables.pop();
}

//==============================================================================
// Public Validators
//==============================================================================

export function validateProgram(
	doc: unknown,
	dialect: DialectName = "evm",
): ValidationResult<Block> {
	// Phase 1: Structural validation via Zod
	const parsed = BlockSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<Block>(zodToValidationErrors(parsed.error));
	}

	// Phase 2: Scoping, arity and control-flow placement
	const state: ValidationState = {
		errors: [],
		path: [],
		dialect: createDialectByName(dialect),
	};
	const env: Env = { functions: [], variables: [], inLoopBody: false, inFunction: false };
	checkBlock(state, env, parsed.data);

	if (state.errors.length > 0) {
		return invalidResult<Block>(state.errors);
	}
	return validResult(parsed.data);
}

/**
 * Validate and return the program, throwing the first problem as a
 * ValidationError.
 */
export function loadProgram(doc: unknown, dialect: DialectName = "evm"): Block {
	const result = validateProgram(doc, dialect);
	const [first] = result.errors;
	if (first) {
		throw IRSimError.validation(first.path, first.message, first.value);
	}
	if (!result.value) {
		throw IRSimError.validation("$", "no program");
	}
	return result.value;
}
