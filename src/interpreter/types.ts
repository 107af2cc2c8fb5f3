// Shared types for the statement executor and expression evaluator

import type { Dialect } from "../dialects/registry.ts";
import type { ScopeArena } from "../scope.ts";
import type { InterpreterState } from "../state.ts";
import type { Word } from "../types.ts";

/**
 * Everything one run shares across its nested executors and evaluators.
 * Created once by the driver and passed down explicitly.
 */
export interface ExecContext {
	state: InterpreterState;
	dialect: Dialect;
	scopes: ScopeArena;
}

/** Variable table of one function activation. */
export type VariableTable = Map<string, Word>;
