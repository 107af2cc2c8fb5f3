// IRSim Driver
// Option resolution and top-level runs; limit failures become result values

import { createDialectByName } from "./dialects/index.ts";
import type { DialectName } from "./dialects/registry.ts";
import { ErrorCodes, IRSimError, isLimitError } from "./errors.ts";
import { ExpressionEvaluator } from "./interpreter/expression-evaluator.ts";
import { Interpreter } from "./interpreter/interpreter.ts";
import type { ExecContext } from "./interpreter/types.ts";
import { ScopeArena } from "./scope.ts";
import {
	createInterpreterState,
	type DataObject,
	type InterpreterState,
	type StateInit,
} from "./state.ts";
import { type Block, hexToBytes, parseWord, type Word, WORD_MASK } from "./types.ts";
import { type InterpreterOptions, InterpreterOptionsSchema } from "./zod-schemas.ts";

//==============================================================================
// Options
//==============================================================================

export interface ResolvedOptions {
	state: StateInit;
	dialect: DialectName;
	verbose: boolean;
}

function wordOption(value: number | string | undefined): Word {
	if (value === undefined) return 0n;
	return typeof value === "number" ? BigInt(value) : parseWord(value);
}

/**
 * Validate raw options and fill in defaults. Throws a ValidationError.
 */
export function resolveOptions(options: unknown = {}): ResolvedOptions {
	const parsed = InterpreterOptionsSchema.safeParse(options);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const path = issue?.path.map(String).join(".") || "$";
		throw IRSimError.validation(path, issue?.message ?? "invalid options");
	}
	const o: InterpreterOptions = parsed.data;
	const dataObjects: DataObject[] = (o.dataObjects ?? []).map((d) => ({
		name: d.name,
		data: hexToBytes(d.data),
	}));
	return {
		state: {
			maxSteps: o.maxSteps ?? 0,
			maxExprNesting: o.maxExprNesting ?? 0,
			calldata: hexToBytes(o.calldata ?? ""),
			address: wordOption(o.address),
			caller: wordOption(o.caller),
			callvalue: wordOption(o.callvalue),
			dataObjects,
		},
		dialect: o.dialect ?? "evm",
		verbose: o.verbose ?? false,
	};
}

//==============================================================================
// Results
//==============================================================================

export type RunOutcome = "ok" | "stepLimit" | "nestingLimit" | "domainError";

export type RunResult<T> =
	| { outcome: "ok"; state: InterpreterState; value: T }
	| { outcome: Exclude<RunOutcome, "ok">; state: InterpreterState; error: IRSimError };

function failureOutcome(err: IRSimError): Exclude<RunOutcome, "ok"> | null {
	if (isLimitError(err)) {
		return err.code === ErrorCodes.StepLimitReached ? "stepLimit" : "nestingLimit";
	}
	return err.code === ErrorCodes.DomainError ? "domainError" : null;
}

function createContext(resolved: ResolvedOptions): ExecContext {
	return {
		state: createInterpreterState(resolved.state),
		dialect: createDialectByName(resolved.dialect),
		scopes: new ScopeArena(),
	};
}

/**
 * Run `body` against a fresh context. The two limit failures and builtin
 * domain errors are reported as outcomes; anything else propagates.
 */
function runGuarded<T>(
	resolved: ResolvedOptions,
	body: (ctx: ExecContext) => T,
): RunResult<T> {
	const ctx = createContext(resolved);
	try {
		return { outcome: "ok", state: ctx.state, value: body(ctx) };
	} catch (err) {
		if (!(err instanceof IRSimError)) throw err;
		const outcome = failureOutcome(err);
		if (outcome === null) throw err;
		if (resolved.verbose) {
			console.warn(`[Interpreter] Run aborted: ${err.message}`);
		}
		return { outcome, state: ctx.state, error: err };
	}
}

//==============================================================================
// Entry Points
//==============================================================================

/**
 * Execute a program's top-level block. The value is the block's own variable
 * bindings as they were just before the block finished.
 */
export function interpret(
	program: Block,
	options: unknown = {},
): RunResult<Map<string, Word>> {
	return runGuarded(resolveOptions(options), (ctx) => {
		let globals = new Map<string, Word>();
		new Interpreter(ctx, ctx.scopes.root).executeBlock(program, (variables) => {
			globals = new Map(variables);
		});
		return globals;
	});
}

/**
 * Call a function defined at the top level of `program` with the given
 * arguments, without running the program's other statements.
 */
export function callFunction(
	program: Block,
	name: string,
	args: Word[],
	options: unknown = {},
): RunResult<Word[]> {
	args.forEach((value, i) => {
		if (value < 0n || value > WORD_MASK) {
			throw IRSimError.validation("args." + String(i), "Argument is not a 256-bit word", value.toString());
		}
	});
	return runGuarded(resolveOptions(options), (ctx) => {
		const scope = ctx.scopes.enterScope(ctx.scopes.root, program);
		for (const stmt of program.statements) {
			if (stmt.kind === "functionDefinition") {
				ctx.scopes.declareFunction(scope, stmt);
			}
		}
		return new ExpressionEvaluator(ctx, scope, new Map()).invokeFunction(name, args);
	});
}
