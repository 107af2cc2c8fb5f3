// IRSim Builtin Registry
// Builtin definitions, fluent builder, and the dialect capability interface

import { IRSimError } from "../errors.ts";
import type { InterpreterState } from "../state.ts";
import type { Expression, Word } from "../types.ts";

//==============================================================================
// Builtin
//==============================================================================

export type DialectName = "evm" | "wasm";

export interface BuiltinCall {
	/** Evaluated arguments in declaration order; literal-only slots hold 0. */
	args: Word[];
	/** Raw argument nodes, for builtins that read a literal themselves. */
	rawArgs: readonly Expression[];
	state: InterpreterState;
}

export type BuiltinImpl = (call: BuiltinCall) => Word;

export interface Builtin {
	dialect: DialectName;
	name: string;
	arity: number;
	/** Empty when no argument must be a literal; else one flag per parameter. */
	literalArguments: readonly boolean[];
	/** Whether the result is meaningful; `false` builtins return 0. */
	returnsValue: boolean;
	impl: BuiltinImpl;
}

class BuiltinBuilder {
	private arity = 0;
	private literalArguments: boolean[] = [];
	private returnsValue = true;
	private impl: BuiltinImpl | undefined;

	constructor(
		private readonly dialect: DialectName,
		private readonly name: string,
	) {}

	setArity(arity: number): this {
		this.arity = arity;
		return this;
	}

	setLiteralArguments(...flags: boolean[]): this {
		this.literalArguments = flags;
		return this;
	}

	setReturnsValue(returnsValue: boolean): this {
		this.returnsValue = returnsValue;
		return this;
	}

	setImpl(impl: BuiltinImpl): this {
		this.impl = impl;
		return this;
	}

	build(): Builtin {
		if (!this.impl) {
			throw new Error("Builtin " + this.dialect + ":" + this.name + " has no implementation");
		}
		if (this.literalArguments.length !== 0 && this.literalArguments.length !== this.arity) {
			throw new Error("Builtin " + this.dialect + ":" + this.name + " literal flags do not match arity");
		}
		return {
			dialect: this.dialect,
			name: this.name,
			arity: this.arity,
			literalArguments: this.literalArguments,
			returnsValue: this.returnsValue,
			impl: this.impl,
		};
	}
}

export function defineBuiltin(dialect: DialectName, name: string): BuiltinBuilder {
	return new BuiltinBuilder(dialect, name);
}

//==============================================================================
// Registry
//==============================================================================

export type BuiltinRegistry = Map<string, Builtin>;

export function createBuiltinRegistry(builtins: Builtin[]): BuiltinRegistry {
	const registry: BuiltinRegistry = new Map();
	for (const builtin of builtins) {
		if (registry.has(builtin.name)) {
			throw new Error("Duplicate builtin: " + builtin.dialect + ":" + builtin.name);
		}
		registry.set(builtin.name, builtin);
	}
	return registry;
}

//==============================================================================
// Dialect
//==============================================================================

/**
 * One execution target: recognises its builtin names and evaluates them
 * against the interpreter state. Exactly one dialect is active per run.
 */
export interface Dialect {
	readonly name: DialectName;
	builtin(name: string): Builtin | undefined;
	evaluate(
		builtin: Builtin,
		rawArgs: readonly Expression[],
		args: Word[],
		state: InterpreterState,
	): Word;
}

export function createDialect(name: DialectName, registry: BuiltinRegistry): Dialect {
	return {
		name,
		builtin: (builtinName) => registry.get(builtinName),
		evaluate(builtin, rawArgs, args, state) {
			if (builtin.dialect !== name || registry.get(builtin.name) !== builtin) {
				throw IRSimError.unknownBuiltin(name, builtin.name);
			}
			if (args.length !== builtin.arity) {
				throw IRSimError.arityMismatch(builtin.arity, args.length, builtin.name);
			}
			return builtin.impl({ args, rawArgs, state });
		},
	};
}

/**
 * Argument accessor that keeps the builtin bodies free of index checks.
 */
export function arg(call: BuiltinCall, index: number): Word {
	const value = call.args[index];
	if (value === undefined) {
		throw IRSimError.arityMismatch(index + 1, call.args.length, "builtin argument");
	}
	return value;
}

/**
 * Append a `NAME(0xA, 0xB)` line for a side-effecting builtin.
 */
export function logTrace(state: InterpreterState, name: string, args: Word[]): void {
	state.trace.push(name + "(" + args.map((a) => "0x" + a.toString(16)).join(", ") + ")");
}
