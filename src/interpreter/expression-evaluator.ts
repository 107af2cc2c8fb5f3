// IRSim Expression Evaluator
// Literals, identifiers and calls; user functions run in a nested statement executor

import { exhaustive, IRSimError } from "../errors.ts";
import type { ScopeId } from "../scope.ts";
import { NESTING_LIMIT_TRACE } from "../state.ts";
import {
	ControlFlow,
	type Expression,
	type FunctionCall,
	valueOfLiteral,
	type Word,
} from "../types.ts";
import { Interpreter } from "./interpreter.ts";
import type { ExecContext, VariableTable } from "./types.ts";

export class ExpressionEvaluator {
	private readonly ctx: ExecContext;
	private readonly scope: ScopeId;
	private readonly variables: VariableTable;
	private nesting: number;

	constructor(
		ctx: ExecContext,
		scope: ScopeId,
		variables: VariableTable,
		nestingBase = 0,
	) {
		this.ctx = ctx;
		this.scope = scope;
		this.variables = variables;
		this.nesting = nestingBase;
	}

	/**
	 * Evaluate an expression that must produce exactly one word.
	 */
	evaluate(expr: Expression): Word {
		const values = this.evaluateMulti(expr);
		const [value] = values;
		if (value === undefined || values.length !== 1) {
			throw IRSimError.arityMismatch(1, values.length, "single-valued expression");
		}
		return value;
	}

	evaluateMulti(expr: Expression): Word[] {
		switch (expr.kind) {
			case "literal":
				this.incrementNesting();
				return [valueOfLiteral(expr)];
			case "identifier": {
				const value = this.variables.get(expr.name);
				if (value === undefined) {
					throw IRSimError.unboundIdentifier(expr.name);
				}
				this.incrementNesting();
				return [value];
			}
			case "call":
				return this.evaluateCall(expr);
			default:
				return exhaustive(expr);
		}
	}

	//==========================================================================
	// Calls
	//==========================================================================

	private evaluateCall(call: FunctionCall): Word[] {
		const { dialect, state } = this.ctx;
		const builtin = dialect.builtin(call.name);
		const args = this.evaluateArgs(call.args, builtin?.literalArguments ?? []);

		if (builtin) {
			return [dialect.evaluate(builtin, call.args, args, state)];
		}
		return this.invokeFunction(call.name, args);
	}

	/**
	 * Run the user function `name` visible from this evaluator's scope with
	 * already evaluated arguments and return its return variables.
	 */
	invokeFunction(name: string, args: readonly Word[]): Word[] {
		const { state } = this.ctx;
		const found = this.ctx.scopes.lookupFunction(this.scope, name);
		if (!found) {
			throw IRSimError.unknownFunction(name);
		}
		const { fn } = found;
		if (args.length !== fn.params.length) {
			throw IRSimError.arityMismatch(fn.params.length, args.length, fn.name);
		}

		const variables: VariableTable = new Map();
		fn.params.forEach((param, i) => {
			variables.set(param, args[i] ?? 0n);
		});
		for (const ret of fn.returns) {
			variables.set(ret, 0n);
		}

		state.controlFlow = ControlFlow.Default;
		const interpreter = new Interpreter(this.ctx, found.scope, variables, this.nesting);
		interpreter.executeBlock(fn.body);
		state.controlFlow = ControlFlow.Default;

		return fn.returns.map((ret) => interpreter.valueOfVariable(ret));
	}

	/**
	 * Arguments are evaluated rightmost first and handed over in declaration
	 * order. Literal-only positions are not evaluated; they hold 0 and the
	 * builtin reads the raw node instead.
	 */
	private evaluateArgs(args: Expression[], literalArguments: readonly boolean[]): Word[] {
		this.incrementNesting();
		const values: Word[] = [];
		for (let i = args.length - 1; i >= 0; i--) {
			const arg = args[i];
			if (arg === undefined || literalArguments[i] === true) {
				values.push(0n);
			} else {
				values.push(this.evaluate(arg));
			}
		}
		return values.reverse();
	}

	private incrementNesting(): void {
		this.nesting++;
		const { maxExprNesting, trace } = this.ctx.state;
		if (maxExprNesting > 0 && this.nesting > maxExprNesting) {
			trace.push(NESTING_LIMIT_TRACE);
			throw IRSimError.nestingLimit(maxExprNesting);
		}
	}
}
