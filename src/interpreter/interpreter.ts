// IRSim Statement Executor
// Walks blocks, loops and conditionals of one function activation

import { exhaustive, IRSimError } from "../errors.ts";
import type { ScopeId } from "../scope.ts";
import { incrementStep } from "../state.ts";
import {
	type Assignment,
	type Block,
	ControlFlow,
	type ControlFlowSignal,
	type Expression,
	type ForLoop,
	type Statement,
	type Switch,
	type VariableDeclaration,
	type Word,
} from "../types.ts";
import { ExpressionEvaluator } from "./expression-evaluator.ts";
import type { ExecContext, VariableTable } from "./types.ts";

/** Called with the block's bindings right before its scope is left. */
export type BlockExitHook = (variables: ReadonlyMap<string, Word>) => void;

export class Interpreter {
	private readonly ctx: ExecContext;
	private readonly variables: VariableTable;
	private readonly nestingBase: number;
	private scope: ScopeId;

	/**
	 * @param scope - scope the activation starts in; the function definition's
	 * scope for calls, so nested functions resolve lexically
	 * @param nestingBase - expression nesting level of the calling evaluator
	 */
	constructor(
		ctx: ExecContext,
		scope: ScopeId,
		variables: VariableTable = new Map(),
		nestingBase = 0,
	) {
		this.ctx = ctx;
		this.scope = scope;
		this.variables = variables;
		this.nestingBase = nestingBase;
	}

	valueOfVariable(name: string): Word {
		const value = this.variables.get(name);
		if (value === undefined) {
			throw IRSimError.unboundIdentifier(name);
		}
		return value;
	}

	execute(stmt: Statement): void {
		switch (stmt.kind) {
			case "expression":
				this.evaluateMulti(stmt.expression);
				return;
			case "assignment":
				this.executeAssignment(stmt);
				return;
			case "variableDeclaration":
				this.executeDeclaration(stmt);
				return;
			case "if":
				if (this.evaluate(stmt.condition) !== 0n) {
					this.executeBlock(stmt.body);
				}
				return;
			case "switch":
				this.executeSwitch(stmt);
				return;
			case "functionDefinition":
				// registered when the enclosing block was entered
				return;
			case "for":
				this.executeFor(stmt);
				return;
			case "break":
				this.setSignal(ControlFlow.Break);
				return;
			case "continue":
				this.setSignal(ControlFlow.Continue);
				return;
			case "leave":
				this.setSignal(ControlFlow.Leave);
				return;
			case "block":
				this.executeBlock(stmt);
				return;
			default:
				exhaustive(stmt);
		}
	}

	/**
	 * Run a block in its own scope. Function definitions among its direct
	 * children are registered first so they can be called before their
	 * textual position. Stops at the first statement that raises a signal.
	 */
	executeBlock(block: Block, onExit?: BlockExitHook): void {
		this.enterScope(block);
		try {
			for (const stmt of block.statements) {
				if (stmt.kind === "functionDefinition") {
					this.ctx.scopes.declareFunction(this.scope, stmt);
				}
			}
			for (const stmt of block.statements) {
				incrementStep(this.ctx.state);
				this.execute(stmt);
				if (this.signal() !== ControlFlow.Default) break;
			}
			onExit?.(this.variables);
		} finally {
			this.leaveScope();
		}
	}

	//==========================================================================
	// Statements
	//==========================================================================

	private executeAssignment(assignment: Assignment): void {
		const values = this.evaluateMulti(assignment.value);
		if (values.length !== assignment.targets.length) {
			throw IRSimError.arityMismatch(assignment.targets.length, values.length, "assignment");
		}
		assignment.targets.forEach((name, i) => {
			if (!this.variables.has(name)) {
				throw IRSimError.unboundIdentifier(name);
			}
			this.variables.set(name, valueAt(values, i));
		});
	}

	private executeDeclaration(decl: VariableDeclaration): void {
		const values = decl.value
			? this.evaluateMulti(decl.value)
			: decl.names.map(() => 0n);
		if (values.length !== decl.names.length) {
			throw IRSimError.arityMismatch(decl.names.length, values.length, "variable declaration");
		}
		decl.names.forEach((name, i) => {
			if (this.variables.has(name)) {
				throw IRSimError.redeclaration(name);
			}
			this.variables.set(name, valueAt(values, i));
			this.ctx.scopes.declareVariable(this.scope, name);
		});
	}

	private executeSwitch(sw: Switch): void {
		const value = this.evaluate(sw.expression);
		// the default case has no value and comes last
		const match = sw.cases.find(
			(c) => c.value === undefined || this.evaluate(c.value) === value,
		);
		if (match) {
			this.executeBlock(match.body);
		}
	}

	private executeFor(loop: ForLoop): void {
		this.enterScope(loop.pre);
		try {
			for (const stmt of loop.pre.statements) {
				this.execute(stmt);
				if (this.signal() === ControlFlow.Leave) return;
			}
			this.runLoop(loop);
		} finally {
			this.leaveScope();
		}
	}

	private runLoop(loop: ForLoop): void {
		const spinsWithoutStatements =
			loop.body.statements.length === 0 && loop.post.statements.length === 0;
		while (this.evaluate(loop.condition) !== 0n) {
			// nothing else would count steps for this loop
			if (spinsWithoutStatements) incrementStep(this.ctx.state);

			this.setSignal(ControlFlow.Default);
			this.executeBlock(loop.body);
			const afterBody = this.signal();
			if (afterBody === ControlFlow.Break || afterBody === ControlFlow.Leave) break;

			this.setSignal(ControlFlow.Default);
			this.executeBlock(loop.post);
			if (this.signal() === ControlFlow.Leave) break;
		}
		if (this.signal() !== ControlFlow.Leave) {
			this.setSignal(ControlFlow.Default);
		}
	}

	//==========================================================================
	// Scope and Signal
	//==========================================================================

	private enterScope(block: Block): void {
		this.scope = this.ctx.scopes.enterScope(this.scope, block);
	}

	private leaveScope(): void {
		this.scope = this.ctx.scopes.leaveScope(this.scope, this.variables);
	}

	private signal(): ControlFlowSignal {
		return this.ctx.state.controlFlow;
	}

	private setSignal(signal: ControlFlowSignal): void {
		this.ctx.state.controlFlow = signal;
	}

	//==========================================================================
	// Expressions
	//==========================================================================

	private evaluator(): ExpressionEvaluator {
		return new ExpressionEvaluator(this.ctx, this.scope, this.variables, this.nestingBase);
	}

	private evaluate(expr: Expression): Word {
		return this.evaluator().evaluate(expr);
	}

	private evaluateMulti(expr: Expression): Word[] {
		return this.evaluator().evaluateMulti(expr);
	}
}

function valueAt(values: Word[], index: number): Word {
	const value = values[index];
	if (value === undefined) {
		throw IRSimError.arityMismatch(index + 1, values.length, "value list");
	}
	return value;
}
