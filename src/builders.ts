// IRSim AST Constructors
// Shorthand for building programs in code

import type {
	Assignment,
	Block,
	Break,
	Case,
	Continue,
	Expression,
	ExpressionStatement,
	ForLoop,
	FunctionCall,
	FunctionDefinition,
	Identifier,
	If,
	Leave,
	Literal,
	Statement,
	Switch,
	VariableDeclaration,
} from "./types.ts";

//==============================================================================
// Expressions
//==============================================================================

export function lit(value: bigint | number | string): Literal {
	return { kind: "literal", literalKind: "number", value: String(value) };
}

export function boolLit(value: boolean): Literal {
	return { kind: "literal", literalKind: "boolean", value: String(value) };
}

export function strLit(value: string): Literal {
	return { kind: "literal", literalKind: "string", value };
}

export function ident(name: string): Identifier {
	return { kind: "identifier", name };
}

export function call(name: string, ...args: Expression[]): FunctionCall {
	return { kind: "call", name, args };
}

//==============================================================================
// Statements
//==============================================================================

export function block(...statements: Statement[]): Block {
	return { kind: "block", statements };
}

/** `let a, b := value`; names may be a single string. */
export function letVar(names: string | string[], value?: Expression): VariableDeclaration {
	const list = typeof names === "string" ? [names] : names;
	return value === undefined
		? { kind: "variableDeclaration", names: list }
		: { kind: "variableDeclaration", names: list, value };
}

export function assign(targets: string | string[], value: Expression): Assignment {
	return { kind: "assignment", targets: typeof targets === "string" ? [targets] : targets, value };
}

export function exprStmt(expression: Expression): ExpressionStatement {
	return { kind: "expression", expression };
}

export function ifStmt(condition: Expression, body: Block): If {
	return { kind: "if", condition, body };
}

export function switchStmt(expression: Expression, ...cases: Case[]): Switch {
	return { kind: "switch", expression, cases };
}

export function caseClause(value: Literal, body: Block): Case {
	return { value, body };
}

export function defaultClause(body: Block): Case {
	return { body };
}

export function funcDef(
	name: string,
	params: string[],
	returns: string[],
	body: Block,
): FunctionDefinition {
	return { kind: "functionDefinition", name, params, returns, body };
}

export function forLoop(pre: Block, condition: Expression, post: Block, body: Block): ForLoop {
	return { kind: "for", pre, condition, post, body };
}

export function breakStmt(): Break {
	return { kind: "break" };
}

export function continueStmt(): Continue {
	return { kind: "continue" };
}

export function leaveStmt(): Leave {
	return { kind: "leave" };
}
