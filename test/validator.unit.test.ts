import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	assign,
	block,
	breakStmt,
	call,
	caseClause,
	defaultClause,
	exprStmt,
	forLoop,
	funcDef,
	ident,
	leaveStmt,
	letVar,
	lit,
	strLit,
	switchStmt,
} from "../src/builders.ts";
import { ErrorCodes, IRSimError, type ValidationError } from "../src/errors.ts";
import { loadProgram, validateProgram } from "../src/validator.ts";
import type { Block } from "../src/types.ts";

function errorsOf(program: unknown, dialect: "evm" | "wasm" = "evm"): ValidationError[] {
	const result = validateProgram(program, dialect);
	assert.equal(result.valid, false);
	return result.errors;
}

function firstError(program: unknown): { path: string; message: string } {
	const [first] = errorsOf(program);
	assert.ok(first);
	return { path: first.path, message: first.message };
}

describe("validateProgram - structure", () => {
	it("accepts a well-formed program and returns it", () => {
		const program = block(letVar("x", lit(3)), letVar("y", call("add", ident("x"), lit(4))));
		const result = validateProgram(program);
		assert.equal(result.valid, true);
		assert.deepEqual(result.errors, []);
		assert.deepEqual(result.value, program);
	});

	it("rejects unknown statement kinds", () => {
		const errors = errorsOf({ kind: "block", statements: [{ kind: "goto" }] });
		assert.ok(errors.length > 0);
		assert.ok(errors.every((e) => e.path.startsWith("statements")));
	});

	it("rejects a non-block root", () => {
		const errors = errorsOf({ kind: "if" });
		assert.ok(errors.length > 0);
	});

	it("rejects a switch without cases", () => {
		errorsOf({ kind: "block", statements: [{ kind: "switch", expression: lit(1), cases: [] }] });
	});
});

describe("validateProgram - names", () => {
	it("undeclared identifier", () => {
		assert.deepEqual(firstError(block(letVar("x", ident("y")))), {
			path: "statements.0.value",
			message: "Undeclared identifier: y",
		});
	});

	it("a variable is not visible before its declaration", () => {
		assert.deepEqual(firstError(block(letVar("x", ident("x")))), {
			path: "statements.0.value",
			message: "Undeclared identifier: x",
		});
	});

	it("redeclaration in a nested block", () => {
		assert.deepEqual(firstError(block(letVar("x", lit(1)), block(letVar("x", lit(2))))), {
			path: "statements.1.statements.0.names.0",
			message: "Name already declared: x",
		});
	});

	it("names may be reused after their block ends", () => {
		const result = validateProgram(block(block(letVar("x", lit(1))), letVar("x", lit(2))));
		assert.equal(result.valid, true);
	});

	it("a builtin name cannot be declared", () => {
		assert.deepEqual(firstError(block(letVar("add", lit(1)))), {
			path: "statements.0.names.0",
			message: "Name collides with a builtin: add",
		});
	});

	it("duplicate function definitions", () => {
		assert.deepEqual(
			firstError(block(funcDef("f", [], [], block()), funcDef("f", [], [], block()))),
			{ path: "statements.1", message: "Duplicate function definition: f" },
		);
	});

	it("duplicate parameters", () => {
		assert.deepEqual(firstError(block(funcDef("f", ["a"], ["a"], block()))), {
			path: "statements.0",
			message: "Duplicate parameter or return variable: a",
		});
	});

	it("functions do not see variables of enclosing functions", () => {
		const program = block(
			letVar("x", lit(1)),
			funcDef("f", [], ["r"], block(assign("r", ident("x")))),
		);
		assert.deepEqual(firstError(program), {
			path: "statements.1.body.statements.0.value",
			message: "Undeclared identifier: x",
		});
	});

	it("mutually recursive functions may be called before their definition", () => {
		const program = block(
			letVar("r", call("ping", lit(3))),
			funcDef("ping", ["n"], ["p"], block(assign("p", call("pong", ident("n"))))),
			funcDef("pong", ["n"], ["q"], block(assign("q", call("ping", ident("n"))))),
		);
		assert.equal(validateProgram(program).valid, true);
	});
});

describe("validateProgram - calls and values", () => {
	it("unknown function", () => {
		assert.deepEqual(firstError(block(letVar("x", call("foo")))), {
			path: "statements.0.value",
			message: "Function not found: foo",
		});
	});

	it("builtin argument count", () => {
		assert.deepEqual(firstError(block(letVar("x", call("add", lit(1))))), {
			path: "statements.0.value",
			message: "add expects 2 arguments, got 1",
		});
	});

	it("user function argument count", () => {
		const program = block(funcDef("f", ["a"], [], block()), exprStmt(call("f")));
		assert.deepEqual(firstError(program), {
			path: "statements.1.expression",
			message: "f expects 1 arguments, got 0",
		});
	});

	it("expression statements must not produce values", () => {
		assert.deepEqual(firstError(block(exprStmt(call("add", lit(1), lit(2))))), {
			path: "statements.0.expression",
			message: "Expression statement must not produce values, got 1",
		});
	});

	it("side-effect builtins are valid expression statements", () => {
		assert.equal(validateProgram(block(exprStmt(call("sstore", lit(0), lit(1))))).valid, true);
	});

	it("declarations need one value per name", () => {
		const program = block(funcDef("f", [], ["a", "b"], block()), letVar("x", call("f")));
		assert.deepEqual(firstError(program), {
			path: "statements.1.value",
			message: "Expected 1 values, got 2",
		});
	});

	it("arguments must be single-valued", () => {
		const program = block(
			funcDef("f", [], ["a", "b"], block()),
			letVar("x", call("add", call("f"), lit(1))),
		);
		assert.deepEqual(firstError(program), {
			path: "statements.1.value.args.0",
			message: "Function argument must produce exactly one value, got 2",
		});
	});

	it("literal-only arguments must be literals", () => {
		const program = block(letVar("n", lit(1)), letVar("s", call("datasize", ident("n"))));
		assert.deepEqual(firstError(program), {
			path: "statements.1.value.args.0",
			message: "Argument 0 of datasize must be a literal",
		});
		assert.equal(validateProgram(block(letVar("s", call("datasize", strLit("code"))))).valid, true);
	});

	it("malformed literals", () => {
		assert.deepEqual(firstError(block(letVar("x", lit("12abc")))), {
			path: "statements.0.value",
			message: 'Invalid literal "12abc": not a decimal or hex number',
		});
	});
});

describe("validateProgram - assignments", () => {
	it("assignment to an undeclared variable", () => {
		assert.deepEqual(firstError(block(assign("x", lit(1)))), {
			path: "statements.0.targets.0",
			message: "Assignment to undeclared variable: x",
		});
	});

	it("assignment to a function", () => {
		assert.deepEqual(firstError(block(funcDef("f", [], [], block()), assign("f", lit(1)))), {
			path: "statements.1.targets.0",
			message: "Cannot assign to function: f",
		});
	});

	it("the same variable assigned twice", () => {
		const program = block(
			letVar("x"),
			funcDef("pair", [], ["a", "b"], block()),
			assign(["x", "x"], call("pair")),
		);
		assert.deepEqual(firstError(program), {
			path: "statements.2.targets.1",
			message: "Variable assigned twice: x",
		});
	});
});

describe("validateProgram - switch", () => {
	it("default must come last", () => {
		const program = block(
			switchStmt(lit(1), defaultClause(block()), caseClause(lit(1), block())),
		);
		assert.deepEqual(firstError(program), {
			path: "statements.0.cases.0",
			message: "Default case must be the last case",
		});
	});

	it("case values must be distinct", () => {
		const program = block(
			switchStmt(lit(1), caseClause(lit(1), block()), caseClause(lit("0x1"), block())),
		);
		const [error] = errorsOf(program);
		assert.deepEqual(error, {
			path: "statements.0.cases.1",
			message: "Duplicate case value",
			value: "0x1",
		});
	});
});

describe("validateProgram - control flow placement", () => {
	it("break outside a loop", () => {
		assert.deepEqual(firstError(block(breakStmt())), {
			path: "statements.0",
			message: '"break" is only allowed inside a for-loop body',
		});
	});

	it("break in a post block", () => {
		const program = block(forLoop(block(), lit(1), block(breakStmt()), block()));
		assert.deepEqual(firstError(program), {
			path: "statements.0.post.statements.0",
			message: '"break" is only allowed inside a for-loop body',
		});
	});

	it("break in a function defined inside a loop body", () => {
		const program = block(
			forLoop(block(), lit(1), block(), block(funcDef("f", [], [], block(breakStmt())))),
		);
		assert.deepEqual(firstError(program), {
			path: "statements.0.body.statements.0.body.statements.0",
			message: '"break" is only allowed inside a for-loop body',
		});
	});

	it("break in a nested block of a loop body is allowed", () => {
		const program = block(forLoop(block(), lit(1), block(), block(block(breakStmt()))));
		assert.equal(validateProgram(program).valid, true);
	});

	it("leave outside a function", () => {
		assert.deepEqual(firstError(block(leaveStmt())), {
			path: "statements.0",
			message: '"leave" is only allowed inside a function',
		});
	});

	it("function definitions in a loop init block", () => {
		const program = block(forLoop(block(funcDef("g", [], [], block())), lit(0), block(), block()));
		assert.deepEqual(firstError(program), {
			path: "statements.0.pre.statements.0",
			message: "Function definitions are not allowed in a for-loop init block",
		});
	});

	it("loop init variables are visible in condition, body and post", () => {
		const program = block(
			forLoop(
				block(letVar("i", lit(0))),
				call("lt", ident("i"), lit(3)),
				block(assign("i", call("add", ident("i"), lit(1)))),
				block(exprStmt(call("sstore", ident("i"), ident("i")))),
			),
		);
		assert.equal(validateProgram(program).valid, true);
	});
});

describe("validateProgram - dialects", () => {
	const program = block(letVar("x", call("i64.add", lit(1), lit(2))));

	it("accepts the linear-memory builtins under that dialect", () => {
		assert.equal(validateProgram(program, "wasm").valid, true);
	});

	it("does not know them under the EVM dialect", () => {
		assert.deepEqual(
			errorsOf(program, "evm").map((e) => e.message),
			["Function not found: i64.add"],
		);
	});
});

describe("loadProgram", () => {
	it("returns the parsed program", () => {
		const json = JSON.stringify(block(letVar("x", lit(1))));
		const program: Block = loadProgram(JSON.parse(json));
		assert.equal(program.statements.length, 1);
	});

	it("throws the first problem as a ValidationError", () => {
		assert.throws(
			() => loadProgram(block(letVar("x", ident("y")))),
			(err: unknown) =>
				err instanceof IRSimError &&
				err.code === ErrorCodes.ValidationError &&
				err.message === "Validation error at statements.0.value: Undeclared identifier: y",
		);
	});
});
