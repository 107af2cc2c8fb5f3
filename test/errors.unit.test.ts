import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	ErrorCodes,
	exhaustive,
	invalidResult,
	IRSimError,
	isLimitError,
	validResult,
} from "../src/errors.ts";

describe("IRSimError class", () => {
	it("constructor sets code, message and name", () => {
		const err = new IRSimError(ErrorCodes.DomainError, "test msg");
		assert.equal(err.code, "DomainError");
		assert.equal(err.message, "test msg");
		assert.equal(err.name, "IRSimError");
		assert.ok(err instanceof Error);
	});
});

describe("Static factories", () => {
	it("stepLimit names the configured maximum", () => {
		const err = IRSimError.stepLimit(50);
		assert.equal(err.code, ErrorCodes.StepLimitReached);
		assert.equal(err.message, "Step limit reached after 50 steps");
	});

	it("nestingLimit names the configured maximum", () => {
		const err = IRSimError.nestingLimit(8);
		assert.equal(err.code, ErrorCodes.ExpressionNestingLimitReached);
		assert.equal(err.message, "Expression nesting level exceeded 8");
	});

	it("arityMismatch reports expected and actual counts", () => {
		const err = IRSimError.arityMismatch(2, 3, "assignment");
		assert.equal(err.code, ErrorCodes.ArityMismatch);
		assert.equal(err.message, "Arity mismatch: assignment expects 2 values, got 3");
	});

	it("unknownBuiltin qualifies the name with the dialect", () => {
		const err = IRSimError.unknownBuiltin("wasm", "mload");
		assert.equal(err.message, "Unknown builtin: wasm:mload");
	});

	it("invalidLiteral quotes the offending text", () => {
		const err = IRSimError.invalidLiteral("0xZZ", "not a decimal or hex number");
		assert.equal(err.code, ErrorCodes.InvalidLiteral);
		assert.equal(err.message, 'Invalid literal "0xZZ": not a decimal or hex number');
	});

	it("validation without value", () => {
		const err = IRSimError.validation("statements.0", "bad node");
		assert.equal(err.code, ErrorCodes.ValidationError);
		assert.equal(err.message, "Validation error at statements.0: bad node");
	});

	it("validation with value appends its JSON form", () => {
		const err = IRSimError.validation("maxSteps", "too small", -1);
		assert.equal(err.message, "Validation error at maxSteps: too small (value: -1)");
	});

	it("name-based factories", () => {
		assert.equal(IRSimError.unboundIdentifier("x").message, "Unbound identifier: x");
		assert.equal(IRSimError.redeclaration("x").message, "Variable already declared: x");
		assert.equal(IRSimError.unknownFunction("f").message, "Function not found: f");
		assert.equal(IRSimError.scopeUnderflow().code, ErrorCodes.ScopeUnderflow);
	});
});

describe("isLimitError", () => {
	it("accepts both limit failures", () => {
		assert.equal(isLimitError(IRSimError.stepLimit(1)), true);
		assert.equal(isLimitError(IRSimError.nestingLimit(1)), true);
	});

	it("rejects other errors", () => {
		assert.equal(isLimitError(IRSimError.unknownFunction("f")), false);
		assert.equal(isLimitError(new Error("Step limit reached")), false);
		assert.equal(isLimitError("StepLimitReached"), false);
	});
});

describe("Validation results", () => {
	it("validResult carries the value and no errors", () => {
		const result = validResult(42);
		assert.equal(result.valid, true);
		assert.deepEqual(result.errors, []);
		assert.equal(result.value, 42);
	});

	it("invalidResult carries errors and no value", () => {
		const result = invalidResult<number>([{ path: "a", message: "b" }]);
		assert.equal(result.valid, false);
		assert.equal(result.errors.length, 1);
		assert.equal("value" in result, false);
	});
});

describe("exhaustive", () => {
	it("throws for any value reaching it", () => {
		assert.throws(() => exhaustive("surprise" as never), /Unexpected value: surprise/);
	});
});
