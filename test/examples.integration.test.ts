// IRSim Example Programs
// Validates and runs every example document and checks its expected outcome

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { relative } from "node:path";
import { fileURLToPath } from "node:url";
import { globSync } from "glob";
import { z } from "zod/v4";

import { interpret, loadProgram, resolveOptions } from "../src/index.ts";

//==============================================================================
// Discovery
//==============================================================================

const ExampleSchema = z.object({
	description: z.string(),
	options: z.record(z.string(), z.unknown()).optional(),
	program: z.unknown(),
	expected: z.object({
		outcome: z.enum(["ok", "stepLimit", "nestingLimit", "domainError"]),
		globals: z.record(z.string(), z.string()).optional(),
		trace: z.array(z.string()),
	}),
});

type Example = z.infer<typeof ExampleSchema> & { relativePath: string };

function discoverExamples(): Example[] {
	const root = fileURLToPath(new URL("..", import.meta.url));
	const files = globSync("examples/**/*.ir.json", { cwd: root, absolute: true }).sort();
	return files.map((filePath) => {
		const doc = ExampleSchema.parse(JSON.parse(readFileSync(filePath, "utf-8")));
		return { ...doc, relativePath: relative(root, filePath) };
	});
}

//==============================================================================
// Tests
//==============================================================================

const examples = discoverExamples();

describe("Example programs", () => {
	it("finds the example documents", () => {
		assert.ok(examples.length >= 5);
	});

	for (const example of examples) {
		it(example.relativePath + ": " + example.description, () => {
			const options = example.options ?? {};
			const program = loadProgram(example.program, resolveOptions(options).dialect);
			const result = interpret(program, options);

			assert.equal(result.outcome, example.expected.outcome);
			assert.deepEqual(result.state.trace, example.expected.trace);

			const { globals } = example.expected;
			if (globals !== undefined) {
				assert.ok(result.outcome === "ok");
				const actual = Object.fromEntries(
					[...result.value].map(([name, value]) => [name, value.toString()]),
				);
				assert.deepEqual(actual, globals);
			}
		});
	}
});
