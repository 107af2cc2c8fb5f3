// IRSim Linear-Memory Dialect
// 64/32-bit integer builtins over little-endian linear memory

import { readMemory, writeMemory } from "../state.ts";
import { boolWord } from "../types.ts";
import {
	arg,
	type Builtin,
	createBuiltinRegistry,
	createDialect,
	defineBuiltin,
	type Dialect,
	logTrace,
} from "./registry.ts";

const MASK64 = (1n << 64n) - 1n;
const MASK32 = (1n << 32n) - 1n;

type Width = 32 | 64;

function maskOf(width: Width): bigint {
	return width === 64 ? MASK64 : MASK32;
}

function binary(width: Width, op: string, fn: (a: bigint, b: bigint) => bigint): Builtin {
	const mask = maskOf(width);
	return defineBuiltin("wasm", "i" + String(width) + "." + op)
		.setArity(2)
		.setImpl((call) => fn(arg(call, 0) & mask, arg(call, 1) & mask) & mask)
		.build();
}

function unary(width: Width, op: string, fn: (a: bigint) => bigint): Builtin {
	const mask = maskOf(width);
	return defineBuiltin("wasm", "i" + String(width) + "." + op)
		.setArity(1)
		.setImpl((call) => fn(arg(call, 0) & mask) & mask)
		.build();
}

function clz64(a: bigint): bigint {
	let count = 0n;
	for (let bit = 63n; bit >= 0n; bit--) {
		if (((a >> bit) & 1n) === 1n) break;
		count++;
	}
	return count;
}

//==============================================================================
// Integer Operations
//==============================================================================

const integer: Builtin[] = [
	binary(64, "add", (a, b) => a + b),
	binary(64, "sub", (a, b) => a - b),
	binary(64, "mul", (a, b) => a * b),
	binary(64, "div_u", (a, b) => (b === 0n ? 0n : a / b)),
	binary(64, "rem_u", (a, b) => (b === 0n ? 0n : a % b)),
	binary(64, "and", (a, b) => a & b),
	binary(64, "or", (a, b) => a | b),
	binary(64, "xor", (a, b) => a ^ b),
	binary(64, "shl", (a, b) => a << (b % 64n)),
	binary(64, "shr_u", (a, b) => a >> (b % 64n)),
	binary(64, "eq", (a, b) => boolWord(a === b)),
	binary(64, "ne", (a, b) => boolWord(a !== b)),
	binary(64, "lt_u", (a, b) => boolWord(a < b)),
	binary(64, "gt_u", (a, b) => boolWord(a > b)),
	unary(64, "eqz", (a) => boolWord(a === 0n)),
	unary(64, "clz", clz64),
	binary(32, "add", (a, b) => a + b),
	binary(32, "sub", (a, b) => a - b),
	unary(32, "eqz", (a) => boolWord(a === 0n)),
	defineBuiltin("wasm", "i32.wrap_i64")
		.setArity(1)
		.setImpl((call) => arg(call, 0) & MASK32)
		.build(),
	defineBuiltin("wasm", "i64.extend_i32_u")
		.setArity(1)
		.setImpl((call) => arg(call, 0) & MASK32)
		.build(),
	defineBuiltin("wasm", "drop").setArity(1).setReturnsValue(false).setImpl(() => 0n).build(),
];

//==============================================================================
// Linear Memory
//==============================================================================

/** Out-of-range loads give 0 and out-of-range stores are dropped. */
function inBounds(addr: bigint, bytes: number): boolean {
	return addr + BigInt(bytes) <= MASK32 + 1n;
}

function load(name: string, bytes: number): Builtin {
	return defineBuiltin("wasm", name)
		.setArity(1)
		.setImpl((call) => {
			const addr = arg(call, 0);
			return inBounds(addr, bytes) ? readMemory(call.state, addr, bytes, true) : 0n;
		})
		.build();
}

function store(name: string, bytes: number): Builtin {
	const mask = (1n << BigInt(bytes * 8)) - 1n;
	return defineBuiltin("wasm", name)
		.setArity(2)
		.setReturnsValue(false)
		.setImpl((call) => {
			const addr = arg(call, 0);
			const value = arg(call, 1) & mask;
			logTrace(call.state, name, [addr, value]);
			if (inBounds(addr, bytes)) {
				writeMemory(call.state, addr, bytes, value, true);
			}
			return 0n;
		})
		.build();
}

const memory: Builtin[] = [
	load("i64.load", 8),
	load("i32.load", 4),
	store("i64.store", 8),
	store("i32.store", 4),
	store("i64.store8", 1),
];

export const wasmBuiltins: Builtin[] = [...integer, ...memory];

export function createWasmDialect(): Dialect {
	return createDialect("wasm", createBuiltinRegistry(wasmBuiltins));
}

