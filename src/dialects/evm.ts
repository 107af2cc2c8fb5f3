// IRSim EVM Dialect
// Stack-machine builtins over 256-bit words, byte-addressed memory and word storage

import { IRSimError } from "../errors.ts";
import { readMemory, writeByte, writeMemory } from "../state.ts";
import type { InterpreterState } from "../state.ts";
import {
	boolWord,
	toSigned,
	toWord,
	WORD_BITS,
	WORD_BYTES,
	WORD_MASK,
	type Word,
} from "../types.ts";
import {
	arg,
	type Builtin,
	type BuiltinCall,
	createBuiltinRegistry,
	createDialect,
	defineBuiltin,
	type Dialect,
	logTrace,
} from "./registry.ts";

//==============================================================================
// Helpers
//==============================================================================

type Binary = (a: Word, b: Word) => Word;

function binary(name: string, fn: Binary): Builtin {
	return defineBuiltin("evm", name)
		.setArity(2)
		.setImpl((call) => toWord(fn(arg(call, 0), arg(call, 1))))
		.build();
}

function unary(name: string, fn: (a: Word) => Word): Builtin {
	return defineBuiltin("evm", name)
		.setArity(1)
		.setImpl((call) => toWord(fn(arg(call, 0))))
		.build();
}

/** Exclusive upper bound on addressable memory. */
const MEMORY_LIMIT = 1n << 32n;

/** Accesses past the addressable range read as zero and write nothing. */
function inMemoryRange(offset: Word, size: number): boolean {
	return offset + BigInt(size) <= MEMORY_LIMIT;
}

function sdiv(a: Word, b: Word): Word {
	if (b === 0n) return 0n;
	// bigint division truncates toward zero
	return toSigned(a) / toSigned(b);
}

function smod(a: Word, b: Word): Word {
	if (b === 0n) return 0n;
	return toSigned(a) % toSigned(b);
}

function exp(base: Word, exponent: Word): Word {
	let result = 1n;
	let b = base;
	let e = exponent;
	while (e > 0n) {
		if ((e & 1n) === 1n) result = (result * b) & WORD_MASK;
		b = (b * b) & WORD_MASK;
		e >>= 1n;
	}
	return result;
}

function signextend(byteIndex: Word, value: Word): Word {
	if (byteIndex >= 31n) return value;
	const bits = (byteIndex + 1n) * 8n;
	const signBit = 1n << (bits - 1n);
	const low = value & ((1n << bits) - 1n);
	return (low & signBit) !== 0n ? low | (WORD_MASK ^ ((1n << bits) - 1n)) : low;
}

function byteOf(index: Word, value: Word): Word {
	if (index >= 32n) return 0n;
	return (value >> (8n * (31n - index))) & 0xffn;
}

function sar(shift: Word, value: Word): Word {
	const signed = toSigned(value);
	if (shift >= WORD_BITS) return signed < 0n ? -1n : 0n;
	return signed >> shift;
}

//==============================================================================
// Arithmetic, Comparison and Bitwise
//==============================================================================

const arithmetic: Builtin[] = [
	binary("add", (a, b) => a + b),
	binary("sub", (a, b) => a - b),
	binary("mul", (a, b) => a * b),
	binary("div", (a, b) => (b === 0n ? 0n : a / b)),
	binary("sdiv", sdiv),
	binary("mod", (a, b) => (b === 0n ? 0n : a % b)),
	binary("smod", smod),
	binary("exp", exp),
	binary("signextend", signextend),
	defineBuiltin("evm", "addmod")
		.setArity(3)
		.setImpl((call) => {
			const m = arg(call, 2);
			return m === 0n ? 0n : (arg(call, 0) + arg(call, 1)) % m;
		})
		.build(),
	defineBuiltin("evm", "mulmod")
		.setArity(3)
		.setImpl((call) => {
			const m = arg(call, 2);
			return m === 0n ? 0n : (arg(call, 0) * arg(call, 1)) % m;
		})
		.build(),
];

const comparison: Builtin[] = [
	binary("lt", (a, b) => boolWord(a < b)),
	binary("gt", (a, b) => boolWord(a > b)),
	binary("slt", (a, b) => boolWord(toSigned(a) < toSigned(b))),
	binary("sgt", (a, b) => boolWord(toSigned(a) > toSigned(b))),
	binary("eq", (a, b) => boolWord(a === b)),
	unary("iszero", (a) => boolWord(a === 0n)),
];

const bitwise: Builtin[] = [
	binary("and", (a, b) => a & b),
	binary("or", (a, b) => a | b),
	binary("xor", (a, b) => a ^ b),
	unary("not", (a) => a ^ WORD_MASK),
	binary("byte", byteOf),
	binary("shl", (shift, value) => (shift >= WORD_BITS ? 0n : value << shift)),
	binary("shr", (shift, value) => (shift >= WORD_BITS ? 0n : value >> shift)),
	binary("sar", sar),
];

//==============================================================================
// Memory and Storage
//==============================================================================

const memory: Builtin[] = [
	defineBuiltin("evm", "mload")
		.setArity(1)
		.setImpl((call) => {
			const offset = arg(call, 0);
			return inMemoryRange(offset, WORD_BYTES) ? readMemory(call.state, offset, WORD_BYTES) : 0n;
		})
		.build(),
	defineBuiltin("evm", "mstore")
		.setArity(2)
		.setReturnsValue(false)
		.setImpl((call) => {
			const offset = arg(call, 0);
			logTrace(call.state, "MSTORE", call.args);
			if (inMemoryRange(offset, WORD_BYTES)) {
				writeMemory(call.state, offset, WORD_BYTES, arg(call, 1));
			}
			return 0n;
		})
		.build(),
	defineBuiltin("evm", "mstore8")
		.setArity(2)
		.setReturnsValue(false)
		.setImpl((call) => {
			const offset = arg(call, 0);
			logTrace(call.state, "MSTORE8", call.args);
			if (inMemoryRange(offset, 1)) {
				writeByte(call.state, offset, Number(arg(call, 1) & 0xffn));
			}
			return 0n;
		})
		.build(),
	defineBuiltin("evm", "msize")
		.setImpl(({ state }) => state.msize)
		.build(),
];

const storage: Builtin[] = [
	defineBuiltin("evm", "sload")
		.setArity(1)
		.setImpl((call) => call.state.storage.get(arg(call, 0)) ?? 0n)
		.build(),
	defineBuiltin("evm", "sstore")
		.setArity(2)
		.setReturnsValue(false)
		.setImpl((call) => {
			logTrace(call.state, "SSTORE", call.args);
			call.state.storage.set(arg(call, 0), arg(call, 1));
			return 0n;
		})
		.build(),
];

//==============================================================================
// Environment, Call Data and Logs
//==============================================================================

function calldataload(call: BuiltinCall): Word {
	const { calldata } = call.state;
	const start = arg(call, 0);
	let value = 0n;
	for (let i = 0n; i < BigInt(WORD_BYTES); i++) {
		const at = start + i;
		const byte = at < BigInt(calldata.length) ? calldata[Number(at)] : undefined;
		value = (value << 8n) | BigInt(byte ?? 0);
	}
	return value;
}

function logBuiltin(topics: number): Builtin {
	const name = "log" + String(topics);
	return defineBuiltin("evm", name)
		.setArity(2 + topics)
		.setReturnsValue(false)
		.setImpl((call) => {
			logTrace(call.state, name.toUpperCase(), call.args);
			return 0n;
		})
		.build();
}

const environment: Builtin[] = [
	defineBuiltin("evm", "calldataload").setArity(1).setImpl(calldataload).build(),
	defineBuiltin("evm", "calldatasize")
		.setImpl(({ state }) => BigInt(state.calldata.length))
		.build(),
	defineBuiltin("evm", "address").setImpl(({ state }) => state.address).build(),
	defineBuiltin("evm", "caller").setImpl(({ state }) => state.caller).build(),
	defineBuiltin("evm", "callvalue").setImpl(({ state }) => state.callvalue).build(),
	defineBuiltin("evm", "pop").setArity(1).setReturnsValue(false).setImpl(() => 0n).build(),
	logBuiltin(0),
	logBuiltin(1),
	logBuiltin(2),
];

//==============================================================================
// Data Objects (literal-argument builtins)
//==============================================================================

function dataObjectName(call: BuiltinCall, builtinName: string): string {
	const raw = call.rawArgs[0];
	if (raw?.kind !== "literal" || raw.literalKind !== "string") {
		throw IRSimError.domainError(builtinName + " expects a string literal argument");
	}
	return raw.value;
}

function locateDataObject(state: InterpreterState, name: string): { offset: bigint; size: bigint } {
	let offset = 0n;
	for (const object of state.dataObjects) {
		const size = BigInt(object.data.length);
		if (object.name === name) return { offset, size };
		offset += size;
	}
	throw IRSimError.domainError("Unknown data object: " + name);
}

const data: Builtin[] = [
	defineBuiltin("evm", "datasize")
		.setArity(1)
		.setLiteralArguments(true)
		.setImpl((call) => locateDataObject(call.state, dataObjectName(call, "datasize")).size)
		.build(),
	defineBuiltin("evm", "dataoffset")
		.setArity(1)
		.setLiteralArguments(true)
		.setImpl((call) => locateDataObject(call.state, dataObjectName(call, "dataoffset")).offset)
		.build(),
];

//==============================================================================
// Dialect
//==============================================================================

export const evmBuiltins: Builtin[] = [
	...arithmetic,
	...comparison,
	...bitwise,
	...memory,
	...storage,
	...environment,
	...data,
];

export function createEvmDialect(): Dialect {
	return createDialect("evm", createBuiltinRegistry(evmBuiltins));
}
