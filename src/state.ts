// IRSim Execution State
// Memory, storage, trace and step accounting shared by every frame of one run

import { IRSimError } from "./errors.ts";
import {
	ControlFlow,
	type ControlFlowSignal,
	toHex32,
	WORD_BYTES,
	type Word,
} from "./types.ts";

//==============================================================================
// State Shape
//==============================================================================

export interface DataObject {
	name: string;
	data: Uint8Array;
}

export interface InterpreterState {
	/** Append-only log of observable events, in emission order. */
	trace: string[];
	/** Byte offset → byte value; absent bytes read as zero. */
	memory: Map<bigint, number>;
	storage: Map<Word, Word>;
	/** Highest accessed memory offset, rounded up to a word boundary. */
	msize: bigint;
	numSteps: number;
	/** 0 = unlimited */
	maxSteps: number;
	/** 0 = unlimited */
	maxExprNesting: number;
	controlFlow: ControlFlowSignal;
	calldata: Uint8Array;
	address: Word;
	caller: Word;
	callvalue: Word;
	dataObjects: DataObject[];
}

export type StateInit = Partial<
	Pick<
		InterpreterState,
		| "maxSteps"
		| "maxExprNesting"
		| "calldata"
		| "address"
		| "caller"
		| "callvalue"
		| "dataObjects"
	>
>;

export const STEP_LIMIT_TRACE = "Interpreter execution step limit reached.";
export const NESTING_LIMIT_TRACE = "Maximum expression nesting level reached.";

export function createInterpreterState(init: StateInit = {}): InterpreterState {
	return {
		trace: [],
		memory: new Map(),
		storage: new Map(),
		msize: 0n,
		numSteps: 0,
		maxSteps: init.maxSteps ?? 0,
		maxExprNesting: init.maxExprNesting ?? 0,
		controlFlow: ControlFlow.Default,
		calldata: init.calldata ?? new Uint8Array(0),
		address: init.address ?? 0n,
		caller: init.caller ?? 0n,
		callvalue: init.callvalue ?? 0n,
		dataObjects: init.dataObjects ?? [],
	};
}

//==============================================================================
// Step Accounting
//==============================================================================

/**
 * Count one executed statement. Throws once the configured budget is used up;
 * the trace gets a final line before the throw.
 */
export function incrementStep(state: InterpreterState): void {
	state.numSteps++;
	if (state.maxSteps > 0 && state.numSteps >= state.maxSteps) {
		state.trace.push(STEP_LIMIT_TRACE);
		throw IRSimError.stepLimit(state.maxSteps);
	}
}

//==============================================================================
// Memory Access
//==============================================================================

function touch(state: InterpreterState, offset: bigint, size: number): void {
	if (size === 0) return;
	const end = offset + BigInt(size);
	const words = (end + BigInt(WORD_BYTES) - 1n) / BigInt(WORD_BYTES);
	const rounded = words * BigInt(WORD_BYTES);
	if (rounded > state.msize) state.msize = rounded;
}

export function readByte(state: InterpreterState, offset: bigint): number {
	return state.memory.get(offset) ?? 0;
}

export function writeByte(state: InterpreterState, offset: bigint, value: number): void {
	touch(state, offset, 1);
	state.memory.set(offset, value & 0xff);
}

/**
 * Read `size` bytes at `offset` as an unsigned integer.
 */
export function readMemory(
	state: InterpreterState,
	offset: bigint,
	size: number,
	littleEndian = false,
): bigint {
	touch(state, offset, size);
	let value = 0n;
	for (let i = 0; i < size; i++) {
		const at = littleEndian ? offset + BigInt(size - 1 - i) : offset + BigInt(i);
		value = (value << 8n) | BigInt(readByte(state, at));
	}
	return value;
}

/**
 * Write the low `size` bytes of `value` at `offset`.
 */
export function writeMemory(
	state: InterpreterState,
	offset: bigint,
	size: number,
	value: bigint,
	littleEndian = false,
): void {
	touch(state, offset, size);
	let rest = value;
	for (let i = 0; i < size; i++) {
		const at = littleEndian ? offset + BigInt(i) : offset + BigInt(size - 1 - i);
		state.memory.set(at, Number(rest & 0xffn));
		rest >>= 8n;
	}
}

//==============================================================================
// Dump
//==============================================================================

/**
 * Human-readable rendering of the trace, the non-zero memory words and the
 * non-zero storage slots.
 */
export function dumpTraceAndState(state: InterpreterState): string {
	let out = "Trace:\n";
	for (const line of state.trace) {
		out += "  " + line + "\n";
	}

	out += "Memory dump:\n";
	const words = new Map<bigint, bigint>();
	const width = BigInt(WORD_BYTES);
	for (const [offset, byte] of state.memory) {
		const base = (offset / width) * width;
		const shift = 8n * (width - 1n - (offset % width));
		words.set(base, (words.get(base) ?? 0n) | (BigInt(byte) << shift));
	}
	for (const [offset, value] of sortedEntries(words)) {
		if (value !== 0n) {
			out += "  " + offset.toString(16).toUpperCase().padStart(4, " ") + ": " + toHex32(value) + "\n";
		}
	}

	out += "Storage dump:\n";
	for (const [key, value] of sortedEntries(state.storage)) {
		if (value !== 0n) {
			out += "  " + toHex32(key) + ": " + toHex32(value) + "\n";
		}
	}
	return out;
}

function sortedEntries(map: Map<bigint, bigint>): [bigint, bigint][] {
	return [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
