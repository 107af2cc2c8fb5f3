// IRSim Type Definitions
// Word domain, control-flow signal, and re-exports of the AST domain

import { IRSimError, exhaustive } from "./errors.ts";
import type { Literal } from "./zod-schemas.ts";

export type {
	Assignment, Block, Break, Case, Continue, Expression, ExpressionStatement,
	ForLoop, FunctionCall, FunctionDefinition, Identifier, If, Leave, Literal,
	LiteralKind, Statement, Switch, VariableDeclaration,
} from "./zod-schemas.ts";

//==============================================================================
// Word Domain
//==============================================================================

/** 256-bit unsigned integer, always kept in [0, 2^256). */
export type Word = bigint;

export const WORD_BITS = 256n;
export const WORD_BYTES = 32;
export const WORD_MODULUS: Word = 1n << WORD_BITS;
export const WORD_MASK: Word = WORD_MODULUS - 1n;

/**
 * Reduce an arbitrary bigint (possibly negative) modulo 2^256.
 */
export function toWord(value: bigint): Word {
	const r = value % WORD_MODULUS;
	return r < 0n ? r + WORD_MODULUS : r;
}

export function boolWord(b: boolean): Word {
	return b ? 1n : 0n;
}

/** Two's-complement view of a word. */
export function toSigned(w: Word): bigint {
	return w >= 1n << (WORD_BITS - 1n) ? w - WORD_MODULUS : w;
}

/**
 * Render as 0x-prefixed lower-case hex without leading zeros (0 → "0x0").
 */
export function toHex(w: Word): string {
	return "0x" + w.toString(16);
}

/**
 * Render as exactly 64 lower-case hex digits, no prefix.
 */
export function toHex32(w: Word): string {
	return w.toString(16).padStart(WORD_BYTES * 2, "0");
}

/**
 * Parse a decimal or 0x-prefixed hex string into a word.
 */
export function parseWord(text: string): Word {
	if (!/^(0x[0-9a-fA-F]+|[0-9]+)$/.test(text)) {
		throw IRSimError.invalidLiteral(text, "not a decimal or hex number");
	}
	const value = BigInt(text);
	if (value > WORD_MASK) {
		throw IRSimError.invalidLiteral(text, "does not fit in 256 bits");
	}
	return value;
}

/**
 * Decode a hex byte string (optional 0x prefix) into bytes.
 */
export function hexToBytes(hex: string): Uint8Array {
	const digits = hex.startsWith("0x") ? hex.slice(2) : hex;
	const bytes = new Uint8Array(digits.length / 2);
	for (let i = 0; i < bytes.length; i++) {
		bytes[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}

//==============================================================================
// Literal Decoding
//==============================================================================

/**
 * Numeric value of a literal: numbers as written, true/false as 1/0, strings
 * as their UTF-8 bytes left-aligned in the word.
 */
export function valueOfLiteral(lit: Literal): Word {
	switch (lit.literalKind) {
		case "number":
			return parseWord(lit.value);
		case "boolean":
			if (lit.value === "true") return 1n;
			if (lit.value === "false") return 0n;
			throw IRSimError.invalidLiteral(lit.value, "not a boolean");
		case "string":
			return stringToWord(lit.value);
		default:
			return exhaustive(lit.literalKind);
	}
}

function stringToWord(text: string): Word {
	const bytes = new TextEncoder().encode(text);
	if (bytes.length > WORD_BYTES) {
		throw IRSimError.invalidLiteral(text, "string longer than 32 bytes");
	}
	let w = 0n;
	for (let i = 0; i < WORD_BYTES; i++) {
		w = (w << 8n) | (i < bytes.length ? BigInt(bytes[i]) : 0n);
	}
	return w;
}

//==============================================================================
// Control Flow
//==============================================================================

export const ControlFlow = {
	Default: "Default",
	Break: "Break",
	Continue: "Continue",
	Leave: "Leave",
} as const;

export type ControlFlowSignal = (typeof ControlFlow)[keyof typeof ControlFlow];
