// IRSim Scope Tree
// Arena of lexical scopes; children are keyed by block identity and reused on re-entry

import { IRSimError } from "./errors.ts";
import type { Block, FunctionDefinition, Word } from "./types.ts";

export type ScopeId = number;

export interface ScopeRecord {
	/** Declared names; `null` marks a variable, otherwise the function it names. */
	names: Map<string, FunctionDefinition | null>;
	parent: ScopeId | null;
	children: Map<Block, ScopeId>;
}

export interface FunctionLookup {
	scope: ScopeId;
	fn: FunctionDefinition;
}

export class ScopeArena {
	private readonly records: ScopeRecord[] = [];
	readonly root: ScopeId;

	constructor() {
		this.root = this.allocate(null);
	}

	private allocate(parent: ScopeId | null): ScopeId {
		this.records.push({ names: new Map(), parent, children: new Map() });
		return this.records.length - 1;
	}

	get(id: ScopeId): ScopeRecord {
		const record = this.records[id];
		if (record === undefined) {
			throw new Error("Unknown scope id: " + String(id));
		}
		return record;
	}

	get size(): number {
		return this.records.length;
	}

	/**
	 * Child scope of `current` for `block`, created on first entry.
	 */
	enterScope(current: ScopeId, block: Block): ScopeId {
		const children = this.get(current).children;
		const existing = children.get(block);
		if (existing !== undefined) return existing;
		const child = this.allocate(current);
		children.set(block, child);
		return child;
	}

	/**
	 * Drop the scope's variables from the activation table and return the parent.
	 * Function names stay registered.
	 */
	leaveScope(current: ScopeId, variables: Map<string, Word>): ScopeId {
		const record = this.get(current);
		for (const [name, fn] of record.names) {
			if (fn === null) variables.delete(name);
		}
		if (record.parent === null) {
			throw IRSimError.scopeUnderflow();
		}
		return record.parent;
	}

	declareVariable(scope: ScopeId, name: string): void {
		this.get(scope).names.set(name, null);
	}

	declareFunction(scope: ScopeId, fn: FunctionDefinition): void {
		this.get(scope).names.set(fn.name, fn);
	}

	/**
	 * Walk outwards from `scope` to the first scope declaring `name` as a function.
	 */
	lookupFunction(scope: ScopeId, name: string): FunctionLookup | undefined {
		let current: ScopeId | null = scope;
		while (current !== null) {
			const record = this.get(current);
			const fn = record.names.get(name);
			if (fn) return { scope: current, fn };
			current = record.parent;
		}
		return undefined;
	}
}
