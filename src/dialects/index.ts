// IRSim Dialects
// Dialect selection by name

import { exhaustive } from "../errors.ts";
import { createEvmDialect } from "./evm.ts";
import type { Dialect, DialectName } from "./registry.ts";
import { createWasmDialect } from "./wasm.ts";

export function createDialectByName(name: DialectName): Dialect {
	switch (name) {
		case "evm":
			return createEvmDialect();
		case "wasm":
			return createWasmDialect();
		default:
			return exhaustive(name);
	}
}
