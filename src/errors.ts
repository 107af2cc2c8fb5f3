// IRSim Error Types
// Error domain for interpreter limits, invariant violations and validation

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Resource exhaustion (terminal for the run)
	StepLimitReached: "StepLimitReached",
	ExpressionNestingLimitReached: "ExpressionNestingLimitReached",

	// Invariant violations (the program was not validated)
	UnboundIdentifier: "UnboundIdentifier",
	Redeclaration: "Redeclaration",
	ArityMismatch: "ArityMismatch",
	UnknownFunction: "UnknownFunction",
	UnknownBuiltin: "UnknownBuiltin",
	InvalidLiteral: "InvalidLiteral",
	ScopeUnderflow: "ScopeUnderflow",
	DomainError: "DomainError",

	// Input errors
	ValidationError: "ValidationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type LimitErrorCode =
	| typeof ErrorCodes.StepLimitReached
	| typeof ErrorCodes.ExpressionNestingLimitReached;

//==============================================================================
// IRSim Error Class
//==============================================================================

export class IRSimError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = "IRSimError";
		this.code = code;
	}

	/**
	 * Create a StepLimitReached error
	 */
	static stepLimit(maxSteps: number): IRSimError {
		return new IRSimError(
			ErrorCodes.StepLimitReached,
			"Step limit reached after " + String(maxSteps) + " steps",
		);
	}

	/**
	 * Create an ExpressionNestingLimitReached error
	 */
	static nestingLimit(maxExprNesting: number): IRSimError {
		return new IRSimError(
			ErrorCodes.ExpressionNestingLimitReached,
			"Expression nesting level exceeded " + String(maxExprNesting),
		);
	}

	static unboundIdentifier(name: string): IRSimError {
		return new IRSimError(
			ErrorCodes.UnboundIdentifier,
			"Unbound identifier: " + name,
		);
	}

	static redeclaration(name: string): IRSimError {
		return new IRSimError(
			ErrorCodes.Redeclaration,
			"Variable already declared: " + name,
		);
	}

	/**
	 * Create an ArityMismatch error
	 */
	static arityMismatch(expected: number, got: number, what: string): IRSimError {
		return new IRSimError(
			ErrorCodes.ArityMismatch,
			"Arity mismatch: " +
				what +
				" expects " +
				String(expected) +
				" values, got " +
				String(got),
		);
	}

	static unknownFunction(name: string): IRSimError {
		return new IRSimError(
			ErrorCodes.UnknownFunction,
			"Function not found: " + name,
		);
	}

	static unknownBuiltin(dialect: string, name: string): IRSimError {
		return new IRSimError(
			ErrorCodes.UnknownBuiltin,
			"Unknown builtin: " + dialect + ":" + name,
		);
	}

	static invalidLiteral(value: string, reason: string): IRSimError {
		return new IRSimError(
			ErrorCodes.InvalidLiteral,
			"Invalid literal " + JSON.stringify(value) + ": " + reason,
		);
	}

	/**
	 * Create a DomainError (a builtin was given arguments it cannot act on)
	 */
	static domainError(message: string): IRSimError {
		return new IRSimError(ErrorCodes.DomainError, message);
	}

	static scopeUnderflow(): IRSimError {
		return new IRSimError(
			ErrorCodes.ScopeUnderflow,
			"Cannot leave the root scope",
		);
	}

	/**
	 * Create a ValidationError
	 */
	static validation(
		path: string,
		message: string,
		value?: unknown,
	): IRSimError {
		return new IRSimError(
			ErrorCodes.ValidationError,
			"Validation error at " +
				path +
				": " +
				message +
				(value !== undefined ? " (value: " + JSON.stringify(value) + ")" : ""),
		);
	}
}

/**
 * True for the two terminal resource-exhaustion failures. Everything else an
 * interpreter throws is a defect in the program or the host.
 */
export function isLimitError(
	err: unknown,
): err is IRSimError & { code: LimitErrorCode } {
	return (
		err instanceof IRSimError &&
		(err.code === ErrorCodes.StepLimitReached ||
			err.code === ErrorCodes.ExpressionNestingLimitReached)
	);
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (stmt.kind) {
 *   case "break": return ...;
 *   case "leave": return ...;
 *   default:
 *     exhaustive(stmt); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
