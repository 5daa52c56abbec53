/**
 * Base class for errors raised by the position core. Every error carries the
 * position text it was raised for.
 */
export class PositionError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly input: string,
	) {
		super(message);
		this.name = "PositionError";
	}
}

/** The input does not match any of the position shapes. */
export class InvalidPositionSyntaxError extends PositionError {
	constructor(input: string) {
		super(`invalid variant position string '${input}'`, "INVALID_POSITION_SYNTAX", input);
		this.name = "InvalidPositionSyntaxError";
	}
}

/**
 * A matched shape produced a field combination no derivation rule covers.
 * Signals a defect in the matcher, not bad input.
 */
export class InvariantViolationError extends PositionError {
	constructor(detail: string, input: string) {
		super(`position invariant violated: ${detail}`, "INVARIANT_VIOLATION", input);
		this.name = "InvariantViolationError";
	}
}

/** Adjacency between intronic or UTR positions has no defined rule. */
export class AdjacencyUndefinedError extends PositionError {
	constructor(
		input: string,
		public readonly other: string,
	) {
		super(
			`adjacency is not implemented for extended positions ('${input}', '${other}')`,
			"ADJACENCY_UNDEFINED",
			input,
		);
		this.name = "AdjacencyUndefinedError";
	}
}
