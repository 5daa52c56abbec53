import { InvalidPositionSyntaxError } from "./errors";
import { VariantPosition } from "./variant-position";

export { derivePosition } from "./derive";
export {
	AdjacencyUndefinedError,
	InvalidPositionSyntaxError,
	InvariantViolationError,
	PositionError,
} from "./errors";
export { matchPosition } from "./grammar";
export type {
	IntronSign,
	PositionFields,
	PositionJson,
	PositionKind,
	PositionMatch,
	UtrSymbol,
} from "./types";
export { UtrSide } from "./types";
export { type Adjacency, sortPositions, VariantPosition } from "./variant-position";

export interface PositionParseError {
	code: string;
	message: string;
	input: string;
}

export type PositionParseResult =
	| { ok: true; position: VariantPosition }
	| { ok: false; error: PositionParseError };

/**
 * Parse a position string without throwing. Invalid syntax comes back as an
 * error result; invariant violations are defects and still throw.
 */
export function parsePosition(input: string): PositionParseResult {
	try {
		return { ok: true, position: VariantPosition.parse(input) };
	} catch (error) {
		if (error instanceof InvalidPositionSyntaxError) {
			return {
				ok: false,
				error: { code: error.code, message: error.message, input: error.input },
			};
		}
		throw error;
	}
}
