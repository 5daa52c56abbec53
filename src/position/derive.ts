import { InvariantViolationError } from "./errors";
import { type IntronSign, type PositionFields, type PositionMatch, UtrSide, type UtrSymbol } from "./types";

function signedOffset(sign: IntronSign, digits: string): bigint {
	const value = BigInt(digits);
	return sign === "-" ? -value : value;
}

function utrSideFor(symbol: UtrSymbol, input: string): UtrSide {
	switch (symbol) {
		case "*":
			return UtrSide.ThreePrime;
		case "-":
			return UtrSide.FivePrime;
		default:
			throw new InvariantViolationError(`unexpected UTR symbol '${String(symbol)}'`, input);
	}
}

/**
 * Turn matcher captures into position fields. A `-` intron sign negates the
 * offset; `*` marks the 3' UTR and `-` the 5' UTR.
 */
export function derivePosition(match: PositionMatch, input: string): PositionFields {
	switch (match.kind) {
		case "simple":
			return {
				position: BigInt(match.position),
				intronicOffset: null,
				utrSide: null,
				utrOffset: null,
			};
		case "intronic":
			return {
				position: BigInt(match.position),
				intronicOffset: signedOffset(match.sign, match.offset),
				utrSide: null,
				utrOffset: null,
			};
		case "utr":
			return {
				position: null,
				intronicOffset: null,
				utrSide: utrSideFor(match.symbol, input),
				utrOffset: BigInt(match.offset),
			};
		case "utr_intronic":
			return {
				position: null,
				intronicOffset: signedOffset(match.sign, match.intronicOffset),
				utrSide: utrSideFor(match.symbol, input),
				utrOffset: BigInt(match.utrOffset),
			};
		default: {
			const unknown: never = match;
			throw new InvariantViolationError(`unexpected match ${JSON.stringify(unknown)}`, input);
		}
	}
}
