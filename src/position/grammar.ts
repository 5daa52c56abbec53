import { InvariantViolationError } from "./errors";
import type { IntronSign, PositionMatch, UtrSymbol } from "./types";

/** Positive integer without leading zeros. Position 0 does not exist in 1-based coordinates. */
const NUM = "[1-9][0-9]*";

const SIMPLE = new RegExp(`^(${NUM})$`);
const INTRONIC = new RegExp(`^(${NUM})([+-])(${NUM})$`);
const UTR = new RegExp(`^([*-])(${NUM})$`);
const UTR_INTRONIC = new RegExp(`^([*-])(${NUM})([+-])(${NUM})$`);

// The patterns only capture these tokens; anything else is a matcher defect.
export function toSign(token: string, input: string): IntronSign {
	if (token === "+" || token === "-") return token;
	throw new InvariantViolationError(`unexpected intron sign '${token}'`, input);
}

export function toSymbol(token: string, input: string): UtrSymbol {
	if (token === "*" || token === "-") return token;
	throw new InvariantViolationError(`unexpected UTR symbol '${token}'`, input);
}

/**
 * Match a position string against the four shapes, in order: simple,
 * intronic, UTR, UTR-intronic. The shapes are disjoint, so at most one
 * matches. Returns null when the whole string matches none of them.
 */
export function matchPosition(text: string): PositionMatch | null {
	const simple = SIMPLE.exec(text);
	if (simple) {
		return { kind: "simple", position: simple[1] };
	}

	const intronic = INTRONIC.exec(text);
	if (intronic) {
		return {
			kind: "intronic",
			position: intronic[1],
			sign: toSign(intronic[2], text),
			offset: intronic[3],
		};
	}

	const utr = UTR.exec(text);
	if (utr) {
		return { kind: "utr", symbol: toSymbol(utr[1], text), offset: utr[2] };
	}

	const utrIntronic = UTR_INTRONIC.exec(text);
	if (utrIntronic) {
		return {
			kind: "utr_intronic",
			symbol: toSymbol(utrIntronic[1], text),
			utrOffset: utrIntronic[2],
			sign: toSign(utrIntronic[3], text),
			intronicOffset: utrIntronic[4],
		};
	}

	return null;
}
