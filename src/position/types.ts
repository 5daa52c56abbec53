export const UtrSide = {
	FivePrime: "5p",
	ThreePrime: "3p",
} as const;

export type UtrSide = (typeof UtrSide)[keyof typeof UtrSide];

export type IntronSign = "+" | "-";
export type UtrSymbol = "*" | "-";

/**
 * Raw captures for one of the four position shapes. Each variant carries only
 * the substrings its own shape defines.
 */
export type PositionMatch =
	| { kind: "simple"; position: string }
	| { kind: "intronic"; position: string; sign: IntronSign; offset: string }
	| { kind: "utr"; symbol: UtrSymbol; offset: string }
	| {
			kind: "utr_intronic";
			symbol: UtrSymbol;
			utrOffset: string;
			sign: IntronSign;
			intronicOffset: string;
	  };

export type PositionKind = PositionMatch["kind"];

/** Coordinates are bigint: the grammar puts no upper bound on a digit run. */
export interface PositionFields {
	position: bigint | null;
	intronicOffset: bigint | null; // never 0
	utrSide: UtrSide | null;
	utrOffset: bigint | null;
}

/** JSON view of the fields. Coordinates beyond the safe integer range become strings. */
export interface PositionJson {
	raw: string;
	position: number | string | null;
	intronicOffset: number | string | null;
	utrSide: UtrSide | null;
	utrOffset: number | string | null;
}
