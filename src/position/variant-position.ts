import { derivePosition } from "./derive";
import { AdjacencyUndefinedError, InvalidPositionSyntaxError, InvariantViolationError } from "./errors";
import { matchPosition } from "./grammar";
import { type PositionFields, type PositionJson, type PositionKind, UtrSide } from "./types";

export type Adjacency = boolean | "indeterminate";

/**
 * A variant position in a spliced transcript or coding sequence, including the
 * extended intronic and UTR syntax.
 *
 * Intronic offsets are signed. Bases toward the 5' end of an intron have a
 * positive offset and carry the position of the last base of the 5' exon;
 * bases toward the 3' end have a negative offset and carry the position of the
 * first base of the 3' exon.
 */
export class VariantPosition implements PositionFields {
	/** Exonic position, or the exon boundary for intronic positions. Null in a UTR. */
	readonly position: bigint | null;
	readonly intronicOffset: bigint | null;
	readonly utrSide: UtrSide | null;
	/** Bases into the 5' or 3' UTR. */
	readonly utrOffset: bigint | null;
	/** Text this position was parsed from. Not part of equality. */
	readonly raw: string;

	private constructor(fields: PositionFields, raw: string) {
		this.position = fields.position;
		this.intronicOffset = fields.intronicOffset;
		this.utrSide = fields.utrSide;
		this.utrOffset = fields.utrOffset;
		this.raw = raw;
		Object.freeze(this);
	}

	/**
	 * Parse a position string such as "88", "88+7", "-12" or "*12-3".
	 * @throws {InvalidPositionSyntaxError} when the text matches no position shape
	 */
	static parse(text: string): VariantPosition {
		const match = matchPosition(text);
		if (!match) {
			throw new InvalidPositionSyntaxError(text);
		}
		return new VariantPosition(derivePosition(match, text), text);
	}

	/** Comparator for `Array.prototype.sort`. */
	static compare(a: VariantPosition, b: VariantPosition): -1 | 0 | 1 {
		return a.compare(b);
	}

	get kind(): PositionKind {
		if (this.isUtr()) {
			return this.isIntronic() ? "utr_intronic" : "utr";
		}
		return this.isIntronic() ? "intronic" : "simple";
	}

	isUtr(): boolean {
		return this.utrSide !== null;
	}

	isIntronic(): boolean {
		return this.intronicOffset !== null;
	}

	/** Whether the position used anything beyond the plain integer syntax. */
	isExtended(): boolean {
		return this.isIntronic() || this.isUtr();
	}

	/**
	 * Whether two positions are immediately adjacent in sequence space.
	 *
	 * Only defined for plain positions. The last base of a transcript and the
	 * first base of its 3' UTR are never reported adjacent, since a position
	 * has no sequence length to go on.
	 *
	 * @throws {AdjacencyUndefinedError} when either position is extended
	 */
	isAdjacent(other: VariantPosition): boolean {
		const result = this.adjacency(other);
		if (result === "indeterminate") {
			throw new AdjacencyUndefinedError(this.raw, other.raw);
		}
		return result;
	}

	/** Like {@link isAdjacent}, but answers "indeterminate" for extended positions. */
	adjacency(other: VariantPosition): Adjacency {
		if (this.isExtended() || other.isExtended()) {
			return "indeterminate";
		}
		const distance = this.anchor() - other.anchor();
		return distance === 1n || distance === -1n;
	}

	equals(other: VariantPosition): boolean {
		return (
			this.position === other.position &&
			this.intronicOffset === other.intronicOffset &&
			this.utrSide === other.utrSide &&
			this.utrOffset === other.utrOffset
		);
	}

	/**
	 * Strict ordering: 5' UTR < coding < 3' UTR. Within the same region the
	 * UTR offset or position decides, then the intronic offset.
	 */
	lessThan(other: VariantPosition): boolean {
		if (this.utrSide !== other.utrSide) {
			return this.utrSide === UtrSide.FivePrime || other.utrSide === UtrSide.ThreePrime;
		}

		const a = this.anchor();
		const b = other.anchor();
		if (a !== b) {
			return a < b;
		}
		return intronLessThan(this.intronicOffset, other.intronicOffset);
	}

	notEquals(other: VariantPosition): boolean {
		return !this.equals(other);
	}

	greaterThan(other: VariantPosition): boolean {
		return other.lessThan(this);
	}

	lessThanOrEqual(other: VariantPosition): boolean {
		return this.lessThan(other) || this.equals(other);
	}

	greaterThanOrEqual(other: VariantPosition): boolean {
		return other.lessThan(this) || this.equals(other);
	}

	compare(other: VariantPosition): -1 | 0 | 1 {
		if (this.equals(other)) return 0;
		return this.lessThan(other) ? -1 : 1;
	}

	toJSON(): PositionJson {
		return {
			raw: this.raw,
			position: coordinateJson(this.position),
			intronicOffset: coordinateJson(this.intronicOffset),
			utrSide: this.utrSide,
			utrOffset: coordinateJson(this.utrOffset),
		};
	}

	/** The coordinate ordering starts from: UTR offset in a UTR, position otherwise. */
	private anchor(): bigint {
		const value = this.isUtr() ? this.utrOffset : this.position;
		if (value === null) {
			throw new InvariantViolationError(`'${this.kind}' position has no coordinate`, this.raw);
		}
		return value;
	}
}

/**
 * Order two intronic offsets at the same anchor. A bare boundary (null) sits
 * after negative offsets and before positive ones.
 */
function intronLessThan(a: bigint | null, b: bigint | null): boolean {
	if (a === b) return false;
	if (a === null) return b !== null && b > 0n;
	if (b === null) return a < 0n;
	return a < b;
}

function coordinateJson(value: bigint | null): number | string | null {
	if (value === null) return null;
	const asNumber = Number(value);
	return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}

/** Return a new array of positions in ascending (or descending) order. */
export function sortPositions(
	positions: readonly VariantPosition[],
	descending = false,
): VariantPosition[] {
	const sorted = [...positions].sort(VariantPosition.compare);
	return descending ? sorted.reverse() : sorted;
}
