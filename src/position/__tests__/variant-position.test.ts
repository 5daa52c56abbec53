import { describe, expect, it } from "vitest";
import { AdjacencyUndefinedError, InvalidPositionSyntaxError } from "../errors";
import { VariantPosition, sortPositions } from "../variant-position";

const p = (text: string) => VariantPosition.parse(text);

describe("VariantPosition", () => {
	describe("parse", () => {
		it("parses '88-7' as position 88 with intronic offset -7", () => {
			const pos = p("88-7");
			expect(pos.position).toBe(88n);
			expect(pos.intronicOffset).toBe(-7n);
			expect(pos.utrSide).toBeNull();
			expect(pos.utrOffset).toBeNull();
		});

		it("parses '88+7' as position 88 with intronic offset 7", () => {
			const pos = p("88+7");
			expect(pos.position).toBe(88n);
			expect(pos.intronicOffset).toBe(7n);
		});

		it("parses '-12' as 5' UTR offset 12", () => {
			const pos = p("-12");
			expect(pos.utrSide).toBe("5p");
			expect(pos.utrOffset).toBe(12n);
			expect(pos.position).toBeNull();
		});

		it("parses '*12' as 3' UTR offset 12", () => {
			const pos = p("*12");
			expect(pos.utrSide).toBe("3p");
			expect(pos.utrOffset).toBe(12n);
		});

		it("parses '-12-3' as 5' UTR offset 12 with intronic offset -3", () => {
			expect(p("-12-3").toJSON()).toEqual({
				raw: "-12-3",
				position: null,
				intronicOffset: -3,
				utrSide: "5p",
				utrOffset: 12,
			});
		});

		it.each(["", "12a", "0", "+5", "12++5", "**3"])(
			"throws InvalidPositionSyntaxError for %j",
			(text) => {
				expect(() => p(text)).toThrow(InvalidPositionSyntaxError);
			},
		);

		it("carries the offending string on the error", () => {
			try {
				p("12a");
				expect.unreachable();
			} catch (error) {
				expect(error).toBeInstanceOf(InvalidPositionSyntaxError);
				if (error instanceof InvalidPositionSyntaxError) {
					expect(error.input).toBe("12a");
					expect(error.code).toBe("INVALID_POSITION_SYNTAX");
					expect(error.message).toBe("invalid variant position string '12a'");
				}
			}
		});

		it("produces frozen values", () => {
			expect(Object.isFrozen(p("5"))).toBe(true);
		});
	});

	describe("classification", () => {
		it.each([
			["5", "simple", false, false, false],
			["5+1", "intronic", false, true, true],
			["-5", "utr", true, false, true],
			["*5-1", "utr_intronic", true, true, true],
		])("%s is %s (utr=%s, intronic=%s, extended=%s)", (text, kind, utr, intronic, extended) => {
			const pos = p(text);
			expect(pos.kind).toBe(kind);
			expect(pos.isUtr()).toBe(utr);
			expect(pos.isIntronic()).toBe(intronic);
			expect(pos.isExtended()).toBe(extended);
		});
	});

	describe("isAdjacent", () => {
		it("is true for neighbouring simple positions in either order", () => {
			expect(p("10").isAdjacent(p("11"))).toBe(true);
			expect(p("11").isAdjacent(p("10"))).toBe(true);
		});

		it("is false for non-neighbouring or identical simple positions", () => {
			expect(p("10").isAdjacent(p("12"))).toBe(false);
			expect(p("10").isAdjacent(p("10"))).toBe(false);
		});

		it("throws for extended positions instead of guessing", () => {
			expect(() => p("10").isAdjacent(p("10+1"))).toThrow(AdjacencyUndefinedError);
			expect(() => p("*1").isAdjacent(p("10"))).toThrow(AdjacencyUndefinedError);
		});

		it("reports indeterminate adjacency through adjacency()", () => {
			expect(p("10").adjacency(p("*1"))).toBe("indeterminate");
			expect(p("10").adjacency(p("11"))).toBe(true);
		});
	});

	describe("equality", () => {
		it("is reflexive for every shape", () => {
			for (const text of ["5", "5+1", "5-1", "-5", "*5", "*5+2", "-5-2"]) {
				expect(p(text).equals(p(text))).toBe(true);
			}
		});

		it("distinguishes fields that share a number", () => {
			expect(p("5").equals(p("*5"))).toBe(false);
			expect(p("-5").equals(p("*5"))).toBe(false);
			expect(p("5+1").equals(p("5-1"))).toBe(false);
			expect(p("5").equals(p("5+1"))).toBe(false);
			expect(p("5").notEquals(p("6"))).toBe(true);
		});
	});

	describe("ordering", () => {
		it("orders 5' UTR before coding before 3' UTR", () => {
			expect(p("-12").lessThan(p("5"))).toBe(true);
			expect(p("5").lessThan(p("*3"))).toBe(true);
			expect(p("-1").lessThan(p("*1"))).toBe(true);
			expect(p("*3").lessThan(p("5"))).toBe(false);
			expect(p("5").lessThan(p("-12"))).toBe(false);
		});

		it("puts the exon boundary between negative and positive intronic offsets", () => {
			expect(p("88-7").lessThan(p("88"))).toBe(true);
			expect(p("88").lessThan(p("88+7"))).toBe(true);
			expect(p("88-7").lessThan(p("88+7"))).toBe(true);
			expect(p("88").lessThan(p("88-7"))).toBe(false);
			expect(p("88+7").lessThan(p("88"))).toBe(false);
		});

		it("compares the anchor before the intronic offset", () => {
			expect(p("87+50").lessThan(p("88-50"))).toBe(true);
			expect(p("88-1").lessThan(p("87+1"))).toBe(false);
		});

		it("orders within a UTR by UTR offset then intronic offset", () => {
			expect(p("*3").lessThan(p("*4"))).toBe(true);
			expect(p("*3-1").lessThan(p("*3"))).toBe(true);
			expect(p("*3").lessThan(p("*3+1"))).toBe(true);
			expect(p("-3+1").lessThan(p("-3+2"))).toBe(true);
		});

		it("is irreflexive", () => {
			expect(p("88+7").lessThan(p("88+7"))).toBe(false);
		});

		it("derives the remaining operators from equals and lessThan", () => {
			expect(p("5").greaterThan(p("4"))).toBe(true);
			expect(p("5").lessThanOrEqual(p("5"))).toBe(true);
			expect(p("5").lessThanOrEqual(p("4"))).toBe(false);
			expect(p("5").greaterThanOrEqual(p("5"))).toBe(true);
			expect(p("4").greaterThanOrEqual(p("5"))).toBe(false);
			expect(p("5").compare(p("5"))).toBe(0);
			expect(p("4").compare(p("5"))).toBe(-1);
			expect(p("*1").compare(p("5"))).toBe(1);
		});

		it("gives exactly one of less, equal or greater for every pair", () => {
			const texts = ["-3", "-3+1", "1", "2-1", "2", "2+1", "*1-1", "*1", "*2"];
			for (const x of texts) {
				for (const y of texts) {
					const a = p(x);
					const b = p(y);
					const outcomes = [a.lessThan(b), a.equals(b), a.greaterThan(b)].filter(Boolean);
					expect(outcomes).toHaveLength(1);
				}
			}
		});
	});

	describe("order laws over a mixed set", () => {
		// Duplicates parse to distinct instances, so equality links across objects.
		const texts = [
			"-3",
			"-3+1",
			"-3+1",
			"1",
			"2-1",
			"2",
			"2",
			"2+1",
			"*1-1",
			"*1",
			"*1",
			"*2",
		];
		const positions = texts.map(p);

		it("equals is symmetric and compare is antisymmetric", () => {
			for (const a of positions) {
				for (const b of positions) {
					expect(a.equals(b)).toBe(b.equals(a));
					expect(a.compare(b) + b.compare(a)).toBe(0);
				}
			}
		});

		it("equals and lessThan are transitive", () => {
			for (const a of positions) {
				for (const b of positions) {
					for (const c of positions) {
						if (a.equals(b) && b.equals(c)) {
							expect(a.equals(c)).toBe(true);
						}
						if (a.lessThan(b) && b.lessThan(c)) {
							expect(a.lessThan(c)).toBe(true);
						}
					}
				}
			}
		});

		it("finds every duplicate pair equal", () => {
			const equalPairs = positions.flatMap((a, i) =>
				positions.slice(i + 1).filter((b) => a.equals(b)).map((b) => b.raw),
			);
			expect(equalPairs).toEqual(["-3+1", "2", "*1"]);
		});
	});

	describe("coordinates beyond the safe integer range", () => {
		it("keeps neighbouring large positions distinct", () => {
			const a = p("9007199254740993");
			const b = p("9007199254740992");
			expect(a.position).toBe(9007199254740993n);
			expect(a.equals(b)).toBe(false);
			expect(b.lessThan(a)).toBe(true);
		});

		it("finds neighbouring large positions adjacent", () => {
			expect(p("9007199254740993").isAdjacent(p("9007199254740994"))).toBe(true);
			expect(p("9007199254740993").isAdjacent(p("9007199254740995"))).toBe(false);
		});

		it("orders large intronic offsets exactly", () => {
			expect(p("5+9007199254740992").lessThan(p("5+9007199254740993"))).toBe(true);
		});

		it("serializes unsafe coordinates as strings and safe ones as numbers", () => {
			expect(p("9007199254740993+2").toJSON()).toEqual({
				raw: "9007199254740993+2",
				position: "9007199254740993",
				intronicOffset: 2,
				utrSide: null,
				utrOffset: null,
			});
		});
	});

	describe("sortPositions", () => {
		it("sorts a mixed set by the total order", () => {
			const sorted = sortPositions(["*5", "-3", "100", "100-2", "100+2"].map(p));
			expect(sorted.map((pos) => pos.raw)).toEqual(["-3", "100-2", "100", "100+2", "*5"]);
		});

		it("sorts descending without touching the input", () => {
			const input = ["2", "1", "3"].map(p);
			const sorted = sortPositions(input, true);
			expect(sorted.map((pos) => pos.raw)).toEqual(["3", "2", "1"]);
			expect(input.map((pos) => pos.raw)).toEqual(["2", "1", "3"]);
		});
	});
});
