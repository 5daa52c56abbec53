import type { PositionCache } from "../cache/position-cache";
import type { PositionParseError, VariantPosition } from "../position/index";

export type Resolved =
	| { ok: true; positions: VariantPosition[] }
	| { ok: false; error: PositionParseError };

/** Parse every input through the cache, stopping at the first invalid one. */
export function resolvePositions(cache: PositionCache, inputs: readonly string[]): Resolved {
	const positions: VariantPosition[] = [];
	for (const input of inputs) {
		const result = cache.parse(input);
		if (!result.ok) {
			return { ok: false, error: result.error };
		}
		positions.push(result.position);
	}
	return { ok: true, positions };
}

export function describePosition(position: VariantPosition): Record<string, unknown> {
	return {
		...position.toJSON(),
		kind: position.kind,
		isUtr: position.isUtr(),
		isIntronic: position.isIntronic(),
		isExtended: position.isExtended(),
	};
}
