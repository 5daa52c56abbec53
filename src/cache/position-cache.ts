import { LRUCache } from "lru-cache";
import { type PositionParseResult, parsePosition } from "../position/index";

export interface CacheStats {
	size: number;
	maxSize: number;
	hits: number;
	misses: number;
}

/**
 * LRU cache of parse results keyed by the exact position text. Failures are
 * cached too, so repeated bad input is not re-matched.
 */
export class PositionCache {
	private readonly cache: LRUCache<string, PositionParseResult>;
	private hitCount = 0;
	private missCount = 0;

	constructor(maxEntries = 1000) {
		this.cache = new LRUCache<string, PositionParseResult>({ max: maxEntries });
	}

	get(text: string): PositionParseResult | undefined {
		const result = this.cache.get(text);
		if (result !== undefined) {
			this.hitCount++;
		} else {
			this.missCount++;
		}
		return result;
	}

	set(text: string, result: PositionParseResult): void {
		this.cache.set(text, result);
	}

	parse(text: string): PositionParseResult {
		const cached = this.get(text);
		if (cached !== undefined) return cached;

		const result = parsePosition(text);
		this.set(text, result);
		return result;
	}

	stats(): CacheStats {
		return {
			size: this.cache.size,
			maxSize: this.cache.max,
			hits: this.hitCount,
			misses: this.missCount,
		};
	}

	clear(): void {
		this.cache.clear();
		this.hitCount = 0;
		this.missCount = 0;
	}
}
