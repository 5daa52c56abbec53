import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { PositionCache } from "./cache/position-cache";
import type { Config } from "./config";
import { logger } from "./logger";
import { registerCheckAdjacencyTool } from "./tools/check-adjacency";
import { registerComparePositionsTool } from "./tools/compare-positions";
import { registerParsePositionTool } from "./tools/parse-position";
import { registerSortPositionsTool } from "./tools/sort-positions";

export const SERVER_INFO = { name: "varpos", version: "0.1.0" } as const;

/**
 * Module-level cache. Persists across stateless transport requests, each of
 * which builds its own McpServer.
 */
let sharedCache: PositionCache | null = null;

export function getCache(config: Config): PositionCache {
	if (!sharedCache) {
		sharedCache = new PositionCache(config.POSITION_CACHE_SIZE);
	}
	return sharedCache;
}

/** Reset the shared cache (for testing). */
export function resetCache(): void {
	sharedCache = null;
}

export function registerTools(server: McpServer, config: Config): void {
	const cache = getCache(config);

	registerParsePositionTool(server, cache);
	registerComparePositionsTool(server, cache);
	registerSortPositionsTool(server, cache);
	registerCheckAdjacencyTool(server, cache);
	logger.debug("Registered tools: parse_position, compare_positions, sort_positions, check_adjacency");
}

export function createServer(config: Config): McpServer {
	const server = new McpServer(SERVER_INFO, { capabilities: { logging: {} } });

	registerTools(server, config);

	return server;
}
