import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PositionCache } from "../cache/position-cache";
import { logger } from "../logger";
import { sortPositions } from "../position/index";
import { createErrorResponse, createToolResponse } from "../types";
import { resolvePositions } from "./resolve";

export function registerSortPositionsTool(server: McpServer, cache: PositionCache): void {
	server.registerTool(
		"sort_positions",
		{
			description:
				"Sort a list of variant position strings into transcript order. Fails on the first string that is not a valid position.",
			inputSchema: {
				positions: z
					.array(z.string())
					.min(1)
					.describe("Position strings to sort, e.g. ['*5', '-3', '100+2']"),
				descending: z.boolean().optional().describe("Sort from 3' to 5' instead"),
			},
		},
		async ({ positions, descending }) => {
			const resolved = resolvePositions(cache, positions);
			if (!resolved.ok) {
				logger.debug("sort_positions rejected input:", resolved.error.input);
				return createErrorResponse({ code: resolved.error.code, message: resolved.error.message });
			}
			const sorted = sortPositions(resolved.positions, descending ?? false);
			return createToolResponse({
				valid: true,
				metadata: { sorted: sorted.map((position) => position.raw) },
				error: null,
			});
		},
	);
}
