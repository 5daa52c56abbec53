import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PositionCache } from "../cache/position-cache";
import { createErrorResponse, createToolResponse } from "../types";
import { resolvePositions } from "./resolve";

/**
 * Adjacency is only known for plain positions. For intronic or UTR positions
 * the tool answers `adjacent: null` with `determinate: false`.
 */
export function registerCheckAdjacencyTool(server: McpServer, cache: PositionCache): void {
	server.registerTool(
		"check_adjacency",
		{
			description:
				"Check whether two variant positions are immediately adjacent. Only plain integer positions have a defined answer; intronic and UTR positions are reported as indeterminate.",
			inputSchema: {
				a: z.string().describe("First position string"),
				b: z.string().describe("Second position string"),
			},
		},
		async ({ a, b }) => {
			const resolved = resolvePositions(cache, [a, b]);
			if (!resolved.ok) {
				return createErrorResponse({ code: resolved.error.code, message: resolved.error.message });
			}
			const [left, right] = resolved.positions;
			const adjacency = left.adjacency(right);
			return createToolResponse({
				valid: true,
				metadata: {
					a,
					b,
					adjacent: adjacency === "indeterminate" ? null : adjacency,
					determinate: adjacency !== "indeterminate",
				},
				error: null,
			});
		},
	);
}
