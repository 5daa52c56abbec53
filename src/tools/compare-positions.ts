import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PositionCache } from "../cache/position-cache";
import { createErrorResponse, createToolResponse } from "../types";
import { resolvePositions } from "./resolve";

export function registerComparePositionsTool(server: McpServer, cache: PositionCache): void {
	server.registerTool(
		"compare_positions",
		{
			description:
				"Compare two variant positions. 5' UTR positions come before coding positions, which come before 3' UTR positions; an exon boundary sorts between its negative and positive intronic offsets.",
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
			return createToolResponse({
				valid: true,
				metadata: {
					a,
					b,
					comparison: left.compare(right),
					equal: left.equals(right),
					lessThan: left.lessThan(right),
					greaterThan: left.greaterThan(right),
				},
				error: null,
			});
		},
	);
}
