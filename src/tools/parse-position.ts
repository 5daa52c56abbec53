import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PositionCache } from "../cache/position-cache";
import { createErrorResponse, createToolResponse } from "../types";
import { describePosition } from "./resolve";

export function registerParsePositionTool(server: McpServer, cache: PositionCache): void {
	server.registerTool(
		"parse_position",
		{
			description:
				"Parse a variant position string (e.g. '88', '88+7', '-12', '*12-3') into its position, intronic offset, UTR side and UTR offset, and classify it as UTR, intronic or extended.",
			inputSchema: {
				position: z.string().describe("Variant position string, e.g. '88-7'"),
			},
		},
		async ({ position }) => {
			const result = cache.parse(position);
			if (!result.ok) {
				return createErrorResponse({ code: result.error.code, message: result.error.message });
			}
			return createToolResponse({
				valid: true,
				metadata: describePosition(result.position),
				error: null,
			});
		},
	);
}
