export interface ToolError {
	code: string;
	message: string;
	details?: unknown;
}

export interface ToolResponseEnvelope {
	valid: boolean;
	metadata: Record<string, unknown> | null;
	error: ToolError | null;
}

export function createToolResponse(envelope: ToolResponseEnvelope) {
	return {
		content: [{ type: "text" as const, text: JSON.stringify(envelope) }],
	};
}

export function createErrorResponse(error: ToolError) {
	return createToolResponse({ valid: false, metadata: null, error });
}
