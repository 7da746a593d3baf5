/**
 * Result shape shared by every tool handler. Domain errors from
 * src/errors.ts satisfy it as well.
 */
export type ToolResponse = {
    isError?: boolean;
    content: Array<{ type: 'text'; text: string }>;
};

/**
 * Wraps a JSON-serializable payload as a successful tool result.
 */
export function jsonResult(payload: unknown): ToolResponse {
    return {
        content: [{ type: 'text', text: JSON.stringify(payload) }],
    };
}
