/**
 * Tool response helpers
 */

export type ToolResponse = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: 'text', text }] };
}

export function jsonResponse(value: unknown): ToolResponse {
  return textResponse(JSON.stringify(value, null, 2));
}

export function errorResponse(message: string): ToolResponse {
  return { content: [{ type: 'text', text: message }], isError: true };
}
