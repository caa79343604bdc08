export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
}

export interface ErrorResult extends ToolResult {
  isError: boolean;
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(message: string): ErrorResult {
  return { isError: true, content: [{ type: 'text', text: message }] };
}
