/**
 * Result from a core tool.
 *
 * Lookups that find nothing are not exceptions: they return isError so the
 * MCP response can flag them without failing the call.
 */
export interface ToolResult {
  output: string;
  isError: boolean;
}
