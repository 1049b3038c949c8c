/**
 * Shape of a tool handed to the agent session. Parameters are plain JSON
 * schema; `execute` receives the raw arguments the model produced.
 */

export type JsonSchemaProperty = {
  type: "number" | "string" | "array" | "object" | "boolean";
  description: string;
  enum?: readonly string[];
  items?: { type: "number" | "string" };
};

export type ToolResult<TDetails> = {
  content: Array<{ type: "text"; text: string }>;
  details: TDetails;
};

export interface ToolDefinition<TDetails = unknown> {
  name: string;
  label: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
  execute: (toolCallId: string, args: unknown) => Promise<ToolResult<TDetails>>;
}

/** Serialise a formula result the way every tool reports it. */
export function textResult<TDetails>(payload: unknown, details: TDetails): ToolResult<TDetails> {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    details,
  };
}
