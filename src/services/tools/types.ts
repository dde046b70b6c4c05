// Tool system types and interfaces
// A tool host advertises descriptors and runs one side effect per invocation

export type ToolParameterType = 'string' | 'integer';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  // Inclusive bounds for integers; minimum length for strings
  min?: number;
  max?: number;
}

export type ToolArgumentValue = string | number;
export type ToolArguments = Record<string, ToolArgumentValue>;

export interface ToolResult {
  success: boolean;
  content: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
  execute: (args: ToolArguments) => Promise<ToolResult>;
}

/** What a host advertises; the handler stays behind the channel. */
export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: ToolParameter[];
}

export interface InvocationResult extends ToolResult {
  tool: string;
}
