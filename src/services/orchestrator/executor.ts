// Tool Executor
// Relays validated calls to the tool host one at a time

import type { ToolChannel } from './channel.js';
import type { ToolCallRequest, ExecutionResult } from './types.js';
import { errorMessage } from '../../utils/errors.js';

export interface ExecutionHooks {
  onInvoke?(call: ToolCallRequest, index: number): void;
  onResult?(result: ExecutionResult, index: number): void;
}

export class ToolExecutor {
  constructor(private channel: ToolChannel) {}

  async execute(toolCall: ToolCallRequest): Promise<ExecutionResult> {
    const startTime = Date.now();

    try {
      const result = await this.channel.callTool(toolCall.tool, toolCall.args);
      return {
        tool: toolCall.tool,
        success: result.success,
        result: result.content,
        error: result.success ? undefined : result.content,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      return {
        tool: toolCall.tool,
        success: false,
        result: '',
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      };
    }
  }

  /**
   * Runs calls in order, awaiting each result before the next request.
   * Stops at the first failure.
   */
  async executeAll(toolCalls: ToolCallRequest[], hooks: ExecutionHooks = {}): Promise<ExecutionResult[]> {
    const results: ExecutionResult[] = [];

    for (const [index, toolCall] of toolCalls.entries()) {
      hooks.onInvoke?.(toolCall, index);
      const result = await this.execute(toolCall);
      results.push(result);
      hooks.onResult?.(result, index);

      if (!result.success) {
        break;
      }
    }

    return results;
  }
}
