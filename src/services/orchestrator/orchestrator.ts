// Orchestrator
// One planning request to the model, then the chosen calls relayed in order.
// There is no loop: the model never sees tool results.

import type { Provider, ProviderResponse } from '../../providers/types.js';
import { describeTool } from '../tools/registry.js';
import type { ToolDescriptor } from '../tools/types.js';
import { AppError, ErrorCode, errorMessage } from '../../utils/errors.js';
import type { ToolChannel } from './channel.js';
import { ToolExecutor } from './executor.js';
import { parseDecision } from './parser.js';
import { buildMessages } from './prompts.js';
import { RunLog } from './run-log.js';
import type { AgentDefinition, ExecutionResult, OrchestratorOptions, RunOutcome, ToolCallRequest } from './types.js';

export interface OrchestratorDeps {
  provider: Provider;
  channel: ToolChannel;
  options: OrchestratorOptions;
  runLog?: () => RunLog;
}

function describeDecision(response: ProviderResponse): string {
  if (response.toolCalls.length > 0) {
    return response.toolCalls.map(call => `${call.name}(${call.arguments})`).join('\n');
  }
  return response.content;
}

export class Orchestrator {
  private provider: Provider;
  private channel: ToolChannel;
  private executor: ToolExecutor;
  private options: OrchestratorOptions;
  private createRunLog: () => RunLog;

  constructor(deps: OrchestratorDeps) {
    this.provider = deps.provider;
    this.channel = deps.channel;
    this.executor = new ToolExecutor(deps.channel);
    this.options = deps.options;
    this.createRunLog = deps.runLog ?? (() => new RunLog());
  }

  async run(agent: AgentDefinition): Promise<RunOutcome> {
    const log = this.createRunLog();
    let calls: ToolCallRequest[] = [];
    let results: ExecutionResult[] = [];

    const fail = (code: ErrorCode, message: string): RunOutcome => {
      log.record('error', message, { agent: agent.name, code });
      return { status: 'failed', calls, results, entries: log.all(), error: { code, message } };
    };

    log.record('instruction', agent.instruction, { agent: agent.name });

    try {
      const tools = await this.channel.listTools();
      const response = await this.decide(agent, tools);
      log.record('decision', describeDecision(response), {
        provider: this.provider.name,
        content: response.content,
        toolCalls: response.toolCalls,
        usage: response.usage,
      });

      calls = parseDecision(response, tools);

      results = await this.executor.executeAll(calls, {
        onInvoke: call => {
          log.record('invocation', `Invoking ${call.tool}`, { tool: call.tool, args: call.args });
        },
        onResult: result => {
          log.record('result', result.success ? result.result : (result.error ?? result.result), {
            tool: result.tool,
            success: result.success,
            durationMs: result.durationMs,
          });
        },
      });
    } catch (error) {
      if (error instanceof AppError) {
        return fail(error.code, error.message);
      }
      return fail(ErrorCode.INTERNAL_ERROR, errorMessage(error));
    }

    const failed = results.find(result => !result.success);
    if (failed) {
      const skipped = calls.length - results.length;
      return fail(
        ErrorCode.EXTERNAL_CALL_ERROR,
        `${failed.tool} failed: ${failed.error ?? failed.result}` + (skipped > 0 ? ` (${skipped} remaining call(s) skipped)` : ''),
      );
    }

    log.record('completion', `Completed ${results.length} call(s)`, {
      agent: agent.name,
      tools: results.map(result => result.tool),
    });
    return { status: 'completed', calls, results, entries: log.all() };
  }

  private async decide(agent: AgentDefinition, tools: ToolDescriptor[]): Promise<ProviderResponse> {
    const native = this.provider.supportsToolCalling;
    return this.provider.sendChat(buildMessages(agent, tools, native), {
      model: this.options.model,
      temperature: this.options.temperature ?? 0,
      maxTokens: this.options.maxTokens,
      tools: native ? tools.map(describeTool) : undefined,
      toolChoice: native ? 'required' : undefined,
    });
  }
}
