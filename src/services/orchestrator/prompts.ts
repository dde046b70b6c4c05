// Prompt construction for the single planning request

import type { ProviderMessage } from '../../providers/types.js';
import type { ToolDescriptor } from '../tools/types.js';
import type { AgentDefinition } from './types.js';

export function formatToolCatalog(tools: ToolDescriptor[]): string {
  return tools
    .map((tool, i) => {
      const params = tool.parameters.map(p => `${p.name}: ${p.type}`).join(', ') || 'no parameters';
      return `${i + 1}. ${tool.name}(${params}) - ${tool.description}`;
    })
    .join('\n');
}

const NATIVE_CALL_INSTRUCTIONS = `Plan the whole task up front and answer with every function call it needs, in the order they must run.
Use the function calling interface only; do not answer with text.`;

const TEXT_CALL_INSTRUCTIONS = `Plan the whole task up front. Respond with one line per call, in the order they must run, and nothing else (no explanations, no markdown):
FUNCTION_CALL: function_name|param1|param2|...
- Parameters MUST be in the order given in the tool list.
- Integer parameters take whole numbers only.`;

export function buildSystemPrompt(agent: AgentDefinition, tools: ToolDescriptor[], nativeCalls: boolean): string {
  const sections = [
    agent.role,
    `Available tools:\n${formatToolCatalog(tools)}`,
    nativeCalls ? NATIVE_CALL_INSTRUCTIONS : TEXT_CALL_INSTRUCTIONS,
  ];

  if (agent.rules.length > 0) {
    sections.push(`Important Rules:\n${agent.rules.map(rule => `- ${rule}`).join('\n')}`);
  }

  return sections.join('\n\n');
}

export function buildMessages(agent: AgentDefinition, tools: ToolDescriptor[], nativeCalls: boolean): ProviderMessage[] {
  return [
    { role: 'system', content: buildSystemPrompt(agent, tools, nativeCalls) },
    { role: 'user', content: `User Query: ${agent.instruction}` },
  ];
}
