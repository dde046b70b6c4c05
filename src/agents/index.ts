// Agent runner
// Connects an orchestrator to its tool host and runs the fixed instruction once

import { env } from '../env.js';
import { getProvider } from '../providers/index.js';
import type { Provider } from '../providers/types.js';
import { buildToolHost, startToolHost } from '../server.js';
import type { ToolHostServer } from '../server.js';
import { HttpToolChannel, Orchestrator } from '../services/orchestrator/index.js';
import type { AgentDefinition, RunOutcome } from '../services/orchestrator/index.js';
import { initializeTools } from '../services/tools/index.js';
import type { HostKind } from '../services/tools/index.js';
import type { ToolRegistry } from '../services/tools/registry.js';
import { componentLogger } from '../utils/logger.js';
import { gmailAgent } from './gmail.js';
import { keynoteAgent } from './keynote.js';

export { gmailAgent } from './gmail.js';
export { keynoteAgent } from './keynote.js';

const log = componentLogger('agent');

export function agentFor(kind: HostKind): AgentDefinition {
  return kind === 'gmail' ? gmailAgent() : keynoteAgent;
}

export interface RunAgentOptions {
  provider?: Provider;
  /** Existing tool host; when empty a host is started in-process. */
  hostUrl?: string;
  registry?: ToolRegistry;
}

export async function runAgent(kind: HostKind, options: RunAgentOptions = {}): Promise<RunOutcome> {
  const provider = options.provider ?? getProvider(env.LLM_PROVIDER);
  let hostUrl = options.hostUrl ?? env.TOOL_HOST_URL;
  let localHost: ToolHostServer | undefined;

  if (!hostUrl) {
    const registry = options.registry ?? await initializeTools(kind);
    localHost = await buildToolHost({ name: kind, registry, logger: false });
    hostUrl = await startToolHost(localHost, '127.0.0.1', 0);
    log.info({ host: kind, url: hostUrl }, 'Started in-process tool host');
  }

  try {
    const orchestrator = new Orchestrator({
      provider,
      channel: new HttpToolChannel(hostUrl),
      options: { model: env.LLM_MODEL },
    });
    return await orchestrator.run(agentFor(kind));
  } finally {
    await localHost?.close();
  }
}
