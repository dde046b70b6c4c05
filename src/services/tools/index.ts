// Tool System Initialization
// Builds the operation catalog of one tool host

import { env } from '../../env.js';
import { ToolRegistry } from './registry.js';
import { CredentialStore } from './gmail/credentials.js';
import type { ConsentFlow } from './gmail/credentials.js';
import { GmailSender } from './gmail/sender.js';
import type { MailSender } from './gmail/sender.js';
import { createSendEmailTool } from './gmail/send-email-tool.js';
import { OsaScriptBridge } from './keynote/applescript.js';
import type { ScriptBridge } from './keynote/applescript.js';
import { createKeynoteTools } from './keynote/keynote-tools.js';
import type { ToolDefinition } from './types.js';
import { componentLogger } from '../../utils/logger.js';

export { ToolRegistry } from './registry.js';
export type { ToolDefinition, ToolDescriptor, ToolParameter, ToolResult, InvocationResult } from './types.js';

const log = componentLogger('tools');

export type HostKind = 'gmail' | 'keynote';

export const HOST_KINDS: readonly HostKind[] = ['gmail', 'keynote'];

export function isHostKind(value: string): value is HostKind {
  return HOST_KINDS.some(kind => kind === value);
}

export function registryFrom(tools: ToolDefinition[]): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of tools) {
    registry.register(tool);
    log.info(`✓ ${tool.name} tool registered`);
  }
  return registry;
}

export interface GmailHostOptions {
  credentialsPath?: string;
  tokenPath?: string;
  consent?: ConsentFlow;
  /** Replaces the Gmail API transport; the credential is still authorized first. */
  sender?: MailSender;
}

/** Authorizes before serving: a missing client secret or refused consent is fatal. */
export async function initializeGmailTools(options: GmailHostOptions = {}): Promise<ToolRegistry> {
  const store = new CredentialStore({
    credentialsPath: options.credentialsPath ?? env.GMAIL_CREDENTIALS_PATH,
    tokenPath: options.tokenPath ?? env.GMAIL_TOKEN_PATH,
    consent: options.consent,
  });

  const { credential, prompted } = await store.authorize();
  log.info({ prompted }, 'Gmail credential ready');

  const sender = options.sender ?? new GmailSender(credential);
  return registryFrom([
    createSendEmailTool(sender, { onAuthorizationFailure: () => store.clear() }),
  ]);
}

export function initializeKeynoteTools(bridge: ScriptBridge = new OsaScriptBridge()): ToolRegistry {
  if (process.platform !== 'darwin') {
    log.warn({ platform: process.platform }, 'Keynote tools need macOS; every call will fail on this platform');
  }
  return registryFrom(createKeynoteTools(bridge));
}

export async function initializeTools(kind: HostKind): Promise<ToolRegistry> {
  log.info({ host: kind }, 'Initializing tool system...');
  const registry = kind === 'gmail'
    ? await initializeGmailTools()
    : initializeKeynoteTools();
  log.info(`Tool system initialized with ${registry.getAll().length} tool(s)`);
  return registry;
}
