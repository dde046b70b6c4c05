// Gmail agent - one fixed instruction: send a test message

import { env } from '../env.js';
import type { AgentDefinition } from '../services/orchestrator/types.js';

export const GMAIL_TEST_SUBJECT = 'Relay Agent Test';
export const GMAIL_TEST_BODY = 'This email was sent by the relay Gmail agent.';

export function gmailAgent(recipient: string = env.GMAIL_RECIPIENT): AgentDefinition {
  return {
    name: 'gmail',
    role: 'You are an agent designed to send emails via Gmail using the available tools.',
    rules: [
      'Use the `send_email` tool to fulfill the user\'s request.',
      'Extract the recipient address, subject, and body from the user query to use as parameters for `send_email` (to, subject, body).',
      'Do not imagine tools that are not listed.',
    ],
    instruction:
      `Please send an email to ${recipient} with the subject '${GMAIL_TEST_SUBJECT}' and the body '${GMAIL_TEST_BODY}'`,
  };
}
