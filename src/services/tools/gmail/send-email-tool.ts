// Send Email Tool
// One Gmail API call per invocation; every failure comes back as a result

import { z } from 'zod';
import type { ToolDefinition, ToolResult } from '../types.js';
import { encodeRawMessage } from './mime.js';
import { httpStatusOf, isAuthorizationFailure } from './sender.js';
import type { MailSender } from './sender.js';
import { errorMessage } from '../../../utils/errors.js';
import { componentLogger } from '../../../utils/logger.js';

const log = componentLogger('send-email');

const TOOL_NAME = 'send_email';

const recipientSchema = z.string().trim().email();

export interface SendEmailToolOptions {
  /** Invoked when Gmail rejects the credential, before the failure is returned. */
  onAuthorizationFailure?: () => Promise<void>;
}

function failure(content: string): ToolResult {
  return { success: false, content };
}

export function createSendEmailTool(sender: MailSender, options: SendEmailToolOptions = {}): ToolDefinition {
  return {
    name: TOOL_NAME,
    description: "Sends an email message. Requires the recipient address ('to'), the 'subject' line and the 'body' text.",
    parameters: [
      { name: 'to', type: 'string', description: 'Recipient email address', min: 1 },
      { name: 'subject', type: 'string', description: 'Subject line' },
      { name: 'body', type: 'string', description: 'Plain text body' },
    ],

    async execute(args): Promise<ToolResult> {
      const to = String(args.to);
      const subject = String(args.subject);
      const body = String(args.body);

      const recipient = recipientSchema.safeParse(to);
      if (!recipient.success) {
        return failure(`Error: Invalid recipient address "${to}"`);
      }
      if (/[\r\n]/.test(subject)) {
        return failure('Error: Subject must be a single line');
      }

      log.info({ to: recipient.data, subject, bodyPreview: body.slice(0, 50) }, 'Sending email');

      try {
        const { id } = await sender.send(encodeRawMessage({ to: recipient.data, subject, body }));
        log.info({ messageId: id }, 'Email sent');
        return {
          success: true,
          content: `Email sent successfully to ${recipient.data} with subject '${subject}'. Message ID: ${id}`,
        };
      } catch (error) {
        if (isAuthorizationFailure(error)) {
          log.error({ error: errorMessage(error) }, 'Gmail rejected the credential');
          if (options.onAuthorizationFailure) {
            await options.onAuthorizationFailure();
          }
          return failure(
            `Error: Gmail authorization failed (${errorMessage(error)}). ` +
            'The cached credential was removed; restart the Gmail host to grant access again.',
          );
        }

        const status = httpStatusOf(error);
        log.error({ status, error: errorMessage(error) }, 'Gmail rejected the message');
        return failure(
          status !== undefined
            ? `Error: Gmail rejected the message (HTTP ${status}): ${errorMessage(error)}`
            : `Error: Failed to send email: ${errorMessage(error)}`,
        );
      }
    },
  };
}
