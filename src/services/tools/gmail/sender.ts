// Gmail API transport for outgoing mail

import { google } from 'googleapis';
import type { gmail_v1 } from 'googleapis';
import type { CachedCredential } from './credentials.js';
import { AppError } from '../../../utils/errors.js';

export interface MailSender {
  /** Submits a base64url encoded RFC 2822 message; resolves to the provider message id. */
  send(raw: string): Promise<{ id: string }>;
}

export class GmailSender implements MailSender {
  private gmail: gmail_v1.Gmail;

  constructor(credential: CachedCredential) {
    const auth = new google.auth.OAuth2(credential.client_id, credential.client_secret);
    auth.setCredentials({ refresh_token: credential.refresh_token });
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  async send(raw: string): Promise<{ id: string }> {
    const response = await this.gmail.users.messages.send({
      userId: 'me',
      requestBody: { raw },
    });

    const id = response.data.id;
    if (!id) {
      throw AppError.externalCall('Gmail accepted the message but returned no message id');
    }
    return { id };
  }
}

export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

const AUTH_FAILURE_MARKERS = ['invalid_grant', 'invalid_client', 'unauthorized_client', 'insufficient authentication scopes'];

export function isAuthorizationFailure(error: unknown): boolean {
  const status = httpStatusOf(error);
  if (status === 401) return true;
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return AUTH_FAILURE_MARKERS.some(marker => message.includes(marker));
}
