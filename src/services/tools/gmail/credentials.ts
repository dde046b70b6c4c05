// Gmail OAuth credential cache
// The refresh token is stored as an authorized_user document after the first
// browser consent and reused on every later start until Google rejects it.

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { authenticate } from '@google-cloud/local-auth';
import { AppError, errorMessage } from '../../../utils/errors.js';
import { componentLogger } from '../../../utils/logger.js';

const log = componentLogger('gmail-credentials');

export const GMAIL_SEND_SCOPE = 'https://www.googleapis.com/auth/gmail.send';

const ClientSectionSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

const ClientSecretsSchema = z.object({
  installed: ClientSectionSchema.optional(),
  web: ClientSectionSchema.optional(),
});

const CachedCredentialSchema = z.object({
  type: z.literal('authorized_user'),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
});

export type ClientSecrets = z.infer<typeof ClientSectionSchema>;
export type CachedCredential = z.infer<typeof CachedCredentialSchema>;

export interface ConsentRequest {
  scopes: string[];
  keyfilePath: string;
}

/** Interactive authorization; resolves once the user granted access. */
export type ConsentFlow = (request: ConsentRequest) => Promise<{ refreshToken: string }>;

export const browserConsentFlow: ConsentFlow = async ({ scopes, keyfilePath }) => {
  const client = await authenticate({ scopes, keyfilePath });
  const refreshToken = client.credentials.refresh_token;
  if (!refreshToken) {
    throw AppError.authorization('Consent flow completed without a refresh token');
  }
  return { refreshToken };
};

export interface CredentialStoreOptions {
  credentialsPath: string;
  tokenPath: string;
  scopes?: string[];
  consent?: ConsentFlow;
}

export interface AuthorizationOutcome {
  credential: CachedCredential;
  prompted: boolean;
}

async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf8');
  return JSON.parse(raw);
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class CredentialStore {
  private credentialsPath: string;
  private tokenPath: string;
  private scopes: string[];
  private consent: ConsentFlow;

  constructor(options: CredentialStoreOptions) {
    this.credentialsPath = path.resolve(options.credentialsPath);
    this.tokenPath = path.resolve(options.tokenPath);
    this.scopes = options.scopes ?? [GMAIL_SEND_SCOPE];
    this.consent = options.consent ?? browserConsentFlow;
  }

  async loadClientSecrets(): Promise<ClientSecrets> {
    let data: unknown;
    try {
      data = await readJson(this.credentialsPath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw AppError.configuration(
          `Client secret file not found at ${this.credentialsPath}. ` +
          'Download the OAuth desktop client credentials and save them there.',
        );
      }
      throw AppError.configuration(`Client secret file is unreadable: ${errorMessage(error)}`);
    }

    const parsed = ClientSecretsSchema.safeParse(data);
    const section = parsed.success ? parsed.data.installed ?? parsed.data.web : undefined;
    if (!section) {
      throw AppError.configuration(
        `Client secret file ${this.credentialsPath} has no "installed" or "web" client section`,
      );
    }
    return section;
  }

  /** Cached credential, or null when absent or unusable. */
  async loadCached(): Promise<CachedCredential | null> {
    let data: unknown;
    try {
      data = await readJson(this.tokenPath);
    } catch (error) {
      if (!isMissingFile(error)) {
        log.warn({ tokenPath: this.tokenPath, error: errorMessage(error) }, 'Token file unreadable, will re-authenticate');
      }
      return null;
    }

    const parsed = CachedCredentialSchema.safeParse(data);
    if (!parsed.success) {
      log.warn({ tokenPath: this.tokenPath }, 'Token file malformed, will re-authenticate');
      return null;
    }
    return parsed.data;
  }

  async save(credential: CachedCredential): Promise<void> {
    await fs.mkdir(path.dirname(this.tokenPath), { recursive: true });
    await fs.writeFile(this.tokenPath, JSON.stringify(credential, null, 2), { mode: 0o600 });
    log.info({ tokenPath: this.tokenPath }, 'Credential cached');
  }

  async clear(): Promise<void> {
    await fs.rm(this.tokenPath, { force: true });
    log.warn({ tokenPath: this.tokenPath }, 'Cached credential removed');
  }

  async authorize(): Promise<AuthorizationOutcome> {
    const secrets = await this.loadClientSecrets();
    const cached = await this.loadCached();

    if (cached && cached.client_id === secrets.client_id) {
      log.info('Reusing cached credential');
      return { credential: cached, prompted: false };
    }
    if (cached) {
      log.warn('Cached credential belongs to another OAuth client, will re-authenticate');
    }

    log.info({ scopes: this.scopes }, 'No valid credential, starting browser consent flow');
    let refreshToken: string;
    try {
      ({ refreshToken } = await this.consent({ scopes: this.scopes, keyfilePath: this.credentialsPath }));
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw AppError.authorization(`Consent flow failed: ${errorMessage(error)}`);
    }

    const credential: CachedCredential = {
      type: 'authorized_user',
      client_id: secrets.client_id,
      client_secret: secrets.client_secret,
      refresh_token: refreshToken,
    };
    await this.save(credential);
    return { credential, prompted: true };
  }
}
