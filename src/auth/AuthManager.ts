import { google, gmail_v1 } from 'googleapis';
import { Credentials, OAuth2Client } from 'google-auth-library';
import fs from 'fs/promises';
import path from 'path';
import { describeError } from '../errors/RetentionErrors.js';
import { logger } from '../utils/logger.js';

// gmail.modify covers search, labels and trash; permanent batchDelete needs the full mail scope
export const SCOPES = [
  'https://www.googleapis.com/auth/gmail.modify',
  'https://mail.google.com/',
];

const DEFAULT_REDIRECT_URI = 'http://localhost:3000/oauth2callback';

interface ClientSecret {
  client_id: string;
  client_secret: string;
  redirect_uris?: string[];
}

export interface AuthManagerOptions {
  credentialsPath: string;
  tokenPath: string;
}

function isClientSecret(value: unknown): value is ClientSecret {
  return (
    typeof value === 'object' &&
    value !== null &&
    'client_id' in value &&
    typeof value.client_id === 'string' &&
    'client_secret' in value &&
    typeof value.client_secret === 'string'
  );
}

function isCredentials(value: unknown): value is Credentials {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * OAuth2 for a single mailbox: client secret from the downloaded
 * credentials file, tokens persisted next to it and refreshed by the client.
 */
export class AuthManager {
  private oAuth2Client: OAuth2Client | null = null;

  constructor(private readonly options: AuthManagerOptions) {}

  async initialize(): Promise<OAuth2Client> {
    if (this.oAuth2Client) {
      return this.oAuth2Client;
    }

    const secret = await this.loadCredentials();
    const client = new OAuth2Client({
      clientId: secret.client_id,
      clientSecret: secret.client_secret,
      redirectUri: secret.redirect_uris?.[0] ?? DEFAULT_REDIRECT_URI,
    });

    client.on('tokens', (tokens) => {
      this.saveToken({ ...client.credentials, ...tokens }).catch((error: unknown) => {
        logger.error('Error saving refreshed token:', error);
      });
    });

    const token = await this.loadToken();
    if (token) {
      client.setCredentials(token);
      logger.info('Loaded existing authentication token');
    } else {
      logger.info('No existing token found', { tokenPath: this.options.tokenPath });
    }

    this.oAuth2Client = client;
    return client;
  }

  async getAuthUrl(): Promise<string> {
    const client = await this.initialize();
    return client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: SCOPES,
    });
  }

  async completeAuthentication(code: string): Promise<void> {
    const client = await this.initialize();
    const { tokens } = await client.getToken(code);
    client.setCredentials(tokens);
    await this.saveToken(tokens);
    logger.info('Authentication completed');
  }

  async isAuthenticated(): Promise<boolean> {
    const client = await this.initialize();
    return Boolean(client.credentials.refresh_token || client.credentials.access_token);
  }

  async getGmailClient(): Promise<gmail_v1.Gmail> {
    const client = await this.initialize();
    if (!(await this.isAuthenticated())) {
      throw new Error(
        `Not authenticated: no token at ${this.options.tokenPath}. Use the authenticate tool first.`
      );
    }
    return google.gmail({ version: 'v1', auth: client });
  }

  private async loadCredentials(): Promise<ClientSecret> {
    let raw: string;
    try {
      raw = await fs.readFile(this.options.credentialsPath, 'utf-8');
    } catch (error) {
      throw new Error(`Cannot read OAuth credentials at ${this.options.credentialsPath}`, { cause: error });
    }

    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null) {
      const secret = 'installed' in parsed ? parsed.installed : 'web' in parsed ? parsed.web : undefined;
      if (isClientSecret(secret)) {
        return secret;
      }
    }
    throw new Error(
      `OAuth credentials at ${this.options.credentialsPath} hold neither an "installed" nor a "web" client`
    );
  }

  private async loadToken(): Promise<Credentials | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.options.tokenPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      logger.warn(`Ignoring unreadable token file at ${this.options.tokenPath}`, { error: describeError(error) });
      return null;
    }

    try {
      const token: unknown = JSON.parse(raw);
      if (isCredentials(token)) {
        return token;
      }
      logger.warn(`Ignoring token file at ${this.options.tokenPath}: not a JSON object`);
    } catch (error) {
      logger.warn(`Ignoring unreadable token file at ${this.options.tokenPath}`, { error: describeError(error) });
    }
    return null;
  }

  private async saveToken(token: Credentials): Promise<void> {
    await fs.mkdir(path.dirname(this.options.tokenPath), { recursive: true });
    await fs.writeFile(this.options.tokenPath, JSON.stringify(token), { mode: 0o600 });
    logger.info('Token saved successfully');
  }
}
