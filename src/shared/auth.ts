/**
 * Bearer credential source.
 *
 * The login flow (OAuth / API key) lives outside this package; it leaves an
 * access token either in HITL_ACCESS_TOKEN or in <configDir>/token.json.
 * The proxy only needs to read it.
 */

import fs from 'node:fs';
import { z } from 'zod';

import { getTokenPath } from './config.js';
import { AuthenticationRequiredError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('auth');

export interface CredentialProvider {
  /** @throws AuthenticationRequiredError when no credential is available */
  getBearerToken(): string;
}

const tokenFileSchema = z.object({ access_token: z.string().min(1) }).passthrough();

/** Reads HITL_ACCESS_TOKEN first, then the token file. Re-read on every call so a fresh login is picked up. */
export class StoredCredentialProvider implements CredentialProvider {
  constructor(private readonly tokenPath: string = getTokenPath()) {}

  getBearerToken(): string {
    const fromEnv = process.env.HITL_ACCESS_TOKEN?.trim();
    if (fromEnv) return fromEnv;

    const fromFile = this.readTokenFile();
    if (fromFile) return fromFile;

    throw new AuthenticationRequiredError();
  }

  private readTokenFile(): string | null {
    if (!fs.existsSync(this.tokenPath)) return null;
    try {
      const parsed = tokenFileSchema.safeParse(JSON.parse(fs.readFileSync(this.tokenPath, 'utf-8')));
      return parsed.success ? parsed.data.access_token : null;
    } catch (err) {
      // Unreadable token file is the same as being logged out
      log.warn(`Ignoring unreadable token file ${this.tokenPath}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }
}

/** Fixed token, for tests and for callers that already hold a credential. */
export class StaticCredentialProvider implements CredentialProvider {
  constructor(private readonly token: string | null) {}

  getBearerToken(): string {
    if (!this.token) throw new AuthenticationRequiredError();
    return this.token;
  }
}

export function createCredentialProvider(tokenPath?: string): CredentialProvider {
  return new StoredCredentialProvider(tokenPath);
}
