/**
 * Device key directory: public keys of the human's receiving devices.
 *
 * GET <apiBaseUrl>/devices/public-keys  →  { "public_keys": ["<base64>", ...] }
 *
 * Not cached: each sensitive tool call re-fetches so a newly paired device
 * is picked up immediately.
 */

import { z } from 'zod';

import type { CredentialProvider } from '../shared/auth.js';
import { DeviceKeyFetchError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('device-keys');

const devicePublicKeysSchema = z.object({
  public_keys: z.array(z.string()).default([]),
});

export interface DeviceKeySource {
  /** Ordered candidate recipients; empty when the account has no devices. */
  fetchDevicePublicKeys(): Promise<string[]>;
}

export interface DeviceKeyDirectoryOptions {
  /** REST base, e.g. https://relay.example.com/api/v1 */
  apiBaseUrl: string;
  credentials: CredentialProvider;
  /** Request timeout (ms) */
  timeout: number;
}

export class DeviceKeyDirectory implements DeviceKeySource {
  constructor(private readonly options: DeviceKeyDirectoryOptions) {}

  /**
   * @throws AuthenticationRequiredError when no bearer credential is available
   * @throws DeviceKeyFetchError on a non-2xx status or an unexpected body
   */
  async fetchDevicePublicKeys(): Promise<string[]> {
    const token = this.options.credentials.getBearerToken();
    const url = `${this.options.apiBaseUrl}/devices/public-keys`;

    const resp = await fetch(url, {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(this.options.timeout),
    });

    if (!resp.ok) {
      throw new DeviceKeyFetchError(resp.status, await resp.text());
    }

    const bodyText = await resp.text();
    let body: unknown;
    try {
      body = JSON.parse(bodyText);
    } catch {
      throw new DeviceKeyFetchError(resp.status, bodyText);
    }

    const parsed = devicePublicKeysSchema.safeParse(body);
    if (!parsed.success) {
      throw new DeviceKeyFetchError(resp.status, bodyText);
    }

    log.debug(`Fetched ${parsed.data.public_keys.length} device public key(s)`);
    return parsed.data.public_keys;
  }
}
