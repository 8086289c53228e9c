/**
 * Registers the agent's public key with the backend key registry so devices
 * can address and verify it.
 *
 * POST <apiBaseUrl>/keys/register
 *   { "entity_type": "agent", "entity_id": "<agentId>", "public_key": "<base64>" }
 */

import type { CredentialProvider } from '../shared/auth.js';
import type { KeyRegistrar } from '../shared/crypto/index.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('key-registration');

export interface BackendKeyRegistrarOptions {
  apiBaseUrl: string;
  credentials: CredentialProvider;
  /** Without an agent id there is nothing to register the key against. */
  agentId?: string;
  timeout: number;
}

export class BackendKeyRegistrar implements KeyRegistrar {
  constructor(private readonly options: BackendKeyRegistrarOptions) {}

  /** Resolves true on HTTP 200, false otherwise. Rejects on network failure or a missing credential. */
  async register(publicKey: string): Promise<boolean> {
    const { agentId } = this.options;
    if (!agentId) {
      log.error('No agent ID available for key registration');
      return false;
    }

    const token = this.options.credentials.getBearerToken();
    const resp = await fetch(`${this.options.apiBaseUrl}/keys/register`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${token}`,
      },
      body: JSON.stringify({ entity_type: 'agent', entity_id: agentId, public_key: publicKey }),
      signal: AbortSignal.timeout(this.options.timeout),
    });

    if (resp.status !== 200) {
      log.error(`Failed to register public key: HTTP ${resp.status} - ${await resp.text()}`);
      return false;
    }

    log.info('Registered agent public key with backend');
    return true;
  }
}
