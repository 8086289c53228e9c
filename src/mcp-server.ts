#!/usr/bin/env node
/**
 * E2EE proxy: the local side.
 *
 * The coding agent spawns this as a child process (stdio transport). It
 * relays ordinary tool calls to the backend's MCP server untouched and seals
 * the human-in-the-loop tools for the human's device, so the backend only
 * ever relays ciphertext for them.
 *
 * The proxy holds one secret: the agent's own X25519 private key.
 *
 * Usage:
 *   hitl-e2ee-proxy [backend-url]
 */

import dotenv from 'dotenv';

import { BackendKeyRegistrar } from './remote/key-registration.js';
import { DeviceKeyDirectory } from './remote/device-keys.js';
import { BackendToolGateway, httpTransportFactory } from './remote/gateway.js';
import { ProxyEngine } from './mcp/engine.js';
import { runStdioProxy } from './mcp/server.js';
import { createCredentialProvider } from './shared/auth.js';
import { apiBaseUrl, getEnvFilePath, loadProxyConfig, resolveMcpUrl } from './shared/config.js';
import { SealedBoxCodec, ensureIdentityKeypair, fingerprint } from './shared/crypto/index.js';
import { createLogger } from './shared/logger.js';

dotenv.config({ path: getEnvFilePath() });

const log = createLogger('mcp-proxy');

async function main(): Promise<void> {
  const config = loadProxyConfig();
  const [backendArg] = process.argv.slice(2);
  if (backendArg) config.backendUrl = backendArg;

  const credentials = createCredentialProvider();
  const restBase = apiBaseUrl(config);

  const identity = await ensureIdentityKeypair(
    config.keypairPath,
    new BackendKeyRegistrar({
      apiBaseUrl: restBase,
      credentials,
      agentId: config.agentId,
      timeout: config.connectTimeout,
    }),
  );
  log.info(`Agent identity ${fingerprint(identity.publicKey)}`);

  const mcpUrl = resolveMcpUrl(config.backendUrl);
  log.info(`Backend MCP endpoint: ${mcpUrl}`);

  const engine = new ProxyEngine({
    gateway: new BackendToolGateway({
      transportFactory: httpTransportFactory(mcpUrl, credentials),
      connectTimeout: config.connectTimeout,
      requestTimeout: config.requestTimeout,
      humanResponseTimeout: config.humanResponseTimeout,
    }),
    deviceKeys: new DeviceKeyDirectory({
      apiBaseUrl: restBase,
      credentials,
      timeout: config.connectTimeout,
    }),
    codec: new SealedBoxCodec(identity),
  });

  await runStdioProxy(engine);
}

main().catch((err: unknown) => {
  log.error('Fatal error:', err);
  process.exit(1);
});
