/**
 * Configuration schema and loading for the local E2EE proxy.
 *
 * Config file: <configDir>/proxy.config.json
 * Agent keypair: <configDir>/agent.key
 * Bearer token (written by the login flow): <configDir>/token.json
 * Environment: <configDir>/.env (loaded by the entrypoint via dotenv)
 *
 * Paths are resolved lazily so tests (and the .env file) can set
 * HITL_CONFIG_DIR before anything reads it.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

/** Fifteen minutes: a human has to read the prompt and answer it. */
export const DEFAULT_HUMAN_RESPONSE_TIMEOUT = 15 * 60_000;

/** Base directory for config, keys and token.
 *  Defaults to ~/.config/hitl-e2ee-proxy. Override with HITL_CONFIG_DIR. */
export function getConfigDir(): string {
  return process.env.HITL_CONFIG_DIR || path.join(os.homedir(), '.config', 'hitl-e2ee-proxy');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'proxy.config.json');
}

export function getKeypairPath(): string {
  return path.join(getConfigDir(), 'agent.key');
}

export function getTokenPath(): string {
  return path.join(getConfigDir(), 'token.json');
}

export function getEnvFilePath(): string {
  return path.join(getConfigDir(), '.env');
}

/** Local proxy configuration */
export interface ProxyConfig {
  /** Backend base URL (e.g. https://relay.example.com). REST calls go to <backendUrl>/api/v1,
   *  MCP calls to <backendUrl>/mcp-server/mcp/ unless the URL already names that endpoint. */
  backendUrl: string;
  /** File holding the agent identity keypair */
  keypairPath: string;
  /** Agent id used when registering a freshly generated public key */
  agentId?: string;
  /** Timeout for backend connections and short REST calls (ms) */
  connectTimeout: number;
  /** Timeout for non-interactive MCP requests such as tools/list (ms) */
  requestTimeout: number;
  /** Timeout for tool calls that wait on a human (ms) */
  humanResponseTimeout: number;
}

const proxyConfigFileSchema = z
  .object({
    backendUrl: z.string().url(),
    keypairPath: z.string().min(1),
    agentId: z.string().min(1),
    connectTimeout: z.number().int().positive(),
    requestTimeout: z.number().int().positive(),
    humanResponseTimeout: z.number().int().positive(),
  })
  .partial();

export type ProxyConfigFile = z.infer<typeof proxyConfigFileSchema>;

function defaults(): ProxyConfig {
  return {
    backendUrl: 'http://127.0.0.1:8000',
    keypairPath: getKeypairPath(),
    connectTimeout: 30_000,
    requestTimeout: 30_000,
    humanResponseTimeout: DEFAULT_HUMAN_RESPONSE_TIMEOUT,
  };
}

function readConfigFile(): ProxyConfigFile {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new Error(`Invalid JSON in ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = proxyConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid proxy config in ${configPath}: ${issues}`);
  }
  return parsed.data;
}

function envOverrides(): ProxyConfigFile {
  const overrides: ProxyConfigFile = {};
  const backendUrl = process.env.HITL_BACKEND_URL?.trim();
  if (backendUrl) overrides.backendUrl = backendUrl;

  const keypairPath = process.env.HITL_KEYPAIR_PATH?.trim();
  if (keypairPath) overrides.keypairPath = keypairPath;

  const agentId = process.env.HITL_AGENT_ID?.trim();
  if (agentId) overrides.agentId = agentId;

  const timeout = process.env.HITL_HUMAN_RESPONSE_TIMEOUT_MS?.trim();
  if (timeout) {
    const ms = Number(timeout);
    if (!Number.isInteger(ms) || ms <= 0) {
      throw new Error(`HITL_HUMAN_RESPONSE_TIMEOUT_MS must be a positive integer, got "${timeout}"`);
    }
    overrides.humanResponseTimeout = ms;
  }
  return overrides;
}

/**
 * Load the proxy config: built-in defaults, then proxy.config.json,
 * then HITL_* environment overrides.
 */
export function loadProxyConfig(): ProxyConfig {
  return { ...defaults(), ...readConfigFile(), ...envOverrides() };
}

export function saveProxyConfig(config: ProxyConfigFile): void {
  fs.mkdirSync(getConfigDir(), { recursive: true, mode: 0o700 });
  fs.writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), { mode: 0o600 });
}

/** Base URL for the backend's REST API. */
export function apiBaseUrl(config: Pick<ProxyConfig, 'backendUrl'>): string {
  const base = config.backendUrl.replace(/\/+$/, '');
  const root = base.replace(/\/mcp-server\/mcp$/, '');
  return `${root}/api/v1`;
}

/**
 * Streamable-HTTP MCP endpoint of the backend. A URL that already points at
 * /mcp-server/mcp is used as-is (with a trailing slash).
 */
export function resolveMcpUrl(backendUrl: string): string {
  const base = backendUrl.replace(/\/+$/, '');
  if (base.endsWith('/mcp-server/mcp')) {
    return `${base}/`;
  }
  return `${base}/mcp-server/mcp/`;
}
