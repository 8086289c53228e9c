/**
 * Backend tool gateway: the MCP client side of the proxy.
 *
 * Talks to the backend's MCP server over streamable HTTP with a bearer
 * credential. Each operation opens its own client connection and closes it
 * afterwards; nothing is cached between calls.
 *
 * No automatic retries: a sensitive call that silently fired twice could
 * notify the human twice.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolResultSchema,
  ErrorCode,
  McpError,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import type { CredentialProvider } from '../shared/auth.js';
import { GatewayError, ProxyError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { PROXY_NAME, PROXY_VERSION } from '../mcp/tools.js';

const log = createLogger('gateway');

export interface ToolGateway {
  listRemoteTools(): Promise<Tool[]>;
  /** Aborting `signal` cancels the call on the backend as well. */
  invokeRemoteTool(name: string, args?: Record<string, unknown>, signal?: AbortSignal): Promise<CallToolResult>;
}

/** Produces a fresh, unconnected transport for one backend operation. */
export type TransportFactory = () => Transport | Promise<Transport>;

export interface GatewayOptions {
  transportFactory: TransportFactory;
  /** Timeout for the initialize handshake (ms) */
  connectTimeout: number;
  /** Timeout for tools/list (ms) */
  requestTimeout: number;
  /** Timeout for tools/call; a human may be on the other end (ms) */
  humanResponseTimeout: number;
}

/**
 * Transport factory for the real backend: streamable HTTP with an
 * `Authorization: Bearer` header read from `credentials` per connection.
 */
export function httpTransportFactory(mcpUrl: string, credentials: CredentialProvider): TransportFactory {
  return () => {
    const token = credentials.getBearerToken();
    return new StreamableHTTPClientTransport(new URL(mcpUrl), {
      requestInit: { headers: { Authorization: `Bearer ${token}` } },
    });
  };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Human-readable timeout budget: milliseconds below one second, whole seconds above. */
export function formatTimeout(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${Math.round(ms / 1000)}s`;
}

/** Classify a failure; typed proxy errors (e.g. missing credential) pass through untouched. */
function toGatewayError(operation: string, err: unknown, timeoutMs: number, signal?: AbortSignal): Error {
  if (err instanceof ProxyError) return err;
  if (signal?.aborted) {
    return new GatewayError('cancelled', `${operation} was cancelled`, { cause: err });
  }
  if (err instanceof McpError) {
    if (err.code === ErrorCode.RequestTimeout) {
      return new GatewayError(
        'timeout',
        `${operation} timed out after ${formatTimeout(timeoutMs)} waiting for the backend`,
        { cause: err },
      );
    }
    return new GatewayError('protocol', `${operation} failed: ${err.message}`, { cause: err });
  }
  return new GatewayError('transport', `${operation} failed: ${describe(err)}`, { cause: err });
}

export class BackendToolGateway implements ToolGateway {
  constructor(private readonly options: GatewayOptions) {}

  /**
   * Full backend catalog (all pages).
   *
   * @throws GatewayError on transport or protocol failure
   */
  async listRemoteTools(): Promise<Tool[]> {
    const timeout = this.options.requestTimeout;
    return this.withClient('tools/list', timeout, async (client) => {
      const tools: Tool[] = [];
      let cursor: string | undefined;
      do {
        const page = await client.listTools(cursor ? { cursor } : undefined, { timeout });
        tools.push(...page.tools);
        cursor = page.nextCursor;
      } while (cursor);
      log.debug(`Backend advertises ${tools.length} tool(s)`);
      return tools;
    });
  }

  /**
   * Invoke `name` on the backend and return the protocol-level result as-is.
   *
   * Aborting `signal` sends a cancellation to the backend and closes the connection.
   *
   * @throws GatewayError with failure 'timeout' when the human-response budget runs out
   * @throws GatewayError with failure 'cancelled' when `signal` is aborted
   */
  async invokeRemoteTool(
    name: string,
    args?: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<CallToolResult> {
    const timeout = this.options.humanResponseTimeout;
    return this.withClient(
      `Tool call ${name}`,
      timeout,
      (client) =>
        client.request(
          { method: 'tools/call', params: { name, arguments: args } },
          CallToolResultSchema,
          { timeout, signal },
        ),
      signal,
    );
  }

  private async withClient<T>(
    operation: string,
    timeoutMs: number,
    fn: (client: Client) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const client = new Client({ name: PROXY_NAME, version: PROXY_VERSION });
    try {
      try {
        const transport = await this.options.transportFactory();
        await client.connect(transport, { timeout: this.options.connectTimeout, signal });
      } catch (err) {
        throw toGatewayError('Connecting to backend', err, this.options.connectTimeout, signal);
      }

      try {
        return await fn(client);
      } catch (err) {
        throw toGatewayError(operation, err, timeoutMs, signal);
      }
    } catch (err) {
      if (err instanceof GatewayError && err.failure === 'cancelled') {
        log.info(err.message);
      } else {
        log.error(describe(err));
      }
      throw err;
    } finally {
      await client.close().catch((err: unknown) => {
        log.debug(`Closing backend connection failed: ${describe(err)}`);
      });
    }
  }
}
