/**
 * MCP front of the proxy, the side the coding agent talks to.
 *
 * The agent spawns this as a child process (stdio transport). tools/list and
 * tools/call are answered by the ProxyEngine; this module is the single place
 * where typed proxy errors become JSON-RPC error objects ({ code, message }).
 */

import type { Readable, Writable } from 'node:stream';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';

import { GatewayError, ProxyError, SensitiveToolError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { ProxyEngine } from './engine.js';
import { PROXY_NAME, PROXY_VERSION } from './tools.js';

const log = createLogger('mcp-proxy');

/** Application error codes, in the JSON-RPC server-defined range. */
export const ProxyErrorCode = {
  AuthenticationRequired: -32010,
  NoRecipient: -32011,
  DecryptionFailed: -32012,
  GatewayFailure: -32013,
  IdentityUnavailable: -32014,
  EncryptionFailed: -32015,
} as const;

function codeFor(err: ProxyError): number {
  if (err instanceof SensitiveToolError) {
    // The phase is in the message; the code follows the underlying failure
    if (err.cause instanceof ProxyError) return codeFor(err.cause);
    switch (err.phase) {
      case 'encryption':
        return ProxyErrorCode.EncryptionFailed;
      case 'decryption':
        return ProxyErrorCode.DecryptionFailed;
      default:
        return ProxyErrorCode.GatewayFailure;
    }
  }
  if (err instanceof GatewayError) {
    return err.isTimeout ? ErrorCode.RequestTimeout : ProxyErrorCode.GatewayFailure;
  }

  switch (err.kind) {
    case 'authentication_required':
      return ProxyErrorCode.AuthenticationRequired;
    case 'no_recipient':
      return ProxyErrorCode.NoRecipient;
    case 'decryption':
      return ProxyErrorCode.DecryptionFailed;
    case 'keypair_not_found':
    case 'keypair_corrupt':
      return ProxyErrorCode.IdentityUnavailable;
    case 'invalid_arguments':
      return ErrorCode.InvalidParams;
    default:
      return ProxyErrorCode.GatewayFailure;
  }
}

/**
 * Convert anything thrown while serving a request into the error object the
 * SDK puts on the wire.
 */
export function toMcpError(err: unknown): McpError {
  if (err instanceof McpError) return err;
  if (err instanceof ProxyError) return new McpError(codeFor(err), err.message);
  const message = err instanceof Error ? err.message : String(err);
  return new McpError(ErrorCode.InternalError, message);
}

export interface ProxyServerOptions {
  /** Aborts every in-flight tool call, on top of the caller's own cancellation. */
  shutdown?: AbortSignal;
  /** Called with each tool call as it starts. */
  track?: (call: Promise<unknown>) => void;
}

export function createProxyServer(engine: ProxyEngine, options: ProxyServerOptions = {}): Server {
  const server = new Server(
    { name: PROXY_NAME, version: PROXY_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: await engine.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const signal = options.shutdown ? AbortSignal.any([extra.signal, options.shutdown]) : extra.signal;
    const call = engine.callTool(name, args, signal);
    options.track?.(call);
    try {
      return await call;
    } catch (err) {
      const mcpError = toMcpError(err);
      log.warn(`Tool ${name} failed: ${mcpError.message}`);
      throw mcpError;
    }
  });

  server.onerror = (err) => {
    log.error(`Protocol error: ${err.message}`);
  };

  return server;
}

/**
 * Serve `engine` over a stdio-style duplex pair until the input reaches
 * end-of-stream. Calls still running at that point are aborted; resolves once
 * the transport is closed and they have settled.
 */
export function runStdioProxy(
  engine: ProxyEngine,
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): Promise<void> {
  const shutdown = new AbortController();
  const inflight = new Set<Promise<unknown>>();
  const track = (call: Promise<unknown>): void => {
    inflight.add(call);
    const remove = (): void => {
      inflight.delete(call);
    };
    call.then(remove, remove);
  };

  const server = createProxyServer(engine, { shutdown: shutdown.signal, track });
  const transport = new StdioServerTransport(input, output);

  return new Promise<void>((resolve, reject) => {
    server.onclose = () => {
      shutdown.abort(new Error('Input channel closed'));
      log.info(`Channel closed; aborting ${inflight.size} in-flight call(s)`);
      Promise.allSettled([...inflight]).then(() => resolve(), reject);
    };

    input.once('end', () => {
      shutdown.abort(new Error('Input channel closed'));
      server.close().catch(reject);
    });

    server.connect(transport).then(() => {
      log.info(`${PROXY_NAME} ${PROXY_VERSION} started (stdio transport)`);
    }, reject);
  });
}
