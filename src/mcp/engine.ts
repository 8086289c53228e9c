/**
 * Tool filter & translator. Decides, per tool call, between transparent
 * pass-through and the encrypt → forward → decrypt flow.
 *
 * Holds no mutable state: every call builds its own InvocationContext, so
 * concurrent calls need no locking. Dispatch is resolved by name at call
 * time; the backend's catalog is open-ended and never pre-registered.
 */

import crypto from 'node:crypto';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';

import type { DeviceKeySource } from '../remote/device-keys.js';
import type { ToolGateway } from '../remote/gateway.js';
import type { JsonValue, SealedBoxCodec } from '../shared/crypto/index.js';
import {
  GatewayError,
  InvalidToolArgumentsError,
  NoRecipientKeyError,
  SensitiveToolError,
  type SensitivePhase,
} from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import {
  SENSITIVE_TOOLS,
  encryptedVariantOf,
  isEncryptedVariant,
  type SensitiveTool,
} from './tools.js';

const log = createLogger('engine');

/** Per-call context; discarded once the result (or error) is delivered. */
export interface InvocationContext {
  toolName: string;
  arguments: Record<string, unknown>;
  correlationId: string;
  /** Fires when the caller cancels or the channel closes. */
  signal?: AbortSignal;
}

export interface ProxyEngineDeps {
  gateway: ToolGateway;
  deviceKeys: DeviceKeySource;
  codec: SealedBoxCodec;
}

function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

/** First text block of a tool result, if any. */
function firstText(result: CallToolResult): string | undefined {
  for (const block of result.content) {
    if (block.type === 'text') return block.text;
  }
  return undefined;
}

/** Render a decrypted device reply as the caller-facing text. */
function replyText(reply: JsonValue): string {
  if (typeof reply === 'string') return reply;
  if (reply !== null && typeof reply === 'object' && !Array.isArray(reply)) {
    const response = reply.response;
    if (typeof response === 'string') return response;
  }
  return JSON.stringify(reply, null, 2);
}

export class ProxyEngine {
  constructor(private readonly deps: ProxyEngineDeps) {}

  /**
   * Catalog shown to the caller: the backend's tools minus every sealed
   * variant, with the local sensitive tools substituted for any backend
   * descriptor of the same name. If the backend cannot be reached only the
   * local sensitive tools are listed.
   */
  async listTools(): Promise<Tool[]> {
    let remote: Tool[] = [];
    try {
      remote = await this.deps.gateway.listRemoteTools();
    } catch (err) {
      log.warn(
        `Backend tool catalog unavailable, listing local tools only: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const passThrough = remote.filter(
      (tool) => !isEncryptedVariant(tool.name) && !SENSITIVE_TOOLS.has(tool.name),
    );
    const local = [...SENSITIVE_TOOLS.values()].map((tool) => tool.descriptor);
    return [...passThrough, ...local];
  }

  /**
   * Dispatch one tool call. Aborting `signal` cancels the backend call it
   * is waiting on; a sensitive call aborted before that point never reaches
   * the backend.
   *
   * @throws InvalidToolArgumentsError for malformed sensitive-tool arguments
   * @throws SensitiveToolError naming the failed phase of the encrypted flow
   * @throws GatewayError / AuthenticationRequiredError from a pass-through call
   */
  async callTool(
    name: string,
    args?: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<CallToolResult> {
    const ctx: InvocationContext = {
      toolName: name,
      arguments: args ?? {},
      correlationId: crypto.randomUUID(),
      signal,
    };

    const sensitive = SENSITIVE_TOOLS.get(name);
    if (sensitive) {
      return this.callSensitive(ctx, sensitive);
    }

    log.debug(`[${ctx.correlationId}] pass-through ${name}`);
    return this.deps.gateway.invokeRemoteTool(name, args, signal);
  }

  private async callSensitive(ctx: InvocationContext, tool: SensitiveTool): Promise<CallToolResult> {
    const parsed = tool.args.safeParse(ctx.arguments);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new InvalidToolArgumentsError(ctx.toolName, detail);
    }
    const payload: unknown = parsed.data;

    const phase = async <T>(which: SensitivePhase, step: () => T | Promise<T>): Promise<T> => {
      try {
        return await step();
      } catch (err) {
        const wrapped = new SensitiveToolError(ctx.toolName, which, err);
        log.error(`[${ctx.correlationId}] ${wrapped.message}`);
        throw wrapped;
      }
    };

    // 1–2. Pick the recipient device. Multi-device fan-out is not implemented:
    // the first registered device both receives the request and must answer it.
    const recipient = await phase('key-retrieval', async () => {
      const keys = await this.deps.deviceKeys.fetchDevicePublicKeys();
      const first = keys[0];
      if (!first) throw new NoRecipientKeyError();
      return first;
    });

    // 3. Seal
    const sealed = await phase('encryption', () => this.deps.codec.seal(payload, recipient));

    // 4. Forward to the sealed variant
    const variant = encryptedVariantOf(ctx.toolName);
    log.info(`[${ctx.correlationId}] ${ctx.toolName} → ${variant}`);
    const result = await phase('backend-call', async () => {
      ctx.signal?.throwIfAborted();
      const res = await this.deps.gateway.invokeRemoteTool(variant, { encrypted_payload: sealed }, ctx.signal);
      if (res.isError) {
        throw new GatewayError('protocol', `Backend rejected ${variant}: ${firstText(res) ?? 'no details'}`);
      }
      return res;
    });

    if (!tool.sealedResponse) {
      return textResult(firstText(result) || tool.fallbackText || '');
    }

    // 5. Open the device's reply with the same key we addressed
    const reply = await phase('decryption', () => {
      const text = firstText(result);
      if (text === undefined) throw new Error('Backend reply carried no text content');
      return this.deps.codec.open(text, recipient);
    });

    // 6. Same result shape as a plaintext tool
    return textResult(replyText(reply));
  }
}
