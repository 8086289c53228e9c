/**
 * Typed error taxonomy.
 *
 * Internal components throw these so callers (and tests) can tell *which*
 * failure happened. The only translation into protocol-level error objects
 * happens at the MCP boundary in ../mcp/server.ts.
 *
 * No message produced here ever contains key material.
 */

export type ProxyErrorKind =
  | 'keypair_not_found'
  | 'keypair_corrupt'
  | 'authentication_required'
  | 'device_key_fetch'
  | 'no_recipient'
  | 'decryption'
  | 'gateway'
  | 'invalid_arguments'
  | 'sensitive_tool';

export abstract class ProxyError extends Error {
  abstract readonly kind: ProxyErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ── Identity ────────────────────────────────────────────────────────────

export class KeypairNotFoundError extends ProxyError {
  readonly kind = 'keypair_not_found';

  constructor(readonly path: string) {
    super(`Agent keypair not found: ${path}`);
  }
}

export class KeypairCorruptError extends ProxyError {
  readonly kind = 'keypair_corrupt';

  constructor(
    readonly path: string,
    reason: string,
  ) {
    super(`Agent keypair at ${path} is invalid: ${reason}`);
  }
}

// ── Backend access ──────────────────────────────────────────────────────

export class AuthenticationRequiredError extends ProxyError {
  readonly kind = 'authentication_required';

  constructor(message = 'No bearer credential available. Log in before starting the proxy.') {
    super(message);
  }
}

/** Longest response-body excerpt carried on a DeviceKeyFetchError. */
const BODY_SNIPPET_LENGTH = 200;

export class DeviceKeyFetchError extends ProxyError {
  readonly kind = 'device_key_fetch';
  readonly bodySnippet: string;

  constructor(
    readonly status: number,
    body: string,
  ) {
    const snippet = body.slice(0, BODY_SNIPPET_LENGTH);
    super(`Failed to get device public keys: ${status} - ${snippet}`);
    this.bodySnippet = snippet;
  }
}

export type GatewayFailureKind = 'timeout' | 'transport' | 'protocol' | 'cancelled';

export class GatewayError extends ProxyError {
  readonly kind = 'gateway';

  constructor(
    readonly failure: GatewayFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  get isTimeout(): boolean {
    return this.failure === 'timeout';
  }
}

// ── Cryptography ────────────────────────────────────────────────────────

export class NoRecipientKeyError extends ProxyError {
  readonly kind = 'no_recipient';

  constructor(message = 'No recipient device is available: register a device before requesting human input') {
    super(message);
  }
}

/**
 * Malformed encoding, tag mismatch and wrong key all collapse into this one
 * error with a fixed message.
 */
export class DecryptionError extends ProxyError {
  readonly kind = 'decryption';

  constructor() {
    super('Failed to decrypt sealed payload');
  }
}

// ── Tool dispatch ───────────────────────────────────────────────────────

export class InvalidToolArgumentsError extends ProxyError {
  readonly kind = 'invalid_arguments';

  constructor(
    readonly toolName: string,
    detail: string,
  ) {
    super(`Invalid arguments for ${toolName}: ${detail}`);
  }
}

export type SensitivePhase = 'key-retrieval' | 'encryption' | 'backend-call' | 'decryption';

const PHASE_LABELS: Record<SensitivePhase, string> = {
  'key-retrieval': 'device key retrieval',
  encryption: 'encryption',
  'backend-call': 'backend call',
  decryption: 'decryption',
};

/** Wraps the failure of one step of the encrypt → forward → decrypt flow. */
export class SensitiveToolError extends ProxyError {
  readonly kind = 'sensitive_tool';

  constructor(
    readonly toolName: string,
    readonly phase: SensitivePhase,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${toolName} failed during ${PHASE_LABELS[phase]}: ${detail}`, { cause });
  }
}
