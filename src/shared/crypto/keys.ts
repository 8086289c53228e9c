/**
 * Agent identity keypair management.
 *
 * One X25519 keypair per agent identity (NaCl `box` keys), serialized as
 * base64 in a single JSON file:
 *
 *   { "public_key": "<base64>", "private_key": "<base64>" }
 *
 * The file is written 0600 inside a 0700 directory. Keys are generated on
 * first use and never rotated automatically.
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import nacl from 'tweetnacl';
import { z } from 'zod';

import { KeypairCorruptError, KeypairNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('keys');

/** Raw key length for X25519 public and secret keys. */
export const KEY_LENGTH = nacl.box.publicKeyLength;

/** Base64-encoded identity keypair */
export interface IdentityKeypair {
  publicKey: string;
  privateKey: string;
}

/** On-disk layout of the keypair file */
const keypairFileSchema = z.object({
  public_key: z.string(),
  private_key: z.string(),
});

type KeypairFile = z.infer<typeof keypairFileSchema>;

/** Receives freshly generated public keys (the backend's key registry). */
export interface KeyRegistrar {
  /** Resolves false (or rejects) when the key could not be registered. */
  register(publicKey: string): Promise<boolean>;
}

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

export function encodeKey(key: Uint8Array): string {
  return Buffer.from(key).toString('base64');
}

/**
 * Decode a base64 key, requiring canonical encoding and exactly 32 bytes.
 *
 * @throws Error describing what is wrong (never echoing the value)
 */
export function decodeKey(value: string): Uint8Array {
  if (!BASE64_RE.test(value)) {
    throw new Error('key is not valid base64');
  }
  const bytes = Buffer.from(value, 'base64');
  if (bytes.toString('base64') !== value) {
    throw new Error('key is not canonical base64');
  }
  if (bytes.length !== KEY_LENGTH) {
    throw new Error(`key must be ${KEY_LENGTH} bytes, got ${bytes.length}`);
  }
  return new Uint8Array(bytes);
}

/**
 * Generate a fresh identity keypair.
 */
export function generateKeypair(): IdentityKeypair {
  const pair = nacl.box.keyPair();
  return {
    publicKey: encodeKey(pair.publicKey),
    privateKey: encodeKey(pair.secretKey),
  };
}

/**
 * Check both keys decode and that the private key derives the stored public key.
 *
 * @throws Error with the reason the pair is invalid
 */
export function validateKeypair(keys: IdentityKeypair): void {
  const pub = decodeKey(keys.publicKey);
  const priv = decodeKey(keys.privateKey);
  const derived = nacl.box.keyPair.fromSecretKey(priv).publicKey;
  if (!nacl.verify(derived, pub)) {
    throw new Error('public key does not match private key');
  }
}

/**
 * Save a keypair with owner-only permissions.
 * Creates the parent directory (0700) if needed; the file is 0600.
 */
export function saveKeypair(keys: IdentityKeypair, filePath: string): void {
  const dir = path.dirname(filePath);
  const created = fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  if (created !== undefined) {
    // mkdir's mode is filtered through the umask
    fs.chmodSync(dir, 0o700);
  }

  const data: KeypairFile = { public_key: keys.publicKey, private_key: keys.privateKey };
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), { mode: 0o600 });
  fs.chmodSync(filePath, 0o600);

  log.info(`Agent keypair saved to ${filePath}`);
}

/**
 * Load and validate the identity keypair.
 *
 * @throws KeypairNotFoundError if the file does not exist
 * @throws KeypairCorruptError if it cannot be parsed or a key is invalid
 */
export function loadIdentityKeypair(filePath: string): IdentityKeypair {
  if (!fs.existsSync(filePath)) {
    throw new KeypairNotFoundError(filePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch {
    throw new KeypairCorruptError(filePath, 'file is not valid JSON');
  }
  const parsed = keypairFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new KeypairCorruptError(filePath, 'public_key and private_key are required');
  }

  const keys: IdentityKeypair = {
    publicKey: parsed.data.public_key,
    privateKey: parsed.data.private_key,
  };
  try {
    validateKeypair(keys);
  } catch (err) {
    throw new KeypairCorruptError(filePath, err instanceof Error ? err.message : String(err));
  }
  return keys;
}

/**
 * Return the stored keypair, generating and persisting one on first run.
 *
 * A freshly generated public key is offered to `registrar`; registration is
 * best-effort and its failure is only logged. A corrupt key file is NOT
 * replaced: that would silently change the agent's identity.
 */
export async function ensureIdentityKeypair(
  filePath: string,
  registrar?: KeyRegistrar,
): Promise<IdentityKeypair> {
  try {
    const keys = loadIdentityKeypair(filePath);
    log.debug(`Loaded existing agent keypair (${fingerprint(keys.publicKey)})`);
    return keys;
  } catch (err) {
    if (!(err instanceof KeypairNotFoundError)) throw err;
  }

  log.info('Generating new agent keypair');
  const keys = generateKeypair();
  saveKeypair(keys, filePath);

  if (registrar) {
    try {
      const registered = await registrar.register(keys.publicKey);
      if (!registered) {
        log.error('Failed to register public key with backend');
      }
    } catch (err) {
      log.error(
        `Failed to register public key with backend: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  return keys;
}

/**
 * Fingerprint of a public key for display/verification.
 * Returns the first 16 bytes of its SHA-256 as colon-separated hex.
 */
export function fingerprint(publicKey: string): string {
  const hash = crypto.createHash('sha256').update(decodeKey(publicKey)).digest();
  return Array.from(hash.subarray(0, 16))
    .map((b) => b.toString(16).padStart(2, '0'))
    .join(':');
}
