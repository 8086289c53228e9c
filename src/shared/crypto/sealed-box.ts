/**
 * Authenticated public-key encryption between the agent and one human device.
 *
 * NaCl `box` (X25519 + XSalsa20-Poly1305): the sender's secret key and the
 * recipient's public key seal; the recipient's secret key and the sender's
 * public key open. Both ends are authenticated, unlike an anonymous sealed box.
 *
 * Wire format (base64 text): nonce (24) || ciphertext (plaintext + 16-byte tag)
 *
 * The plaintext is JSON. A payload that does not parse as JSON (a device
 * answering with a bare string) is handed back as that string.
 */

import nacl from 'tweetnacl';

import { DecryptionError, NoRecipientKeyError } from '../errors.js';
import { decodeKey, type IdentityKeypair } from './keys.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const NONCE_LENGTH = nacl.box.nonceLength;
const MIN_SEALED_LENGTH = NONCE_LENGTH + nacl.box.overheadLength;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export class SealedBoxCodec {
  private readonly secretKey: Uint8Array;

  constructor(private readonly identity: IdentityKeypair) {
    this.secretKey = decodeKey(identity.privateKey);
  }

  /** Base64 public key peers need in order to open what we seal. */
  get publicKey(): string {
    return this.identity.publicKey;
  }

  /**
   * Seal a JSON-serializable payload for `recipientPublicKey`.
   *
   * @throws NoRecipientKeyError if no recipient key is given (checked before any crypto)
   * @throws Error if the recipient key is malformed or the payload cannot be serialized
   */
  seal(payload: unknown, recipientPublicKey: string | null | undefined): string {
    if (!recipientPublicKey) {
      throw new NoRecipientKeyError('No recipient public key provided for encryption');
    }

    let recipient: Uint8Array;
    try {
      recipient = decodeKey(recipientPublicKey);
    } catch (err) {
      throw new Error(`Recipient public key is invalid: ${err instanceof Error ? err.message : String(err)}`);
    }

    const json = JSON.stringify(payload);
    if (typeof json !== 'string') {
      throw new Error('Payload is not JSON-serializable');
    }

    const nonce = nacl.randomBytes(NONCE_LENGTH);
    const ciphertext = nacl.box(new TextEncoder().encode(json), nonce, recipient, this.secretKey);

    const packed = new Uint8Array(NONCE_LENGTH + ciphertext.length);
    packed.set(nonce);
    packed.set(ciphertext, NONCE_LENGTH);
    return Buffer.from(packed).toString('base64');
  }

  /**
   * Open a payload sealed for us by `senderPublicKey`.
   *
   * @throws DecryptionError on malformed encoding, tampering, or a key mismatch
   */
  open(sealed: string, senderPublicKey: string): JsonValue {
    const plaintext = this.openBytes(sealed, senderPublicKey);

    let text: string;
    try {
      text = utf8Decoder.decode(plaintext);
    } catch {
      throw new DecryptionError();
    }

    try {
      return JSON.parse(text) as JsonValue;
    } catch {
      return text;
    }
  }

  private openBytes(sealed: string, senderPublicKey: string): Uint8Array {
    const trimmed = sealed.trim();
    if (!BASE64_RE.test(trimmed)) {
      throw new DecryptionError();
    }

    let sender: Uint8Array;
    try {
      sender = decodeKey(senderPublicKey);
    } catch {
      throw new DecryptionError();
    }

    const packed = new Uint8Array(Buffer.from(trimmed, 'base64'));
    if (packed.length < MIN_SEALED_LENGTH) {
      throw new DecryptionError();
    }

    const nonce = packed.subarray(0, NONCE_LENGTH);
    const ciphertext = packed.subarray(NONCE_LENGTH);
    const opened = nacl.box.open(ciphertext, nonce, sender, this.secretKey);
    if (!opened) {
      throw new DecryptionError();
    }
    return opened;
  }
}
