export {
  KEY_LENGTH,
  decodeKey,
  encodeKey,
  ensureIdentityKeypair,
  fingerprint,
  generateKeypair,
  loadIdentityKeypair,
  saveKeypair,
  validateKeypair,
  type IdentityKeypair,
  type KeyRegistrar,
} from './keys.js';
export { SealedBoxCodec, type JsonValue } from './sealed-box.js';
