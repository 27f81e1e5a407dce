import {
  createCipheriv,
  createDecipheriv,
  createHash,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  randomBytes,
  sign,
  verify,
  type KeyObject,
} from 'node:crypto';

const CIPHER = 'aes-256-gcm';
const IV_BYTES = 12;
const TAG_BYTES = 16;

/**
 * Hex-encoded Ed25519 key pair (SPKI public, PKCS#8 private), as stored in config
 */
export interface SigningKeyPair {
  publicKey: string;
  privateKey: string;
}

/**
 * A loaded signing key: the private KeyObject plus the public key we put in frames
 */
export interface FrameSigner {
  publicKey: string;
  privateKey: KeyObject;
}

/**
 * Generate a fresh Ed25519 signing key pair
 */
export function generateSigningKey(): SigningKeyPair {
  const { publicKey, privateKey } = generateKeyPairSync('ed25519');
  return {
    publicKey: publicKey.export({ type: 'spki', format: 'der' }).toString('hex'),
    privateKey: privateKey.export({ type: 'pkcs8', format: 'der' }).toString('hex'),
  };
}

/**
 * Parse a hex PKCS#8 private key and derive its public half.
 * @throws If the hex does not hold a usable key
 */
export function loadSigner(privateKeyHex: string): FrameSigner {
  const privateKey = createPrivateKey({
    key: Buffer.from(privateKeyHex, 'hex'),
    format: 'der',
    type: 'pkcs8',
  });
  const publicKey = createPublicKey(privateKey).export({ type: 'spki', format: 'der' }).toString('hex');
  return { publicKey, privateKey };
}

export function signText(text: string, signer: FrameSigner): string {
  return sign(null, Buffer.from(text), signer.privateKey).toString('hex');
}

/**
 * Check an Ed25519 signature. Malformed keys or signatures count as invalid.
 */
export function verifyText(text: string, signatureHex: string, publicKeyHex: string): boolean {
  try {
    const publicKey = createPublicKey({
      key: Buffer.from(publicKeyHex, 'hex'),
      format: 'der',
      type: 'spki',
    });
    return verify(null, Buffer.from(text), publicKey, Buffer.from(signatureHex, 'hex'));
  } catch {
    return false;
  }
}

/**
 * 32-byte AES key derived from the shared secret
 */
export function deriveEncryptionKey(secret: string): Buffer {
  return createHash('sha256').update(secret).digest();
}

/**
 * AES-256-GCM encrypt; output is base64 of iv | tag | ciphertext
 */
export function encryptBody(plain: Buffer, key: Buffer): string {
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv(CIPHER, key, iv);
  const ciphertext = Buffer.concat([cipher.update(plain), cipher.final()]);
  return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]).toString('base64');
}

/**
 * Reverse of encryptBody.
 * @throws When the body is truncated or fails authentication
 */
export function decryptBody(body: string, key: Buffer): Buffer {
  const raw = Buffer.from(body, 'base64');
  if (raw.length < IV_BYTES + TAG_BYTES) {
    throw new Error('Encrypted body too short');
  }
  const iv = raw.subarray(0, IV_BYTES);
  const tag = raw.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
  const decipher = createDecipheriv(CIPHER, key, iv);
  decipher.setAuthTag(tag);
  return Buffer.concat([decipher.update(raw.subarray(IV_BYTES + TAG_BYTES)), decipher.final()]);
}
