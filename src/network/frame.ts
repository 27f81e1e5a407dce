import { deflateRawSync, inflateRawSync } from 'node:zlib';
import type { WireMessageType } from '../protocol/messages.js';
import {
  decryptBody,
  deriveEncryptionKey,
  encryptBody,
  loadSigner,
  signText,
  verifyText,
  type FrameSigner,
} from './crypto.js';

export const FRAME_VERSION = 1;

/**
 * What travels over a point-to-point link. `body` is plain UTF-8 text unless
 * the frame is compressed or encrypted, in which case it is base64.
 */
export interface Frame {
  v: number;
  type: WireMessageType;
  /** Sender node id */
  sender: string;
  /** Sender's message port, so the receiver can answer */
  port: number;
  messageClass?: string;
  /** Unix timestamp (ms) when the frame was built */
  timestamp: number;
  compressed: boolean;
  encrypted: boolean;
  body: string;
  /** Sender's Ed25519 public key (hex), present on signed frames */
  publicKey?: string;
  /** Ed25519 signature over the canonical frame (hex) */
  signature?: string;
}

export interface FrameInput {
  type: WireMessageType;
  sender: string;
  port: number;
  messageClass?: string;
  body: string;
  encrypt?: boolean;
}

export interface FrameCodecOptions {
  encryptionKey?: string;
  /** Hex PKCS#8 Ed25519 private key */
  signingKey?: string;
  enableCompression: boolean;
  maxMessageSize: number;
}

export type EncodeResult = { ok: true; data: string } | { ok: false; error: string };

export type FrameDecodeFailure =
  | 'message_too_large'
  | 'invalid_json'
  | 'invalid_frame'
  | 'signature_invalid'
  | 'missing_encryption_key'
  | 'decryption_failed'
  | 'decompression_failed';

export type DecodeFrameResult =
  | { ok: true; frame: Frame; body: string }
  | { ok: false; reason: FrameDecodeFailure };

/**
 * Deterministic JSON serialization with recursively sorted keys.
 */
function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return JSON.stringify(value);
  if (typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }
  const entries = Object.entries(value).filter(([, v]) => v !== undefined);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + stableStringify(v)).join(',') + '}';
}

/**
 * Canonical form of a frame for signing: every field except the signature.
 */
export function canonicalizeFrame(frame: Frame): string {
  const { signature: _signature, ...unsigned } = frame;
  return stableStringify(unsigned);
}

function isFrame(value: unknown): value is Frame {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const f: Record<string, unknown> = { ...value };
  return (
    typeof f.v === 'number' &&
    (f.type === 'heartbeat' || f.type === 'smart_message') &&
    typeof f.sender === 'string' &&
    typeof f.port === 'number' &&
    (f.messageClass === undefined || typeof f.messageClass === 'string') &&
    typeof f.timestamp === 'number' &&
    typeof f.compressed === 'boolean' &&
    typeof f.encrypted === 'boolean' &&
    typeof f.body === 'string' &&
    (f.publicKey === undefined || typeof f.publicKey === 'string') &&
    (f.signature === undefined || typeof f.signature === 'string')
  );
}

/**
 * Turns outgoing bodies into frames and back, applying the node's
 * compression, encryption and signing settings.
 */
export class FrameCodec {
  private options: FrameCodecOptions;
  private encryptionKey: Buffer | null;
  private signer: FrameSigner | null;

  /**
   * @throws When the signing key cannot be parsed
   */
  constructor(options: FrameCodecOptions) {
    this.options = options;
    this.encryptionKey = options.encryptionKey ? deriveEncryptionKey(options.encryptionKey) : null;
    this.signer = options.signingKey ? loadSigner(options.signingKey) : null;
  }

  encode(input: FrameInput): EncodeResult {
    let bytes = Buffer.from(input.body, 'utf-8');
    let compressed = false;
    if (this.options.enableCompression) {
      bytes = deflateRawSync(bytes);
      compressed = true;
    }

    let body: string;
    let encrypted = false;
    if (input.encrypt && this.encryptionKey) {
      body = encryptBody(bytes, this.encryptionKey);
      encrypted = true;
    } else {
      body = compressed ? bytes.toString('base64') : bytes.toString('utf-8');
    }

    const frame: Frame = {
      v: FRAME_VERSION,
      type: input.type,
      sender: input.sender,
      port: input.port,
      ...(input.messageClass !== undefined ? { messageClass: input.messageClass } : {}),
      timestamp: Date.now(),
      compressed,
      encrypted,
      body,
      ...(this.signer ? { publicKey: this.signer.publicKey } : {}),
    };

    if (this.signer) {
      frame.signature = signText(canonicalizeFrame(frame), this.signer);
    }

    const data = JSON.stringify(frame);
    const size = Buffer.byteLength(data);
    if (size > this.options.maxMessageSize) {
      return { ok: false, error: `Message too large (${size} > ${this.options.maxMessageSize} bytes)` };
    }
    return { ok: true, data };
  }

  decode(raw: string | Buffer): DecodeFrameResult {
    const size = typeof raw === 'string' ? Buffer.byteLength(raw) : raw.length;
    if (size > this.options.maxMessageSize) {
      return { ok: false, reason: 'message_too_large' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.toString());
    } catch {
      return { ok: false, reason: 'invalid_json' };
    }
    if (!isFrame(parsed)) {
      return { ok: false, reason: 'invalid_frame' };
    }
    const frame = parsed;

    if (frame.signature !== undefined || frame.publicKey !== undefined) {
      if (!frame.signature || !frame.publicKey || !verifyText(canonicalizeFrame(frame), frame.signature, frame.publicKey)) {
        return { ok: false, reason: 'signature_invalid' };
      }
    }

    let bytes: Buffer;
    if (frame.encrypted) {
      if (!this.encryptionKey) {
        return { ok: false, reason: 'missing_encryption_key' };
      }
      try {
        bytes = decryptBody(frame.body, this.encryptionKey);
      } catch {
        return { ok: false, reason: 'decryption_failed' };
      }
    } else {
      bytes = frame.compressed ? Buffer.from(frame.body, 'base64') : Buffer.from(frame.body, 'utf-8');
    }

    if (frame.compressed) {
      try {
        bytes = inflateRawSync(bytes, { maxOutputLength: this.options.maxMessageSize });
      } catch {
        return { ok: false, reason: 'decompression_failed' };
      }
    }

    return { ok: true, frame, body: bytes.toString('utf-8') };
  }
}
