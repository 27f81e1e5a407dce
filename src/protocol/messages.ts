/**
 * Kinds of message a node puts on the wire
 */
export type WireMessageType = 'heartbeat' | 'smart_message';

/**
 * Body of a heartbeat, as serialized by the sender
 */
export interface HeartbeatPayload {
  node_id: string;
  /** Unix timestamp (ms) at the sender */
  timestamp: number;
  /** Message classes the sender has active subscribers for */
  message_types: string[];
  protocol_version: string;
}

/**
 * Where an inbound message came from, as reported by the network driver
 */
export interface SenderInfo {
  address: string;
  port: number;
  /** Sender node id claimed by the frame, when the driver knows it */
  nodeId?: string;
}

/**
 * Decoded heartbeat
 */
export interface InboundHeartbeat {
  type: 'heartbeat';
  nodeId: string;
  timestamp?: number;
  messageTypes: string[];
  protocolVersion?: string;
}

/**
 * Decoded application message
 */
export interface InboundApplicationMessage {
  type: 'smart_message';
  messageClass: string;
  /** Serialized payload, forwarded untouched */
  payload: string;
}

export type InboundMessage = InboundHeartbeat | InboundApplicationMessage;

export type DecodeFailureReason =
  | 'invalid_json'
  | 'not_an_object'
  | 'unknown_type'
  | 'missing_node_id'
  | 'missing_message_class'
  | 'missing_payload';

export type DecodeResult =
  | { ok: true; message: InboundMessage }
  | { ok: false; reason: DecodeFailureReason; type?: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Decode an inbound wire message into the canonical schema.
 * Accepts JSON text, a Buffer holding JSON text, or an already-parsed object.
 * Never throws.
 */
export function decodeInboundMessage(raw: unknown): DecodeResult {
  let data: unknown = raw;

  if (typeof raw === 'string' || Buffer.isBuffer(raw)) {
    try {
      data = JSON.parse(raw.toString());
    } catch {
      return { ok: false, reason: 'invalid_json' };
    }
  }

  if (!isRecord(data)) {
    return { ok: false, reason: 'not_an_object' };
  }

  const type = data.type;

  if (type === 'heartbeat') {
    const nodeId = nonEmptyString(data.node_id);
    if (!nodeId) {
      return { ok: false, reason: 'missing_node_id', type };
    }
    return {
      ok: true,
      message: {
        type: 'heartbeat',
        nodeId,
        ...(typeof data.timestamp === 'number' ? { timestamp: data.timestamp } : {}),
        messageTypes: stringList(data.message_types),
        ...(typeof data.protocol_version === 'string' ? { protocolVersion: data.protocol_version } : {}),
      },
    };
  }

  if (type === 'smart_message') {
    const messageClass = nonEmptyString(data.message_class);
    if (!messageClass) {
      return { ok: false, reason: 'missing_message_class', type };
    }

    let payload: string | undefined;
    if (typeof data.payload === 'string') {
      payload = data.payload;
    } else if (isRecord(data.payload) || Array.isArray(data.payload)) {
      payload = JSON.stringify(data.payload);
    }
    if (payload === undefined) {
      return { ok: false, reason: 'missing_payload', type };
    }

    return { ok: true, message: { type: 'smart_message', messageClass, payload } };
  }

  return { ok: false, reason: 'unknown_type', type: typeof type === 'string' ? type : undefined };
}
