import type { SenderInfo, WireMessageType } from '../protocol/messages.js';

/**
 * A node found by a discovery query
 */
export interface PeerDescriptor {
  nodeId: string;
  address: string;
  port: number;
  capabilities?: string[];
}

export interface SendOptions {
  type: WireMessageType;
  messageClass?: string;
  /** Encrypt the body when the driver has a key */
  encrypt?: boolean;
}

export interface SendResult {
  ok: boolean;
  error?: string;
}

/**
 * Called once per inbound message. `message` is the decoded wire object
 * (see decodeInboundMessage for the accepted shapes).
 */
export type ReceiveHandler = (message: unknown, sender: SenderInfo) => void;

/**
 * Byte-level network access the transport is built on: broadcast discovery
 * and point-to-point delivery.
 */
export interface NetworkDriver {
  /** Bind sockets; rejects when the network cannot be used */
  start(): Promise<void>;
  /** Query the network for reachable nodes for up to timeoutSeconds */
  discover(timeoutSeconds: number): Promise<PeerDescriptor[]>;
  /** Deliver data to one node */
  sendTo(nodeId: string, data: string, options: SendOptions): Promise<SendResult>;
  /** Register the inbound message callback; replaces any previous one */
  onReceive(handler: ReceiveHandler): void;
  /** Release sockets and connections */
  close(): Promise<void>;
}
