import type { Logger } from '../logger.js';
import type { SubscriberRegistry } from '../dispatch/subscriber-registry.js';
import {
  decodeInboundMessage,
  type DecodeFailureReason,
  type InboundApplicationMessage,
  type InboundHeartbeat,
  type SenderInfo,
} from '../protocol/messages.js';
import type { NodeRegistry } from '../registry/node-registry.js';
import { errorMessage } from '../utils.js';

export interface InboundDispatcherOptions {
  registry: NodeRegistry;
  subscribers: Pick<SubscriberRegistry, 'dispatch'>;
  localNodeId: string;
  /** Whether this node currently has a handler for the class */
  isSubscribed: (messageClass: string) => boolean;
  logger?: Logger;
}

export type InboundOutcome =
  | { kind: 'heartbeat'; nodeId: string }
  | { kind: 'dispatched'; messageClass: string; handlers: number }
  | { kind: 'dropped'; reason: DecodeFailureReason | 'self' | 'no_subscribers' | 'error' };

/**
 * Entry point for everything the network driver receives.
 * Heartbeats update the registry; application messages go to subscribers.
 * Nothing that arrives here can make handle() throw.
 */
export class InboundDispatcher {
  private options: InboundDispatcherOptions;
  private logger: Logger | null;

  constructor(options: InboundDispatcherOptions) {
    this.options = options;
    this.logger = options.logger ?? null;
  }

  /**
   * Classify and process one inbound message.
   *
   * @param raw - Message as delivered by the driver (object, JSON text or Buffer)
   * @param sender - Address metadata of the sender
   */
  async handle(raw: unknown, sender: SenderInfo): Promise<InboundOutcome> {
    try {
      const decoded = decodeInboundMessage(raw);
      if (!decoded.ok) {
        if (decoded.reason === 'unknown_type') {
          this.logger?.debug(`Unknown message type: ${decoded.type ?? '(none)'}`);
        } else {
          this.logger?.debug(`Dropping inbound ${decoded.type ?? 'message'}: ${decoded.reason}`);
        }
        return { kind: 'dropped', reason: decoded.reason };
      }

      const { message } = decoded;
      if (message.type === 'heartbeat') {
        return this.handleHeartbeat(message, sender);
      }
      return await this.handleApplicationMessage(message);
    } catch (err) {
      this.logger?.error(`Error handling incoming message: ${errorMessage(err)}`);
      return { kind: 'dropped', reason: 'error' };
    }
  }

  private handleHeartbeat(message: InboundHeartbeat, sender: SenderInfo): InboundOutcome {
    if (message.nodeId === this.options.localNodeId) {
      return { kind: 'dropped', reason: 'self' };
    }

    this.options.registry.recordHeartbeat(message.nodeId, {
      address: sender.address,
      port: sender.port,
      advertisedMessageTypes: message.messageTypes,
      ...(message.protocolVersion !== undefined ? { protocolVersion: message.protocolVersion } : {}),
    });

    return { kind: 'heartbeat', nodeId: message.nodeId };
  }

  private async handleApplicationMessage(message: InboundApplicationMessage): Promise<InboundOutcome> {
    if (!this.options.isSubscribed(message.messageClass)) {
      this.logger?.debug(`No handlers for message class: ${message.messageClass}`);
      return { kind: 'dropped', reason: 'no_subscribers' };
    }

    const handlers = await this.options.subscribers.dispatch(message.messageClass, message.payload);
    return { kind: 'dispatched', messageClass: message.messageClass, handlers };
  }
}
