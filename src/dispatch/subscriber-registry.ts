import type { Logger } from '../logger.js';
import { errorMessage } from '../utils.js';

/**
 * Receives the serialized payload of an inbound message of one class.
 */
export type MessageHandler = (payload: string, messageClass: string) => void | Promise<void>;

/**
 * The host library's subscription table, as the transport sees it.
 */
export interface SubscriberRegistry {
  add(messageClass: string, handler: MessageHandler): void;
  /** @returns true if the handler was registered */
  remove(messageClass: string, handler: MessageHandler): boolean;
  hasActiveSubscribers(messageClass: string): boolean;
  /** Deliver a payload to every handler of the class; resolves to the number of handlers reached */
  dispatch(messageClass: string, payload: string): Promise<number>;
}

/**
 * In-memory SubscriberRegistry. A handler that throws is logged and does not
 * stop delivery to the others.
 */
export class MessageDispatcher implements SubscriberRegistry {
  private handlers = new Map<string, Set<MessageHandler>>();
  private logger: Logger | null;

  constructor(logger?: Logger) {
    this.logger = logger ?? null;
  }

  add(messageClass: string, handler: MessageHandler): void {
    let set = this.handlers.get(messageClass);
    if (!set) {
      set = new Set();
      this.handlers.set(messageClass, set);
    }
    set.add(handler);
  }

  remove(messageClass: string, handler: MessageHandler): boolean {
    const set = this.handlers.get(messageClass);
    if (!set) {
      return false;
    }
    const removed = set.delete(handler);
    if (set.size === 0) {
      this.handlers.delete(messageClass);
    }
    return removed;
  }

  hasActiveSubscribers(messageClass: string): boolean {
    return (this.handlers.get(messageClass)?.size ?? 0) > 0;
  }

  /**
   * Message classes with at least one handler.
   */
  messageClasses(): string[] {
    return Array.from(this.handlers.keys());
  }

  async dispatch(messageClass: string, payload: string): Promise<number> {
    const set = this.handlers.get(messageClass);
    if (!set) {
      return 0;
    }

    let delivered = 0;
    for (const handler of Array.from(set)) {
      try {
        await handler(payload, messageClass);
        delivered++;
      } catch (err) {
        this.logger?.error(`Handler for ${messageClass} failed: ${errorMessage(err)}`);
      }
    }
    return delivered;
  }
}
