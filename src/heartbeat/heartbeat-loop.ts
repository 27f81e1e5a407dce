import type { Logger } from '../logger.js';
import type { NetworkDriver } from '../network/driver.js';
import type { HeartbeatPayload } from '../protocol/messages.js';
import type { NodeRegistry } from '../registry/node-registry.js';
import { PROTOCOL_VERSION } from '../version.js';
import { errorMessage, pause, sleep as defaultSleep, withTimeout, type Sleep } from '../utils.js';

/** Wait after a failed heartbeat cycle before the next attempt. */
export const HEARTBEAT_BACKOFF_MS = 10000;

/** A node is stale after this many silent heartbeat intervals. */
export const STALE_INTERVALS = 3;

export interface HeartbeatLoopOptions {
  driver: Pick<NetworkDriver, 'sendTo'>;
  registry: NodeRegistry;
  localNodeId: string;
  /** Seconds between cycles */
  heartbeatInterval: number;
  /** Seconds a single send may take before it counts as failed */
  connectionTimeout: number;
  /** Message classes this node currently has handlers for */
  subscriptions: () => string[];
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
}

export interface HeartbeatCycleResult {
  sent: number;
  failed: string[];
  evicted: string[];
}

/**
 * Announces this node to every known peer and sweeps out the ones that
 * have gone quiet.
 */
export class HeartbeatLoop {
  private options: HeartbeatLoopOptions;
  private logger: Logger | null;
  private sleep: Sleep;
  private now: () => number;
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(options: HeartbeatLoopOptions) {
    this.options = options;
    this.logger = options.logger ?? null;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * The heartbeat this node would send right now.
   */
  buildHeartbeat(): HeartbeatPayload {
    return {
      node_id: this.options.localNodeId,
      timestamp: this.now(),
      message_types: this.options.subscriptions(),
      protocol_version: PROTOCOL_VERSION,
    };
  }

  /**
   * Send one heartbeat to every known peer. Failures are logged per peer and
   * never stop the remaining sends.
   *
   * @param signal - Aborting fails the sends still in flight
   */
  async sendHeartbeats(signal?: AbortSignal): Promise<{ sent: number; failed: string[] }> {
    const { driver, registry, connectionTimeout } = this.options;
    const data = JSON.stringify({ type: 'heartbeat', ...this.buildHeartbeat() });
    const targets = registry.peerIds();

    const results = await Promise.allSettled(
      targets.map(nodeId =>
        withTimeout(
          Promise.resolve().then(() => driver.sendTo(nodeId, data, { type: 'heartbeat' })),
          connectionTimeout * 1000,
          `Heartbeat to ${nodeId}`,
          signal
        )
      )
    );

    let sent = 0;
    const failed: string[] = [];
    results.forEach((result, i) => {
      const nodeId = targets[i];
      if (result.status === 'fulfilled' && result.value.ok) {
        sent++;
        return;
      }
      const reason = result.status === 'rejected' ? errorMessage(result.reason) : result.value.error ?? 'send failed';
      this.logger?.debug(`Heartbeat failed to ${nodeId}: ${reason}`);
      failed.push(nodeId);
    });

    return { sent, failed };
  }

  /**
   * Remove every node silent for longer than STALE_INTERVALS heartbeat intervals.
   *
   * @returns Ids of the removed nodes
   */
  evictStale(): string[] {
    const maxAgeMs = this.options.heartbeatInterval * STALE_INTERVALS * 1000;
    const evicted = this.options.registry.evictStale(maxAgeMs);
    for (const nodeId of evicted) {
      this.logger?.debug(`Removing stale node: ${nodeId}`);
    }
    return evicted;
  }

  /**
   * One full cycle: fan out the heartbeat, then evict.
   */
  async runOnce(signal?: AbortSignal): Promise<HeartbeatCycleResult> {
    const { sent, failed } = await this.sendHeartbeats(signal);
    const evicted = this.evictStale();
    return { sent, failed, evicted };
  }

  /**
   * Loop until the signal is aborted. Never rejects.
   */
  async run(signal: AbortSignal): Promise<void> {
    const periodMs = this.options.heartbeatInterval * 1000;
    const onSleepError = (err: unknown): void => {
      this.logger?.error(`Heartbeat sleep failed: ${errorMessage(err)}`);
    };

    while (!signal.aborted) {
      let waitMs = periodMs;
      try {
        await this.runOnce(signal);
      } catch (err) {
        if (signal.aborted) break;
        this.logger?.error(`Heartbeat service error: ${errorMessage(err)}`);
        waitMs = HEARTBEAT_BACKOFF_MS;
      }
      await pause(this.sleep, waitMs, signal, onSleepError);
    }
  }

  /**
   * Start the loop in the background. No-op when already running.
   */
  start(): void {
    if (this.running) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.run(controller.signal);
    this.logger?.debug('Heartbeat service started');
  }

  /**
   * Signal the loop to stop and wait for it to exit.
   */
  async stop(): Promise<void> {
    const running = this.running;
    this.controller?.abort();
    this.controller = null;
    if (running) {
      await running;
    }
    this.running = null;
  }
}
