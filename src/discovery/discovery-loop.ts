import type { Logger } from '../logger.js';
import type { NetworkDriver, PeerDescriptor } from '../network/driver.js';
import type { NodeRegistry } from '../registry/node-registry.js';
import { errorMessage, pause, sleep as defaultSleep, withTimeout, type Sleep } from '../utils.js';

/** Wait after a failed discovery cycle before the next attempt. */
export const DISCOVERY_BACKOFF_MS = 5000;

export type DiscoveryState = 'idle' | 'discovering' | 'stopped';

export interface DiscoveryLoopOptions {
  driver: Pick<NetworkDriver, 'discover'>;
  registry: NodeRegistry;
  localNodeId: string;
  /** Seconds between cycles, also passed to the driver as the query timeout */
  discoveryTimeout: number;
  /** Seconds added to discoveryTimeout before a hung query counts as failed */
  connectionTimeout: number;
  logger?: Logger;
  sleep?: Sleep;
}

/**
 * Periodically asks the network driver who is out there and merges the
 * answers into the registry. Discovery only adds or refreshes peers;
 * eviction belongs to the heartbeat loop.
 */
export class DiscoveryLoop {
  private options: DiscoveryLoopOptions;
  private logger: Logger | null;
  private sleep: Sleep;
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private inFlight = 0;

  constructor(options: DiscoveryLoopOptions) {
    this.options = options;
    this.logger = options.logger ?? null;
    this.sleep = options.sleep ?? defaultSleep;
  }

  state(): DiscoveryState {
    if (this.inFlight > 0) return 'discovering';
    return this.running ? 'idle' : 'stopped';
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * Run one discovery cycle.
   *
   * @param signal - Aborting rejects the cycle; late results are not merged.
   *   Defaults to the running loop's stop signal, so stop() abandons manual cycles too
   * @returns Ids of the peers merged into the registry
   * @throws When the driver fails or the query outlives its deadline
   */
  async runOnce(signal: AbortSignal | undefined = this.controller?.signal): Promise<string[]> {
    const { driver, discoveryTimeout, connectionTimeout } = this.options;
    const deadlineMs = (discoveryTimeout + connectionTimeout) * 1000;

    this.inFlight++;
    try {
      const discovered = await withTimeout(
        driver.discover(discoveryTimeout),
        deadlineMs,
        'Node discovery',
        signal
      );
      if (signal?.aborted) {
        return [];
      }
      return this.merge(discovered);
    } finally {
      this.inFlight--;
    }
  }

  /**
   * Loop until the signal is aborted. Never rejects.
   */
  async run(signal: AbortSignal): Promise<void> {
    const periodMs = this.options.discoveryTimeout * 1000;
    const onSleepError = (err: unknown): void => {
      this.logger?.error(`Discovery sleep failed: ${errorMessage(err)}`);
    };

    while (!signal.aborted) {
      let waitMs = periodMs;
      try {
        await this.runOnce(signal);
      } catch (err) {
        if (signal.aborted) break;
        this.logger?.error(`Discovery service error: ${errorMessage(err)}`);
        waitMs = DISCOVERY_BACKOFF_MS;
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
    this.logger?.debug('Discovery service started');
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

  private merge(discovered: PeerDescriptor[]): string[] {
    const { registry, localNodeId } = this.options;
    const merged: string[] = [];

    for (const node of discovered) {
      if (typeof node.nodeId !== 'string' || node.nodeId === '' || node.nodeId === localNodeId) {
        continue;
      }
      const record = registry.upsert(node.nodeId, {
        address: node.address,
        port: node.port,
        ...(Array.isArray(node.capabilities) ? { capabilities: node.capabilities } : {}),
      });
      if (record) {
        merged.push(record.nodeId);
      }
    }

    if (merged.length > 0) {
      this.logger?.debug(`Discovered ${registry.size()} nodes`);
    }
    return merged;
  }
}
