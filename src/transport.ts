import { resolveTransportConfig, type TransportConfig, type TransportOptions } from './config.js';
import { DiscoveryLoop } from './discovery/discovery-loop.js';
import {
  MessageDispatcher,
  type MessageHandler,
  type SubscriberRegistry,
} from './dispatch/subscriber-registry.js';
import { TransportSetupError } from './errors.js';
import { HeartbeatLoop } from './heartbeat/heartbeat-loop.js';
import { InboundDispatcher } from './inbound/inbound-dispatcher.js';
import type { Logger } from './logger.js';
import type { NetworkDriver, SendResult } from './network/driver.js';
import { LanNetworkDriver } from './network/lan-driver.js';
import type { HeartbeatInfo, PeerRecord } from './registry/peer.js';
import { NodeRegistry } from './registry/node-registry.js';
import { routeMessage } from './routing/router.js';
import { errorMessage, withTimeout, type Sleep } from './utils.js';

/**
 * Builds the network driver when the transport is configured.
 */
export interface NetworkDriverFactory {
  (config: TransportConfig, logger?: Logger): NetworkDriver;
}

/**
 * Collaborators and hooks; all optional.
 */
export interface LanMeshTransportDeps {
  logger?: Logger;
  driverFactory?: NetworkDriverFactory;
  subscribers?: SubscriberRegistry;
  /** Clock in ms used by the registry and heartbeats */
  now?: () => number;
  /** Sleep used by both background loops */
  sleep?: Sleep;
}

export interface PublishResult {
  /** Peers the message was addressed to */
  targets: string[];
  /** Number of peers that accepted it */
  sent: number;
  /** Peers the send failed for */
  failed: string[];
}

export interface NetworkTopology {
  localNode: string;
  discoveredNodes: Record<string, PeerRecord>;
  nodeRegistry: Record<string, HeartbeatInfo>;
  activeSubscriptions: string[];
}

/**
 * Default driver: UDP discovery plus WebSocket links.
 */
export const createLanDriver: NetworkDriverFactory = (config, logger) =>
  new LanNetworkDriver({
    nodeId: config.nodeId,
    port: config.port,
    broadcastPort: config.broadcastPort,
    connectionTimeout: config.connectionTimeout,
    capabilities: config.capabilities,
    networkInterface: config.networkInterface,
    encryptionKey: config.encryptionKey,
    signingKey: config.signingKey,
    enableCompression: config.enableCompression,
    maxMessageSize: config.maxMessageSize,
    logger,
  });

/**
 * Peer-to-peer transport for a message-passing library: discovers nodes on
 * the local network, keeps their liveness, and routes published messages by
 * explicit target, capability, or broadcast.
 */
export class LanMeshTransport {
  readonly config: TransportConfig;
  private registry: NodeRegistry;
  private subscribers: SubscriberRegistry;
  private activeSubscriptions = new Set<string>();
  private logger: Logger | null;
  private deps: LanMeshTransportDeps;
  private driverFactory: NetworkDriverFactory;
  private driver: NetworkDriver | null = null;
  private discoveryLoop: DiscoveryLoop | null = null;
  private heartbeatLoop: HeartbeatLoop | null = null;
  private inbound: InboundDispatcher;
  private configuring: Promise<void> | null = null;
  private shutdown = false;
  /** Bumped by every disconnect; a setup from an older generation is abandoned */
  private generation = 0;

  /**
   * @param options - Explicit configuration; LANMESH_* env and defaults fill the rest
   * @throws Error when the resolved configuration is invalid
   */
  constructor(options: TransportOptions = {}, deps: LanMeshTransportDeps = {}) {
    this.config = resolveTransportConfig(options);
    this.deps = deps;
    this.logger = deps.logger ?? null;
    this.driverFactory = deps.driverFactory ?? createLanDriver;
    this.subscribers = deps.subscribers ?? new MessageDispatcher(deps.logger);
    this.registry = new NodeRegistry({ localNodeId: this.config.nodeId, now: deps.now });
    this.inbound = new InboundDispatcher({
      registry: this.registry,
      subscribers: this.subscribers,
      localNodeId: this.config.nodeId,
      isSubscribed: (messageClass) => this.activeSubscriptions.has(messageClass),
      logger: deps.logger,
    });
  }

  /**
   * Create and start the network driver, then start discovery and heartbeats.
   * Calling it again while configured is a no-op.
   *
   * @throws TransportSetupError when the driver cannot be created or started,
   * or when disconnect() is called before setup completes
   */
  async configure(): Promise<void> {
    if (this.driver) {
      return;
    }
    if (!this.configuring) {
      const configuring: Promise<void> = this.setup().finally(() => {
        if (this.configuring === configuring) {
          this.configuring = null;
        }
      });
      this.configuring = configuring;
    }
    return this.configuring;
  }

  /**
   * Configure and report readiness.
   */
  async connect(): Promise<void> {
    await this.configure();
    this.logger?.info('Transport connected');
  }

  /**
   * Stop both loops, release the driver and forget every peer.
   * Safe to call repeatedly. A configure() still in flight is abandoned: its
   * driver is closed as soon as it finishes starting.
   */
  async disconnect(): Promise<void> {
    this.shutdown = true;
    this.generation++;
    this.configuring = null;

    const loops = [this.discoveryLoop, this.heartbeatLoop];
    this.discoveryLoop = null;
    this.heartbeatLoop = null;
    await Promise.all(loops.map(loop => loop?.stop()));

    const driver = this.driver;
    this.driver = null;
    if (driver) {
      await this.closeDriver(driver);
    }

    this.registry.clear();
    this.logger?.info('Transport disconnected');
  }

  isConnected(): boolean {
    return !this.shutdown && this.driver !== null && (this.discoveryLoop?.isRunning() ?? false);
  }

  /**
   * Route a serialized message and send it to every target.
   * An empty routing result widens to every known peer. Per-peer failures are
   * logged and counted, never thrown.
   */
  async publish(messageClass: string, serializedPayload: string): Promise<PublishResult> {
    const driver = this.driver;
    if (!driver) {
      this.logger?.warn(`Cannot publish ${messageClass}: transport not configured`);
      return { targets: [], sent: 0, failed: [] };
    }

    const peers = this.registry.all();
    let { targets } = routeMessage(serializedPayload, peers);

    if (targets.length === 0) {
      this.logger?.debug(`No target nodes found for ${messageClass}, broadcasting to all discovered nodes`);
      targets = peers.map(peer => peer.nodeId);
    }

    const timeoutMs = this.config.connectionTimeout * 1000;
    const results = await Promise.allSettled(
      targets.map(nodeId =>
        withTimeout(
          Promise.resolve().then(() =>
            driver.sendTo(nodeId, serializedPayload, { type: 'smart_message', messageClass, encrypt: true })
          ),
          timeoutMs,
          `Send to ${nodeId}`
        )
      )
    );

    let sent = 0;
    const failed: string[] = [];
    results.forEach((result: PromiseSettledResult<SendResult>, i) => {
      const nodeId = targets[i];
      if (result.status === 'fulfilled' && result.value.ok) {
        sent++;
        return;
      }
      const reason = result.status === 'rejected' ? errorMessage(result.reason) : result.value.error ?? 'send failed';
      this.logger?.warn(`Failed to send to ${nodeId}: ${reason}`);
      failed.push(nodeId);
    });

    this.logger?.debug(`Published ${messageClass} to ${sent}/${targets.length} nodes`);
    return { targets, sent, failed };
  }

  /**
   * Register a handler; the class is advertised in heartbeats while it has one.
   */
  subscribe(messageClass: string, handler: MessageHandler): void {
    this.subscribers.add(messageClass, handler);
    if (!this.activeSubscriptions.has(messageClass)) {
      this.activeSubscriptions.add(messageClass);
      this.logger?.debug(`Registered handler for ${messageClass}`);
    }
  }

  /**
   * Remove a handler; the class stops being advertised once none remain.
   */
  unsubscribe(messageClass: string, handler: MessageHandler): void {
    this.subscribers.remove(messageClass, handler);
    if (!this.subscribers.hasActiveSubscribers(messageClass) && this.activeSubscriptions.delete(messageClass)) {
      this.logger?.debug(`Unregistered handler for ${messageClass}`);
    }
  }

  /**
   * Read-only snapshot of what this node knows about the network.
   */
  networkTopology(): NetworkTopology {
    const discoveredNodes: Record<string, PeerRecord> = {};
    for (const peer of this.registry.all()) {
      discoveredNodes[peer.nodeId] = peer;
    }
    const nodeRegistry: Record<string, HeartbeatInfo> = {};
    for (const [nodeId, info] of this.registry.heartbeats()) {
      nodeRegistry[nodeId] = info;
    }
    return {
      localNode: this.config.nodeId,
      discoveredNodes,
      nodeRegistry,
      activeSubscriptions: Array.from(this.activeSubscriptions),
    };
  }

  /**
   * Run one discovery cycle now instead of waiting for the timer.
   *
   * @returns Ids merged into the registry; empty when not configured or when discovery failed
   */
  async discoverNodesNow(): Promise<string[]> {
    const loop = this.discoveryLoop;
    if (!loop) {
      this.logger?.warn('Cannot discover nodes: transport not configured');
      return [];
    }
    try {
      return await loop.runOnce();
    } catch (err) {
      if (this.discoveryLoop !== loop) {
        this.logger?.debug(`Node discovery abandoned: ${errorMessage(err)}`);
      } else {
        this.logger?.error(`Node discovery failed: ${errorMessage(err)}`);
      }
      return [];
    }
  }

  private async setup(): Promise<void> {
    const generation = this.generation;
    let driver: NetworkDriver;
    try {
      driver = this.driverFactory(this.config, this.deps.logger);
      await driver.start();
    } catch (err) {
      this.logger?.error(`Failed to set up network driver: ${errorMessage(err)}`);
      throw new TransportSetupError(`Failed to initialize network driver: ${errorMessage(err)}`, { cause: err });
    }
    this.logger?.debug('Network driver initialized');

    if (generation !== this.generation) {
      await this.closeDriver(driver);
      throw new TransportSetupError('Transport disconnected during setup');
    }

    driver.onReceive((message, sender) => {
      void this.inbound.handle(message, sender);
    });

    this.shutdown = false;
    this.driver = driver;

    const common = {
      driver,
      registry: this.registry,
      localNodeId: this.config.nodeId,
      connectionTimeout: this.config.connectionTimeout,
      logger: this.deps.logger,
      sleep: this.deps.sleep,
    };
    this.discoveryLoop = new DiscoveryLoop({ ...common, discoveryTimeout: this.config.discoveryTimeout });
    this.heartbeatLoop = new HeartbeatLoop({
      ...common,
      heartbeatInterval: this.config.heartbeatInterval,
      subscriptions: () => Array.from(this.activeSubscriptions),
      now: this.deps.now,
    });
    this.discoveryLoop.start();
    this.heartbeatLoop.start();

    this.logger?.info(`Transport configured with node_id: ${this.config.nodeId}`);
  }

  private async closeDriver(driver: NetworkDriver): Promise<void> {
    try {
      await driver.close();
    } catch (err) {
      this.logger?.error(`Failed to close network driver: ${errorMessage(err)}`);
    }
  }
}
