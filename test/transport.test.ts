import { describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { LanMeshTransport, type NetworkDriverFactory } from '../src/transport.js';
import { TransportSetupError } from '../src/errors.js';
import type {
  NetworkDriver,
  PeerDescriptor,
  ReceiveHandler,
  SendOptions,
  SendResult,
} from '../src/network/driver.js';
import type { Logger } from '../src/logger.js';
import type { Sleep } from '../src/utils.js';

function createMockLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (message: string) => lines.push(`debug: ${message}`),
    info: (message: string) => lines.push(`info: ${message}`),
    warn: (message: string) => lines.push(`warn: ${message}`),
    error: (message: string) => lines.push(`error: ${message}`),
  };
}

/** Sleep that only returns once the loop is stopped */
const sleepUntilAborted: Sleep = (_ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });

const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve));

function peers(...ids: string[]): PeerDescriptor[] {
  return ids.map((nodeId, i) => ({ nodeId, address: `10.0.0.${i + 10}`, port: 9999 }));
}

function createMockDriver(options: {
  discovered?: PeerDescriptor[];
  send?: (nodeId: string) => SendResult;
  discover?: () => Promise<PeerDescriptor[]>;
  close?: () => Promise<void>;
} = {}) {
  let receiveHandler: ReceiveHandler | null = null;
  const driver = {
    start: mock.fn(async () => {}),
    discover: mock.fn(async (_timeout: number): Promise<PeerDescriptor[]> =>
      options.discover ? options.discover() : options.discovered ?? []
    ),
    sendTo: mock.fn(async (nodeId: string, _data: string, _options: SendOptions): Promise<SendResult> =>
      options.send ? options.send(nodeId) : { ok: true }
    ),
    onReceive: mock.fn((handler: ReceiveHandler) => {
      receiveHandler = handler;
    }),
    close: mock.fn(async () => {
      await options.close?.();
    }),
    deliver(message: unknown) {
      receiveHandler?.(message, { address: '10.0.0.99', port: 9999 });
    },
  } satisfies NetworkDriver & { deliver(message: unknown): void };
  return driver;
}

function createTransport(driver: NetworkDriver, logger?: Logger) {
  const driverFactory = mock.fn<NetworkDriverFactory>(() => driver);
  const transport = new LanMeshTransport(
    { nodeId: 'local', discoveryTimeout: 5, heartbeatInterval: 30, connectionTimeout: 10 },
    { driverFactory, logger, sleep: sleepUntilAborted }
  );
  return { transport, driverFactory };
}

function smartMessageCalls(driver: ReturnType<typeof createMockDriver>) {
  return driver.sendTo.mock.calls.filter(call => call.arguments[2].type === 'smart_message');
}

describe('LanMeshTransport', () => {
  describe('configure', () => {
    it('should start the driver and both loops once', async () => {
      const driver = createMockDriver({ discovered: peers('n1', 'n2') });
      const { transport, driverFactory } = createTransport(driver);

      await Promise.all([transport.configure(), transport.configure()]);
      await transport.configure();
      await nextTick();

      assert.strictEqual(driverFactory.mock.callCount(), 1);
      assert.strictEqual(driver.start.mock.callCount(), 1);
      assert.strictEqual(driver.onReceive.mock.callCount(), 1);
      assert.strictEqual(driver.discover.mock.callCount(), 1);
      assert.strictEqual(transport.isConnected(), true);
      assert.deepStrictEqual(Object.keys(transport.networkTopology().discoveredNodes), ['n1', 'n2']);

      await transport.disconnect();
    });

    it('should wrap driver start failures in TransportSetupError', async () => {
      const driver = createMockDriver();
      driver.start.mock.mockImplementation(async () => {
        throw new Error('EADDRINUSE');
      });
      const logger = createMockLogger();
      const { transport } = createTransport(driver, logger);

      await assert.rejects(transport.configure(), (err: unknown) => {
        assert.ok(err instanceof TransportSetupError);
        assert.strictEqual(err.message, 'Failed to initialize network driver: EADDRINUSE');
        assert.ok(err.cause instanceof Error);
        return true;
      });
      assert.strictEqual(transport.isConnected(), false);
      assert.deepStrictEqual(logger.lines, ['error: Failed to set up network driver: EADDRINUSE']);
    });

    it('should wrap driver factory failures too', async () => {
      const transport = new LanMeshTransport(
        { nodeId: 'local' },
        {
          driverFactory: () => {
            throw new Error('no interface');
          },
        }
      );

      await assert.rejects(transport.connect(), TransportSetupError);
    });
  });

  describe('publish', () => {
    it('should count partial failures without throwing', async () => {
      const driver = createMockDriver({
        discovered: peers('n1', 'n2', 'n3', 'n4', 'n5'),
        send: (nodeId) => {
          if (nodeId === 'n2') return { ok: false, error: 'refused' };
          if (nodeId === 'n4') throw new Error('socket closed');
          return { ok: true };
        },
      });
      const logger = createMockLogger();
      const { transport } = createTransport(driver, logger);
      await transport.configure();
      await nextTick();

      const result = await transport.publish('OrderPlaced', '{"id":7}');

      assert.deepStrictEqual(result, { targets: ['n1', 'n2', 'n3', 'n4', 'n5'], sent: 3, failed: ['n2', 'n4'] });
      assert.ok(logger.lines.includes('warn: Failed to send to n2: refused'));
      assert.ok(logger.lines.includes('warn: Failed to send to n4: socket closed'));
      assert.ok(logger.lines.includes('debug: Published OrderPlaced to 3/5 nodes'));

      await transport.disconnect();
    });

    it('should send the payload unchanged as an encrypted application message', async () => {
      const driver = createMockDriver({ discovered: peers('n1') });
      const { transport } = createTransport(driver);
      await transport.configure();
      await nextTick();

      await transport.publish('OrderPlaced', '{"id":7}');

      const calls = smartMessageCalls(driver);
      assert.strictEqual(calls.length, 1);
      assert.deepStrictEqual(calls[0]?.arguments, [
        'n1',
        '{"id":7}',
        { type: 'smart_message', messageClass: 'OrderPlaced', encrypt: true },
      ]);

      await transport.disconnect();
    });

    it('should route by explicit target and by capability', async () => {
      const driver = createMockDriver({
        discovered: [
          { nodeId: 'n1', address: '10.0.0.1', port: 9999, capabilities: ['gpu'] },
          { nodeId: 'n2', address: '10.0.0.2', port: 9999, capabilities: ['gpu', 'storage'] },
          { nodeId: 'n3', address: '10.0.0.3', port: 9999 },
        ],
      });
      const { transport } = createTransport(driver);
      await transport.configure();
      await nextTick();

      const direct = await transport.publish('C', JSON.stringify({ _sm_header: { to: 'n3' } }));
      const byCapability = await transport.publish('C', JSON.stringify({ _sm_header: { capabilities: ['storage'] } }));

      assert.deepStrictEqual(direct.targets, ['n3']);
      assert.deepStrictEqual(byCapability.targets, ['n2']);

      await transport.disconnect();
    });

    it('should widen an empty routing result to every known peer', async () => {
      const driver = createMockDriver({ discovered: peers('n1', 'n2') });
      const logger = createMockLogger();
      const { transport } = createTransport(driver, logger);
      await transport.configure();
      await nextTick();

      const result = await transport.publish('C', JSON.stringify({ _sm_header: { to: 'n9' } }));

      assert.deepStrictEqual(result.targets, ['n1', 'n2']);
      assert.ok(logger.lines.includes('debug: No target nodes found for C, broadcasting to all discovered nodes'));

      await transport.disconnect();
    });

    it('should send nothing before configure', async () => {
      const driver = createMockDriver({ discovered: peers('n1') });
      const { transport } = createTransport(driver);

      assert.deepStrictEqual(await transport.publish('C', '{}'), { targets: [], sent: 0, failed: [] });
      assert.strictEqual(driver.sendTo.mock.callCount(), 0);
    });
  });

  describe('subscriptions and inbound messages', () => {
    it('should advertise a class while it has handlers', () => {
      const { transport } = createTransport(createMockDriver());
      const first = () => {};
      const second = () => {};

      transport.subscribe('OrderPlaced', first);
      transport.subscribe('OrderPlaced', second);
      assert.deepStrictEqual(transport.networkTopology().activeSubscriptions, ['OrderPlaced']);

      transport.unsubscribe('OrderPlaced', first);
      assert.deepStrictEqual(transport.networkTopology().activeSubscriptions, ['OrderPlaced']);

      transport.unsubscribe('OrderPlaced', second);
      assert.deepStrictEqual(transport.networkTopology().activeSubscriptions, []);
    });

    it('should hand inbound payloads to subscribers and record heartbeats', async () => {
      const driver = createMockDriver();
      const { transport } = createTransport(driver);
      const received = new Promise<string>((resolve) => {
        transport.subscribe('OrderPlaced', (payload) => resolve(payload));
      });
      await transport.configure();

      driver.deliver({ type: 'smart_message', message_class: 'OrderPlaced', payload: '{"id":7}' });
      driver.deliver({ type: 'heartbeat', node_id: 'n5', message_types: ['OrderPlaced'] });

      assert.strictEqual(await received, '{"id":7}');
      const topology = transport.networkTopology();
      assert.deepStrictEqual(topology.nodeRegistry.n5?.advertisedMessageTypes, ['OrderPlaced']);
      assert.strictEqual(topology.nodeRegistry.n5?.address, '10.0.0.99');
      assert.deepStrictEqual(topology.discoveredNodes, {});

      await transport.disconnect();
    });
  });

  describe('discoverNodesNow', () => {
    it('should return merged ids', async () => {
      const driver = createMockDriver({ discovered: peers('n1', 'local') });
      const { transport } = createTransport(driver);
      await transport.configure();

      assert.deepStrictEqual(await transport.discoverNodesNow(), ['n1']);

      await transport.disconnect();
    });

    it('should return an empty list when discovery fails or the transport is idle', async () => {
      const logger = createMockLogger();
      const driver = createMockDriver({
        discover: async () => {
          throw new Error('network down');
        },
      });
      const { transport } = createTransport(driver, logger);

      assert.deepStrictEqual(await transport.discoverNodesNow(), []);

      await transport.configure();
      assert.deepStrictEqual(await transport.discoverNodesNow(), []);
      assert.ok(logger.lines.includes('error: Node discovery failed: network down'));

      await transport.disconnect();
    });
  });

  describe('disconnect', () => {
    it('should be idempotent and clear the registry', async () => {
      const driver = createMockDriver({ discovered: peers('n1', 'n2') });
      const { transport } = createTransport(driver);
      transport.subscribe('OrderPlaced', () => {});
      await transport.configure();
      await nextTick();

      await transport.disconnect();
      await transport.disconnect();

      assert.strictEqual(driver.close.mock.callCount(), 1);
      assert.strictEqual(transport.isConnected(), false);
      const topology = transport.networkTopology();
      assert.deepStrictEqual(topology.discoveredNodes, {});
      assert.deepStrictEqual(topology.activeSubscriptions, ['OrderPlaced']);
    });

    it('should log driver close failures instead of throwing', async () => {
      const logger = createMockLogger();
      const driver = createMockDriver({
        close: async () => {
          throw new Error('already closed');
        },
      });
      const { transport } = createTransport(driver, logger);
      await transport.configure();

      await transport.disconnect();

      assert.ok(logger.lines.includes('error: Failed to close network driver: already closed'));
    });

    it('should allow configuring again after a disconnect', async () => {
      const driver = createMockDriver({ discovered: peers('n1') });
      const { transport } = createTransport(driver);

      await transport.connect();
      await transport.disconnect();
      await transport.connect();

      assert.strictEqual(transport.isConnected(), true);
      assert.strictEqual(driver.start.mock.callCount(), 2);

      await transport.disconnect();
    });

    it('should abandon a configure that is still starting the driver', async () => {
      const driver = createMockDriver({ discovered: peers('n1') });
      let release: () => void = () => {};
      driver.start.mock.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );
      const { transport } = createTransport(driver);

      const abandoned = assert.rejects(transport.configure(), (err: unknown) => {
        assert.ok(err instanceof TransportSetupError);
        assert.strictEqual(err.message, 'Transport disconnected during setup');
        return true;
      });
      await transport.disconnect();
      release();
      await abandoned;

      assert.strictEqual(transport.isConnected(), false);
      assert.strictEqual(driver.close.mock.callCount(), 1);
      assert.strictEqual(driver.onReceive.mock.callCount(), 0);
      assert.strictEqual(driver.discover.mock.callCount(), 0);
      assert.deepStrictEqual(transport.networkTopology().discoveredNodes, {});

      await transport.configure();
      assert.strictEqual(transport.isConnected(), true);
      assert.strictEqual(driver.start.mock.callCount(), 2);

      await transport.disconnect();
    });

    it('should not merge a manual discovery that finishes after disconnect', async () => {
      const replies: Array<(nodes: PeerDescriptor[]) => void> = [];
      const driver = createMockDriver({
        discover: () =>
          new Promise<PeerDescriptor[]>((resolve) => {
            replies.push(resolve);
          }),
      });
      const logger = createMockLogger();
      const { transport } = createTransport(driver, logger);
      await transport.configure();

      const manual = transport.discoverNodesNow();
      await transport.disconnect();
      for (const reply of replies) {
        reply(peers('ghost'));
      }

      assert.deepStrictEqual(await manual, []);
      assert.deepStrictEqual(transport.networkTopology().discoveredNodes, {});
      assert.ok(logger.lines.includes('debug: Node discovery abandoned: Node discovery aborted'));
      assert.deepStrictEqual(logger.lines.filter(line => line.startsWith('error:')), []);
    });
  });
});
