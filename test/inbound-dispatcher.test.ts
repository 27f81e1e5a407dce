import { describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { InboundDispatcher } from '../src/inbound/inbound-dispatcher.js';
import { NodeRegistry } from '../src/registry/node-registry.js';
import type { Logger } from '../src/logger.js';

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

const sender = { address: '10.0.0.7', port: 9999 };

function setup(subscribed: string[] = ['OrderPlaced']) {
  let now = 5000;
  const registry = new NodeRegistry({ localNodeId: 'local', now: () => now });
  const dispatch = mock.fn(async (_messageClass: string, _payload: string) => 1);
  const logger = createMockLogger();
  const dispatcher = new InboundDispatcher({
    registry,
    subscribers: { dispatch },
    localNodeId: 'local',
    isSubscribed: (messageClass) => subscribed.includes(messageClass),
    logger,
  });
  return { registry, dispatch, logger, dispatcher, tick: (ms: number) => (now += ms) };
}

describe('InboundDispatcher', () => {
  it('should record a heartbeat with the sender address', async () => {
    const { registry, dispatcher } = setup();

    const outcome = await dispatcher.handle(
      { type: 'heartbeat', node_id: 'n1', message_types: ['OrderPlaced'], protocol_version: '1.0.0' },
      sender
    );

    assert.deepStrictEqual(outcome, { kind: 'heartbeat', nodeId: 'n1' });
    assert.deepStrictEqual(registry.heartbeat('n1'), {
      address: '10.0.0.7',
      port: 9999,
      lastHeartbeat: 5000,
      advertisedMessageTypes: ['OrderPlaced'],
      protocolVersion: '1.0.0',
    });
  });

  it('should refresh lastSeen of a discovered peer on heartbeat', async () => {
    const { registry, dispatcher, tick } = setup();
    registry.upsert('n1', { address: '10.0.0.7', port: 9999 });
    tick(1000);

    await dispatcher.handle({ type: 'heartbeat', node_id: 'n1' }, sender);

    assert.strictEqual(registry.get('n1')?.lastSeen, 6000);
  });

  it('should drop a heartbeat without a node id and leave the registry untouched', async () => {
    const { registry, dispatcher } = setup();

    const outcome = await dispatcher.handle({ type: 'heartbeat', message_types: [] }, sender);

    assert.deepStrictEqual(outcome, { kind: 'dropped', reason: 'missing_node_id' });
    assert.strictEqual(registry.heartbeats().size, 0);
  });

  it('should ignore heartbeats from the local node', async () => {
    const { registry, dispatcher } = setup();

    const outcome = await dispatcher.handle({ type: 'heartbeat', node_id: 'local' }, sender);

    assert.deepStrictEqual(outcome, { kind: 'dropped', reason: 'self' });
    assert.strictEqual(registry.heartbeats().size, 0);
  });

  it('should forward the payload unchanged to subscribers', async () => {
    const { dispatch, dispatcher } = setup();
    const payload = '{"id": 7, "items":["a","b"]}';

    const outcome = await dispatcher.handle(
      JSON.stringify({ type: 'smart_message', message_class: 'OrderPlaced', payload }),
      sender
    );

    assert.deepStrictEqual(outcome, { kind: 'dispatched', messageClass: 'OrderPlaced', handlers: 1 });
    assert.deepStrictEqual(dispatch.mock.calls[0]?.arguments, ['OrderPlaced', payload]);
  });

  it('should drop messages for classes without handlers', async () => {
    const { dispatch, dispatcher, logger } = setup([]);

    const outcome = await dispatcher.handle({ type: 'smart_message', message_class: 'OrderPlaced', payload: '{}' }, sender);

    assert.deepStrictEqual(outcome, { kind: 'dropped', reason: 'no_subscribers' });
    assert.strictEqual(dispatch.mock.callCount(), 0);
    assert.deepStrictEqual(logger.lines, ['debug: No handlers for message class: OrderPlaced']);
  });

  it('should drop unknown message types with a debug note', async () => {
    const { dispatcher, logger } = setup();

    const outcome = await dispatcher.handle({ type: 'gossip' }, sender);

    assert.deepStrictEqual(outcome, { kind: 'dropped', reason: 'unknown_type' });
    assert.deepStrictEqual(logger.lines, ['debug: Unknown message type: gossip']);
  });

  it('should never throw when the subscriber registry fails', async () => {
    let now = 0;
    const logger = createMockLogger();
    const dispatcher = new InboundDispatcher({
      registry: new NodeRegistry({ localNodeId: 'local', now: () => now++ }),
      subscribers: {
        dispatch: async () => {
          throw new Error('registry offline');
        },
      },
      localNodeId: 'local',
      isSubscribed: () => true,
      logger,
    });

    const outcome = await dispatcher.handle({ type: 'smart_message', message_class: 'C', payload: 'x' }, sender);

    assert.deepStrictEqual(outcome, { kind: 'dropped', reason: 'error' });
    assert.deepStrictEqual(logger.lines, ['error: Error handling incoming message: registry offline']);
  });

  it('should drop garbage input', async () => {
    const { dispatcher } = setup();
    assert.deepStrictEqual(await dispatcher.handle('not json', sender), { kind: 'dropped', reason: 'invalid_json' });
    assert.deepStrictEqual(await dispatcher.handle(null, sender), { kind: 'dropped', reason: 'not_an_object' });
  });
});
