export * from './version.js';
export * from './logger.js';
export * from './errors.js';
export * from './config.js';
export * from './utils.js';
export * from './registry/peer.js';
export * from './registry/node-registry.js';
export * from './routing/router.js';
export * from './protocol/messages.js';
export * from './dispatch/subscriber-registry.js';
export * from './discovery/discovery-loop.js';
export * from './heartbeat/heartbeat-loop.js';
export * from './inbound/inbound-dispatcher.js';
export * from './network/driver.js';
export * from './network/crypto.js';
export * from './network/frame.js';
export * from './network/lan-driver.js';
export * from './transport.js';
export {
  createMonitorRouter,
  type TopologySource,
  type MonitorRouterOptions,
} from './monitor/rest-api.js';
