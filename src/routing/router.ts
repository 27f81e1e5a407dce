import type { PeerRecord } from '../registry/peer.js';

/** Value of `to` that means "every known peer". */
export const BROADCAST_TARGET = 'broadcast';

/** Key of the routing header inside a serialized message. */
export const ROUTING_HEADER_KEY = '_sm_header';

/**
 * Routing hints carried in a message header.
 */
export interface RoutingHeader {
  /** Explicit destination node id, or 'broadcast' */
  to?: string;
  /** Every listed capability must be advertised by a target */
  capabilities?: string[];
}

export type RoutingStrategy = 'direct' | 'capabilities' | 'broadcast';

export interface RoutingDecision {
  targets: string[];
  strategy: RoutingStrategy;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract the routing header from a serialized message.
 *
 * @param serialized - JSON text of the outbound message
 * @returns The header (possibly empty), or null when the message is not a JSON object
 *          or its header is not an object
 */
export function parseRoutingHeader(serialized: string): RoutingHeader | null {
  let data: unknown;
  try {
    data = JSON.parse(serialized);
  } catch {
    return null;
  }

  if (!isRecord(data)) {
    return null;
  }

  const raw = data[ROUTING_HEADER_KEY];
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    return null;
  }

  const header: RoutingHeader = {};
  if (typeof raw.to === 'string') {
    header.to = raw.to;
  }
  if (Array.isArray(raw.capabilities)) {
    header.capabilities = raw.capabilities.filter((cap): cap is string => typeof cap === 'string');
  }
  return header;
}

/**
 * Decide which peers an outbound message goes to.
 *
 * 1. Explicit `to` (other than 'broadcast'): that peer if known, otherwise nobody.
 * 2. Non-empty `capabilities`: peers advertising all of them.
 * 3. Otherwise, including a null header: every known peer.
 *
 * @param header - Parsed routing header, null when the message could not be parsed
 * @param peers - Registry snapshot
 */
export function determineTargets(header: RoutingHeader | null, peers: readonly PeerRecord[]): RoutingDecision {
  if (header?.to !== undefined && header.to !== BROADCAST_TARGET) {
    const target = header.to;
    return {
      targets: peers.some(peer => peer.nodeId === target) ? [target] : [],
      strategy: 'direct',
    };
  }

  const required = header?.capabilities ?? [];
  if (required.length > 0) {
    return {
      targets: peers
        .filter(peer => required.every(cap => peer.capabilities.includes(cap)))
        .map(peer => peer.nodeId),
      strategy: 'capabilities',
    };
  }

  return {
    targets: peers.map(peer => peer.nodeId),
    strategy: 'broadcast',
  };
}

/**
 * Parse the header out of a serialized message and route it.
 */
export function routeMessage(serialized: string, peers: readonly PeerRecord[]): RoutingDecision {
  return determineTargets(parseRoutingHeader(serialized), peers);
}
