import type {
  HeartbeatInfo,
  HeartbeatUpdate,
  NodeEntry,
  PeerRecord,
  PeerUpdate,
} from './peer.js';
import { uniqueStrings } from '../utils.js';

export interface NodeRegistryOptions {
  /** Identifier of the local node; never stored */
  localNodeId: string;
  /** Clock in ms, defaults to Date.now */
  now?: () => number;
}

function clonePeer(peer: Readonly<PeerRecord>): PeerRecord {
  return { ...peer, capabilities: [...peer.capabilities] };
}

function cloneHeartbeat(info: Readonly<HeartbeatInfo>): HeartbeatInfo {
  return { ...info, advertisedMessageTypes: [...info.advertisedMessageTypes] };
}

function freezeEntry(entry: NodeEntry): NodeEntry {
  if (entry.peer) {
    Object.freeze(entry.peer.capabilities);
    Object.freeze(entry.peer);
  }
  if (entry.heartbeat) {
    Object.freeze(entry.heartbeat.advertisedMessageTypes);
    Object.freeze(entry.heartbeat);
  }
  return Object.freeze(entry);
}

/**
 * In-memory registry of known nodes.
 *
 * Each method runs to completion without yielding to the event loop, so every
 * call is one atomic step with respect to the discovery loop, the heartbeat
 * loop and inbound handlers. Entries are frozen values replaced as a whole;
 * readers always receive copies.
 */
export class NodeRegistry {
  private entries: Map<string, NodeEntry> = new Map();
  private readonly localNodeId: string;
  private readonly now: () => number;

  constructor(options: NodeRegistryOptions) {
    this.localNodeId = options.localNodeId;
    this.now = options.now ?? Date.now;
  }

  /**
   * Insert or merge discovery fields into a peer and bump its lastSeen.
   *
   * @param nodeId - The peer's identifier
   * @param update - Fields to merge; omitted fields keep their previous value
   * @returns Copy of the stored record, or undefined when the id is empty or our own
   */
  upsert(nodeId: string, update: PeerUpdate = {}): PeerRecord | undefined {
    if (!this.accepts(nodeId)) {
      return undefined;
    }

    const existing = this.entries.get(nodeId);
    const previous = existing?.peer;
    const peer: PeerRecord = {
      nodeId,
      address: update.address ?? previous?.address ?? '',
      port: update.port ?? previous?.port ?? 0,
      lastSeen: Math.max(this.now(), previous?.lastSeen ?? 0),
      capabilities: uniqueStrings(update.capabilities ?? previous?.capabilities ?? []),
    };

    this.entries.set(nodeId, freezeEntry({ nodeId, peer, heartbeat: existing?.heartbeat }));
    return clonePeer(peer);
  }

  /**
   * Store a heartbeat and count it as liveness for an already-discovered peer.
   * A heartbeat from a node discovery has not found yet only fills the heartbeat view.
   *
   * @returns Copy of the stored heartbeat info, or undefined when the id is empty or our own
   */
  recordHeartbeat(nodeId: string, update: HeartbeatUpdate): HeartbeatInfo | undefined {
    if (!this.accepts(nodeId)) {
      return undefined;
    }

    const existing = this.entries.get(nodeId);
    const now = this.now();
    const heartbeat: HeartbeatInfo = {
      address: update.address,
      port: update.port,
      lastHeartbeat: Math.max(now, existing?.heartbeat?.lastHeartbeat ?? 0),
      advertisedMessageTypes: uniqueStrings(update.advertisedMessageTypes),
      ...(update.protocolVersion !== undefined ? { protocolVersion: update.protocolVersion } : {}),
    };

    const peer = existing?.peer
      ? { ...existing.peer, capabilities: [...existing.peer.capabilities], lastSeen: Math.max(now, existing.peer.lastSeen) }
      : undefined;

    this.entries.set(nodeId, freezeEntry({ nodeId, peer, heartbeat }));
    return cloneHeartbeat(heartbeat);
  }

  /**
   * Get a discovered peer by id.
   */
  get(nodeId: string): PeerRecord | undefined {
    const peer = this.entries.get(nodeId)?.peer;
    return peer ? clonePeer(peer) : undefined;
  }

  /**
   * Whether a discovered peer with this id exists.
   */
  has(nodeId: string): boolean {
    return this.entries.get(nodeId)?.peer !== undefined;
  }

  /**
   * Snapshot of all discovered peers, in insertion order.
   */
  all(): PeerRecord[] {
    const peers: PeerRecord[] = [];
    for (const entry of this.entries.values()) {
      if (entry.peer) {
        peers.push(clonePeer(entry.peer));
      }
    }
    return peers;
  }

  /**
   * Ids of all discovered peers, in insertion order.
   */
  peerIds(): string[] {
    const ids: string[] = [];
    for (const entry of this.entries.values()) {
      if (entry.peer) {
        ids.push(entry.nodeId);
      }
    }
    return ids;
  }

  /**
   * Last heartbeat received from a node.
   */
  heartbeat(nodeId: string): HeartbeatInfo | undefined {
    const info = this.entries.get(nodeId)?.heartbeat;
    return info ? cloneHeartbeat(info) : undefined;
  }

  /**
   * Snapshot of the heartbeat view keyed by node id.
   */
  heartbeats(): Map<string, HeartbeatInfo> {
    const view = new Map<string, HeartbeatInfo>();
    for (const entry of this.entries.values()) {
      if (entry.heartbeat) {
        view.set(entry.nodeId, cloneHeartbeat(entry.heartbeat));
      }
    }
    return view;
  }

  /**
   * Number of discovered peers.
   */
  size(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.peer) count++;
    }
    return count;
  }

  /**
   * Remove a node from both the membership and the heartbeat view.
   *
   * @returns true if anything was removed
   */
  evict(nodeId: string): boolean {
    return this.entries.delete(nodeId);
  }

  /**
   * Remove every node not heard from within the window. A discovered peer is
   * judged by lastSeen; a heartbeat-only node by lastHeartbeat.
   *
   * @param maxAgeMs - Entries strictly older than this are removed
   * @returns Ids of the removed nodes
   */
  evictStale(maxAgeMs: number): string[] {
    const cutoff = this.now() - maxAgeMs;
    const evicted: string[] = [];

    for (const [nodeId, entry] of this.entries) {
      const lastHeard = entry.peer ? entry.peer.lastSeen : entry.heartbeat?.lastHeartbeat ?? 0;
      if (lastHeard < cutoff) {
        this.entries.delete(nodeId);
        evicted.push(nodeId);
      }
    }

    return evicted;
  }

  /**
   * Drop every entry.
   */
  clear(): void {
    this.entries.clear();
  }

  private accepts(nodeId: string): boolean {
    return typeof nodeId === 'string' && nodeId.length > 0 && nodeId !== this.localNodeId;
  }
}
