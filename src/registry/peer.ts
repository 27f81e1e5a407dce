/**
 * A peer is another node in the local-network fabric, as seen by discovery.
 */
export interface PeerRecord {
  /** Stable node identifier */
  nodeId: string;
  /** Host or IP address of the node's message endpoint */
  address: string;
  /** Port of the node's message endpoint */
  port: number;
  /** Unix timestamp (ms) of the last discovery hit or heartbeat */
  lastSeen: number;
  /** Feature tags the node advertises, used for capability routing */
  capabilities: string[];
}

/**
 * Fields a discovery result may set on a peer.
 */
export type PeerUpdate = Partial<Pick<PeerRecord, 'address' | 'port' | 'capabilities'>>;

/**
 * What the last heartbeat from a node told us.
 */
export interface HeartbeatInfo {
  /** Address the heartbeat arrived from */
  address: string;
  /** Port the heartbeat arrived from */
  port: number;
  /** Unix timestamp (ms) of receipt */
  lastHeartbeat: number;
  /** Message classes the node has active subscribers for */
  advertisedMessageTypes: string[];
  /** Protocol version tag the node reported */
  protocolVersion?: string;
}

/**
 * Heartbeat fields as decoded from the wire; the registry stamps lastHeartbeat.
 */
export type HeartbeatUpdate = Omit<HeartbeatInfo, 'lastHeartbeat'>;

/**
 * One row of the registry. Discovery owns `peer`, heartbeat receipt owns
 * `heartbeat`; either may be absent, never both.
 */
export interface NodeEntry {
  readonly nodeId: string;
  readonly peer?: Readonly<PeerRecord>;
  readonly heartbeat?: Readonly<HeartbeatInfo>;
}
