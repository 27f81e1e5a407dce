/**
 * Protocol version tag carried in every heartbeat.
 * Bump when the heartbeat or frame layout changes incompatibly.
 */
export const PROTOCOL_VERSION = '1.0.0';
