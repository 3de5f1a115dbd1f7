/**
 * A remote process reachable at a recorded port
 */
export interface PeerRecord {
  /** IPv4 address or host name; unique key of the directory */
  address: string;
  /** UDP port the peer listens on */
  port: number;
}

/**
 * A (display name, address) pair believed to be live
 */
export interface PresenceEntry {
  name: string;
  address: string;
  /** Unix timestamp (ms) of the last message seen from this identity */
  lastSeenAt: number;
}
