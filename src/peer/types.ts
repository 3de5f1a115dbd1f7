/**
 * This process's identity on the network. Shared by reference: a rename
 * is visible to every component at once.
 */
export interface LocalIdentity {
  name: string;
  /** Address advertised in outgoing messages */
  address: string;
  /** UDP port this process listens on */
  port: number;
}
