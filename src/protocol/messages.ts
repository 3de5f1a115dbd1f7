/**
 * Field delimiter shared by every peer on the network.
 */
export const FIELD_DELIMITER = ':';

/**
 * Wire tags, in the order they appear at the start of a datagram.
 */
export const MessageTag = {
  chat: 'MSG',
  join: 'SYS:JOIN',
  leave: 'SYS:LEAVE',
  ping: 'SYS:PING',
  active: 'SYS:ACTIVE',
  rename: 'SYS:RENAME',
  private: 'PM',
} as const;

export type MessageKind = keyof typeof MessageTag;

/**
 * Public chat line, fanned out to every known peer
 */
export interface ChatMessage {
  readonly kind: 'chat';
  readonly sender: string;
  readonly address: string;
  /** May contain the delimiter; always the last field on the wire */
  readonly text: string;
}

/**
 * A peer announces it has joined the chat
 */
export interface JoinMessage {
  readonly kind: 'join';
  readonly name: string;
  readonly address: string;
}

/**
 * A peer announces it is leaving
 */
export interface LeaveMessage {
  readonly kind: 'leave';
  readonly name: string;
  readonly address: string;
}

/**
 * Presence ping. When replyPort is set the receiver records it as the
 * sender's listening port.
 */
export interface PingMessage {
  readonly kind: 'ping';
  readonly name: string;
  readonly address: string;
  readonly replyPort?: number;
}

/**
 * Reply to a join or ping confirming the sender is reachable
 */
export interface ActiveMessage {
  readonly kind: 'active';
  readonly name: string;
  readonly address: string;
}

/**
 * A peer changed its display name
 */
export interface RenameMessage {
  readonly kind: 'rename';
  readonly oldName: string;
  readonly newName: string;
  readonly address: string;
}

/**
 * Whisper addressed to a single display name
 */
export interface PrivateMessage {
  readonly kind: 'private';
  readonly sender: string;
  readonly address: string;
  readonly targetName: string;
  readonly text: string;
}

/**
 * Union of every message that travels on the wire
 */
export type Message =
  | ChatMessage
  | JoinMessage
  | LeaveMessage
  | PingMessage
  | ActiveMessage
  | RenameMessage
  | PrivateMessage;

/**
 * Identity a message claims to come from
 */
export interface SenderIdentity {
  name: string;
  address: string;
}

/**
 * Get the (name, address) pair a message carries for its sender.
 * A rename speaks for the new name.
 */
export function senderOf(message: Message): SenderIdentity {
  switch (message.kind) {
    case 'chat':
    case 'private':
      return { name: message.sender, address: message.address };
    case 'rename':
      return { name: message.newName, address: message.address };
    case 'join':
    case 'leave':
    case 'ping':
    case 'active':
      return { name: message.name, address: message.address };
  }
}
