import {
  FIELD_DELIMITER,
  MessageTag,
  type Message,
  type PingMessage,
} from './messages.js';

/**
 * Why a datagram could not be decoded
 */
export type DecodeFailure =
  | 'empty'
  | 'unknown_tag'
  | 'missing_fields'
  | 'extra_fields'
  | 'empty_field'
  | 'invalid_field'
  | 'invalid_port';

export type DecodeResult =
  | { ok: true; message: Message }
  | { ok: false; reason: DecodeFailure };

/**
 * Thrown when a message cannot be put on the wire without breaking the
 * field layout (empty or delimiter-bearing fixed field, line break, bad port).
 */
export class WireFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WireFormatError';
  }
}

const LINE_BREAK = /[\r\n]/;
const WHITESPACE = /\s/;

/**
 * Whether a value can be used as a fixed (non-trailing) field: non-empty,
 * free of the delimiter, whitespace-only values excluded.
 */
export function isValidFieldValue(value: string): boolean {
  return value.trim() !== '' && !value.includes(FIELD_DELIMITER) && !LINE_BREAK.test(value);
}

/**
 * Addresses are also stored space-separated in the peer file, so they must
 * not contain whitespace.
 */
export function isValidAddress(value: string): boolean {
  return isValidFieldValue(value) && !WHITESPACE.test(value);
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function fixedField(name: string, value: string): string {
  if (!isValidFieldValue(value)) {
    throw new WireFormatError(`Invalid ${name} field: ${JSON.stringify(value)}`);
  }
  return value;
}

function addressField(value: string): string {
  if (!isValidAddress(value)) {
    throw new WireFormatError(`Invalid address field: ${JSON.stringify(value)}`);
  }
  return value;
}

function textField(value: string): string {
  if (LINE_BREAK.test(value)) {
    throw new WireFormatError('Text must not contain line breaks');
  }
  return value;
}

function join(fields: string[]): string {
  return fields.join(FIELD_DELIMITER);
}

/**
 * Encode a message as a single line (without the trailing newline).
 *
 * @throws WireFormatError if a field cannot be represented on the wire
 */
export function encodeMessage(message: Message): string {
  switch (message.kind) {
    case 'chat':
      return join([
        MessageTag.chat,
        fixedField('sender', message.sender),
        addressField(message.address),
        textField(message.text),
      ]);
    case 'join':
    case 'leave':
    case 'active':
      return join([
        MessageTag[message.kind],
        fixedField('name', message.name),
        addressField(message.address),
      ]);
    case 'ping': {
      const fields = [
        MessageTag.ping,
        fixedField('name', message.name),
        addressField(message.address),
      ];
      if (message.replyPort !== undefined) {
        if (!isValidPort(message.replyPort)) {
          throw new WireFormatError(`Invalid replyPort: ${message.replyPort}`);
        }
        fields.push(String(message.replyPort));
      }
      return join(fields);
    }
    case 'rename':
      return join([
        MessageTag.rename,
        fixedField('oldName', message.oldName),
        fixedField('newName', message.newName),
        addressField(message.address),
      ]);
    case 'private':
      return join([
        MessageTag.private,
        fixedField('sender', message.sender),
        addressField(message.address),
        fixedField('targetName', message.targetName),
        textField(message.text),
      ]);
  }
}

type FieldsResult = { ok: true; fields: string[] } | { ok: false; reason: DecodeFailure };

/**
 * Apply the encoder's rules to decoded fixed fields: no blanks, no line
 * breaks, and no whitespace in the address at `addressAt`.
 */
function checkFixed(fields: string[], addressAt: number): FieldsResult {
  if (fields.some(p => p.trim() === '')) return { ok: false, reason: 'empty_field' };
  if (!fields.every(isValidFieldValue)) return { ok: false, reason: 'invalid_field' };
  if (!isValidAddress(fields[addressAt])) return { ok: false, reason: 'invalid_field' };
  return { ok: true, fields };
}

/**
 * Take exactly `count` valid fields.
 */
function exactFields(parts: string[], count: number, addressAt: number): FieldsResult {
  if (parts.length < count) return { ok: false, reason: 'missing_fields' };
  if (parts.length > count) return { ok: false, reason: 'extra_fields' };
  return checkFixed(parts, addressAt);
}

/**
 * Take `count` valid fields followed by the remainder of the line as text.
 */
function fieldsWithText(parts: string[], count: number, addressAt: number): FieldsResult {
  if (parts.length < count + 1) return { ok: false, reason: 'missing_fields' };
  const fixed = checkFixed(parts.slice(0, count), addressAt);
  if (!fixed.ok) return fixed;
  const text = join(parts.slice(count));
  if (LINE_BREAK.test(text)) return { ok: false, reason: 'invalid_field' };
  return { ok: true, fields: [...fixed.fields, text] };
}

function decodePing(parts: string[]): DecodeResult {
  if (parts.length === 3 && parts[2] === '') {
    parts = parts.slice(0, 2);
  }
  if (parts.length === 2) {
    const result = exactFields(parts, 2, 1);
    if (!result.ok) return result;
    const [name, address] = result.fields;
    return { ok: true, message: { kind: 'ping', name, address } };
  }

  const result = exactFields(parts, 3, 1);
  if (!result.ok) return result;
  const [name, address, rawPort] = result.fields;
  if (!/^\d+$/.test(rawPort)) return { ok: false, reason: 'invalid_port' };
  const replyPort = parseInt(rawPort, 10);
  if (!isValidPort(replyPort)) return { ok: false, reason: 'invalid_port' };

  const message: PingMessage = { kind: 'ping', name, address, replyPort };
  return { ok: true, message };
}

function decodeSystem(subtype: string | undefined, parts: string[]): DecodeResult {
  switch (subtype) {
    case 'JOIN':
    case 'LEAVE':
    case 'ACTIVE': {
      const result = exactFields(parts, 2, 1);
      if (!result.ok) return result;
      const [name, address] = result.fields;
      const kind = subtype === 'JOIN' ? 'join' : subtype === 'LEAVE' ? 'leave' : 'active';
      return { ok: true, message: { kind, name, address } };
    }
    case 'PING':
      return decodePing(parts);
    case 'RENAME': {
      const result = exactFields(parts, 3, 2);
      if (!result.ok) return result;
      const [oldName, newName, address] = result.fields;
      return { ok: true, message: { kind: 'rename', oldName, newName, address } };
    }
    default:
      return { ok: false, reason: 'unknown_tag' };
  }
}

/**
 * Decode one datagram. Never throws: anything that does not match the
 * per-tag layout comes back as `{ ok: false, reason }`.
 */
export function decodeMessage(line: string): DecodeResult {
  const stripped = line.replace(/\r?\n$/, '');
  if (stripped.trim() === '') {
    return { ok: false, reason: 'empty' };
  }

  const [tag, ...parts] = stripped.split(FIELD_DELIMITER);

  switch (tag) {
    case MessageTag.chat: {
      const result = fieldsWithText(parts, 2, 1);
      if (!result.ok) return result;
      const [sender, address, text] = result.fields;
      return { ok: true, message: { kind: 'chat', sender, address, text } };
    }
    case MessageTag.private: {
      const result = fieldsWithText(parts, 3, 1);
      if (!result.ok) return result;
      const [sender, address, targetName, text] = result.fields;
      return { ok: true, message: { kind: 'private', sender, address, targetName, text } };
    }
    case 'SYS':
      return decodeSystem(parts[0], parts.slice(1));
    default:
      return { ok: false, reason: 'unknown_tag' };
  }
}
