import dgram from 'node:dgram';

/** Upper bound for a single datagram send, including DNS lookup */
export const DEFAULT_SEND_TIMEOUT_MS = 1000;

export interface RemoteEndpoint {
  address: string;
  port: number;
}

export interface SendResult {
  ok: boolean;
  error?: string;
}

export type DatagramHandler = (payload: string, from: RemoteEndpoint) => void;
export type TransportErrorHandler = (error: Error) => void;

/**
 * Minimal datagram socket the engine talks to. UdpTransport is the real
 * one; tests plug in an in-process network.
 */
export interface DatagramTransport {
  bind(port: number): Promise<void>;
  /** Port actually bound (differs from the requested one when binding 0) */
  boundPort(): number | undefined;
  /** Best-effort send; resolves with ok: false instead of rejecting */
  send(line: string, address: string, port: number): Promise<SendResult>;
  onDatagram(handler: DatagramHandler): void;
  onError(handler: TransportErrorHandler): void;
  close(): Promise<void>;
}

export interface UdpTransportOptions {
  /** Interface to bind; all interfaces by default */
  host?: string;
  sendTimeoutMs?: number;
}

/**
 * UDP (IPv4) transport. One datagram carries one newline-terminated line.
 */
export class UdpTransport implements DatagramTransport {
  private socket: dgram.Socket | null = null;
  private host: string | undefined;
  private sendTimeoutMs: number;
  private datagramHandlers: DatagramHandler[] = [];
  private errorHandlers: TransportErrorHandler[] = [];

  constructor(options: UdpTransportOptions = {}) {
    this.host = options.host;
    this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
  }

  /**
   * Bind the listening socket. Rejects if the port is already in use.
   */
  bind(port: number): Promise<void> {
    if (this.socket) {
      return Promise.reject(new Error('Transport already bound'));
    }

    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket('udp4');

      const onBindError = (error: Error): void => {
        socket.close();
        reject(error);
      };
      socket.once('error', onBindError);

      socket.bind(port, this.host, () => {
        socket.off('error', onBindError);
        socket.on('error', (error) => {
          for (const handler of this.errorHandlers) handler(error);
        });
        socket.on('message', (data, rinfo) => {
          const from = { address: rinfo.address, port: rinfo.port };
          for (const handler of this.datagramHandlers) handler(data.toString('utf-8'), from);
        });
        this.socket = socket;
        resolve();
      });
    });
  }

  boundPort(): number | undefined {
    return this.socket?.address().port;
  }

  send(line: string, address: string, port: number): Promise<SendResult> {
    const socket = this.socket;
    if (!socket) {
      return Promise.resolve({ ok: false, error: 'Transport not bound' });
    }

    return new Promise((resolve) => {
      const timeout = setTimeout(() => {
        resolve({ ok: false, error: `Send to ${address}:${port} timed out` });
      }, this.sendTimeoutMs);

      try {
        socket.send(`${line}\n`, port, address, (err) => {
          clearTimeout(timeout);
          resolve(err ? { ok: false, error: err.message } : { ok: true });
        });
      } catch (err) {
        clearTimeout(timeout);
        resolve({ ok: false, error: err instanceof Error ? err.message : String(err) });
      }
    });
  }

  onDatagram(handler: DatagramHandler): void {
    this.datagramHandlers.push(handler);
  }

  onError(handler: TransportErrorHandler): void {
    this.errorHandlers.push(handler);
  }

  close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.resolve();
    }
    this.socket = null;
    return new Promise((resolve) => {
      socket.close(() => resolve());
    });
  }
}
