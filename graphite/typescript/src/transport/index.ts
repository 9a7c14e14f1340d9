/**
 * Transport layer: one stream connection per flush cycle.
 */

import * as net from 'net';
import type { GraphiteAddress } from '../types';
import { ConnectionError, WriteError } from '../errors';

/**
 * Connection owned by a single flush cycle.
 */
export interface Connection {
  /** Writes a chunk; resolves once it has been handed to the socket. */
  write(chunk: string): Promise<void>;
  /** Closes the connection. Safe to call more than once. */
  close(): Promise<void>;
}

export interface ConnectOptions {
  /** Connect timeout in milliseconds. */
  connectTimeout: number;
}

/**
 * Opens a connection, rejecting with ConnectionError on failure.
 */
export type ConnectionFactory = (
  address: GraphiteAddress,
  options: ConnectOptions
) => Promise<Connection>;

/**
 * TCP connection implementation.
 */
export class TcpConnection implements Connection {
  private readonly socket: net.Socket;
  private readonly address: GraphiteAddress;
  private closed = false;
  /** Socket error raised between writes, reported by the next write */
  private failure: Error | null = null;

  private constructor(socket: net.Socket, address: GraphiteAddress) {
    this.socket = socket;
    this.address = address;
    this.socket.on('error', (err: Error) => {
      this.failure ??= err;
    });
  }

  /**
   * Connects to the address, honouring the connect timeout.
   */
  static open(address: GraphiteAddress, options: ConnectOptions): Promise<TcpConnection> {
    const { host, port } = address;

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const onError = (err: Error): void => {
        clearTimeout(timeout);
        socket.destroy();
        reject(ConnectionError.refused(host, port, err));
      };

      const timeout = setTimeout(() => {
        socket.removeListener('error', onError);
        socket.on('error', () => undefined);
        socket.destroy();
        reject(ConnectionError.timedOut(host, port, options.connectTimeout));
      }, options.connectTimeout);

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timeout);
        socket.removeListener('error', onError);
        resolve(new TcpConnection(socket, address));
      });
    });
  }

  write(chunk: string): Promise<void> {
    if (this.failure) {
      return Promise.reject(
        new WriteError(`Connection to ${this.describe()} failed: ${this.failure.message}`, {
          cause: this.failure,
        })
      );
    }
    if (this.closed || this.socket.destroyed) {
      return Promise.reject(new WriteError(`Connection to ${this.describe()} is closed`));
    }

    return new Promise((resolve, reject) => {
      this.socket.write(chunk, 'utf-8', (err?: Error | null) => {
        if (err) {
          reject(new WriteError(`Write to ${this.describe()} failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;

    if (this.socket.destroyed) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.end(() => this.socket.destroy());
    });
  }

  private describe(): string {
    return `${this.address.host}:${this.address.port}`;
  }
}

/**
 * Default factory opening a TCP connection
 */
export const tcpConnectionFactory: ConnectionFactory = (address, options) =>
  TcpConnection.open(address, options);
