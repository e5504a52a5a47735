/**
 * Quote of the Day server (RFC 865)
 *
 * Binds a TCP listener and a UDP socket to the same address and port and
 * answers every TCP connection and every UDP datagram with one quote.
 * All quote reads go through a single QuoteBroker.
 */

import * as net from 'net';
import * as dgram from 'dgram';
import { Logger } from '../utils/logger';
import { QuoteSource, MAX_UDP_QUOTE_BYTES } from '../types';
import { QuoteBroker, BrokerUnavailableError, DEFAULT_BROKER_CAPACITY } from './broker';
import { PrivilegeOps, dropPrivileges as dropProcessPrivileges } from './privileges';

export type ServerState = 'unbound' | 'bound' | 'serving' | 'closed';

export interface QotdServerOptions {
  logger: Logger;
  /** Bound of the broker's request queue. */
  brokerCapacity?: number;
  /** UDP replies must be strictly shorter than this. */
  maxUdpQuoteBytes?: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function listenTcp(server: net.Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen({ host, port }, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

function bindUdp(socket: dgram.Socket, address: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.once('error', reject);
    socket.bind({ address, port, exclusive: true }, () => {
      socket.off('error', reject);
      resolve();
    });
  });
}

function closeTcp(server: net.Server | null): Promise<void> {
  return new Promise((resolve) => {
    if (!server) {
      resolve();
      return;
    }
    // Errors only mean the server was not listening
    server.close(() => resolve());
  });
}

function closeUdp(socket: dgram.Socket | null): Promise<void> {
  return new Promise((resolve) => {
    if (!socket) {
      resolve();
      return;
    }
    try {
      socket.close(() => resolve());
    } catch {
      // Already closed
      resolve();
    }
  });
}

/** Write everything, then close the connection. */
function writeAndClose(socket: net.Socket, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (socket.destroyed) {
      reject(new Error('Connection closed before the quote was sent'));
      return;
    }
    socket.once('error', reject);
    socket.end(data, () => {
      socket.off('error', reject);
      socket.destroy();
      resolve();
    });
  });
}

function sendDatagram(socket: dgram.Socket, data: Buffer, to: dgram.RemoteInfo): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(data, to.port, to.address, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

export class QotdServer {
  private tcp: net.Server | null = null;
  private udp: dgram.Socket | null = null;
  private broker: QuoteBroker | null = null;
  private _state: ServerState = 'unbound';
  private readonly logger: Logger;
  private readonly brokerCapacity: number;
  private readonly maxUdpQuoteBytes: number;
  private readonly connections = new Set<net.Socket>();
  /** Traffic that arrived between bind() and serve(). */
  private heldConnections: net.Socket[] = [];
  private heldDatagrams: dgram.RemoteInfo[] = [];
  private listenerError: Error | null = null;
  private failServing: ((err: Error) => void) | null = null;

  constructor(options: QotdServerOptions) {
    this.logger = options.logger;
    this.brokerCapacity = options.brokerCapacity ?? DEFAULT_BROKER_CAPACITY;
    this.maxUdpQuoteBytes = options.maxUdpQuoteBytes ?? MAX_UDP_QUOTE_BYTES;
  }

  get state(): ServerState {
    return this._state;
  }

  /**
   * Bind TCP, then UDP on the exact address TCP resolved to, so a request
   * for port 0 yields one shared port number for both protocols.
   */
  async bind(host: string, port: number): Promise<this> {
    if (this._state !== 'unbound') {
      throw new Error(`Cannot bind: server is ${this._state}`);
    }

    this.logger.trace('Binding TCP socket');
    const tcp = net.createServer({ pauseOnConnect: true }, (socket) => this.onConnection(socket));
    try {
      await listenTcp(tcp, host, port);
    } catch (err) {
      throw new Error(`Failed to bind TCP port: ${errorMessage(err)}`, { cause: err });
    }

    const local = tcp.address();
    if (!local || typeof local === 'string') {
      await closeTcp(tcp);
      throw new Error('Could not read local address');
    }
    this.logger.debug(`Bound to TCP ${local.address}:${local.port}`);

    this.logger.trace('Binding UDP socket');
    const udp = dgram.createSocket(local.family === 'IPv6' ? 'udp6' : 'udp4');
    udp.on('message', (_msg, rinfo) => this.onDatagram(rinfo));
    try {
      await bindUdp(udp, local.address, local.port);
    } catch (err) {
      await Promise.all([closeTcp(tcp), closeUdp(udp)]);
      throw new Error(`Failed to bind UDP port: ${errorMessage(err)}`, { cause: err });
    }
    this.logger.debug(`Bound to UDP ${local.address}:${local.port}`);

    tcp.on('error', (err) => this.onListenerError('TCP', err));
    udp.on('error', (err) => this.onListenerError('UDP', err));
    this.tcp = tcp;
    this.udp = udp;
    this._state = 'bound';
    return this;
  }

  address(): net.AddressInfo {
    const local = this.tcp?.address();
    if (!local || typeof local === 'string') {
      throw new Error(`Server has no address: server is ${this._state}`);
    }
    return local;
  }

  /** Switch to an unprivileged account once the ports are bound. */
  dropPrivileges(user: string, group: string | null = null, ops?: PrivilegeOps): this {
    dropProcessPrivileges(user, group, this.logger, ops);
    return this;
  }

  /**
   * Serve quotes from `source` until close(). Rejects, after closing the
   * listeners, when the broker fails or a listener errors: no further
   * request could be answered.
   */
  async serve(source: QuoteSource): Promise<void> {
    if (this._state !== 'bound') {
      throw new Error(`Cannot serve: server is ${this._state}`);
    }

    const broker = new QuoteBroker(source, this.logger, this.brokerCapacity);
    this.broker = broker;
    this._state = 'serving';

    const local = this.address();
    this.logger.info(`Now listening on TCP/UDP ${local.address}:${local.port}`);

    const listenerFailure = new Promise<never>((_resolve, reject) => {
      this.failServing = reject;
    });
    const brokerStopped = broker.start().catch((err: unknown) => {
      throw new BrokerUnavailableError(`Quote broker failed: ${errorMessage(err)}`, {
        cause: err,
      });
    });

    for (const socket of this.heldConnections.splice(0)) {
      this.dispatchConnection(socket, broker);
    }
    for (const rinfo of this.heldDatagrams.splice(0)) {
      this.dispatchDatagram(rinfo, broker);
    }
    if (this.listenerError) {
      this.failServing?.(this.listenerError);
    }

    try {
      await Promise.race([brokerStopped, listenerFailure]);
    } catch (err) {
      this.logger.error('No longer accepting clients', err);
      await this.close();
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this._state === 'closed') {
      return;
    }
    this._state = 'closed';
    this.broker?.stop();

    for (const socket of this.heldConnections.splice(0)) {
      socket.destroy();
    }
    this.heldDatagrams = [];
    for (const socket of this.connections) {
      socket.destroy();
    }

    await Promise.all([closeTcp(this.tcp), closeUdp(this.udp)]);
    this.logger.debug('Server closed');
  }

  // --- Event handlers ---

  private onConnection(socket: net.Socket): void {
    if (this._state === 'serving' && this.broker) {
      this.dispatchConnection(socket, this.broker);
    } else if (this._state === 'closed') {
      socket.destroy();
    } else {
      this.heldConnections.push(socket);
    }
  }

  private onDatagram(rinfo: dgram.RemoteInfo): void {
    if (this._state === 'serving' && this.broker) {
      this.dispatchDatagram(rinfo, this.broker);
    } else if (this._state !== 'closed') {
      this.heldDatagrams.push(rinfo);
    }
  }

  private onListenerError(kind: 'TCP' | 'UDP', err: Error): void {
    this.logger.error(`${kind} listener error`, err);
    const failure = new Error(`${kind} listener failed: ${err.message}`, { cause: err });
    if (this.failServing) {
      this.failServing(failure);
    } else {
      this.listenerError = failure;
    }
  }

  private dispatchConnection(socket: net.Socket, broker: QuoteBroker): void {
    this.handleTcp(socket, broker).catch((err) => {
      this.logger.error('TCP handler error', err);
    });
  }

  private dispatchDatagram(rinfo: dgram.RemoteInfo, broker: QuoteBroker): void {
    this.handleUdp(rinfo, broker).catch((err) => {
      this.logger.error('UDP handler error', err);
    });
  }

  // --- Per-client tasks ---

  private async handleTcp(socket: net.Socket, broker: QuoteBroker): Promise<void> {
    const peer = `${socket.remoteAddress}:${socket.remotePort}`;
    const log = this.logger.child({ protocol: 'tcp', peer });
    log.info(`TCP client connected: ${peer}`);

    this.connections.add(socket);
    socket.on('close', () => this.connections.delete(socket));
    socket.on('error', (err) => log.debug(`Socket error: ${err.message}`));
    // Client input is ignored. Draining it keeps the close a clean FIN.
    socket.resume();

    try {
      log.debug('Getting quote');
      const quote = await broker.requestQuote();
      log.debug('Sending quote to client');
      await writeAndClose(socket, quote);
      log.info(`Served ${quote.length} byte quote, connection closed`);
    } catch (err) {
      log.error('Failed to serve TCP client', err);
      socket.destroy();
    }
  }

  /**
   * Retries with fresh quotes until one fits in a datagram. There is no
   * retry cap: a corpus of only oversized quotes never answers over UDP.
   */
  private async handleUdp(rinfo: dgram.RemoteInfo, broker: QuoteBroker): Promise<void> {
    const peer = `${rinfo.address}:${rinfo.port}`;
    const log = this.logger.child({ protocol: 'udp', peer });
    log.info(`UDP client connected: ${peer}`);

    try {
      for (;;) {
        log.debug('Getting quote');
        const quote = await broker.requestQuote();
        if (quote.length < this.maxUdpQuoteBytes) {
          const udp = this.udp;
          if (!udp || this._state === 'closed') {
            throw new Error('UDP socket closed');
          }
          log.debug('Sending quote to client');
          await sendDatagram(udp, quote, rinfo);
          log.info(`Served ${quote.length} byte quote`);
          return;
        }
        log.info(`Quote too long for UDP client (${quote.length}), retrying`);
      }
    } catch (err) {
      log.error('Failed to serve UDP client', err);
    }
  }
}
