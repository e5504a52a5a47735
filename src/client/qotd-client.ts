/**
 * Quote of the Day client
 *
 * TCP: connect and read until the server closes the stream.
 * UDP: send one empty datagram and wait for the single reply.
 */

import * as net from 'net';
import * as dgram from 'dgram';
import { DEFAULT_PORT } from '../types';

export type QotdProtocol = 'tcp' | 'udp';

export interface FetchQuoteOptions {
  host: string;
  port?: number;
  protocol?: QotdProtocol;
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 5000;

export function fetchQuote(options: FetchQuoteOptions): Promise<Buffer> {
  const port = options.port ?? DEFAULT_PORT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  return (options.protocol ?? 'udp') === 'tcp'
    ? fetchTcp(options.host, port, timeoutMs)
    : fetchUdp(options.host, port, timeoutMs);
}

function fetchTcp(host: string, port: number, timeoutMs: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = net.createConnection({ host, port });

    socket.setTimeout(timeoutMs, () => {
      socket.destroy(new Error(`No quote from ${host}:${port} within ${timeoutMs}ms`));
    });
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('error', reject);
    // The server closes the connection once the whole quote is written
    socket.on('end', () => {
      socket.destroy();
      resolve(Buffer.concat(chunks));
    });
  });
}

function fetchUdp(host: string, port: number, timeoutMs: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const socket = dgram.createSocket(net.isIPv6(host) ? 'udp6' : 'udp4');

    const finish = (err: Error | null, quote?: Buffer): void => {
      clearTimeout(timer);
      socket.close();
      if (err) {
        reject(err);
      } else {
        resolve(quote ?? Buffer.alloc(0));
      }
    };

    const timer = setTimeout(() => {
      finish(new Error(`No quote from ${host}:${port} within ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('message', (msg) => finish(null, msg));
    socket.once('error', (err) => finish(err));
    // Content is ignored by the server; an empty datagram is enough
    socket.send(Buffer.alloc(0), port, host);
  });
}
