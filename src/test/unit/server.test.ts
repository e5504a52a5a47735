import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'net';
import * as dgram from 'dgram';
import { QotdServer } from '../../server/server';
import { BrokerUnavailableError } from '../../server/broker';
import { fetchQuote } from '../../client/qotd-client';
import { FakeQuoteSource, makeCapturingLogger, makeLogger } from '../helpers';

const HOST = '127.0.0.1';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Connect, send `input`, and collect everything until the server closes. */
function rawTcpExchange(port: number, input: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = net.createConnection({ host: HOST, port }, () => socket.write(input));
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('error', reject);
    socket.on('end', () => {
      socket.destroy();
      resolve(Buffer.concat(chunks));
    });
  });
}

describe('QotdServer', () => {
  const servers: QotdServer[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((s) => s.close()));
  });

  async function bound(logger = makeLogger()): Promise<QotdServer> {
    const server = new QotdServer({ logger });
    servers.push(server);
    await server.bind(HOST, 0);
    return server;
  }

  describe('bind', () => {
    it('binds both protocols to one free port', async () => {
      const server = await bound();
      const address = server.address();

      expect(server.state).toBe('bound');
      expect(address.address).toBe(HOST);
      expect(address.family).toBe('IPv4');
      expect(address.port).toBeGreaterThan(0);
    });

    it('rejects when the TCP port is taken', async () => {
      const first = await bound();
      const second = new QotdServer({ logger: makeLogger() });

      await expect(second.bind(HOST, first.address().port)).rejects.toThrow(/^Failed to bind TCP port: /);
      expect(second.state).toBe('unbound');
    });

    it('rejects when only the UDP port is taken', async () => {
      const blocker = dgram.createSocket('udp4');
      await new Promise<void>((resolve) => blocker.bind(0, HOST, () => resolve()));
      const port = blocker.address().port;

      try {
        const server = new QotdServer({ logger: makeLogger() });
        await expect(server.bind(HOST, port)).rejects.toThrow(/^Failed to bind UDP port: /);

        // The TCP listener was released again
        const probe = net.createServer();
        await new Promise<void>((resolve, reject) => {
          probe.once('error', reject);
          probe.listen(port, HOST, () => resolve());
        });
        await new Promise<void>((resolve) => probe.close(() => resolve()));
      } finally {
        await new Promise<void>((resolve) => blocker.close(() => resolve()));
      }
    });

    it('refuses to bind twice', async () => {
      const server = await bound();
      await expect(server.bind(HOST, 0)).rejects.toThrow('Cannot bind: server is bound');
    });

    it('has no address before binding', () => {
      const server = new QotdServer({ logger: makeLogger() });
      expect(() => server.address()).toThrow('Server has no address: server is unbound');
    });
  });

  describe('serve', () => {
    it('refuses to serve before binding', async () => {
      const server = new QotdServer({ logger: makeLogger() });
      await expect(server.serve(new FakeQuoteSource(['q']))).rejects.toThrow(
        'Cannot serve: server is unbound',
      );
    });

    it('writes one quote over TCP and closes the connection', async () => {
      const server = await bound();
      const serving = server.serve(new FakeQuoteSource(['Quote one.\n']));

      const quote = await fetchQuote({ host: HOST, port: server.address().port, protocol: 'tcp' });

      expect(quote.toString()).toBe('Quote one.\n');
      await server.close();
      await serving;
    });

    it('ignores whatever the TCP client sends', async () => {
      const server = await bound();
      const serving = server.serve(new FakeQuoteSource(['Ignored input.\n']));

      const reply = await rawTcpExchange(server.address().port, 'GET / HTTP/1.0\r\n\r\n');

      expect(reply.toString()).toBe('Ignored input.\n');
      await server.close();
      await serving;
    });

    it('sends quotes of any size over TCP', async () => {
      const big = 'x'.repeat(100_000);
      const server = await bound();
      const serving = server.serve(new FakeQuoteSource([big]));

      const quote = await fetchQuote({ host: HOST, port: server.address().port, protocol: 'tcp' });

      expect(quote.length).toBe(100_000);
      await server.close();
      await serving;
    });

    it('answers an empty UDP datagram with one quote on the same port', async () => {
      const server = await bound();
      const serving = server.serve(new FakeQuoteSource(['Datagram quote.\n']));

      const quote = await fetchQuote({ host: HOST, port: server.address().port, protocol: 'udp' });

      expect(quote.toString()).toBe('Datagram quote.\n');
      await server.close();
      await serving;
    });

    it('retries over UDP until a quote is shorter than 512 bytes', async () => {
      const { logger, messages } = makeCapturingLogger('info');
      const server = await bound(logger);
      const serving = server.serve(
        new FakeQuoteSource(['y'.repeat(600), 'z'.repeat(512), 'w'.repeat(511)]),
      );

      const quote = await fetchQuote({ host: HOST, port: server.address().port, protocol: 'udp' });

      expect(quote.toString()).toBe('w'.repeat(511));
      expect(messages()).toContain('Quote too long for UDP client (600), retrying');
      expect(messages()).toContain('Quote too long for UDP client (512), retrying');
      await server.close();
      await serving;
    });

    it('serves many clients of both protocols concurrently', async () => {
      const server = await bound();
      const serving = server.serve(new FakeQuoteSource(['a\n', 'b\n', 'c\n']));
      const port = server.address().port;

      const quotes = await Promise.all(
        Array.from({ length: 12 }, (_, i) =>
          fetchQuote({ host: HOST, port, protocol: i % 2 === 0 ? 'tcp' : 'udp' }),
        ),
      );

      expect(quotes).toHaveLength(12);
      for (const quote of quotes) {
        expect(['a\n', 'b\n', 'c\n']).toContain(quote.toString());
      }
      await server.close();
      await serving;
    });

    it('answers clients that connected before serving started', async () => {
      const server = await bound();
      const port = server.address().port;

      const early = fetchQuote({ host: HOST, port, protocol: 'tcp' });
      await delay(20);
      const serving = server.serve(new FakeQuoteSource(['Worth the wait.\n']));

      expect((await early).toString()).toBe('Worth the wait.\n');
      await server.close();
      await serving;
    });

    it('logs connected clients with their peer address', async () => {
      const { logger, lines } = makeCapturingLogger('info');
      const server = await bound(logger);
      const serving = server.serve(new FakeQuoteSource(['q\n']));

      await fetchQuote({ host: HOST, port: server.address().port, protocol: 'tcp' });
      await server.close();
      await serving;

      const connected = lines.find((l) => l.msg.startsWith('TCP client connected: '));
      expect(connected).toMatchObject({ protocol: 'tcp' });
      expect(connected?.peer).toMatch(/^127\.0\.0\.1:\d+$/);
    });

    it('rejects with BrokerUnavailableError and stops listening when the broker fails', async () => {
      const server = await bound();
      const port = server.address().port;

      const err = await server
        .serve(new FakeQuoteSource(['never'], 5).failOnCall(1))
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(BrokerUnavailableError);
      expect(err).toMatchObject({
        message: 'Quote broker failed: Failed to choose quote: disk on fire',
      });
      expect(server.state).toBe('closed');
      await expect(fetchQuote({ host: HOST, port, protocol: 'tcp' })).rejects.toMatchObject({
        code: 'ECONNREFUSED',
      });
    });
  });

  describe('close', () => {
    it('is idempotent', async () => {
      const server = await bound();
      const serving = server.serve(new FakeQuoteSource(['q']));

      await server.close();
      await server.close();
      await serving;
      expect(server.state).toBe('closed');
    });

    it('can close a server that never served', async () => {
      const server = await bound();
      await server.close();
      expect(server.state).toBe('closed');
    });
  });

  it('keeps its identity when not running as root', async () => {
    const server = await bound();
    const ops = { getuid: () => 1000, setuid: () => undefined, setgid: () => undefined };
    expect(server.dropPrivileges('nobody', null, ops)).toBe(server);
  });
});
