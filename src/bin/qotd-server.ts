#!/usr/bin/env node
import { ConfigError, SERVER_USAGE, parseServerArgs, readVersion } from '../config';
import { CATEGORY_SETS } from '../types';
import { Logger } from '../utils/logger';
import { QuoteCorpus } from '../quotes';
import { QotdServer } from '../server';

async function main(argv: readonly string[]): Promise<void> {
  const command = parseServerArgs(argv);
  if (command.kind === 'help') {
    process.stdout.write(SERVER_USAGE);
    return;
  }
  if (command.kind === 'version') {
    process.stdout.write(`qotd-server ${readVersion()}\n`);
    return;
  }

  const { config } = command;
  const logger = Logger.create('qotd-server', {
    level: config.logLevel,
    logFile: config.logFile,
    fileLevel: config.fileLogLevel,
  });

  const corpus = await QuoteCorpus.fromDir(config.dir, CATEGORY_SETS[config.categories], {
    logger,
  });
  const server = new QotdServer({ logger });
  try {
    await server.bind(config.host, config.port);
    server.dropPrivileges(config.user, config.group);

    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info(`Received ${signal}, shutting down`);
      server.close().catch((err) => logger.error('Error during shutdown', err));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await server.serve(corpus);
  } finally {
    await server.close();
    await corpus.close();
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`qotd-server: fatal: ${message}`);
  if (err instanceof ConfigError) {
    console.error(SERVER_USAGE);
  }
  process.exit(1);
});
