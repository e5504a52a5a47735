#!/usr/bin/env node
import { CLIENT_USAGE, ConfigError, parseClientArgs, readVersion } from '../config';
import { fetchQuote } from '../client/qotd-client';

async function main(argv: readonly string[]): Promise<void> {
  const command = parseClientArgs(argv);
  if (command.kind === 'help') {
    process.stdout.write(CLIENT_USAGE);
    return;
  }
  if (command.kind === 'version') {
    process.stdout.write(`qotd ${readVersion()}\n`);
    return;
  }

  const quote = await fetchQuote(command.config);
  process.stdout.write(`${quote.toString('utf-8').trimEnd()}\n`);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`qotd: ${message}`);
  if (err instanceof ConfigError) {
    console.error(CLIENT_USAGE);
  }
  process.exit(1);
});
