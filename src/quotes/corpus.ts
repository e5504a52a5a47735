import * as path from 'path';
import { readdir } from 'fs/promises';
import { QuoteCategory, QuoteSource } from '../types';
import { Logger } from '../utils/logger';
import { RandomSource, defaultRandom, randomIndex } from '../utils/random';
import { IndexedFile, indexQuoteFile } from './indexer';
import { WeightedIndex } from './weighted-index';
import { rot13 } from './rot13';

export class EmptyCorpusError extends Error {
  constructor(readonly dir: string) {
    super(`No quote files with quotes in the allowed categories under "${dir}"`);
    this.name = 'EmptyCorpusError';
  }
}

export interface QuoteCorpusOptions {
  logger?: Logger;
  random?: RandomSource;
}

export interface QuoteSelection {
  fileIndex: number;
  spanIndex: number;
}

export interface CorpusFileInfo {
  path: string;
  quotes: number;
  encoding: IndexedFile['encoding'];
  category: QuoteCategory;
}

async function closeAll(files: IndexedFile[]): Promise<void> {
  await Promise.allSettled(files.map((f) => f.handle.close()));
}

/**
 * Depth-first walk collecting every regular file under `dir` that has at
 * least one quote and an allowed category. On failure every handle opened
 * so far is closed before the error propagates.
 */
async function collectFiles(
  dir: string,
  allowed: readonly QuoteCategory[],
  logger: Logger,
  into: IndexedFile[],
): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collectFiles(entryPath, allowed, logger, into);
    } else if (entry.isFile()) {
      const file = await indexQuoteFile(entryPath);
      if (!allowed.includes(file.category)) {
        logger.info(`File "${entryPath}" is not in allowed categories`);
        await file.handle.close();
      } else if (file.spans.length === 0) {
        logger.info(`File "${entryPath}" contains no quotes`);
        await file.handle.close();
      } else {
        logger.info(`Indexed file "${entryPath}" containing ${file.spans.length} entries`);
        into.push(file);
      }
    } else {
      logger.debug(`Skipping "${entryPath}": not a regular file or directory`);
    }
  }
}

/**
 * Indexed, category-filtered collection of quote files.
 *
 * Selection is two-stage: a file is drawn with probability proportional to
 * its quote count, then a quote uniformly within it, so every quote in the
 * corpus is equally likely regardless of how quotes are spread over files.
 *
 * File handles are shared state. Serve reads through a single owner
 * (QuoteBroker) rather than calling readQuote concurrently.
 */
export class QuoteCorpus implements QuoteSource {
  private readonly weights: WeightedIndex;
  private readonly random: RandomSource;
  private closed = false;

  private constructor(
    private readonly indexed: IndexedFile[],
    random: RandomSource,
  ) {
    this.weights = new WeightedIndex(indexed.map((f) => f.spans.length));
    this.random = random;
  }

  static async fromDir(
    dir: string,
    allowedCategories: readonly QuoteCategory[],
    options: QuoteCorpusOptions = {},
  ): Promise<QuoteCorpus> {
    const logger = options.logger ?? Logger.silent();
    const files: IndexedFile[] = [];
    try {
      await collectFiles(dir, allowedCategories, logger, files);
    } catch (err) {
      await closeAll(files);
      throw err;
    }

    if (files.length === 0) {
      throw new EmptyCorpusError(dir);
    }

    const corpus = new QuoteCorpus(files, options.random ?? defaultRandom);
    logger.info(`Loaded ${corpus.quoteCount} quotes from ${corpus.fileCount} files`);
    return corpus;
  }

  get fileCount(): number {
    return this.indexed.length;
  }

  get quoteCount(): number {
    return this.weights.totalWeight;
  }

  get files(): CorpusFileInfo[] {
    return this.indexed.map((f) => ({
      path: f.path,
      quotes: f.spans.length,
      encoding: f.encoding,
      category: f.category,
    }));
  }

  selectQuote(): QuoteSelection {
    const fileIndex = this.weights.sample(this.random);
    const spanIndex = randomIndex(this.random, this.indexed[fileIndex].spans.length);
    return { fileIndex, spanIndex };
  }

  async randomQuote(): Promise<Buffer> {
    const { fileIndex, spanIndex } = this.selectQuote();
    return this.readQuote(fileIndex, spanIndex);
  }

  async readQuote(fileIndex: number, spanIndex: number): Promise<Buffer> {
    if (this.closed) {
      throw new Error('QuoteCorpus is closed');
    }
    const file = this.indexed[fileIndex];
    if (!file) {
      throw new RangeError(`No quote file at index ${fileIndex}`);
    }
    const span = file.spans[spanIndex];
    if (!span) {
      throw new RangeError(`No quote ${spanIndex} in "${file.path}"`);
    }

    const quote = Buffer.alloc(span.length);
    let filled = 0;
    while (filled < span.length) {
      const { bytesRead } = await file.handle.read(
        quote,
        filled,
        span.length - filled,
        span.offset + filled,
      );
      if (bytesRead === 0) {
        throw new Error(
          `Unexpected end of "${file.path}" reading ${span.length} bytes at offset ${span.offset}`,
        );
      }
      filled += bytesRead;
    }

    return file.encoding === 'rot13' ? rot13(quote) : quote;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await closeAll(this.indexed);
  }
}
