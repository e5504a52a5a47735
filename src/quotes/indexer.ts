import * as path from 'path';
import { open, FileHandle } from 'fs/promises';
import {
  FileEncoding,
  QuoteCategory,
  QuoteSpan,
  QUOTE_DELIMITER,
  ROT13_MARKER,
  PLAIN_MARKER,
  OFFENSIVE_SUFFIX,
} from '../types';

export interface IndexedFile {
  path: string;
  /** Kept open for the lifetime of the corpus; read with positioned reads only. */
  handle: FileHandle;
  spans: QuoteSpan[];
  encoding: FileEncoding;
  category: QuoteCategory;
}

const READ_CHUNK_BYTES = 64 * 1024;
const NEWLINE = 0x0a;
const DELIMITER_BYTE = QUOTE_DELIMITER.charCodeAt(0);

/**
 * Yield the file's lines, each including its trailing newline (the last one
 * may lack it). A yielded buffer is only valid until the next iteration.
 */
async function* readLines(handle: FileHandle): AsyncGenerator<Buffer> {
  const chunk = Buffer.alloc(READ_CHUNK_BYTES);
  let carry = Buffer.alloc(0);
  let position = 0;

  for (;;) {
    const { bytesRead } = await handle.read(chunk, 0, READ_CHUNK_BYTES, position);
    if (bytesRead === 0) {
      break;
    }
    position += bytesRead;

    const data =
      carry.length > 0
        ? Buffer.concat([carry, chunk.subarray(0, bytesRead)])
        : chunk.subarray(0, bytesRead);
    let start = 0;
    let newline = data.indexOf(NEWLINE, start);
    while (newline !== -1) {
      yield data.subarray(start, newline + 1);
      start = newline + 1;
      newline = data.indexOf(NEWLINE, start);
    }
    // Copy: `chunk` is overwritten by the next read
    carry = Buffer.from(data.subarray(start));
  }

  if (carry.length > 0) {
    yield carry;
  }
}

export function categoryForPath(filePath: string): QuoteCategory {
  return path.basename(filePath).endsWith(OFFENSIVE_SUFFIX) ? 'offensive' : 'decorous';
}

/**
 * Scan one quote file and record the byte range of every quote in it.
 *
 * A line starting with `%` closes the quote that began after the previous
 * delimiter line (or at the start of the file). Text after the last
 * delimiter line is not a quote. Empty ranges are skipped.
 *
 * The first line mentioning either encoding marker decides the encoding.
 * The returned handle stays open; the caller owns it.
 */
export async function indexQuoteFile(filePath: string): Promise<IndexedFile> {
  const handle = await open(filePath, 'r');
  try {
    const spans: QuoteSpan[] = [];
    let encoding: FileEncoding = 'plain';
    let encodingFound = false;
    let offset = 0;
    let lastBoundary = 0;

    for await (const line of readLines(handle)) {
      if (!encodingFound) {
        if (line.includes(ROT13_MARKER)) {
          encoding = 'rot13';
          encodingFound = true;
        } else if (line.includes(PLAIN_MARKER)) {
          encoding = 'plain';
          encodingFound = true;
        }
      }

      if (line[0] === DELIMITER_BYTE) {
        const length = offset - lastBoundary;
        if (length > 0) {
          spans.push({ offset: lastBoundary, length });
        }
        lastBoundary = offset + line.length;
      }
      offset += line.length;
    }

    return {
      path: filePath,
      handle,
      spans,
      encoding,
      category: categoryForPath(filePath),
    };
  } catch (err) {
    await handle.close();
    throw err;
  }
}
