import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'path';
import { categoryForPath, IndexedFile, indexQuoteFile } from '../../quotes/indexer';
import { makeQuoteDir, removeDir } from '../helpers';

describe('indexQuoteFile', () => {
  const dirs: string[] = [];
  const opened: IndexedFile[] = [];

  afterEach(async () => {
    await Promise.all(opened.splice(0).map((f) => f.handle.close()));
    dirs.splice(0).forEach(removeDir);
  });

  async function index(name: string, content: string | Buffer): Promise<IndexedFile> {
    const dir = makeQuoteDir({ [name]: content });
    dirs.push(dir);
    const file = await indexQuoteFile(path.join(dir, name));
    opened.push(file);
    return file;
  }

  async function spanText(file: IndexedFile): Promise<string[]> {
    const texts: string[] = [];
    for (const span of file.spans) {
      const buf = Buffer.alloc(span.length);
      await file.handle.read(buf, 0, span.length, span.offset);
      texts.push(buf.toString());
    }
    return texts;
  }

  describe('spans', () => {
    it('records one span per delimited quote', async () => {
      const file = await index('quotes', '%\nQuote one.\n%\nQuote two.\n%\n');

      expect(file.spans).toEqual([
        { offset: 2, length: 11 },
        { offset: 15, length: 11 },
      ]);
      expect(await spanText(file)).toEqual(['Quote one.\n', 'Quote two.\n']);
    });

    it('closes text before the first delimiter as a span and drops the unterminated tail', async () => {
      const file = await index('quotes', 'Quote zero.\n%\nQuote one.\n');

      expect(file.spans).toEqual([{ offset: 0, length: 12 }]);
      expect(await spanText(file)).toEqual(['Quote zero.\n']);
    });

    it('skips empty ranges between adjacent delimiters', async () => {
      const file = await index('quotes', '%\n%\nOnly.\n%\n%\n');
      expect(await spanText(file)).toEqual(['Only.\n']);
    });

    it('treats any line starting with % as a delimiter', async () => {
      const file = await index('quotes', '% header text\nA\n%%\nB\n% trailer\n');
      expect(await spanText(file)).toEqual(['A\n', 'B\n']);
    });

    it('keeps multi-line quotes whole', async () => {
      const file = await index('quotes', '%\nline one\n  line two\n\t-- Someone\n%\n');
      expect(await spanText(file)).toEqual(['line one\n  line two\n\t-- Someone\n']);
    });

    it('indexes quotes that straddle read chunk boundaries', async () => {
      const long = 'x'.repeat(70_000) + '\n';
      const file = await index('quotes', `%\n${long}%\nshort\n%\n`);

      expect(file.spans).toEqual([
        { offset: 2, length: 70_001 },
        { offset: 70_005, length: 6 },
      ]);
      expect((await spanText(file))[1]).toBe('short\n');
    });

    it('returns no spans for an empty file', async () => {
      const file = await index('quotes', '');
      expect(file.spans).toEqual([]);
    });
  });

  describe('encoding', () => {
    it('defaults to plain without a marker', async () => {
      expect((await index('quotes', '%\nA\n%\n')).encoding).toBe('plain');
    });

    it('detects the rot13 marker', async () => {
      expect((await index('quotes', '% $SerrOFQ$\nN\n%\n')).encoding).toBe('rot13');
    });

    it('lets the first marker win', async () => {
      expect((await index('a', '% $FreeBSD$\nA\n% $SerrOFQ$\nB\n%\n')).encoding).toBe('plain');
      expect((await index('b', '% $SerrOFQ$\nA\n% $FreeBSD$\nB\n%\n')).encoding).toBe('rot13');
    });

    it('finds a marker anywhere in a line', async () => {
      const file = await index('quotes', 'Brought to you by $SerrOFQ$ today\n%\nN\n%\n');
      expect(file.encoding).toBe('rot13');
    });
  });

  describe('category', () => {
    it('marks files ending in -o as offensive', async () => {
      expect((await index('jokes-o', '%\nA\n%\n')).category).toBe('offensive');
      expect((await index('jokes', '%\nA\n%\n')).category).toBe('decorous');
    });

    it('only looks at the base name', () => {
      expect(categoryForPath('/data/extra-o/jokes')).toBe('decorous');
      expect(categoryForPath('/data/extra/a-o')).toBe('offensive');
      expect(categoryForPath('/data/extra/a-o.txt')).toBe('decorous');
    });
  });

  it('rejects when the file cannot be opened', async () => {
    await expect(indexQuoteFile('/nonexistent/qotd/quotes')).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});
