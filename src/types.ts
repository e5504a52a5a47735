export type QuoteCategory = 'decorous' | 'offensive';

export type FileEncoding = 'plain' | 'rot13';

/** Category selector accepted on the command line. */
export type AllowedCategories = 'decorous' | 'offensive' | 'all';

export const ALLOWED_CATEGORIES = ['decorous', 'offensive', 'all'] as const satisfies readonly AllowedCategories[];

/** Quote categories admitted into the corpus for each selector. */
export const CATEGORY_SETS: Record<AllowedCategories, readonly QuoteCategory[]> = {
  decorous: ['decorous'],
  offensive: ['offensive'],
  all: ['decorous', 'offensive'],
};

/** Byte range of one quote inside its source file, delimiter lines excluded. */
export interface QuoteSpan {
  offset: number;
  length: number;
}

/** Anything able to produce one random quote. The corpus is the real one. */
export interface QuoteSource {
  randomQuote(): Promise<Buffer>;
}

// --- Quote file format ---

/** Lines starting with this character separate quotes. */
export const QUOTE_DELIMITER = '%';
/** "$FreeBSD$" rot13-encoded; marks a file whose letters are rot13-encoded. */
export const ROT13_MARKER = '$SerrOFQ$';
export const PLAIN_MARKER = '$FreeBSD$';
/** File name suffix of offensive quote files. */
export const OFFENSIVE_SUFFIX = '-o';

// --- Wire protocol ---

/** Well-known Quote of the Day port (RFC 865). */
export const DEFAULT_PORT = 17;
export const DEFAULT_HOST = '127.0.0.1';
/** Quotes sent over UDP must be strictly shorter than this many bytes. */
export const MAX_UDP_QUOTE_BYTES = 512;
