export { QuoteCorpus, EmptyCorpusError } from './corpus';
export type { QuoteCorpusOptions, QuoteSelection, CorpusFileInfo } from './corpus';
export { indexQuoteFile, categoryForPath } from './indexer';
export type { IndexedFile } from './indexer';
export { WeightedIndex } from './weighted-index';
export { rot13 } from './rot13';
