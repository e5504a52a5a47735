export { QotdServer } from './server';
export type { QotdServerOptions, ServerState } from './server';
export { QuoteBroker, BrokerUnavailableError, DEFAULT_BROKER_CAPACITY } from './broker';
export type { BrokerState } from './broker';
export { dropPrivileges, DEFAULT_USER } from './privileges';
export type { PrivilegeOps } from './privileges';
export { QuoteCorpus, EmptyCorpusError } from '../quotes';
export { fetchQuote } from '../client/qotd-client';
export type { FetchQuoteOptions, QotdProtocol } from '../client/qotd-client';
export * from '../types';
