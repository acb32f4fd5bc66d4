/**
 * @hiresdl/api
 *
 * Signed catalog API client: session, request signing, secret validation,
 * authentication, pagination and byte transfer.
 */

export {
  CatalogSession,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  type SessionOptions,
} from './client.js';

export { signFileUrlRequest, unixTimestamp } from './signature.js';
export { paginate, PAGE_LIMIT, type PageShape } from './pagination.js';
export { downloadToFile, probeSize, type TransferOptions } from './transfer.js';

export type {
  CatalogApi,
  ByteTransfer,
  QueryParams,
  QueryValue,
} from './types.js';
