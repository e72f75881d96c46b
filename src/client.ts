/**
 * Yelp Fusion Client - 函式庫進入點
 */

export { YelpFusionClient, API_BASE, REQUEST_TIMEOUT_MS } from './services/api.js';
export type { ClientOptions } from './services/api.js';
export { AuthService, TOKEN_ENDPOINT } from './services/auth.js';
export {
  YelpError,
  AuthenticationError,
  ApiError,
  ResponseFormatError,
  InvalidParameterError,
} from './lib/errors.js';
export type { YelpErrorCode } from './lib/errors.js';
export { paginate, MAX_PAGE_SIZE, MAX_RESULT_WINDOW } from './lib/paginator.js';
export type { PageRequest, Page, PaginateOptions, PaginateResult } from './lib/paginator.js';
export { validateSearchParameters, SEARCH_PARAMETER_NAMES } from './lib/search-params.js';
export { loggers, setLogLevel, StructuredLogger } from './lib/logger.js';
export type { LogLevel, LogContext, LogEntry } from './lib/logger.js';
export type { SearchParameters, SortBy } from './types/search.js';
export type {
  YelpBusiness,
  YelpBusinessDetails,
  YelpReview,
  SearchResponse,
  ReviewsResponse,
  LookupOptions,
} from './types/api.js';
