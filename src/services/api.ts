/**
 * Yelp Fusion API Client
 * Yelp Fusion v3 API 客戶端 - 商家搜尋（自動分頁）、商家詳細資料、商家評論
 */

import { ofetch, FetchError } from 'ofetch';
import { AuthService, REQUEST_TIMEOUT_MS } from './auth.js';
import type { AuthServiceOptions } from './auth.js';
import { loggers } from '../lib/logger.js';
import { paginate, MAX_RESULT_WINDOW } from '../lib/paginator.js';
import type { Page } from '../lib/paginator.js';
import { validateSearchParameters, toSearchQuery } from '../lib/search-params.js';
import { ApiError, InvalidParameterError, ResponseFormatError } from '../lib/errors.js';
import { isRecord } from '../lib/guards.js';
import type { SearchParameters, SearchQuery } from '../types/search.js';
import type {
  YelpBusiness,
  YelpBusinessDetails,
  SearchResponse,
  ReviewsResponse,
  LookupOptions,
} from '../types/api.js';

export const API_BASE = 'https://api.yelp.com/v3';

export { REQUEST_TIMEOUT_MS };

export type ClientOptions = AuthServiceOptions;

interface SearchPage extends Page<YelpBusiness> {
  response: SearchResponse;
}

export class YelpFusionClient {
  private auth: AuthService;

  constructor(clientId: string, clientSecret: string, options: ClientOptions = {}) {
    if (!clientId || !clientSecret) {
      throw new InvalidParameterError('clientId and clientSecret are required');
    }
    // 建構時不發出任何請求，第一次查詢才取得 token
    this.auth = new AuthService(clientId, clientSecret, options);
  }

  /**
   * 商家搜尋
   * limit 為想取得的總筆數；超過 50 筆時自動分頁，最多到 API 的 1000 筆範圍
   * limit 未指定或為 0 時只發一次請求，由 API 決定筆數
   */
  async search(input: SearchParameters): Promise<SearchResponse> {
    const params = validateSearchParameters(input);
    const requested = params.limit ?? 0;
    const startOffset = params.offset ?? 0;

    if (startOffset >= MAX_RESULT_WINDOW) {
      throw new InvalidParameterError(`offset must be below ${MAX_RESULT_WINDOW}`, 'offset');
    }

    const baseQuery = toSearchQuery(params);

    return loggers.api.trackAsync('Business search', async () => {
      if (requested === 0) {
        const query: SearchQuery = params.offset !== undefined
          ? { ...baseQuery, offset: startOffset }
          : baseQuery;
        return this.fetchSearchPage(query);
      }

      const result = await paginate<YelpBusiness, SearchPage>(
        async ({ limit, offset }) => {
          const response = await this.fetchSearchPage({ ...baseQuery, limit, offset });
          return { items: response.businesses, response };
        },
        { requested, offset: startOffset }
      );

      loggers.api.debug('Search pagination finished', {
        requested,
        collected: result.items.length,
        requests: result.requests,
      });

      // total / region 以最後一頁為準
      return {
        ...result.lastPage.response,
        businesses: result.items,
      };
    }, { requested });
  }

  /**
   * 取得商家詳細資料
   */
  async getBusinessDetails(businessId: string, options: LookupOptions = {}): Promise<YelpBusinessDetails> {
    const path = `/businesses/${encodeBusinessId(businessId)}`;

    return loggers.api.trackAsync('Business details', async () => {
      const body = await this.request(path, localeQuery(options));
      if (!isBusinessDetails(body)) {
        throw new ResponseFormatError('Business details response has no id', API_BASE + path);
      }
      return body;
    }, { businessId });
  }

  /**
   * 取得商家評論
   */
  async getBusinessReviews(businessId: string, options: LookupOptions = {}): Promise<ReviewsResponse> {
    const path = `/businesses/${encodeBusinessId(businessId)}/reviews`;

    return loggers.api.trackAsync('Business reviews', async () => {
      const body = await this.request(path, localeQuery(options));
      if (!isReviewsResponse(body)) {
        throw new ResponseFormatError('Reviews response has no reviews array', API_BASE + path);
      }
      return body;
    }, { businessId });
  }

  /**
   * 取得內部的認證服務（用於測試與除錯）
   */
  getAuthService(): AuthService {
    return this.auth;
  }

  private async fetchSearchPage(query: SearchQuery): Promise<SearchResponse> {
    const path = '/businesses/search';
    const body = await this.request(path, query);
    if (!isSearchResponse(body)) {
      throw new ResponseFormatError('Search response has no businesses array or total', API_BASE + path);
    }
    return body;
  }

  /**
   * 發送帶認證的 GET 請求，回傳解析後的 JSON 物件
   * 不重試：任何錯誤都直接交給呼叫端
   */
  private async request(path: string, query?: SearchQuery): Promise<Record<string, unknown>> {
    const url = API_BASE + path;
    const startTime = Date.now();

    // token 失敗時直接拋出 AuthenticationError，不會發出資料請求
    const token = await this.auth.getToken();

    loggers.api.debug('API request started', { method: 'GET', url, query });

    let body: unknown;
    try {
      body = await ofetch<unknown>(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${token}`,
        },
        query,
        retry: 0,
        timeout: REQUEST_TIMEOUT_MS,
      });
    } catch (error) {
      const mapped = toRequestError(error, url);

      loggers.api.error(
        'API request failed',
        mapped instanceof Error ? mapped : new Error(String(mapped)),
        {
          method: 'GET',
          url,
          duration: Date.now() - startTime,
          statusCode: mapped instanceof ApiError ? mapped.statusCode : undefined,
        }
      );

      throw mapped;
    }

    // 非 JSON 內容會被解析成字串
    if (!isRecord(body)) {
      const error = new ResponseFormatError(`Expected a JSON object from ${url}`, url);
      loggers.api.error('API response malformed', error, { method: 'GET', url });
      throw error;
    }

    loggers.api.info('API request completed', {
      method: 'GET',
      url,
      duration: Date.now() - startTime,
      statusCode: 200,
    });

    return body;
  }
}

/**
 * 將 ofetch 錯誤轉為用戶端錯誤
 * - 有 HTTP 狀態碼 → ApiError（附上 API 的 error.code / error.description）
 * - JSON 解析失敗 → ResponseFormatError
 * - 其他（網路錯誤、逾時）原樣拋出
 */
export function toRequestError(error: unknown, url: string): unknown {
  if (error instanceof FetchError) {
    const status = error.statusCode ?? error.status;
    if (typeof status === 'number') {
      const data: unknown = error.data;
      const detail = isRecord(data) && isRecord(data.error) ? data.error : undefined;
      return new ApiError(
        status,
        typeof detail?.code === 'string' ? detail.code : undefined,
        typeof detail?.description === 'string' ? detail.description : undefined,
        { cause: error }
      );
    }
    return error;
  }

  if (error instanceof SyntaxError) {
    return new ResponseFormatError(`Response from ${url} is not valid JSON`, url, { cause: error });
  }

  return error;
}

function encodeBusinessId(businessId: string): string {
  if (typeof businessId !== 'string' || businessId.trim().length === 0) {
    throw new InvalidParameterError('business id is required', 'id');
  }
  return encodeURIComponent(businessId);
}

function localeQuery(options: LookupOptions): SearchQuery | undefined {
  return options.locale ? { locale: options.locale } : undefined;
}

function isSearchResponse(value: unknown): value is SearchResponse {
  return (
    isRecord(value) &&
    typeof value.total === 'number' &&
    Array.isArray(value.businesses) &&
    value.businesses.every((business) => isRecord(business) && typeof business.id === 'string')
  );
}

function isBusinessDetails(value: Record<string, unknown>): value is YelpBusinessDetails {
  return typeof value.id === 'string';
}

function isReviewsResponse(value: Record<string, unknown>): value is ReviewsResponse {
  return Array.isArray(value.reviews) && value.reviews.every(isRecord);
}
