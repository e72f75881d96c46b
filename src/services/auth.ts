/**
 * Auth Service
 * OAuth2 認證服務 - 處理 Yelp Fusion Access Token 取得與快取
 */

import { ofetch, FetchError } from 'ofetch';
import type { TokenResponse, CachedToken } from '../types/auth.js';
import { AuthenticationError } from '../lib/errors.js';
import { isRecord, isNonEmptyString, isFiniteNumber } from '../lib/guards.js';
import { loggers } from '../lib/logger.js';

export const TOKEN_ENDPOINT = 'https://api.yelp.com/oauth2/token';

// 單次請求最多等 30 秒（token 與資料請求共用）
export const REQUEST_TIMEOUT_MS = 30 * 1000;

// Yelp 的配額以美西時間計算，到期時間以同一時區記錄
const QUOTA_TIME_ZONE = 'America/Los_Angeles';

const pacificFormatter = new Intl.DateTimeFormat('en-US', {
  timeZone: QUOTA_TIME_ZONE,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  second: '2-digit',
  hourCycle: 'h23',
  timeZoneName: 'short',
});

export function formatPacificTime(epochMs: number): string {
  return pacificFormatter.format(new Date(epochMs));
}

export interface AuthServiceOptions {
  /** 時鐘（測試用） */
  now?: () => number;
}

export class AuthService {
  private clientId: string;
  private clientSecret: string;
  private now: () => number;
  private cachedToken: CachedToken | null = null;

  // 單一飛行請求：並發呼叫共用同一個 token 請求
  private inFlightTokenPromise: Promise<string> | null = null;

  constructor(clientId: string, clientSecret: string, options: AuthServiceOptions = {}) {
    this.clientId = clientId;
    this.clientSecret = clientSecret;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * 取得有效的 Access Token
   * - 快取有效：直接返回
   * - 有請求進行中：等待進行中的請求
   * - 快取無效：發起新請求並保存 Promise
   */
  async getToken(): Promise<string> {
    const cached = this.getValidToken();
    if (cached) {
      return cached.accessToken;
    }

    if (this.inFlightTokenPromise) {
      return this.inFlightTokenPromise;
    }

    this.inFlightTokenPromise = this.refreshToken();

    try {
      return await this.inFlightTokenPromise;
    } finally {
      this.inFlightTokenPromise = null;
    }
  }

  /**
   * 檢查快取的 token 是否有效（嚴格早於到期時間）
   */
  isTokenValid(): boolean {
    return this.getValidToken() !== null;
  }

  /**
   * 取得目前持有的 token 資訊（不觸發更新）
   */
  getCachedToken(): CachedToken | null {
    return this.cachedToken ? { ...this.cachedToken } : null;
  }

  /**
   * 清除快取的 token
   * 不中斷飛行中的請求
   */
  clearCache(): void {
    this.cachedToken = null;
  }

  hasInflightRequest(): boolean {
    return this.inFlightTokenPromise !== null;
  }

  private getValidToken(): CachedToken | null {
    if (!this.cachedToken) {
      return null;
    }
    return this.now() < this.cachedToken.expiresAt ? this.cachedToken : null;
  }

  private async refreshToken(): Promise<string> {
    const response = await this.requestToken();

    const issuedAt = this.now();
    const expiresAt = issuedAt + response.expires_in * 1000;

    // 整個替換，不修改舊物件
    this.cachedToken = {
      accessToken: response.access_token,
      expiresAt,
      expiresAtPacific: formatPacificTime(expiresAt),
    };

    loggers.auth.info('Access token refreshed', {
      expiresIn: response.expires_in,
      expiresAtPacific: this.cachedToken.expiresAtPacific,
    });

    return this.cachedToken.accessToken;
  }

  /**
   * 請求新的 token
   */
  private async requestToken(): Promise<TokenResponse> {
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.clientId,
      client_secret: this.clientSecret,
    }).toString();

    let response: unknown;
    try {
      response = await ofetch<unknown>(TOKEN_ENDPOINT, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body,
        timeout: REQUEST_TIMEOUT_MS,
      });
    } catch (error) {
      const statusCode = error instanceof FetchError ? error.statusCode : undefined;
      const reason = error instanceof Error ? error.message : String(error);
      loggers.auth.error(
        'Token request failed',
        error instanceof Error ? error : null,
        { url: TOKEN_ENDPOINT, method: 'POST', statusCode }
      );
      throw new AuthenticationError(
        statusCode !== undefined
          ? `Token request rejected with status ${statusCode}`
          : `Token request failed: ${reason}`,
        statusCode,
        { cause: error }
      );
    }

    if (!isTokenResponse(response)) {
      loggers.auth.error('Malformed token response', null, { url: TOKEN_ENDPOINT });
      throw new AuthenticationError('Token response is missing access_token or expires_in');
    }

    return response;
  }
}

function isTokenResponse(value: unknown): value is TokenResponse {
  return (
    isRecord(value) &&
    isNonEmptyString(value.access_token) &&
    isFiniteNumber(value.expires_in)
  );
}
