/**
 * Error Types
 * Yelp Fusion 用戶端錯誤分類
 */

export type YelpErrorCode =
  | 'AUTH_ERROR'
  | 'API_ERROR'
  | 'RESPONSE_FORMAT_ERROR'
  | 'INVALID_PARAMETER';

/**
 * 所有用戶端錯誤的基底類別
 */
export class YelpError extends Error {
  public readonly code: YelpErrorCode;

  constructor(code: YelpErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'YelpError';
    this.code = code;
  }
}

/**
 * Token 交換失敗（非 2xx、網路錯誤或回應缺少欄位）
 */
export class AuthenticationError extends YelpError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super('AUTH_ERROR', message, options);
    this.name = 'AuthenticationError';
    this.statusCode = statusCode;
  }
}

/**
 * 資料查詢回傳非 2xx
 */
export class ApiError extends YelpError {
  public readonly statusCode: number;
  /** API 回傳的錯誤代碼，如 BUSINESS_NOT_FOUND */
  public readonly apiCode?: string;
  public readonly description?: string;

  constructor(
    statusCode: number,
    apiCode?: string,
    description?: string,
    options?: { cause?: unknown }
  ) {
    const detail = apiCode
      ? `${apiCode}${description ? `: ${description}` : ''}`
      : description ?? 'request failed';
    super('API_ERROR', `Yelp API error ${statusCode} (${detail})`, options);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.apiCode = apiCode;
    this.description = description;
  }
}

/**
 * 回應內容不是預期的 JSON 結構
 */
export class ResponseFormatError extends YelpError {
  public readonly url?: string;

  constructor(message: string, url?: string, options?: { cause?: unknown }) {
    super('RESPONSE_FORMAT_ERROR', message, options);
    this.name = 'ResponseFormatError';
    this.url = url;
  }
}

/**
 * 呼叫端傳入的參數不合法（在發出任何請求前拋出）
 */
export class InvalidParameterError extends YelpError {
  public readonly parameter?: string;

  constructor(message: string, parameter?: string) {
    super('INVALID_PARAMETER', message);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
  }
}

/**
 * CLI 找不到憑證（環境變數與設定檔皆未設定）
 */
export class MissingCredentialsError extends Error {
  public readonly code = 'MISSING_CREDENTIALS';

  constructor(message = 'Yelp API credentials are not configured') {
    super(message);
    this.name = 'MissingCredentialsError';
  }
}

export function isYelpError(error: unknown): error is YelpError {
  return error instanceof YelpError;
}

/**
 * 將任意錯誤轉為 CLI 輸出用的錯誤碼
 */
export function errorCodeOf(error: unknown): string {
  if (isYelpError(error) || error instanceof MissingCredentialsError) {
    return error.code;
  }
  return 'UNKNOWN_ERROR';
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
