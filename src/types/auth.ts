/**
 * OAuth2 Token Response
 */
export interface TokenResponse {
  access_token: string;
  expires_in: number; // 秒
  token_type?: string;
}

/**
 * Cached Token with expiry
 */
export interface CachedToken {
  accessToken: string;
  expiresAt: number; // Unix timestamp (ms)
  /** 到期時間（美西時區，僅供記錄） */
  expiresAtPacific: string;
}
