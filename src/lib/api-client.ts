/**
 * API Client Helper
 * 提供 CLI 指令共用的 YelpFusionClient 建立函數
 */

import { YelpFusionClient } from '../services/api.js';
import { getConfigService } from '../services/config.js';
import type { ConfigService } from '../services/config.js';
import { MissingCredentialsError } from './errors.js';

let cachedClient: YelpFusionClient | null = null;

/**
 * 取得 YelpFusionClient 實例
 * 同一個行程內共用，token 只需取得一次
 * @throws MissingCredentialsError 如果未設定 API 憑證
 */
export function getApiClient(config: ConfigService = getConfigService()): YelpFusionClient {
  if (cachedClient) {
    return cachedClient;
  }

  const clientId = config.getClientId();
  const clientSecret = config.getClientSecret();

  if (!clientId || !clientSecret) {
    throw new MissingCredentialsError(
      'Yelp API credentials are not configured: set YELP_CLIENT_ID and YELP_CLIENT_SECRET, ' +
        'or run `yelp config set clientId <id>` and `yelp config set clientSecret <secret>`'
    );
  }

  cachedClient = new YelpFusionClient(clientId, clientSecret);
  return cachedClient;
}

/**
 * 清除快取的 Client（用於測試）
 */
export function clearApiClientCache(): void {
  cachedClient = null;
}
