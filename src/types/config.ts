/**
 * 設定檔結構
 */
export interface AppConfig {
  /** Yelp Fusion Client ID */
  clientId?: string;
  /** Yelp Fusion Client Secret */
  clientSecret?: string;
  /** 預設輸出格式 */
  format?: 'json' | 'table' | 'csv';
  /** 預設語系 (如 en_US, zh_TW) */
  locale?: string;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = ['clientId', 'clientSecret', 'format', 'locale'];
