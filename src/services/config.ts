/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { CONFIG_KEYS } from '../types/config.js';
import type { AppConfig, ConfigKey } from '../types/config.js';
import { isRecord } from '../lib/guards.js';
import { loggers } from '../lib/logger.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'yelp-fusion');
const DEFAULT_CONFIG_FILE = 'config.json';

const OUTPUT_FORMATS: ReadonlyArray<NonNullable<AppConfig['format']>> = ['json', 'table', 'csv'];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

export function isOutputFormat(value: unknown): value is NonNullable<AppConfig['format']> {
  return typeof value === 'string' && OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * 只保留認得且型別正確的欄位
 */
function sanitize(raw: unknown): AppConfig {
  if (!isRecord(raw)) {
    return {};
  }
  const config: AppConfig = {};
  if (typeof raw.clientId === 'string') config.clientId = raw.clientId;
  if (typeof raw.clientSecret === 'string') config.clientSecret = raw.clientSecret;
  if (isOutputFormat(raw.format)) config.format = raw.format;
  if (typeof raw.locale === 'string') config.locale = raw.locale;
  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔
   * 讀取失敗或格式錯誤時使用空設定
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      return sanitize(JSON.parse(content));
    } catch (error) {
      loggers.cli.warn('Ignoring unreadable config file', {
        configPath: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    // 內含 client secret，只允許本人讀寫
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  clear(): void {
    this.config = {};
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得 Client ID（優先環境變數）
   */
  getClientId(): string | undefined {
    const envValue = process.env.YELP_CLIENT_ID;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.clientId;
  }

  /**
   * 取得 Client Secret（優先環境變數）
   */
  getClientSecret(): string | undefined {
    const envValue = process.env.YELP_CLIENT_SECRET;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.clientSecret;
  }

  hasCredentials(): boolean {
    return Boolean(this.getClientId() && this.getClientSecret());
  }
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService(process.env.YELP_CONFIG_PATH);
  }
  return defaultInstance;
}

/**
 * 清除預設實例（用於測試）
 */
export function resetConfigService(): void {
  defaultInstance = null;
}
