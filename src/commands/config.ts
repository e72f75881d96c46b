/**
 * Config Command
 * 設定檔管理指令
 */

import { Command } from 'commander';
import { getConfigService, isConfigKey, isOutputFormat } from '../services/config.js';
import { CONFIG_KEYS } from '../types/config.js';
import type { AppConfig, ConfigKey } from '../types/config.js';
import { InvalidParameterError } from '../lib/errors.js';
import { runCommand } from '../lib/command-context.js';
import { formatJSON } from '../utils/output.js';

const SECRET_KEYS: readonly ConfigKey[] = ['clientSecret'];

/**
 * 遮蔽機密值，只保留最後 4 碼
 */
export function maskSecret(value: string): string {
  if (value.length <= 4) {
    return '****';
  }
  return '*'.repeat(value.length - 4) + value.slice(-4);
}

function displayValue(key: ConfigKey, value: AppConfig[ConfigKey]): string | undefined {
  if (value === undefined) return undefined;
  return SECRET_KEYS.includes(key) ? maskSecret(value) : value;
}

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new InvalidParameterError(`unknown config key: ${key} (available: ${CONFIG_KEYS.join(', ')})`, key);
  }
  return key;
}

export function createConfigCommand(): Command {
  const setCommand = new Command('set')
    .description('設定值')
    .argument('<key>', `設定鍵: ${CONFIG_KEYS.join(' | ')}`)
    .argument('<value>', '設定值')
    .action(async (rawKey: string, value: string, _options: unknown, cmd: Command) => {
      await runCommand(cmd, async (format) => {
        const key = requireKey(rawKey);
        if (key === 'format' && !isOutputFormat(value)) {
          throw new InvalidParameterError('format must be one of: json, table, csv', key);
        }
        const config = getConfigService();
        config.set(key, value);

        if (format === 'json') {
          console.log(formatJSON({ success: true, key, value: displayValue(key, value) }));
        } else {
          console.log(`已設定 ${key}`);
        }
      });
    });

  const getCommand = new Command('get')
    .description('取得設定值')
    .argument('<key>', `設定鍵: ${CONFIG_KEYS.join(' | ')}`)
    .action(async (rawKey: string, _options: unknown, cmd: Command) => {
      await runCommand(cmd, async (format) => {
        const key = requireKey(rawKey);
        const value = displayValue(key, getConfigService().get(key));

        if (format === 'json') {
          console.log(formatJSON({ success: true, key, value: value ?? null }));
        } else {
          console.log(value ?? '(未設定)');
        }
      });
    });

  const unsetCommand = new Command('unset')
    .description('刪除設定值')
    .argument('<key>', `設定鍵: ${CONFIG_KEYS.join(' | ')}`)
    .action(async (rawKey: string, _options: unknown, cmd: Command) => {
      await runCommand(cmd, async (format) => {
        const key = requireKey(rawKey);
        getConfigService().delete(key);

        if (format === 'json') {
          console.log(formatJSON({ success: true, key }));
        } else {
          console.log(`已刪除 ${key}`);
        }
      });
    });

  const listCommand = new Command('list')
    .description('列出所有設定（機密值會遮蔽）')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, async (format) => {
        const config = getConfigService();
        const all = config.getAll();
        const entries = CONFIG_KEYS.map((key) => [key, displayValue(key, all[key]) ?? null] as const);

        if (format === 'json') {
          console.log(formatJSON({
            success: true,
            configPath: config.getConfigPath(),
            hasCredentials: config.hasCredentials(),
            config: Object.fromEntries(entries),
          }));
        } else {
          for (const [key, value] of entries) {
            console.log(`${key}: ${value ?? '(未設定)'}`);
          }
        }
      });
    });

  const pathCommand = new Command('path')
    .description('顯示設定檔路徑')
    .action(() => {
      console.log(getConfigService().getConfigPath());
    });

  return new Command('config')
    .description('設定管理（憑證也可用環境變數 YELP_CLIENT_ID / YELP_CLIENT_SECRET）')
    .addCommand(setCommand)
    .addCommand(getCommand)
    .addCommand(unsetCommand)
    .addCommand(listCommand)
    .addCommand(pathCommand);
}
