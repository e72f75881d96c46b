/**
 * Search Command
 * 商家搜尋指令
 */

import { Command, InvalidArgumentError } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { runCommand } from '../lib/command-context.js';
import { getConfigService } from '../services/config.js';
import { renderBusinesses } from '../utils/output.js';
import type { SearchParameters, SortBy } from '../types/search.js';
import { SORT_BY_VALUES } from '../lib/search-params.js';

interface SearchCommandOptions {
  location?: string;
  latitude?: number;
  longitude?: number;
  radius?: number;
  categories?: string;
  locale?: string;
  limit?: number;
  offset?: number;
  sortBy?: SortBy;
  price?: string;
  openNow?: boolean;
  openAt?: number;
  attributes?: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('必須是非負整數');
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('必須是數字');
  }
  return parsed;
}

function parseSortBy(value: string): SortBy {
  const match = SORT_BY_VALUES.find((mode) => mode === value);
  if (!match) {
    throw new InvalidArgumentError(`可用值: ${SORT_BY_VALUES.join(', ')}`);
  }
  return match;
}

/**
 * 將指令列選項轉為搜尋條件
 */
export function toSearchParameters(
  terms: string[],
  options: SearchCommandOptions,
  defaultLocale?: string
): SearchParameters {
  const params: SearchParameters = {
    term: terms.length > 0 ? terms.join(' ') : undefined,
    location: options.location,
    latitude: options.latitude,
    longitude: options.longitude,
    radius: options.radius,
    categories: options.categories,
    locale: options.locale ?? defaultLocale,
    limit: options.limit,
    offset: options.offset,
    sort_by: options.sortBy,
    price: options.price,
    open_now: options.openNow,
    open_at: options.openAt,
    attributes: options.attributes,
  };
  return params;
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('商家搜尋（超過 50 筆自動分頁，最多 1000 筆）')
    .argument('[term...]', '搜尋關鍵字，如 coffee、"thai food"')
    .option('-l, --location <location>', '地址、城市或郵遞區號')
    .option('--latitude <lat>', '緯度（需搭配 --longitude）', parseNumber)
    .option('--longitude <lon>', '經度（需搭配 --latitude）', parseNumber)
    .option('-r, --radius <meters>', '搜尋半徑（公尺，最大 40000）', parseInteger)
    .option('-c, --categories <list>', '分類，以逗號分隔（如 bars,french）')
    .option('--locale <locale>', '語系（如 en_US）')
    .option('-n, --limit <count>', '取得筆數（超過 50 自動分頁）', parseInteger)
    .option('--offset <offset>', '起始位移', parseInteger)
    .option('-s, --sort-by <mode>', `排序: ${SORT_BY_VALUES.join(' | ')}`, parseSortBy)
    .option('-p, --price <levels>', '價位，以逗號分隔（1=$ ... 4=$$$$）')
    .option('--open-now', '只顯示營業中')
    .option('--open-at <unixTime>', '指定時間營業中（Unix 秒）', parseInteger)
    .option('-a, --attributes <list>', '屬性，以逗號分隔（如 hot_and_new,deals）')
    .action(async (terms: string[], options: SearchCommandOptions, cmd: Command) => {
      await runCommand(cmd, async (format) => {
        const params = toSearchParameters(terms, options, getConfigService().get('locale'));
        const result = await getApiClient().search(params);
        console.log(renderBusinesses(result.businesses, result.total, format));
      });
    });
}
