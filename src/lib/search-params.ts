/**
 * Search Parameters
 * 商家搜尋參數驗證與 query string 轉換
 */

import type { SearchParameters, SearchParameterName, SearchQuery, SortBy } from '../types/search.js';
import { InvalidParameterError } from './errors.js';
import { isRecord } from './guards.js';

export const SEARCH_PARAMETER_NAMES: readonly SearchParameterName[] = [
  'term',
  'location',
  'latitude',
  'longitude',
  'radius',
  'categories',
  'locale',
  'limit',
  'offset',
  'sort_by',
  'price',
  'open_now',
  'open_at',
  'attributes',
];

export const SORT_BY_VALUES: readonly SortBy[] = ['best_match', 'rating', 'review_count', 'distance'];

/** 搜尋半徑上限（公尺） */
export const MAX_RADIUS = 40000;

function isParameterName(key: string): key is SearchParameterName {
  return SEARCH_PARAMETER_NAMES.some((name) => name === key);
}

function isSortBy(value: unknown): value is SortBy {
  return typeof value === 'string' && SORT_BY_VALUES.some((mode) => mode === value);
}

function expectString(name: SearchParameterName, value: unknown): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(`${name} must be a string`, name);
  }
  return value;
}

function expectInteger(name: SearchParameterName, value: unknown, min: number, max?: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || (max !== undefined && value > max)) {
    const range = max !== undefined ? `between ${min} and ${max}` : `>= ${min}`;
    throw new InvalidParameterError(`${name} must be an integer ${range}`, name);
  }
  return value;
}

function expectCoordinate(name: 'latitude' | 'longitude', value: unknown): number {
  const bound = name === 'latitude' ? 90 : 180;
  if (typeof value !== 'number' || !Number.isFinite(value) || Math.abs(value) > bound) {
    throw new InvalidParameterError(`${name} must be a number between -${bound} and ${bound}`, name);
  }
  return value;
}

/**
 * 字串或字串陣列（陣列會以逗號串接）
 */
function expectList(name: SearchParameterName, value: unknown): string | string[] {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && value.length > 0 && value.every((item) => typeof item === 'string' && item.length > 0)) {
    return value.map(String);
  }
  throw new InvalidParameterError(`${name} must be a string or a non-empty list of strings`, name);
}

function expectPrice(value: unknown): string | number | number[] {
  const isLevel = (item: unknown): item is number =>
    typeof item === 'number' && Number.isInteger(item) && item >= 1 && item <= 4;

  if (typeof value === 'string' || isLevel(value)) {
    return value;
  }
  if (Array.isArray(value) && value.length > 0 && value.every(isLevel)) {
    return value.map(Number);
  }
  throw new InvalidParameterError('price must be a level from 1 to 4, a list of levels, or a string', 'price');
}

/**
 * 驗證搜尋條件
 * 不認得的鍵、型別錯誤與互斥條件都在發出請求前拒絕
 */
export function validateSearchParameters(input: unknown): SearchParameters {
  if (!isRecord(input)) {
    throw new InvalidParameterError('search parameters must be an object');
  }

  const params: SearchParameters = {};

  for (const [key, value] of Object.entries(input)) {
    if (!isParameterName(key)) {
      throw new InvalidParameterError(`unrecognized search parameter: ${key}`, key);
    }
    if (value === undefined) {
      continue;
    }

    switch (key) {
      case 'term':
      case 'location':
      case 'locale':
        params[key] = expectString(key, value);
        break;
      case 'latitude':
      case 'longitude':
        params[key] = expectCoordinate(key, value);
        break;
      case 'radius':
        params.radius = expectInteger(key, value, 0, MAX_RADIUS);
        break;
      case 'limit':
      case 'offset':
        params[key] = expectInteger(key, value, 0);
        break;
      case 'open_at':
        params.open_at = expectInteger(key, value, 0);
        break;
      case 'categories':
      case 'attributes':
        params[key] = expectList(key, value);
        break;
      case 'price':
        params.price = expectPrice(value);
        break;
      case 'sort_by':
        if (!isSortBy(value)) {
          throw new InvalidParameterError(`sort_by must be one of: ${SORT_BY_VALUES.join(', ')}`, key);
        }
        params.sort_by = value;
        break;
      case 'open_now':
        if (typeof value !== 'boolean') {
          throw new InvalidParameterError('open_now must be a boolean', key);
        }
        params.open_now = value;
        break;
    }
  }

  const hasLatitude = params.latitude !== undefined;
  const hasLongitude = params.longitude !== undefined;
  if (hasLatitude !== hasLongitude) {
    throw new InvalidParameterError('latitude and longitude must be given together', hasLatitude ? 'longitude' : 'latitude');
  }
  if (params.open_now === true && params.open_at !== undefined) {
    throw new InvalidParameterError('open_now and open_at cannot be used together', 'open_at');
  }

  return params;
}

function joinList(value: string | number | Array<string | number>): string | number {
  return Array.isArray(value) ? value.join(',') : value;
}

/**
 * 轉為 query string 參數（不含 limit/offset，由分頁迴圈決定）
 */
export function toSearchQuery(params: SearchParameters): SearchQuery {
  const query: SearchQuery = {};

  if (params.term !== undefined) query.term = params.term;
  if (params.location !== undefined) query.location = params.location;
  if (params.latitude !== undefined) query.latitude = params.latitude;
  if (params.longitude !== undefined) query.longitude = params.longitude;
  if (params.radius !== undefined) query.radius = params.radius;
  if (params.categories !== undefined) query.categories = joinList(params.categories);
  if (params.locale !== undefined) query.locale = params.locale;
  if (params.sort_by !== undefined) query.sort_by = params.sort_by;
  if (params.price !== undefined) query.price = joinList(params.price);
  if (params.open_now === true) query.open_now = 'true';
  if (params.open_at !== undefined) query.open_at = params.open_at;
  if (params.attributes !== undefined) query.attributes = joinList(params.attributes);

  return query;
}
