/**
 * Output Formatter Module
 * 輸出格式化模組 - 支援 JSON、Table、CSV 格式
 */

import type { YelpBusiness } from '../types/api.js';
import { errorCodeOf, errorMessageOf } from '../lib/errors.js';

export type OutputFormat = 'json' | 'table' | 'csv';

/**
 * 欄位定義
 */
export interface ColumnDef<T> {
  key: keyof T & string;
  label: string;
  align?: 'left' | 'right';
  /** 表格中最大寬度（超過會截斷），CSV 不受影響 */
  maxWidth?: number;
}

/**
 * 搜尋結果的扁平化列
 */
export interface BusinessRow {
  id: string;
  name: string;
  rating: string;
  reviews: string;
  price: string;
  phone: string;
  address: string;
}

export const BUSINESS_COLUMNS: ColumnDef<BusinessRow>[] = [
  { key: 'name', label: 'Name', maxWidth: 32 },
  { key: 'rating', label: 'Rating', align: 'right' },
  { key: 'reviews', label: 'Reviews', align: 'right' },
  { key: 'price', label: 'Price' },
  { key: 'phone', label: 'Phone' },
  { key: 'address', label: 'Address', maxWidth: 48 },
  { key: 'id', label: 'ID' },
];

/**
 * 計算字串顯示寬度（全形字元佔 2 格）
 */
export function getDisplayWidth(str: string): number {
  let width = 0;
  for (const char of str) {
    const code = char.codePointAt(0) ?? 0;
    width += isWide(code) ? 2 : 1;
  }
  return width;
}

function isWide(code: number): boolean {
  return (
    (code >= 0x1100 && code <= 0x115f) || // Hangul Jamo
    (code >= 0x2e80 && code <= 0xa4cf) || // CJK ... Yi
    (code >= 0xac00 && code <= 0xd7a3) || // Hangul Syllables
    (code >= 0xf900 && code <= 0xfaff) || // CJK Compatibility Ideographs
    (code >= 0xff00 && code <= 0xff60) || // Fullwidth Forms
    (code >= 0xffe0 && code <= 0xffe6)
  );
}

export function padString(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  const padding = Math.max(0, width - getDisplayWidth(str));
  return align === 'right' ? ' '.repeat(padding) + str : str + ' '.repeat(padding);
}

/**
 * 截斷字串到指定寬度（結尾加上 …）
 */
export function truncateString(str: string, maxWidth: number): string {
  if (getDisplayWidth(str) <= maxWidth) return str;

  let width = 0;
  let result = '';
  for (const char of str) {
    const charWidth = getDisplayWidth(char);
    if (width + charWidth + 1 > maxWidth) {
      break;
    }
    result += char;
    width += charWidth;
  }
  return result + '…';
}

export function toBusinessRow(business: YelpBusiness): BusinessRow {
  const address = business.location?.display_address?.join(', ') ?? '';
  return {
    id: business.id,
    name: business.name ?? '',
    rating: business.rating !== undefined ? business.rating.toFixed(1) : '',
    reviews: business.review_count !== undefined ? String(business.review_count) : '',
    price: business.price ?? '',
    phone: business.display_phone || business.phone || '',
    address,
  };
}

/**
 * 格式化表格（無邊框、以兩個空白分隔）
 */
export function formatTable<T>(rows: T[], columns: ColumnDef<T>[]): string {
  if (rows.length === 0) {
    return '';
  }

  const cell = (row: T, col: ColumnDef<T>): string => {
    const value = String(row[col.key] ?? '');
    return col.maxWidth !== undefined ? truncateString(value, col.maxWidth) : value;
  };

  const widths = columns.map((col) =>
    Math.max(getDisplayWidth(col.label), ...rows.map((row) => getDisplayWidth(cell(row, col))))
  );

  const renderLine = (cells: string[]): string =>
    cells.map((value, i) => padString(value, widths[i], columns[i].align)).join('  ').trimEnd();

  const lines = [
    renderLine(columns.map((col) => col.label)),
    widths.map((w) => '─'.repeat(w)).join('  '),
    ...rows.map((row) => renderLine(columns.map((col) => cell(row, col)))),
  ];

  return lines.join('\n');
}

function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * 格式化 CSV（第一列為欄位名稱）
 */
export function formatCSV<T>(rows: T[], columns: ColumnDef<T>[]): string {
  const lines = [columns.map((col) => escapeCSV(col.label)).join(',')];
  for (const row of rows) {
    lines.push(columns.map((col) => escapeCSV(String(row[col.key] ?? ''))).join(','));
  }
  return lines.join('\n');
}

export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * 輸出搜尋結果
 */
export function renderBusinesses(
  businesses: YelpBusiness[],
  total: number,
  format: OutputFormat
): string {
  const rows = businesses.map(toBusinessRow);
  switch (format) {
    case 'table':
      return rows.length === 0
        ? 'No businesses found'
        : `${formatTable(rows, BUSINESS_COLUMNS)}\n\nShowing ${rows.length} of ${total}`;
    case 'csv':
      return formatCSV(rows, BUSINESS_COLUMNS);
    case 'json':
    default:
      return formatJSON({ success: true, total, count: businesses.length, businesses });
  }
}

/**
 * 錯誤輸出（JSON 模式下輸出到 stdout 以便程式解析）
 */
export function renderError(error: unknown, format: OutputFormat): string {
  if (format === 'json') {
    return formatJSON({
      success: false,
      error: {
        code: errorCodeOf(error),
        message: errorMessageOf(error),
      },
    }, false);
  }
  return `Error: ${errorMessageOf(error)}`;
}

export function parseOutputFormat(value: unknown, fallback: OutputFormat = 'json'): OutputFormat {
  return value === 'json' || value === 'table' || value === 'csv' ? value : fallback;
}
