/**
 * Search Parameter Types
 * 商家搜尋參數定義
 */

export type SortBy = 'best_match' | 'rating' | 'review_count' | 'distance';

/**
 * 商家搜尋條件
 * limit 為呼叫端想取得的「總筆數」，實際每頁最多 50 筆
 */
export interface SearchParameters {
  term?: string;
  location?: string;
  latitude?: number;
  longitude?: number;
  /** 搜尋半徑（公尺），上限 40000 */
  radius?: number;
  categories?: string | string[];
  locale?: string;
  limit?: number;
  offset?: number;
  sort_by?: SortBy;
  /** 1 = $, 2 = $$, 3 = $$$, 4 = $$$$ */
  price?: string | number | number[];
  open_now?: boolean;
  /** Unix 時間（秒），不可與 open_now 同時使用 */
  open_at?: number;
  attributes?: string | string[];
}

export type SearchParameterName = keyof SearchParameters;

/**
 * 單頁查詢的 query string 參數
 */
export type SearchQuery = Record<string, string | number>;
