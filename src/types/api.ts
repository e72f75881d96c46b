/**
 * Yelp Fusion API Types
 * Yelp Fusion v3 API 回應類型定義
 */

export interface YelpCategory {
  alias: string;
  title: string;
}

export interface YelpCoordinates {
  latitude: number;
  longitude: number;
}

export interface YelpLocation {
  address1?: string | null;
  address2?: string | null;
  address3?: string | null;
  city?: string;
  zip_code?: string;
  country?: string;
  state?: string;
  display_address?: string[];
}

/**
 * 商家資料
 * API 可能回傳額外欄位，保留原樣不做轉換
 */
export interface YelpBusiness {
  id: string;
  alias?: string;
  name?: string;
  image_url?: string;
  is_closed?: boolean;
  url?: string;
  review_count?: number;
  categories?: YelpCategory[];
  rating?: number;
  coordinates?: YelpCoordinates;
  transactions?: string[];
  price?: string;
  location?: YelpLocation;
  phone?: string;
  display_phone?: string;
  distance?: number;
  [key: string]: unknown;
}

/**
 * 商家詳細資料
 */
export interface YelpBusinessDetails extends YelpBusiness {
  is_claimed?: boolean;
  photos?: string[];
  hours?: Array<{
    open: Array<{
      is_overnight: boolean;
      start: string;
      end: string;
      day: number;
    }>;
    hours_type: string;
    is_open_now: boolean;
  }>;
}

export interface YelpRegion {
  center: YelpCoordinates;
}

/**
 * 商家搜尋 API 回應（單頁或合併後）
 */
export interface SearchResponse {
  total: number;
  businesses: YelpBusiness[];
  region?: YelpRegion;
  [key: string]: unknown;
}

export interface YelpReview {
  id: string;
  rating: number;
  text: string;
  time_created: string;
  url?: string;
  user?: {
    id?: string;
    name: string;
    profile_url?: string;
    image_url?: string | null;
  };
  [key: string]: unknown;
}

/**
 * 商家評論 API 回應
 */
export interface ReviewsResponse {
  reviews: YelpReview[];
  total?: number;
  possible_languages?: string[];
  [key: string]: unknown;
}

/**
 * API 錯誤 payload
 * 例：{ "error": { "code": "BUSINESS_NOT_FOUND", "description": "..." } }
 */
export interface YelpErrorPayload {
  error: {
    code?: string;
    description?: string;
  };
}

export interface LookupOptions {
  locale?: string;
}
