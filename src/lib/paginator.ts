/**
 * Paginator
 * 商家搜尋分頁迴圈 - 依序抓取多頁結果直到滿足筆數或資料用盡
 */

import { InvalidParameterError } from './errors.js';

/** 單次請求的筆數上限 */
export const MAX_PAGE_SIZE = 50;

/** API 可回傳的結果範圍上限（offset + limit 不得超過） */
export const MAX_RESULT_WINDOW = 1000;

export interface PageRequest {
  limit: number;
  offset: number;
}

export interface Page<T> {
  items: T[];
}

export interface PaginateOptions {
  /** 想取得的總筆數（> 0） */
  requested: number;
  /** 起始 offset，須小於 resultWindow (default: 0) */
  offset?: number;
  pageSize?: number;
  resultWindow?: number;
}

export interface PaginateResult<T, P extends Page<T>> {
  items: T[];
  /** 最後一頁的原始回應 */
  lastPage: P;
  /** 實際發出的請求數 */
  requests: number;
}

/**
 * 依序抓取分頁
 *
 * 每頁請求 min(pageSize, 剩餘筆數, 剩餘視窗) 筆；
 * 以下任一條件成立即停止：
 * - 已收集筆數 >= requested
 * - 某頁回傳筆數少於請求筆數（資料用盡）
 * - 下一頁 offset 已達 resultWindow
 *
 * 任何一頁失敗都直接拋出，已收集的結果捨棄。
 * 起始 offset 已達 resultWindow 時不發出請求，直接拋出 InvalidParameterError。
 */
export async function paginate<T, P extends Page<T>>(
  fetchPage: (request: PageRequest) => Promise<P>,
  options: PaginateOptions
): Promise<PaginateResult<T, P>> {
  const {
    requested,
    offset: startOffset = 0,
    pageSize = MAX_PAGE_SIZE,
    resultWindow = MAX_RESULT_WINDOW,
  } = options;

  if (startOffset >= resultWindow) {
    throw new InvalidParameterError(`offset must be below ${resultWindow}`, 'offset');
  }

  const collected: T[] = [];
  let requests = 0;

  for (;;) {
    const offset = startOffset + collected.length;
    const limit = Math.min(pageSize, requested - collected.length, resultWindow - offset);

    const page = await fetchPage({ limit, offset });
    requests += 1;
    collected.push(...page.items);

    const nextOffset = startOffset + collected.length;
    const exhausted = page.items.length < limit;

    if (collected.length >= requested || exhausted || nextOffset >= resultWindow) {
      return {
        items: collected.slice(0, requested),
        lastPage: page,
        requests,
      };
    }
  }
}
