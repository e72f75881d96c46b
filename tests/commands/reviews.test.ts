/**
 * Reviews Command Tests
 * 商家評論指令測試
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// Mock ofetch with FetchError
vi.mock('ofetch', () => {
  class FetchError extends Error {
    statusCode?: number;
    status?: number;
    data?: unknown;

    constructor(message: string) {
      super(message);
      this.name = 'FetchError';
    }
  }

  return {
    ofetch: vi.fn(),
    FetchError,
  };
});

import { ofetch } from 'ofetch';
import { toReviewRow } from '../../src/commands/reviews.js';
import { API_BASE } from '../../src/services/api.js';
import { tokenResponse } from '../helpers/yelp-fixtures.js';
import { setupCli } from '../helpers/cli-harness.js';
import type { CliHarness } from '../helpers/cli-harness.js';
import type { ReviewsResponse, YelpReview } from '../../src/types/api.js';

const review: YelpReview = {
  id: 'review-1',
  rating: 5,
  text: 'Great  coffee\nand pastries.',
  time_created: '2024-05-01 12:34:56',
  user: { name: 'Alex' },
};

const response: ReviewsResponse = {
  reviews: [review],
  total: 1,
  possible_languages: ['en'],
};

describe('toReviewRow', () => {
  it('should render stars, date and collapsed text', () => {
    expect(toReviewRow(review)).toEqual({
      rating: '★★★★★',
      user: 'Alex',
      date: '2024-05-01',
      text: 'Great coffee and pastries.',
    });
  });

  it('should leave the user empty when absent', () => {
    expect(toReviewRow({ ...review, user: undefined, rating: 3 })).toMatchObject({
      rating: '★★★',
      user: '',
    });
  });
});

describe('reviews command', () => {
  let cli: CliHarness;

  beforeEach(() => {
    vi.clearAllMocks();
    cli = setupCli();
  });

  afterEach(() => {
    cli.cleanup();
  });

  it('should print the reviews response as JSON', async () => {
    vi.mocked(ofetch)
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(response);

    const output = await cli.run('reviews', 'café-paris');

    expect(JSON.parse(output)).toEqual({ success: true, ...response });
    expect(ofetch).toHaveBeenLastCalledWith(
      `${API_BASE}/businesses/caf%C3%A9-paris/reviews`,
      expect.objectContaining({ method: 'GET' })
    );
  });

  it('should print CSV rows', async () => {
    vi.mocked(ofetch)
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(response);

    const output = await cli.run('-f', 'csv', 'reviews', 'blue-cafe-sf');

    expect(output).toBe('Rating,User,Date,Text\n★★★★★,Alex,2024-05-01,Great coffee and pastries.');
  });

  it('should report no reviews in table mode', async () => {
    vi.mocked(ofetch)
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce({ reviews: [], total: 0 });

    const output = await cli.run('-f', 'table', 'reviews', 'quiet-place');

    expect(output).toBe('No reviews');
  });

  it('should report a malformed response', async () => {
    vi.mocked(ofetch)
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce({ total: 0 });

    const output = await cli.run('reviews', 'blue-cafe-sf');

    expect(JSON.parse(output).error).toEqual({
      code: 'RESPONSE_FORMAT_ERROR',
      message: 'Reviews response has no reviews array',
    });
    expect(process.exitCode).toBe(1);
  });
});
