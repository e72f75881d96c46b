/**
 * Reviews Command
 * 商家評論查詢指令
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { getApiClient } from '../lib/api-client.js';
import { runCommand } from '../lib/command-context.js';
import { getConfigService } from '../services/config.js';
import { formatCSV, formatJSON } from '../utils/output.js';
import type { ColumnDef } from '../utils/output.js';
import type { YelpReview } from '../types/api.js';

interface ReviewRow {
  rating: string;
  user: string;
  date: string;
  text: string;
}

const REVIEW_COLUMNS: ColumnDef<ReviewRow>[] = [
  { key: 'rating', label: 'Rating' },
  { key: 'user', label: 'User' },
  { key: 'date', label: 'Date' },
  { key: 'text', label: 'Text' },
];

export function toReviewRow(review: YelpReview): ReviewRow {
  return {
    rating: '★'.repeat(Math.round(review.rating)),
    user: review.user?.name ?? '',
    // time_created 格式: "2024-05-01 12:34:56"
    date: review.time_created.slice(0, 10),
    text: review.text.replace(/\s+/g, ' ').trim(),
  };
}

export function createReviewsCommand(): Command {
  return new Command('reviews')
    .description('商家評論（API 最多回傳 3 則）')
    .argument('<id>', '商家 ID 或 alias')
    .option('--locale <locale>', '評論語系（如 en_US）')
    .action(async (id: string, options: { locale?: string }, cmd: Command) => {
      await runCommand(cmd, async (format) => {
        const locale = options.locale ?? getConfigService().get('locale');
        const response = await getApiClient().getBusinessReviews(id, { locale });

        if (format === 'json') {
          console.log(formatJSON({ success: true, ...response }));
          return;
        }

        const rows = response.reviews.map(toReviewRow);
        if (format === 'csv') {
          console.log(formatCSV(rows, REVIEW_COLUMNS));
          return;
        }

        if (rows.length === 0) {
          console.log('No reviews');
          return;
        }

        const table = new Table({
          head: REVIEW_COLUMNS.map((col) => col.label),
          style: { head: ['cyan'] },
          colWidths: [8, 18, 12, 60],
          wordWrap: true,
        });
        for (const row of rows) {
          table.push([row.rating, row.user, row.date, row.text]);
        }
        console.log(table.toString());
      });
    });
}
