/**
 * Business Command
 * 商家詳細資料查詢指令
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { getApiClient } from '../lib/api-client.js';
import { runCommand } from '../lib/command-context.js';
import { getConfigService } from '../services/config.js';
import { formatCSV, formatJSON } from '../utils/output.js';
import type { YelpBusinessDetails } from '../types/api.js';

/**
 * 商家資料轉為「欄位 / 值」列
 */
export function describeBusiness(business: YelpBusinessDetails): Array<[string, string]> {
  const rows: Array<[string, string]> = [
    ['ID', business.id],
    ['Name', business.name ?? ''],
  ];

  if (business.rating !== undefined) {
    rows.push(['Rating', `${business.rating.toFixed(1)} (${business.review_count ?? 0} reviews)`]);
  }
  if (business.price) rows.push(['Price', business.price]);
  if (business.categories && business.categories.length > 0) {
    rows.push(['Categories', business.categories.map((c) => c.title).join(', ')]);
  }

  const phone = business.display_phone || business.phone;
  if (phone) rows.push(['Phone', phone]);

  const address = business.location?.display_address?.join(', ');
  if (address) rows.push(['Address', address]);

  const openNow = business.hours?.[0]?.is_open_now;
  if (openNow !== undefined) rows.push(['Open now', openNow ? 'yes' : 'no']);
  if (business.is_closed) rows.push(['Status', 'permanently closed']);
  if (business.url) rows.push(['URL', business.url]);

  return rows;
}

export function createBusinessCommand(): Command {
  return new Command('business')
    .description('商家詳細資料')
    .argument('<id>', '商家 ID 或 alias（由 search 結果的 id 取得）')
    .option('--locale <locale>', '語系（如 en_US）')
    .action(async (id: string, options: { locale?: string }, cmd: Command) => {
      await runCommand(cmd, async (format) => {
        const locale = options.locale ?? getConfigService().get('locale');
        const business = await getApiClient().getBusinessDetails(id, { locale });

        if (format === 'json') {
          console.log(formatJSON({ success: true, business }));
          return;
        }

        const rows = describeBusiness(business);
        if (format === 'csv') {
          const fields = rows.map(([field, value]) => ({ field, value }));
          console.log(formatCSV(fields, [
            { key: 'field', label: 'Field' },
            { key: 'value', label: 'Value' },
          ]));
          return;
        }

        const table = new Table({
          style: { head: ['cyan'] },
          wordWrap: true,
          colWidths: [14, 60],
        });
        for (const row of rows) {
          table.push(row);
        }
        console.log(table.toString());
      });
    });
}
