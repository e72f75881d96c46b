import { Command } from 'commander';
import { createSearchCommand } from './commands/search.js';
import { createBusinessCommand } from './commands/business.js';
import { createReviewsCommand } from './commands/reviews.js';
import { createConfigCommand } from './commands/config.js';
import { isLogLevel, setLogLevel } from './lib/logger.js';

/**
 * 建立 CLI 程式（每次呼叫都是全新的選項狀態）
 */
export function createCli(): Command {
  const cli = new Command();

  cli
    .name('yelp')
    .description('Yelp Fusion v3 API CLI: business search, details and reviews')
    .version('0.1.0');

  // 全域選項
  cli
    .option('-f, --format <format>', '輸出格式: json (default) | table | csv')
    .option('-v, --verbose', '詳細模式（debug 日誌輸出至 stderr）');

  // 日誌級別：--verbose > YELP_LOG_LEVEL > warn
  cli.hook('preAction', (thisCommand) => {
    const envLevel = process.env.YELP_LOG_LEVEL;
    if (thisCommand.opts().verbose) {
      setLogLevel('debug');
    } else if (isLogLevel(envLevel)) {
      setLogLevel(envLevel);
    }
  });

  // 註冊指令
  cli.addCommand(createSearchCommand());
  cli.addCommand(createBusinessCommand());
  cli.addCommand(createReviewsCommand());
  cli.addCommand(createConfigCommand());

  return cli;
}
