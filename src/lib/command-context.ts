/**
 * Command Context
 * CLI 指令共用的輸出格式判斷與錯誤處理
 */

import type { Command } from 'commander';
import { getConfigService } from '../services/config.js';
import { parseOutputFormat, renderError } from '../utils/output.js';
import type { OutputFormat } from '../utils/output.js';
import { loggers } from './logger.js';

/**
 * 輸出格式：指令列 > 設定檔 > json
 */
export function resolveFormat(cmd: Command): OutputFormat {
  const fromFlag: unknown = cmd.optsWithGlobals().format;
  if (fromFlag !== undefined) {
    return parseOutputFormat(fromFlag);
  }
  return parseOutputFormat(getConfigService().get('format'));
}

/**
 * 執行指令主體；失敗時輸出錯誤並設定 exit code 1
 */
export async function runCommand(
  cmd: Command,
  body: (format: OutputFormat) => Promise<void>
): Promise<void> {
  const format = resolveFormat(cmd);

  try {
    await body(format);
  } catch (error) {
    loggers.cli.debug('Command failed', { command: cmd.name() });
    if (format === 'json') {
      console.log(renderError(error, format));
    } else {
      console.error(renderError(error, format));
    }
    process.exitCode = 1;
  }
}
