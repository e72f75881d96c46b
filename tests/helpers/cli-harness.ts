/**
 * CLI Harness
 * 在同一個行程內執行 CLI 指令（需搭配 vi.mock('ofetch')）
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import { createCli } from '../../src/cli.js';
import { clearApiClientCache } from '../../src/lib/api-client.js';
import { setLogLevel } from '../../src/lib/logger.js';
import { resetConfigService } from '../../src/services/config.js';

export interface CliHarness {
  /** 執行指令，回傳 stdout 內容 */
  run(...args: string[]): Promise<string>;
  stderr(): string;
  configPath: string;
  cleanup(): void;
}

function collect(calls: unknown[][], from: number): string {
  return calls
    .slice(from)
    .map((args) => args.map(String).join(' '))
    .join('\n');
}

export function setupCli(options: { credentials?: boolean } = {}): CliHarness {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'yelp-cli-test-'));
  const configPath = path.join(dir, 'config.json');
  const withCredentials = options.credentials !== false;

  vi.stubEnv('YELP_CONFIG_PATH', configPath);
  vi.stubEnv('YELP_CLIENT_ID', withCredentials ? 'test-client-id' : '');
  vi.stubEnv('YELP_CLIENT_SECRET', withCredentials ? 'test-secret' : '');
  vi.stubEnv('YELP_LOG_LEVEL', '');
  resetConfigService();
  clearApiClientCache();

  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

  return {
    configPath,
    async run(...args: string[]): Promise<string> {
      const from = logSpy.mock.calls.length;
      await createCli().parseAsync(['node', 'yelp', ...args]);
      return collect(logSpy.mock.calls, from);
    },
    stderr(): string {
      return collect(errorSpy.mock.calls, 0);
    },
    cleanup(): void {
      process.exitCode = undefined;
      setLogLevel('warn');
      resetConfigService();
      clearApiClientCache();
      vi.unstubAllEnvs();
      vi.restoreAllMocks();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
