/**
 * Config Command Tests
 * 設定管理指令測試
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import { maskSecret } from '../../src/commands/config.js';
import { setupCli } from '../helpers/cli-harness.js';
import type { CliHarness } from '../helpers/cli-harness.js';

describe('maskSecret', () => {
  it('should keep only the last four characters', () => {
    expect(maskSecret('test-secret')).toBe('*******cret');
  });

  it('should hide short values entirely', () => {
    expect(maskSecret('abcd')).toBe('****');
  });
});

describe('config command', () => {
  let cli: CliHarness;

  beforeEach(() => {
    cli = setupCli({ credentials: false });
  });

  afterEach(() => {
    cli.cleanup();
  });

  it('should store a value in the config file', async () => {
    const output = await cli.run('config', 'set', 'clientId', 'my-client-id');

    expect(JSON.parse(output)).toEqual({ success: true, key: 'clientId', value: 'my-client-id' });
    expect(JSON.parse(fs.readFileSync(cli.configPath, 'utf-8'))).toEqual({ clientId: 'my-client-id' });
  });

  it('should mask the client secret in output', async () => {
    const output = await cli.run('config', 'set', 'clientSecret', 'test-secret');

    expect(JSON.parse(output).value).toBe('*******cret');
  });

  it('should reject an unknown key', async () => {
    const output = await cli.run('config', 'get', 'apiKey');

    expect(JSON.parse(output).error).toEqual({
      code: 'INVALID_PARAMETER',
      message: 'unknown config key: apiKey (available: clientId, clientSecret, format, locale)',
    });
    expect(process.exitCode).toBe(1);
  });

  it('should reject an unsupported format', async () => {
    const output = await cli.run('config', 'set', 'format', 'xml');

    expect(JSON.parse(output).error.message).toBe('format must be one of: json, table, csv');
    expect(process.exitCode).toBe(1);
  });

  it('should switch to plain output once a table format is configured', async () => {
    await cli.run('config', 'set', 'format', 'table');

    expect(await cli.run('config', 'get', 'format')).toBe('table');
    expect(await cli.run('config', 'get', 'locale')).toBe('(未設定)');
  });

  it('should remove a value', async () => {
    await cli.run('config', 'set', 'locale', 'en_US');
    await cli.run('config', 'unset', 'locale');

    expect(JSON.parse(await cli.run('config', 'get', 'locale'))).toEqual({
      success: true,
      key: 'locale',
      value: null,
    });
  });

  it('should list every key with credentials status', async () => {
    await cli.run('config', 'set', 'clientId', 'my-client-id');
    await cli.run('config', 'set', 'clientSecret', 'test-secret');

    const output = await cli.run('config', 'list');

    expect(JSON.parse(output)).toEqual({
      success: true,
      configPath: cli.configPath,
      hasCredentials: true,
      config: {
        clientId: 'my-client-id',
        clientSecret: '*******cret',
        format: null,
        locale: null,
      },
    });
  });

  it('should print the config path', async () => {
    expect(await cli.run('config', 'path')).toBe(cli.configPath);
  });
});

describe('config command with environment credentials', () => {
  let cli: CliHarness;

  beforeEach(() => {
    cli = setupCli();
  });

  afterEach(() => {
    cli.cleanup();
  });

  it('should report credentials taken from the environment', async () => {
    const output = await cli.run('config', 'list');

    const parsed = JSON.parse(output);
    expect(parsed.hasCredentials).toBe(true);
    expect(parsed.config.clientId).toBeNull();
  });
});
