import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { configureLogging, createLogger } from '@vocalis/core';

const dirs: string[] = [];

const tempLog = () => {
  const dir = mkdtempSync(join(tmpdir(), 'vocalis-log-'));
  dirs.push(dir);
  return join(dir, 'session.log');
};

afterEach(() => {
  configureLogging();
  dirs.splice(0).forEach((dir) => rmSync(dir, { recursive: true, force: true }));
});

describe('logging', () => {
  it('writes debug lines to the configured file', async () => {
    const filePath = tempLog();
    configureLogging({ level: 'debug', filePath });
    createLogger('logging-test').debug('debug line written');

    await vi.waitFor(() => {
      expect(readFileSync(filePath, 'utf-8')).toContain('debug line written');
    });
  });

  it('keeps lines below the configured level out of the file', async () => {
    const filePath = tempLog();
    configureLogging({ level: 'warn', filePath });
    const logger = createLogger('logging-test');
    logger.info('info line skipped');
    logger.warn('warn line kept');

    await vi.waitFor(() => {
      expect(readFileSync(filePath, 'utf-8')).toContain('warn line kept');
    });
    expect(readFileSync(filePath, 'utf-8')).not.toContain('info line skipped');
  });
});
