import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { RollingLogger } from '../rolling-logger';
import { createTempFolders } from './harness/temp-folders';
import type { TempFolders } from './harness/temp-folders';

describe('RollingLogger', () => {
  let folders: TempFolders;

  beforeEach(async () => {
    folders = await createTempFolders();
  });

  afterEach(async () => {
    await folders.cleanup();
  });

  it('should write JSON lines in call order', async () => {
    const logger = new RollingLogger({ name: 'run', logDir: folders.root, consoleOutput: false });

    logger.info('Export arrived', { fileName: 'a.md' });
    logger.error('Book failed', { error: new Error('boom') });
    await logger.close();

    const lines = (await fs.readFile(path.join(folders.root, 'run.log'), 'utf-8')).trim().split('\n');
    const entries: unknown[] = lines.map(line => JSON.parse(line));

    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ level: 'INFO', message: 'Export arrived', data: { fileName: 'a.md' } });
    expect(entries[1]).toMatchObject({
      level: 'ERROR',
      message: 'Book failed',
      data: { error: { name: 'Error', message: 'boom' } },
    });
  });

  it('should rotate to a backup file when the log gets too big', async () => {
    const logger = new RollingLogger({ name: 'run', logDir: folders.root, maxSize: 150, consoleOutput: false });

    logger.info('first entry that takes up a good part of the budget');
    logger.info('second entry that pushes the log over its size limit');
    await logger.close();

    const current = (await fs.readFile(path.join(folders.root, 'run.log'), 'utf-8')).trim().split('\n');
    expect(current).toHaveLength(1);
    expect(current[0]).toContain('second entry');
    await expect(fs.stat(path.join(folders.root, 'run.backup.log'))).resolves.toBeDefined();
  });
});
