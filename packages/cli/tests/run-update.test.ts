import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { resolveSettings } from '../src/run-update.js';
import { DEFAULT_SETTINGS } from '../src/settings.js';

describe('resolveSettings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lastmod-run-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('uses the defaults without a config file or flags', async () => {
    expect(await resolveSettings({ output: 'sitemap.xml', sort: true })).toEqual(DEFAULT_SETTINGS);
  });

  it('lets flags win over the config file', async () => {
    const config = path.join(dir, 'lastmod.json');
    await fs.writeFile(
      config,
      JSON.stringify({ crawler: { maxPages: 50, maxConcurrency: 8 }, normalizeContent: false }),
    );

    const settings = await resolveSettings({
      output: 'sitemap.xml',
      config,
      maxPages: 10,
      timeout: 2000,
      sort: false,
    });

    expect(settings).toEqual({
      crawler: {
        maxPages: 10,
        maxConcurrency: 8,
        timeoutMs: 2000,
        userAgent: DEFAULT_SETTINGS.crawler.userAgent,
      },
      normalizeContent: false,
      sortByUrl: false,
    });
  });

  it('keeps a config file that turns sorting off', async () => {
    const config = path.join(dir, 'lastmod.json');
    await fs.writeFile(config, JSON.stringify({ sortByUrl: false }));

    const settings = await resolveSettings({ output: 'sitemap.xml', config, sort: true });

    expect(settings.sortByUrl).toBe(false);
  });
});
