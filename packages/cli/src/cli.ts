import { Command, InvalidArgumentError } from 'commander';
import type { OutputConfiguration } from 'commander';

export interface UpdateOptions {
  output: string;
  old?: string;
  domain?: string;
  config?: string;
  maxPages?: number;
  concurrency?: number;
  timeout?: number;
  sort: boolean;
}

export type UpdateRunner = (siteUrl: string, options: UpdateOptions) => Promise<void>;

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Builds the command line. Commander errors (including `--help`) reject
 * `parseAsync` with a `CommanderError` instead of exiting the process.
 */
export function createProgram(runUpdate: UpdateRunner, output?: OutputConfiguration): Command {
  const program = new Command();
  program
    .name('lastmod')
    .description('Sitemaps whose lastmod follows page content')
    .version('0.1.0');
  program.exitOverride();
  if (output) {
    program.configureOutput(output);
  }

  program
    .command('update')
    .description('Crawl a site and write its sitemap, keeping lastmod for unchanged pages')
    .argument('<site-url>', 'The page to start crawling from, e.g. https://example.com/')
    .requiredOption('-o, --output <path>', 'Where to write the sitemap; a .gz suffix compresses it')
    .option('--old <url-or-path>', 'The currently published sitemap to carry lastmod values from')
    .option(
      '--domain <url>',
      'Publish locations under this origin, for crawls of a staging or local host',
    )
    .option('-c, --config <file>', 'JSON settings file')
    .option('--max-pages <n>', 'Stop after this many pages', parsePositiveInteger)
    .option('--concurrency <n>', 'Requests in flight at once', parsePositiveInteger)
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parsePositiveInteger)
    .option('--no-sort', 'Keep crawl order instead of sorting entries by URL')
    .action(async (siteUrl: string, options: UpdateOptions) => {
      await runUpdate(siteUrl, options);
    });

  return program;
}
