import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { crawlWebsite } from './crawl.js';
import type { CrawledPage } from './crawl.js';
import { validateCredentials } from './provider.js';
import { loadConfig, mergeParameters, parseIntegerOption, resolveCredentials } from './config.js';
import { formatPages } from './formatter.js';
import type { OutputFormat } from './formatter.js';

const FORMATS: OutputFormat[] = ['json', 'markdown'];

interface CrawlOpts {
  maxDepth?: string;
  limit?: string;
  ignoreRendering?: boolean;
  includePaths?: string;
  excludePaths?: string;
  onlyMainContent?: boolean;
  proxy?: string;
  allowedDomains?: string;
  includeTags?: string;
  excludeTags?: string;
  locale?: string;
  extraHeaders?: string;
  format: string;
  output?: string;
  pollInterval?: string;
  maxPolls?: string;
  config: string;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('watercrawl-datasource')
    .description('Crawl a website through Watercrawl and emit datasource records')
    .version('0.1.0');

  program
    .command('crawl')
    .description('Run a crawl job and print the crawled pages')
    .argument('<url>', 'Start URL')
    .option('--max-depth <n>', 'Maximum link depth to follow (default: 1)')
    .option('--limit <n>', 'Maximum number of pages (default: 1)')
    .option('--ignore-rendering', 'Skip JavaScript rendering')
    .option('--no-ignore-rendering', 'Render JavaScript even if the config skips it')
    .option('--include-paths <list>', 'Comma-separated URL patterns to include')
    .option('--exclude-paths <list>', 'Comma-separated URL patterns to exclude')
    .option('--only-main-content', 'Extract only the main content of each page')
    .option('--no-only-main-content', 'Keep the whole page even if the config trims it')
    .option('--proxy <slug>', 'Proxy server slug')
    .option('--allowed-domains <list>', 'Comma-separated domains the crawl may visit')
    .option('--include-tags <list>', 'Comma-separated HTML tags to keep')
    .option('--exclude-tags <list>', 'Comma-separated HTML tags to drop')
    .option('--locale <locale>', 'Locale for page requests')
    .option('--extra-headers <json>', 'Extra request headers as a JSON object')
    .option('--format <format>', `Output format: ${FORMATS.join(', ')}`, 'json')
    .option('--output <path>', 'Write records to this path (default: stdout)')
    .option('--poll-interval <ms>', 'Milliseconds between status checks')
    .option('--max-polls <n>', 'Status checks before giving up')
    .option('--config <path>', 'Path to watercrawl.config.json', 'watercrawl.config.json')
    .action(async (url: string, opts: CrawlOpts) => {
      try {
        await runCrawl(url, opts);
      } catch (err) {
        console.error('Error:', (err as Error).message);
        process.exit(1);
      }
    });

  program
    .command('validate')
    .description('Check the configured API key and base URL')
    .option('--config <path>', 'Path to watercrawl.config.json', 'watercrawl.config.json')
    .action(async (opts: { config: string }) => {
      try {
        const config = await loadConfig(opts.config);
        await validateCredentials(resolveCredentials(config));
        console.log('Credentials OK');
      } catch (err) {
        console.error('Error:', (err as Error).message);
        process.exit(1);
      }
    });

  return program;
}

async function runCrawl(url: string, opts: CrawlOpts) {
  if (!FORMATS.some(f => f === opts.format)) {
    throw new Error(`unknown format "${opts.format}". Choose from: ${FORMATS.join(', ')}`);
  }
  const format: OutputFormat = opts.format === 'markdown' ? 'markdown' : 'json';
  const config = await loadConfig(opts.config);

  const flags: Record<string, unknown> = {
    url,
    max_depth: opts.maxDepth,
    limit: opts.limit,
    ignore_rendering: opts.ignoreRendering,
    include_paths: opts.includePaths,
    exclude_paths: opts.excludePaths,
    only_main_content: opts.onlyMainContent,
    proxy_server_slug: opts.proxy,
    allowed_domains: opts.allowedDomains,
    include_tags: opts.includeTags,
    exclude_tags: opts.excludeTags,
    locale: opts.locale,
    extra_headers: opts.extraHeaders,
  };
  const parameters = mergeParameters(config.defaults, flags);

  console.error(`Crawling ${url} with Watercrawl...`);

  let pages: CrawledPage[] = [];
  const messages = crawlWebsite(parameters, resolveCredentials(config), {
    pollIntervalMs: parseIntegerOption(opts.pollInterval, '--poll-interval') ?? config.pollIntervalMs,
    maxPollAttempts: parseIntegerOption(opts.maxPolls, '--max-polls') ?? config.maxPollAttempts,
  });
  for await (const message of messages) {
    if (message.status === 'completed') {
      pages = message.web_info_list;
    } else {
      console.error(`Processing: ${message.completed}/${message.total} pages`);
    }
  }
  console.error(`Fetched ${pages.length} pages.`);

  const output = formatPages(pages, format);
  if (opts.output) {
    await writeFile(opts.output, output, 'utf-8');
    console.error(`Written to ${opts.output}`);
  } else {
    process.stdout.write(output);
  }
}
