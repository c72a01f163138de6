import type { CrawledPage } from './crawl.js';

export type OutputFormat = 'json' | 'markdown';

export function formatJson(pages: CrawledPage[]): string {
  return `${JSON.stringify(pages, null, 2)}\n`;
}

export function formatMarkdown(pages: CrawledPage[]): string {
  const sections: string[] = [];

  for (const page of pages) {
    sections.push(`## ${page.title || page.source_url}`, '', `URL: ${page.source_url}`, '');
    if (page.description) sections.push(`> ${page.description}`, '');
    if (page.content) sections.push(page.content.trim(), '');
    sections.push('---', '');
  }

  return sections.join('\n');
}

export function formatPages(pages: CrawledPage[], format: OutputFormat): string {
  return format === 'markdown' ? formatMarkdown(pages) : formatJson(pages);
}
