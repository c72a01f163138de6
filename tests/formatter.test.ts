import { describe, it, expect } from 'vitest';
import { formatJson, formatMarkdown, formatPages } from '../src/formatter.js';
import type { CrawledPage } from '../src/crawl.js';

const pages: CrawledPage[] = [
  {
    source_url: 'https://example.com/about',
    title: 'About Us',
    description: 'Learn about our team.',
    content: '# About Us\n\nWe build software.\n',
  },
  {
    source_url: 'https://example.com/blank',
    title: '',
    description: '',
    content: '',
  },
];

describe('formatJson', () => {
  it('pretty prints the records with a trailing newline', () => {
    const out = formatJson(pages.slice(0, 1));
    expect(out).toBe(
      '[\n  {\n    "source_url": "https://example.com/about",\n    "title": "About Us",\n' +
      '    "description": "Learn about our team.",\n    "content": "# About Us\\n\\nWe build software.\\n"\n  }\n]\n',
    );
    expect(JSON.parse(out)).toEqual(pages.slice(0, 1));
  });

  it('prints an empty array for no pages', () => {
    expect(formatJson([])).toBe('[]\n');
  });
});

describe('formatMarkdown', () => {
  it('renders one section per page', () => {
    expect(formatMarkdown(pages)).toBe([
      '## About Us',
      '',
      'URL: https://example.com/about',
      '',
      '> Learn about our team.',
      '',
      '# About Us\n\nWe build software.',
      '',
      '---',
      '',
      '## https://example.com/blank',
      '',
      'URL: https://example.com/blank',
      '',
      '---',
      '',
    ].join('\n'));
  });

  it('returns an empty string for no pages', () => {
    expect(formatMarkdown([])).toBe('');
  });
});

describe('formatPages', () => {
  it('dispatches on the format', () => {
    expect(formatPages(pages, 'markdown')).toBe(formatMarkdown(pages));
    expect(formatPages(pages, 'json')).toBe(formatJson(pages));
  });
});
