/**
 * RSS Source
 *
 * Fetches an RSS 2.0 or Atom feed and lists its entries as plain text.
 * Extraction is tag matching, not XML parsing.
 */

import { LoadFailureError } from '../core/errors.ts';
import { debugLog } from '../debug.ts';
import type { FetchLike } from './http-source.ts';
import type { DescriptorOf, SourceResult, TextSource } from './text-source.ts';

export interface FeedItem {
  title: string;
  link: string;
  date: string;
  summary: string;
}

export interface Feed {
  title: string;
  items: FeedItem[];
}

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const MAX_CODE_POINT = 0x10ffff;

function fromCodePointOr(code: number, fallback: string): string {
  return Number.isNaN(code) || code > MAX_CODE_POINT ? fallback : String.fromCodePoint(code);
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return fromCodePointOr(parseInt(entity.slice(2), 16), match);
    }
    if (entity.startsWith('#')) {
      return fromCodePointOr(parseInt(entity.slice(1), 10), match);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/**
 * Text content of an element: CDATA unwrapped, markup removed, entities
 * decoded, whitespace collapsed.
 */
export function elementText(raw: string): string {
  const unwrapped = raw.replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1');
  const decoded = decodeEntities(unwrapped.replace(/<[^>]*>/g, ' '));
  // Escaped markup inside CDATA-less descriptions decodes into tags
  return decoded.replace(/<[^>]*>/g, ' ').replace(/\s+/g, ' ').trim();
}

function firstElement(xml: string, names: readonly string[]): string {
  for (const name of names) {
    const match = new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)</${name}>`, 'i').exec(xml);
    if (match) return elementText(match[1] ?? '');
  }
  return '';
}

function atomLink(xml: string): string {
  const links = xml.match(/<link\b[^>]*>/gi) ?? [];
  for (const tag of links) {
    const href = /href\s*=\s*"([^"]*)"/i.exec(tag)?.[1];
    if (href === undefined) continue;
    const rel = /rel\s*=\s*"([^"]*)"/i.exec(tag)?.[1];
    if (rel === undefined || rel === 'alternate') return decodeEntities(href);
  }
  return '';
}

function blocks(xml: string, name: string): string[] {
  const pattern = new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)</${name}>`, 'gi');
  return Array.from(xml.matchAll(pattern), (match) => match[1] ?? '');
}

export function parseFeed(xml: string): Feed {
  const rssItems = blocks(xml, 'item');
  if (rssItems.length > 0) {
    const channel = xml.slice(0, xml.search(/<item[\s>]/i));
    return {
      title: firstElement(channel, ['title']),
      items: rssItems.map((item) => ({
        title: firstElement(item, ['title']),
        link: firstElement(item, ['link', 'guid']),
        date: firstElement(item, ['pubDate', 'dc:date']),
        summary: firstElement(item, ['description', 'content:encoded']),
      })),
    };
  }

  const entries = blocks(xml, 'entry');
  const head = entries.length > 0 ? xml.slice(0, xml.search(/<entry[\s>]/i)) : xml;
  return {
    title: firstElement(head, ['title']),
    items: entries.map((entry) => ({
      title: firstElement(entry, ['title']),
      link: atomLink(entry),
      date: firstElement(entry, ['updated', 'published']),
      summary: firstElement(entry, ['summary', 'content']),
    })),
  };
}

export function formatFeed(feed: Feed): string {
  const lines: string[] = [feed.title || '(untitled feed)', ''];
  feed.items.forEach((item, index) => {
    lines.push(`${index + 1}. ${item.title || '(untitled)'}`);
    if (item.link) lines.push(`   ${item.link}`);
    if (item.date) lines.push(`   ${item.date}`);
    if (item.summary) lines.push(`   ${item.summary}`);
    lines.push('');
  });
  return lines.join('\n');
}

export class RssSource implements TextSource<DescriptorOf<'rss'>> {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly userAgent: string, fetchImpl?: FetchLike) {
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async read(descriptor: DescriptorOf<'rss'>): Promise<SourceResult> {
    const url = descriptor.url;
    let xml: string;
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { 'user-agent': this.userAgent },
      });
      if (!response.ok) {
        throw new LoadFailureError(url, `HTTP ${response.status}`);
      }
      xml = await response.text();
    } catch (error) {
      if (error instanceof LoadFailureError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new LoadFailureError(url, reason, { cause: error });
    }

    const feed = parseFeed(xml);
    debugLog(`[RssSource] ${feed.items.length} items from ${url}`);
    if (feed.items.length === 0) {
      throw new LoadFailureError(url, 'no feed items');
    }
    return { text: formatFeed(feed) };
  }
}
