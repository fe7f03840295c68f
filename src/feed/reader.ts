import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { decodeHtmlEntities } from '../utils/text.js';

type TextNode = string | { '#text'?: string };

interface RssItem {
  title?: TextNode;
  link?: TextNode;
  description?: TextNode;
  guid?: TextNode;
  pubDate?: TextNode;
}

interface RssDocument {
  rss?: {
    channel?: {
      item?: RssItem[];
    };
  };
}

export interface ParsedFeedItem {
  title: string;
  link: string;
  description: string;
  guid: string;
  pubDate: string;
}

export class FeedParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FeedParseError';
  }
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  isArray: (_name, jpath) => jpath === 'rss.channel.item',
});

function textOf(node: TextNode | undefined): string {
  if (typeof node === 'string') {
    return node.trim();
  }
  return node?.['#text']?.trim() ?? '';
}

function readItems(xml: string): RssItem[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new FeedParseError(`Invalid feed XML at line ${validation.err.line}: ${validation.err.msg}`);
  }

  let document: RssDocument;
  try {
    document = parser.parse(xml);
  } catch (error) {
    throw new FeedParseError(`Feed could not be parsed: ${String(error)}`);
  }
  if (!document.rss?.channel) {
    throw new FeedParseError('Feed has no rss/channel element');
  }
  return document.rss.channel.item ?? [];
}

export function parseFeedItems(xml: string): ParsedFeedItem[] {
  return readItems(xml).map((item) => ({
    title: textOf(item.title),
    link: textOf(item.link),
    description: decodeHtmlEntities(textOf(item.description)),
    guid: textOf(item.guid),
    pubDate: textOf(item.pubDate),
  }));
}

export function parseKnownLinks(xml: string, onMalformed?: (error: FeedParseError) => void): Set<string> {
  try {
    const links = readItems(xml).map((item) => textOf(item.link));
    return new Set(links.filter((link) => link.length > 0));
  } catch (error) {
    if (!(error instanceof FeedParseError)) {
      throw error;
    }
    onMalformed?.(error);
    return new Set();
  }
}
