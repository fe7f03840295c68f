import type { FeedChannel, FeedItem, JobRecord } from '../types.js';
import { escapeHtml, escapeXml } from '../utils/text.js';
import { guidFromUrl } from './guid.js';

export const DC_NAMESPACE = 'http://purl.org/dc/elements/1.1/';
export const ATOM_NAMESPACE = 'http://www.w3.org/2005/Atom';

const INDENT = '  ';

export function formatRfc2822(date: Date): string {
  return date.toUTCString().replace(/GMT$/, '+0000');
}

export function toFeedItem(job: JobRecord, channel: FeedChannel, pubDate: string): FeedItem {
  return {
    title: job.title,
    link: job.link,
    description: job.description,
    guid: guidFromUrl(job.link),
    pubDate,
    source: {
      name: channel.title,
      url: channel.feedUrl,
    },
  };
}

function element(depth: number, name: string, text: string): string {
  return `${INDENT.repeat(depth)}<${name}>${escapeXml(text)}</${name}>`;
}

function renderItem(item: FeedItem): string[] {
  return [
    `${INDENT.repeat(2)}<item>`,
    element(3, 'title', item.title),
    element(3, 'link', item.link),
    `${INDENT.repeat(3)}<description><![CDATA[${escapeHtml(item.description)}]]></description>`,
    `${INDENT.repeat(3)}<guid isPermaLink="false">${item.guid}</guid>`,
    element(3, 'pubDate', item.pubDate),
    `${INDENT.repeat(3)}<source url="${escapeXml(item.source.url)}">${escapeXml(item.source.name)}</source>`,
    `${INDENT.repeat(2)}</item>`,
  ];
}

export function buildFeed(jobs: readonly JobRecord[], channel: FeedChannel, builtAt: Date): string {
  const pubDate = formatRfc2822(builtAt);
  const items = jobs.map((job) => toFeedItem(job, channel, pubDate));

  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<rss version="2.0" xmlns:dc="${DC_NAMESPACE}" xmlns:atom="${ATOM_NAMESPACE}" xml:base="${escapeXml(channel.baseUrl)}">`,
    `${INDENT}<channel>`,
    element(2, 'title', channel.title),
    element(2, 'link', channel.link),
    element(2, 'description', channel.description),
    element(2, 'language', channel.language),
    `${INDENT.repeat(2)}<atom:link href="${escapeXml(channel.feedUrl)}" rel="self" type="application/rss+xml"/>`,
    element(2, 'pubDate', pubDate),
    element(2, 'lastBuildDate', pubDate),
    ...items.flatMap((item) => renderItem(item)),
    `${INDENT}</channel>`,
    '</rss>',
  ];

  return `${lines.filter((line) => line.trim().length > 0).join('\n')}\n`;
}
