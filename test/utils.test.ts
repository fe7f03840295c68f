import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { RunLogger, dailyLogPath } from '../src/utils/logger.js';
import {
  containsAny,
  decodeHtmlEntities,
  escapeHtml,
  escapeXml,
  normalizeWhitespace,
  stripInvalidXmlChars,
} from '../src/utils/text.js';
import { resolveJobLink } from '../src/utils/url.js';

describe('resolveJobLink', () => {
  const bases = { baseDomain: 'https://example.org', relativeLinkBase: 'https://example.org/careersite/1' };

  it('keeps absolute targets', () => {
    expect(resolveJobLink('https://other.example.net/jobs/1', bases)).toBe('https://other.example.net/jobs/1');
  });

  it('prefixes root-relative targets with the base domain', () => {
    expect(resolveJobLink('/jobs/123', { baseDomain: 'https://example.org' })).toBe('https://example.org/jobs/123');
  });

  it('joins other relative targets with a single slash', () => {
    expect(resolveJobLink('requisition/9', bases)).toBe('https://example.org/careersite/1/requisition/9');
    expect(resolveJobLink('jobs/9', { baseDomain: 'https://example.org/' })).toBe('https://example.org/jobs/9');
  });

  it('returns null for an empty target', () => {
    expect(resolveJobLink(undefined, bases)).toBeNull();
    expect(resolveJobLink('   ', bases)).toBeNull();
  });
});

describe('text helpers', () => {
  it('collapses whitespace', () => {
    expect(normalizeWhitespace('  Senior \n\t Economist ')).toBe('Senior Economist');
  });

  it('matches needles case-insensitively', () => {
    expect(containsAny('Contact Us', ['contact'])).toBe(true);
    expect(containsAny('Economist', ['contact'])).toBe(false);
  });

  it('escapes xml and html special characters', () => {
    expect(escapeXml(`<a href="x">Tom & Jerry's</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&apos;s&lt;/a&gt;');
    expect(escapeHtml(`"it's" <ok> & ]]>`)).toBe('&quot;it&#x27;s&quot; &lt;ok&gt; &amp; ]]&gt;');
  });

  it('decodes entities in a single pass', () => {
    expect(decodeHtmlEntities('&amp;lt; &lt;b&gt; &#39;&#x27; &copy;')).toBe("&lt; <b> '' &copy;");
  });

  it('keeps references beyond the unicode range undecoded', () => {
    expect(decodeHtmlEntities('&#x110000; &#1114112; &#65;')).toBe('&#x110000; &#1114112; A');
  });

  it('strips characters outside the xml character range', () => {
    expect(stripInvalidXmlChars('a\u0000b\u0008c\u000Bd\u001Fe\uFFFEf')).toBe('abcdef');
    expect(stripInvalidXmlChars('tab\tline\ncr\r')).toBe('tab\tline\ncr\r');
    expect(stripInvalidXmlChars('\uD83D\uDE00 ok')).toBe('\uD83D\uDE00 ok');
    expect(stripInvalidXmlChars('x\uD800y\uDC00z')).toBe('xyz');
    expect(escapeXml('A\u0001 & B')).toBe('A &amp; B');
  });
});

describe('RunLogger', () => {
  let dir = '';

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('names the log file after the run date', () => {
    expect(dailyLogPath('logs', new Date(Date.UTC(2026, 9, 19, 23, 0)))).toBe(join('logs', 'feed_run_2026-10-19.log'));
  });

  it('frames leveled messages between start and finish markers', async () => {
    dir = await mkdtemp(join(tmpdir(), 'careers-feed-log-'));
    const path = join(dir, 'nested', 'run.log');
    const logger = new RunLogger(path, { label: 'Test run' });

    await logger.init();
    await logger.info('hello');
    await logger.warn('careful');
    await logger.error('broken');
    await logger.close();

    const lines = (await readFile(path, 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(5);
    expect(lines[0]).toMatch(/^\S+ === Test run started \S+ ===$/);
    expect(lines[1]).toMatch(/^\S+ \[INFO\] hello$/);
    expect(lines[2]).toMatch(/^\S+ \[WARN\] careful$/);
    expect(lines[3]).toMatch(/^\S+ \[ERROR\] broken$/);
    expect(lines[4]).toMatch(/^\S+ === Test run finished \S+ ===$/);
  });
});
