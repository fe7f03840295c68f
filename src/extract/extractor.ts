import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { hasChildren, isText } from 'domhandler';
import type { CandidateRejection, ExtractionReport, JobRecord, RejectionReason } from '../types.js';
import { containsAny, normalizeWhitespace, stripInvalidXmlChars } from '../utils/text.js';
import { resolveJobLink } from '../utils/url.js';
import { STRATEGIES, classContains, findCandidates } from './strategies.js';
import type { StrategyMatcher } from './strategies.js';

export const MIN_TITLE_LENGTH = 5;
export const MAX_FALLBACK_TITLE_LENGTH = 100;
export const TITLE_BLACKLIST = ['search', 'filter', 'sort', 'login', 'sign in', 'home', 'about', 'contact'];

export interface ExtractOptions {
  orgName: string;
  baseDomain: string;
  relativeLinkBase?: string;
  defaultLocation: string;
  locationHints?: readonly string[];
  maxCandidates?: number;
  strategies?: readonly StrategyMatcher[];
}

class CandidateRejected extends Error {
  constructor(readonly reason: RejectionReason) {
    super(reason);
    this.name = 'CandidateRejected';
  }
}

export function describeJob(orgName: string, title: string, department: string, location: string): string {
  const role = department ? `${title}, ${department}` : title;
  return `${orgName} is hiring: ${role} (${location}).`;
}

export function isBlacklistedTitle(title: string): boolean {
  return containsAny(title, TITLE_BLACKLIST);
}

function cleanText(value: string): string {
  return normalizeWhitespace(stripInvalidXmlChars(value));
}

function textOf($: CheerioAPI, element: Element): string {
  return cleanText($(element).text());
}

function findFirstText(node: AnyNode, predicate: (text: string) => boolean): string | null {
  if (isText(node)) {
    return predicate(node.data) ? node.data : null;
  }
  if (!hasChildren(node)) {
    return null;
  }
  for (const child of node.children) {
    const found = findFirstText(child, predicate);
    if (found !== null) {
      return found;
    }
  }
  return null;
}

function candidateLink($: CheerioAPI, element: Element, options: ExtractOptions): string | null {
  const href =
    element.tagName === 'a' && element.attribs.href
      ? element.attribs.href
      : $(element).find('a[href]').first().attr('href');
  return resolveJobLink(href, {
    baseDomain: options.baseDomain,
    relativeLinkBase: options.relativeLinkBase,
  });
}

function candidateTitle($: CheerioAPI, element: Element): string {
  if (element.tagName === 'a') {
    return textOf($, element);
  }

  const node = $(element);
  const titled = node
    .find('h2, h3, h4, a')
    .toArray()
    .find((child) => classContains(child, ['title']));
  const heading = titled ?? node.find('h2, h3, h4').first().get(0) ?? node.find('a').first().get(0);
  if (heading) {
    return textOf($, heading);
  }
  return textOf($, element).slice(0, MAX_FALLBACK_TITLE_LENGTH);
}

function classedText($: CheerioAPI, element: Element, keyword: string): string | null {
  const match = $(element)
    .find('span, div, p')
    .toArray()
    .find((child) => classContains(child, [keyword]));
  return match ? textOf($, match) : null;
}

function candidateLocation($: CheerioAPI, element: Element, options: ExtractOptions): string {
  const classed = classedText($, element, 'location');
  if (classed !== null) {
    return classed;
  }

  const hints = options.locationHints ?? [];
  if (hints.length > 0) {
    const hinted = findFirstText(element, (text) => hints.some((hint) => text.includes(hint)));
    if (hinted !== null) {
      return cleanText(hinted);
    }
  }
  return options.defaultLocation;
}

function buildJob($: CheerioAPI, element: Element, options: ExtractOptions): JobRecord {
  const link = candidateLink($, element, options);
  if (!link) {
    throw new CandidateRejected('no-link');
  }

  const title = candidateTitle($, element);
  if (title.length < MIN_TITLE_LENGTH) {
    throw new CandidateRejected('short-title');
  }
  if (isBlacklistedTitle(title)) {
    throw new CandidateRejected('blacklisted-title');
  }

  const location = candidateLocation($, element, options);
  const department = classedText($, element, 'department') ?? '';

  return Object.freeze({
    title,
    link,
    location,
    department,
    description: describeJob(options.orgName, title, department, location),
  });
}

export function extractJobs(html: string, options: ExtractOptions): ExtractionReport {
  const $ = cheerio.load(html);
  const { strategy, candidates } = findCandidates($, options.strategies ?? STRATEGIES);
  const limited = candidates.slice(0, options.maxCandidates ?? 50);

  const jobs: JobRecord[] = [];
  const rejections: CandidateRejection[] = [];

  limited.forEach((element, index) => {
    try {
      jobs.push(buildJob($, element, options));
    } catch (error) {
      if (error instanceof CandidateRejected) {
        rejections.push({ index, reason: error.reason });
        return;
      }
      rejections.push({ index, reason: 'error', detail: String(error) });
    }
  });

  return {
    strategy,
    candidateCount: candidates.length,
    jobs,
    rejections,
  };
}
