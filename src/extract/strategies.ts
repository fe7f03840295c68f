import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { ExtractionStrategy } from '../types.js';
import { containsAny, normalizeWhitespace } from '../utils/text.js';

export const CARD_CLASS_KEYWORDS = ['job-card', 'job-item', 'position', 'vacancy', 'requisition'] as const;

const REQUISITION_HREF = /requisition/i;
const MIN_LINK_TEXT_LENGTH = 5;

export interface StrategyMatcher {
  name: ExtractionStrategy;
  find: ($: CheerioAPI) => Element[];
}

export function classContains(element: Element, keywords: readonly string[]): boolean {
  const className = element.attribs.class;
  return Boolean(className) && containsAny(className, keywords);
}

function byCardClass($: CheerioAPI): Element[] {
  return $('div, article, li')
    .toArray()
    .filter((element) => classContains(element, CARD_CLASS_KEYWORDS));
}

function byRequisitionLink($: CheerioAPI): Element[] {
  return $('a[href]')
    .toArray()
    .filter((anchor) => REQUISITION_HREF.test(anchor.attribs.href ?? ''))
    .filter((anchor) => normalizeWhitespace($(anchor).text()).length > MIN_LINK_TEXT_LENGTH);
}

function byStructure($: CheerioAPI): Element[] {
  return $('div, article')
    .toArray()
    .filter((element) => {
      const container = $(element);
      return container.find('h2, h3, h4, a').length > 0 && container.find('a[href]').length > 0;
    });
}

export const STRATEGIES: readonly StrategyMatcher[] = [
  { name: 'class-keyword', find: byCardClass },
  { name: 'link-pattern', find: byRequisitionLink },
  { name: 'structural', find: byStructure },
];

export function findCandidates(
  $: CheerioAPI,
  strategies: readonly StrategyMatcher[] = STRATEGIES,
): { strategy: ExtractionStrategy | null; candidates: Element[] } {
  for (const strategy of strategies) {
    const candidates = strategy.find($);
    if (candidates.length > 0) {
      return { strategy: strategy.name, candidates };
    }
  }
  return { strategy: null, candidates: [] };
}
