/**
 * Extraction Strategy Chain
 *
 * Ordered content extractors behind one interface. The chain returns the
 * first result that meets the substance threshold; otherwise the longest
 * short result, or a failure when every strategy threw.
 */

import TurndownService from 'turndown';
import * as cheerio from 'cheerio';
import { parseHTML } from 'linkedom';
import { Readability } from '@mozilla/readability';
import { logger } from '../utils/logger.js';
import type { ExtractionStrategyName } from '../types/research.js';

const log = logger.create('ExtractionStrategies');

// ============================================
// TYPES
// ============================================

export interface ExtractionInput {
  html: string;
  url: string;
}

/**
 * One way of turning markup into clean text. Throws when the markup
 * cannot be processed at all; returns '' when nothing was found.
 */
export interface ExtractionStrategy {
  readonly name: ExtractionStrategyName;
  extract(input: ExtractionInput): string;
}

export type ChainOutcome =
  | { kind: 'substantial'; text: string; strategy: ExtractionStrategyName }
  | { kind: 'insufficient'; text: string }
  | { kind: 'failed'; error: string };

// ============================================
// CONSTANTS
// ============================================

/** Regions that never carry page content */
const BOILERPLATE_SELECTORS =
  'script, style, noscript, iframe, svg, template, nav, header, footer, aside, form, ' +
  '[role="navigation"], [role="banner"], [role="contentinfo"], ' +
  '[class*="cookie"], [id*="cookie"], [class*="banner"], [class*="popup"], [class*="modal"]';

/** Content containers, most specific first */
const MAIN_SELECTORS = [
  'main',
  '[role="main"]',
  'article',
  '.main-content',
  '.content',
  '.page-content',
  '.services-content',
  '#content',
  '.container',
];

/** Elements whose names suggest business content */
const CONTENT_HINT_SELECTORS =
  '[class*="service"], [id*="service"], [class*="offering"], [id*="offering"], ' +
  '[class*="solution"], [id*="solution"], [class*="product"], [id*="product"], ' +
  '[class*="partner"], [id*="partner"], section, .section';

const MAIN_CONTENT_TARGET = 500;
const HINT_BLOCK_MIN = 50;
const BODY_FALLBACK_BELOW = 200;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Tidy converted markdown: trailing spaces and runs of blank lines
 */
function normalizeMarkdown(markdown: string): string {
  return markdown
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function isReadabilityCompatible(doc: unknown): doc is Document {
  return (
    typeof doc === 'object' &&
    doc !== null &&
    'documentElement' in doc &&
    'querySelectorAll' in doc &&
    typeof doc.querySelectorAll === 'function'
  );
}

// ============================================
// STRATEGIES
// ============================================

/**
 * Precision extractor: Readability article detection, converted to
 * Markdown so headings and lists survive into the synthesis prompt.
 */
export class ReadabilityStrategy implements ExtractionStrategy {
  readonly name = 'readability' as const;
  private readonly turndown: TurndownService;

  constructor() {
    this.turndown = new TurndownService({
      headingStyle: 'atx',
      codeBlockStyle: 'fenced',
      emDelimiter: '*',
    });
    this.turndown.remove(['script', 'style', 'noscript', 'iframe']);
  }

  extract(input: ExtractionInput): string {
    const { document } = parseHTML(input.html);
    if (!isReadabilityCompatible(document)) {
      throw new Error('Parsed document is not usable by Readability');
    }

    const article = new Readability(document, { maxElemsToParse: 20000 }).parse();
    if (!article?.content) {
      return '';
    }

    return normalizeMarkdown(this.turndown.turndown(article.content));
  }
}

/**
 * Permissive extractor: strips boilerplate regions, reads the main content
 * container, tops it up with service/offering/partner blocks and finally
 * falls back to the whole body.
 */
export class SelectorStrategy implements ExtractionStrategy {
  readonly name = 'selectors' as const;

  extract(input: ExtractionInput): string {
    const $ = cheerio.load(input.html);
    $(BOILERPLATE_SELECTORS).remove();

    let text = '';
    for (const selector of MAIN_SELECTORS) {
      const element = $(selector).first();
      if (element.length === 0) continue;
      text = collapseWhitespace(element.text());
      if (text) break;
    }

    if (text.length < MAIN_CONTENT_TARGET) {
      const blocks: string[] = [];
      $(CONTENT_HINT_SELECTORS).each((_, element) => {
        const block = collapseWhitespace($(element).text());
        if (block.length <= HINT_BLOCK_MIN || text.includes(block) || blocks.some((b) => b.includes(block))) {
          return;
        }
        blocks.push(block);
      });
      if (blocks.length > 0) {
        text = collapseWhitespace([text, ...blocks].join(' '));
      }
    }

    if (text.length < BODY_FALLBACK_BELOW) {
      text = collapseWhitespace($('body').text());
    }

    return text;
  }
}

// ============================================
// CHAIN
// ============================================

export class ExtractionStrategyChain {
  private readonly strategies: ExtractionStrategy[];

  constructor(
    private readonly minSubstantialLength: number = 500,
    strategies?: ExtractionStrategy[]
  ) {
    this.strategies = strategies ?? [new ReadabilityStrategy(), new SelectorStrategy()];
  }

  get strategyNames(): ExtractionStrategyName[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  extract(input: ExtractionInput): ChainOutcome {
    let best = '';
    let anyCompleted = false;
    const errors: string[] = [];

    for (const strategy of this.strategies) {
      let text: string;
      try {
        text = strategy.extract(input);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        errors.push(`${strategy.name}: ${message}`);
        log.debug('Extraction strategy failed', { url: input.url, strategy: strategy.name, error: message });
        continue;
      }

      anyCompleted = true;
      if (text.length >= this.minSubstantialLength) {
        return { kind: 'substantial', text, strategy: strategy.name };
      }
      log.debug('Extraction strategy result too short', {
        url: input.url,
        strategy: strategy.name,
        chars: text.length,
        threshold: this.minSubstantialLength,
      });
      if (text.length > best.length) {
        best = text;
      }
    }

    if (!anyCompleted) {
      return { kind: 'failed', error: errors.join('; ') || 'No extraction strategies configured' };
    }
    return { kind: 'insufficient', text: best };
  }
}
