/**
 * Intelligence Synthesizer
 *
 * Packs successful pages into the synthesis provider's context budget in
 * rank order, asks for a fixed schema of business fields plus a narrative,
 * and validates the reply. One repair round-trip is allowed; after that the
 * artifact degrades to the raw narrative with a soft error.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { extractJson, parseWithFixers } from '../utils/json-response.js';
import { PROMPT_RESERVE_CHARS, type ProviderRouter, type RouteCallOptions } from '../providers/provider-router.js';
import { CHARS_PER_TOKEN, type ChatMessage, type CompletionRequest } from '../providers/types.js';
import type {
  ExtractionBatch,
  IntelligenceArtifact,
  IntelligenceFields,
  PageExtractionResult,
  ResearchTarget,
} from '../types/research.js';

const log = logger.synthesizer;

const MAX_OUTPUT_TOKENS = 4096;

/** A page cut to less than this is dropped instead of truncated */
export const MIN_TRUNCATED_PAGE_CHARS = 500;

// ============================================
// SCHEMA
// ============================================

const optionalText = z
  .string()
  .nullable()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const intelligenceFieldsSchema = z.object({
  companyName: optionalText,
  overview: optionalText,
  industry: optionalText,
  businessModel: optionalText,
  targetMarket: optionalText,
  valueProposition: optionalText,
  companySize: optionalText,
  foundingYear: z
    .union([z.string(), z.number()])
    .nullable()
    .optional()
    .transform((value) => (value === null || value === undefined || value === '' ? null : String(value))),
  headquarters: optionalText,
  services: z.array(z.string()).default([]),
  leadership: z
    .array(
      z.object({
        name: z.string().min(1),
        title: optionalText,
      })
    )
    .default([]),
});

const synthesisReplySchema = z.object({
  narrative: z.string().min(1),
  fields: intelligenceFieldsSchema,
});

export function emptyIntelligenceFields(): IntelligenceFields {
  return {
    companyName: null,
    overview: null,
    industry: null,
    businessModel: null,
    targetMarket: null,
    valueProposition: null,
    companySize: null,
    foundingYear: null,
    headquarters: null,
    services: [],
    leadership: [],
  };
}

// ============================================
// CONTEXT PACKING
// ============================================

export interface SynthesisContext {
  text: string;
  /** Pages that reached the prompt, in rank order */
  includedUrls: string[];
  truncatedUrl?: string;
  droppedUrls: string[];
}

/**
 * Concatenate successful pages as `### <url>` sections until `budgetChars`
 * is reached. The first page that does not fit is truncated when at least
 * MIN_TRUNCATED_PAGE_CHARS of it still fit; every later page is dropped.
 */
export function buildSynthesisContext(results: PageExtractionResult[], budgetChars: number): SynthesisContext {
  const pages = results.filter((result) => result.status === 'success').sort((a, b) => a.rank - b.rank);
  const parts: string[] = [];
  const includedUrls: string[] = [];
  const droppedUrls: string[] = [];
  let truncatedUrl: string | undefined;
  let used = 0;

  for (const page of pages) {
    if (truncatedUrl !== undefined || droppedUrls.length > 0) {
      droppedUrls.push(page.url);
      continue;
    }

    const header = `### ${page.url}\n`;
    const section = `${header}${page.text}\n\n`;
    if (used + section.length <= budgetChars) {
      parts.push(section);
      includedUrls.push(page.url);
      used += section.length;
      continue;
    }

    const room = budgetChars - used - header.length - 2;
    if (room >= MIN_TRUNCATED_PAGE_CHARS) {
      parts.push(`${header}${page.text.slice(0, room)}\n\n`);
      includedUrls.push(page.url);
      truncatedUrl = page.url;
    } else {
      droppedUrls.push(page.url);
    }
  }

  return {
    text: parts.join('').trimEnd(),
    includedUrls,
    ...(truncatedUrl !== undefined && { truncatedUrl }),
    droppedUrls,
  };
}

// ============================================
// PROMPTS
// ============================================

const SYSTEM_PROMPT =
  'You are a business analyst. You write company profiles strictly from the website content you are given. ' +
  'When the content does not state something, use null rather than guessing. Answer with a single JSON object.';

const REPLY_FORMAT = `{
  "narrative": "<3-6 paragraph profile of the company>",
  "fields": {
    "companyName": "<string or null>",
    "overview": "<one or two sentences or null>",
    "industry": "<string or null>",
    "businessModel": "<how the company makes money, or null>",
    "targetMarket": "<who the customers are, or null>",
    "valueProposition": "<string or null>",
    "companySize": "<employee count or range, or null>",
    "foundingYear": "<year or null>",
    "headquarters": "<city and country, or null>",
    "services": ["<product or service>"],
    "leadership": [{ "name": "<person>", "title": "<role or null>" }]
  }
}`;

export function buildSynthesisPrompt(target: ResearchTarget, context: string): string {
  const hints = target.context ? `Context from the requester: ${target.context}\n` : '';
  return (
    `Company: ${target.companyName}\n` +
    hints +
    '\nUsing only the website content below, produce a profile of the company in exactly this JSON format:\n' +
    `${REPLY_FORMAT}\n\n` +
    `Website content:\n\n${context}`
  );
}

function buildRepairMessage(error: string): string {
  return (
    `Your previous reply could not be used (${error}). ` +
    'Reply again with only the corrected JSON object in the required format, with no other text.'
  );
}

// ============================================
// SYNTHESIZER
// ============================================

export interface SynthesizeOptions extends RouteCallOptions {
  maxContextChars: number;
}

export class IntelligenceSynthesizer {
  constructor(private readonly router: ProviderRouter) {}

  async synthesize(
    batch: ExtractionBatch,
    target: ResearchTarget,
    options: SynthesizeOptions
  ): Promise<IntelligenceArtifact> {
    if (batch.succeeded === 0) {
      log.warn('No successful pages, skipping synthesis', { attempted: batch.attempted });
      return {
        narrative: '',
        fields: emptyIntelligenceFields(),
        sourceUrls: [],
        provider: null,
        softError: { code: 'NO_CONTENT', message: `None of ${batch.attempted} pages yielded usable content` },
      };
    }

    const framing = buildSynthesisPrompt(target, '').length;
    const providerBudget = this.router.contextBudgetChars(
      'synthesis',
      PROMPT_RESERVE_CHARS + Math.ceil(MAX_OUTPUT_TOKENS * CHARS_PER_TOKEN) + framing
    );
    const budget = Math.min(options.maxContextChars, providerBudget);
    const context = buildSynthesisContext(batch.results, budget);

    log.info('Synthesizing', {
      pages: context.includedUrls.length,
      chars: context.text.length,
      budget,
      truncated: context.truncatedUrl,
      dropped: context.droppedUrls.length,
    });

    const messages: ChatMessage[] = [{ role: 'user', content: buildSynthesisPrompt(target, context.text) }];
    const first = await this.call(messages, options);
    let parsed = parseWithFixers(first.text, synthesisReplySchema);
    let provider = first.provider;
    let lastReply = first.text;

    if (!parsed.success) {
      log.warn('Synthesis reply invalid, attempting repair', { error: parsed.error });
      const repair = await this.call(
        [...messages, { role: 'assistant', content: first.text }, { role: 'user', content: buildRepairMessage(parsed.error) }],
        options
      );
      parsed = parseWithFixers(repair.text, synthesisReplySchema);
      provider = repair.provider;
      lastReply = repair.text;
    }

    if (!parsed.success) {
      log.warn('Synthesis repair failed, returning degraded artifact', { error: parsed.error });
      return {
        narrative: salvageNarrative(lastReply),
        fields: emptyIntelligenceFields(),
        sourceUrls: context.includedUrls,
        provider,
        softError: { code: 'SYNTHESIS_FAILED', message: parsed.error },
      };
    }

    return {
      narrative: parsed.data.narrative.trim(),
      fields: parsed.data.fields,
      sourceUrls: context.includedUrls,
      provider,
    };
  }

  private async call(messages: ChatMessage[], options: SynthesizeOptions): Promise<{ text: string; provider: string }> {
    const request: CompletionRequest = {
      kind: 'completion',
      purpose: 'synthesis',
      system: SYSTEM_PROMPT,
      messages,
      maxOutputTokens: MAX_OUTPUT_TOKENS,
      temperature: 0.2,
      json: true,
    };
    const { value, provider } = await this.router.complete(request, options);
    return { text: value.text, provider };
  }
}

/**
 * Best narrative text from an unusable reply: its `narrative` string when
 * the JSON still parses that far, otherwise the reply itself.
 */
export function salvageNarrative(reply: string): string {
  try {
    const value: unknown = JSON.parse(extractJson(reply));
    if (typeof value === 'object' && value !== null && 'narrative' in value && typeof value.narrative === 'string') {
      return value.narrative.trim();
    }
  } catch (error) {
    log.debug('Unparseable synthesis reply kept verbatim', { error: String(error) });
  }
  return reply.trim();
}
