/**
 * Company Research Example
 *
 * Runs the full pipeline for one company and prints the profile, the
 * pages it was built from and what the provider calls cost.
 *
 * Usage: OPENAI_API_KEY=... ANTHROPIC_API_KEY=... tsx examples/company-research.ts acme.com "Acme"
 */

import { createResearchPipeline, PipelineCancelledError, type ProgressEvent } from '../src/sdk.js';

async function main(): Promise<void> {
  const [url, name] = process.argv.slice(2);
  if (!url) {
    console.error('Usage: company-research <domain-or-url> [company name]');
    process.exit(1);
  }
  const companyName = name ?? url;

  const pipeline = createResearchPipeline({ overrides: { maxPrioritizedPages: 8, globalTimeoutMs: 120000 } });
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const result = await pipeline.research(
      { companyName, url },
      {
        signal: controller.signal,
        sink: {
          onEvent: (event: ProgressEvent) => console.error(`[${event.stage}] ${event.status}: ${event.detail}`),
        },
      }
    );

    const { fields, narrative, sourceUrls } = result.artifact;
    console.log(`\n${fields.companyName ?? companyName}`);
    console.log(`Industry: ${fields.industry ?? 'unknown'}`);
    console.log(`Founded: ${fields.foundingYear ?? 'unknown'}`);
    console.log(`Headquarters: ${fields.headquarters ?? 'unknown'}`);
    if (fields.services.length > 0) {
      console.log(`Services: ${fields.services.join(', ')}`);
    }
    console.log(`\n${narrative}\n`);
    console.log(`Sources (${sourceUrls.length}):`);
    for (const source of sourceUrls) console.log(`  ${source}`);

    const cost = result.providerCalls.reduce((sum, call) => sum + call.estimatedCostUsd, 0);
    console.log(`\n${result.providerCalls.length} model calls, ~$${cost.toFixed(4)}, ${result.durationMs}ms`);
    for (const warning of result.warnings) console.log(`Warning ${warning.code}: ${warning.message}`);
  } catch (error) {
    if (error instanceof PipelineCancelledError) {
      console.error(`Stopped (${error.reason}) after ${error.partial.batch?.results.length ?? 0} pages`);
      process.exit(130);
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
