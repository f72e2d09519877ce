/**
 * Progress Event Types for ResearchPipeline.research()
 *
 * The pipeline reports every stage transition, every finished page and
 * every provider call to an injected sink. Nothing is kept globally.
 */

export type PipelineStage =
  | 'resolution'      // Finding a website for a target without a URL
  | 'discovery'       // robots.txt, sitemaps, crawl
  | 'prioritization'  // Model-ranked page selection
  | 'extraction'      // Concurrent fetch + strategy chain
  | 'synthesis'       // Structured intelligence call
  | 'pipeline';       // Whole-run events

export type ProgressStatus = 'started' | 'progress' | 'completed' | 'failed';

export interface ProgressEvent {
  stage: PipelineStage;
  status: ProgressStatus;
  /** Human-readable description */
  detail: string;
  /** Milliseconds since the run started */
  elapsedMs: number;
  /** Page or site the event concerns */
  url?: string;
  data?: Record<string, unknown>;
}

/**
 * Consumer of progress events. Implementations must not block; a
 * throwing sink is logged and otherwise ignored.
 */
export interface ProgressSink {
  onEvent(event: ProgressEvent): void;
}

export function createProgressEvent(
  stage: PipelineStage,
  status: ProgressStatus,
  detail: string,
  startTime: number,
  extras?: { url?: string; data?: Record<string, unknown> }
): ProgressEvent {
  return {
    stage,
    status,
    detail,
    elapsedMs: Date.now() - startTime,
    ...(extras?.url !== undefined && { url: extras.url }),
    ...(extras?.data && { data: extras.data }),
  };
}

/**
 * Sink that keeps every event, for callers that want the full trace
 */
export class CollectingProgressSink implements ProgressSink {
  readonly events: ProgressEvent[] = [];

  onEvent(event: ProgressEvent): void {
    this.events.push(event);
  }

  byStage(stage: PipelineStage): ProgressEvent[] {
    return this.events.filter((event) => event.stage === stage);
  }
}
