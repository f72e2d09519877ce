export {
  researchCompanyArgsSchema,
  discoverLinksArgsSchema,
  parseToolArgs,
  runOverrides,
  LoggingProgressSink,
  handleResearchCompany,
  handleDiscoverLinks,
  dispatchToolCall,
  TOOL_NAMES,
  type ResearchCompanyArgs,
  type DiscoverLinksArgs,
  type ToolContext,
} from './research-handlers.js';
