/**
 * MCP Module Exports
 */

export {
  jsonResponse,
  errorResponse,
  formatResearchResult,
  formatDiscoveryReport,
  RESPONSE_SCHEMA_VERSION,
  type McpResponse,
  type ResearchFormatOptions,
} from './response-formatters.js';

export { researchCompanySchema, discoverLinksSchema, getAllToolSchemas } from './tool-schemas.js';

export * from './handlers/index.js';
