export { TOOL_NAMES } from './types.js';
export type { Tool, ToolContext, ToolName } from './types.js';
export { ToolRegistry, DEFAULT_TOOLS } from './registry.js';
export { discoverDatabaseSchema, discoverSchemaTool } from './discover-schema.js';
export { generateSqlQuery, generateSqlTool } from './generate-sql.js';
export { verifySqlQuery, verifySqlTool, describeVerdict, VERIFIED_MESSAGE } from './verify-sql.js';
export { executeSqlQuery, executeSqlTool } from './execute-sql.js';
export { formatResponse, formatResponseTool } from './format-response.js';
