export {
  jsonSchemaToFieldSchema,
  jsonSchemaToCallSchema,
  fieldSchemaToJsonSchema,
  callSchemaToJsonSchema,
  mcpToolToToolDefinition,
  toolDefinitionToMcpTool,
} from './schema-bridge.js';
export {
  ToolDispatcher,
  createMarqueeServer,
  type ToolHandler,
  type MarqueeServerOptions,
  type PaginatedReply,
} from './server.js';
