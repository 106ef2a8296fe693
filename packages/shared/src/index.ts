export type {
  StringFormat,
  StringFieldSchema,
  IntegerFieldSchema,
  NumberFieldSchema,
  BooleanFieldSchema,
  ArrayFieldSchema,
  ObjectFieldSchema,
  UnsupportedFieldSchema,
  FieldSchema,
  CallSchema,
  ToolDefinition,
  McpToolDescriptor,
} from './types/tool.js';
export type { ValidationErrorCode, ValidationError, ValidationResult } from './types/validation.js';
export type { ContextInfo, PageView, CreateContextOptions } from './types/context.js';
export type {
  LogLevel,
  PaginationConfig,
  LoggingConfig,
  CatalogConfig,
  ServerConfig,
  MarqueeConfig,
} from './types/config.js';
export {
  logLevelSchema,
  paginationConfigSchema,
  loggingConfigSchema,
  catalogConfigSchema,
  serverConfigSchema,
  marqueeConfigSchema,
} from './schemas/config.schema.js';
export {
  jsonSchemaPropertySchema,
  mcpToolDescriptorSchema,
  catalogFileSchema,
  validateToolCallArgsSchema,
  contextPageArgsSchema,
  contextInfoArgsSchema,
  searchContextArgsSchema,
} from './schemas/tool.schema.js';
export { DEFAULT_CONFIG, CONTEXT_ID_PREFIX, TOOL_NAME_FIELD, BUILTIN_TOOL_NAMES } from './constants.js';
export * from './utils/index.js';
