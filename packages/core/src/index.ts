export { ToolValidator, validateArguments, type ToolSchemaEntry } from './tool-validator.js';
export {
  validateField,
  validateString,
  validateInteger,
  validateNumber,
  validateArray,
  validateObject,
  itemPath,
  propertyPath,
} from './field-validators.js';
export { isValidDate, isValidUri, isValidEmail, isValidDateTime, FORMAT_CHECKS } from './formats.js';
export { ContextManager, totalPagesFor, type ContextManagerOptions } from './context-manager.js';
export { ConfigManager, CONFIG_FILE_NAMES, CONFIG_ENV_VARS } from './config-manager.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';
