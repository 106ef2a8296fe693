export { generateId } from './id.js';
export { systemClock, isoNow, type Clock } from './clock.js';
export { describeType, valueToText, type ValueKind } from './text.js';
export {
  MarqueeError,
  ContextNotFoundError,
  ToolNotFoundError,
  CatalogError,
  ConfigError,
} from './errors.js';
