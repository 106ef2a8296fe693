export class MarqueeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MarqueeError';
  }
}

/** Raised for unknown and expired context ids alike. */
export class ContextNotFoundError extends MarqueeError {
  constructor(public readonly contextId: string) {
    super(`Context not found or expired: ${contextId}`);
    this.name = 'ContextNotFoundError';
  }
}

export class ToolNotFoundError extends MarqueeError {
  constructor(public readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = 'ToolNotFoundError';
  }
}

export class CatalogError extends MarqueeError {
  constructor(message: string) {
    super(`Catalog error: ${message}`);
    this.name = 'CatalogError';
  }
}

export class ConfigError extends MarqueeError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}
