import { describe, it, expect } from 'vitest';
import {
  MarqueeError,
  ContextNotFoundError,
  ToolNotFoundError,
  CatalogError,
  ConfigError,
} from '../src/utils/errors.js';

describe('error classes', () => {
  it('carries the context id', () => {
    const err = new ContextNotFoundError('ctx_42');

    expect(err).toBeInstanceOf(MarqueeError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ContextNotFoundError');
    expect(err.contextId).toBe('ctx_42');
    expect(err.message).toBe('Context not found or expired: ctx_42');
  });

  it('prefixes messages by area', () => {
    expect(new ToolNotFoundError('get_movie').message).toBe('Tool not found: get_movie');
    expect(new CatalogError('duplicate tool name: x').message).toBe('Catalog error: duplicate tool name: x');
    expect(new ConfigError('bad level').message).toBe('Configuration error: bad level');
  });
});
