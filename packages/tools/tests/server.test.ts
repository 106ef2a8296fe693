import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ContextManager, type Logger } from '@marquee/core';
import { loadCatalog, type ToolCatalog } from '../src/catalog.js';
import { createFixtureSearch } from '../src/fixture-search.js';
import { ToolDispatcher, createMarqueeServer, type MarqueeServerOptions } from '../src/mcp/server.js';

function textOf(result: CallToolResult): string {
  const first = result.content[0];
  if (first?.type !== 'text') {
    throw new Error('expected text content');
  }
  return first.text;
}

function jsonOf(result: CallToolResult): unknown {
  return JSON.parse(textOf(result));
}

function recordingLogger() {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

const movies = Array.from({ length: 7 }, (_, i) => ({
  id: i + 1,
  title: `Noir ${i + 1}`,
  genres: i % 2 === 0 ? ['Drama'] : ['Comedy'],
}));

let catalog: ToolCatalog;

beforeAll(async () => {
  catalog = await loadCatalog();
});

function createDispatcher(overrides: Partial<MarqueeServerOptions> = {}) {
  let n = 0;
  const contexts = new ContextManager({ generateId: () => `ctx_${++n}` });
  const dispatcher = new ToolDispatcher({ catalog, contexts, ...overrides });
  return { dispatcher, contexts };
}

describe('ToolDispatcher', () => {
  it('lists only tools it can run', () => {
    const { dispatcher } = createDispatcher();

    expect(dispatcher.listTools().map(t => t.name)).toEqual([
      'get_context_page',
      'get_context_info',
      'validate_tool_call',
    ]);
  });

  it('lists handled catalog tools and the search built-in when enabled', () => {
    const { dispatcher } = createDispatcher({
      handlers: { get_movie: async () => ({}) },
      search: createFixtureSearch(movies),
    });

    expect(dispatcher.listTools().map(t => t.name)).toEqual([
      'create_search_context',
      'get_context_page',
      'get_context_info',
      'get_movie',
      'validate_tool_call',
    ]);
    expect(dispatcher.isCallable('add_movie')).toBe(false);
  });

  it('ignores handlers for tools outside the catalog', () => {
    const logger = recordingLogger();
    const { dispatcher } = createDispatcher({ logger, handlers: { launch_rocket: async () => 1 } });

    expect(dispatcher.isCallable('launch_rocket')).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('handler has no catalog schema, not exposed', { tool: 'launch_rocket' });
  });

  it('refuses catalog tools without an implementation', async () => {
    const { dispatcher } = createDispatcher();

    await expect(dispatcher.call('add_movie', { title: 'Heat' })).rejects.toThrow('Tool not available: add_movie');
  });

  it('returns validation failures as error results without running the handler', async () => {
    const handler = vi.fn(async () => ({ id: 1 }));
    const { dispatcher } = createDispatcher({ handlers: { get_movie: handler } });

    const result = await dispatcher.call('get_movie', { movie_id: 0 });

    expect(result.isError).toBe(true);
    expect(jsonOf(result)).toEqual({
      valid: false,
      errors: [{ field: 'movie_id', value: '0', message: 'Value must be at least 1', code: 'VALUE_TOO_SMALL' }],
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it('reports unknown tools through the validator', async () => {
    const { dispatcher } = createDispatcher();

    const result = await dispatcher.call('frobnicate', undefined);

    expect(result.isError).toBe(true);
    expect(jsonOf(result)).toEqual({
      valid: false,
      errors: [{ field: 'tool_name', value: 'frobnicate', message: 'Unknown tool: frobnicate', code: 'UNKNOWN_TOOL' }],
    });
  });

  it('validates a call on request', async () => {
    const { dispatcher } = createDispatcher();

    const result = await dispatcher.call('validate_tool_call', {
      tool_name: 'add_movie',
      arguments: { director: 'X', year: 1999 },
    });

    expect(result.isError).toBe(false);
    expect(jsonOf(result)).toEqual({
      valid: false,
      errors: [{ field: 'title', value: '', message: "Required field 'title' is missing", code: 'REQUIRED_FIELD_MISSING' }],
    });
  });

  it('passes valid arguments to the domain handler', async () => {
    const handler = vi.fn(async (args: Record<string, unknown>) => ({ id: args.movie_id, title: 'Heat' }));
    const { dispatcher } = createDispatcher({ handlers: { get_movie: handler } });

    const result = await dispatcher.call('get_movie', { movie_id: 7 });

    expect(handler).toHaveBeenCalledWith({ movie_id: 7 });
    expect(textOf(result)).toBe(JSON.stringify({ id: 7, title: 'Heat' }, null, 2));
  });

  it('wraps long handler results into a context', async () => {
    const { dispatcher, contexts } = createDispatcher({
      inlineResultLimit: 5,
      handlers: { list_top_movies: async () => movies },
    });

    const reply = jsonOf(await dispatcher.call('list_top_movies', { limit: 7 }));

    expect(reply).toMatchObject({ paginated: true, context: { id: 'ctx_1', total: 7, pageSize: 50, totalPages: 1 } });
    expect(contexts.getPage('ctx_1', 1).data).toEqual(movies);
  });

  it('returns short handler results inline', async () => {
    const { dispatcher } = createDispatcher({
      inlineResultLimit: 10,
      handlers: { list_top_movies: async () => movies },
    });

    expect(jsonOf(await dispatcher.call('list_top_movies', {}))).toEqual(movies);
  });

  it('reports handler failures as error results', async () => {
    const logger = recordingLogger();
    const { dispatcher } = createDispatcher({
      logger,
      handlers: { get_movie: async () => { throw new Error('store offline'); } },
    });

    const result = await dispatcher.call('get_movie', { movie_id: 1 });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error executing get_movie: store offline' }],
      isError: true,
    });
    expect(logger.error).toHaveBeenCalledWith('tool handler failed', { tool: 'get_movie', error: 'store offline' });
  });

  it('pages through a search context', async () => {
    const { dispatcher } = createDispatcher({ search: createFixtureSearch(movies) });

    const info = jsonOf(await dispatcher.call('create_search_context', {
      search_criteria: { genres: 'drama' },
      page_size: 3,
    }));
    expect(info).toMatchObject({ id: 'ctx_1', total: 4, pageSize: 3, totalPages: 2 });

    const page = jsonOf(await dispatcher.call('get_context_page', { context_id: 'ctx_1', page: 2 }));
    expect(page).toMatchObject({
      contextId: 'ctx_1',
      data: [movies[6]],
      page: 2,
      hasNext: false,
      hasPrevious: true,
    });

    const resized = jsonOf(await dispatcher.call('get_context_page', { context_id: 'ctx_1', page: 1, page_size: 4 }));
    expect(resized).toMatchObject({ data: [movies[0], movies[2], movies[4], movies[6]], totalPages: 1 });

    const described = jsonOf(await dispatcher.call('get_context_info', { context_id: 'ctx_1' }));
    expect(described).toMatchObject({ id: 'ctx_1', total: 4 });
  });

  it('maps missing contexts to invalid params', async () => {
    const { dispatcher } = createDispatcher();

    await expect(dispatcher.call('get_context_info', { context_id: 'ctx_gone' }))
      .rejects.toThrow('Context not found or expired: ctx_gone');
  });
});

describe('createMarqueeServer', () => {
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    client = undefined;
  });

  async function connect(options: Partial<MarqueeServerOptions> = {}): Promise<Client> {
    const server = createMarqueeServer({ catalog, contexts: new ContextManager(), ...options });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const connected = new Client({ name: 'marquee-test', version: '0.0.0' });
    await connected.connect(clientTransport);
    client = connected;
    return connected;
  }

  it('advertises tools with their JSON Schema', async () => {
    const mcp = await connect({ handlers: { get_movie: async () => ({}) } });

    const { tools } = await mcp.listTools();
    const getMovie = tools.find(t => t.name === 'get_movie');

    expect(tools).toHaveLength(4);
    expect(getMovie?.inputSchema).toEqual({
      type: 'object',
      properties: { movie_id: { type: 'integer', description: 'The movie ID', minimum: 1 } },
      required: ['movie_id'],
    });
  });

  it('answers tool calls over the protocol', async () => {
    const mcp = await connect();

    const result = await mcp.callTool({ name: 'validate_tool_call', arguments: { tool_name: 'nope', arguments: {} } });

    expect(result.isError).toBe(false);
    expect(result.content).toEqual([{
      type: 'text',
      text: JSON.stringify({
        valid: false,
        errors: [{ field: 'tool_name', value: 'nope', message: 'Unknown tool: nope', code: 'UNKNOWN_TOOL' }],
      }, null, 2),
    }]);
  });

  it('surfaces missing contexts as protocol errors', async () => {
    const mcp = await connect();

    await expect(mcp.callTool({ name: 'get_context_page', arguments: { context_id: 'ctx_x', page: 1 } }))
      .rejects.toThrow('Context not found or expired: ctx_x');
  });
});
