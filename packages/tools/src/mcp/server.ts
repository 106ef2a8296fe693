import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import {
  type ContextInfo,
  type McpToolDescriptor,
  BUILTIN_TOOL_NAMES,
  ContextNotFoundError,
  DEFAULT_CONFIG,
  contextInfoArgsSchema,
  contextPageArgsSchema,
  searchContextArgsSchema,
  validateToolCallArgsSchema,
} from '@marquee/shared';
import { ContextManager, ToolValidator, silentLogger, type Logger } from '@marquee/core';
import type { ToolCatalog } from '../catalog.js';
import type { SearchSource } from '../fixture-search.js';
import { toolDefinitionToMcpTool } from './schema-bridge.js';

export type ToolHandler = (args: Record<string, unknown>) => Promise<unknown>;

export interface MarqueeServerOptions {
  catalog: ToolCatalog;
  contexts: ContextManager;
  logger?: Logger;
  /** Domain handlers keyed by catalog tool name. */
  handlers?: Record<string, ToolHandler>;
  /** Enables `create_search_context`. */
  search?: SearchSource;
  inlineResultLimit?: number;
  info?: { name: string; version: string };
}

export interface PaginatedReply {
  paginated: true;
  context: ContextInfo;
}

function jsonResult(value: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    isError,
  };
}

function parseArgs<S extends z.ZodTypeAny>(schema: S, toolName: string, args: Record<string, unknown>): z.infer<S> {
  const result = schema.safeParse(args);
  if (!result.success) {
    throw new McpError(
      ErrorCode.InvalidParams,
      `Invalid arguments for ${toolName}: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return result.data;
}

/**
 * Validate-then-dispatch for every tool call. Arguments are checked against
 * the catalog before any handler runs; rejected calls come back as error
 * results carrying the full validation report.
 */
export class ToolDispatcher {
  private readonly validator: ToolValidator;
  private readonly routes = new Map<string, ToolHandler>();
  private readonly logger: Logger;
  private readonly inlineResultLimit: number;

  constructor(private readonly options: MarqueeServerOptions) {
    this.validator = new ToolValidator(options.catalog.list());
    this.logger = options.logger ?? silentLogger;
    this.inlineResultLimit = options.inlineResultLimit ?? DEFAULT_CONFIG.pagination.inlineResultLimit;

    this.registerBuiltins();
    for (const [name, handler] of Object.entries(options.handlers ?? {})) {
      if (!options.catalog.has(name)) {
        this.logger.warn('handler has no catalog schema, not exposed', { tool: name });
        continue;
      }
      this.routes.set(name, args => this.runDomainHandler(name, handler, args));
    }
  }

  listTools(): McpToolDescriptor[] {
    return this.options.catalog.list()
      .filter(tool => this.routes.has(tool.name))
      .map(toolDefinitionToMcpTool);
  }

  isCallable(name: string): boolean {
    return this.routes.has(name);
  }

  async call(name: string, rawArgs: Record<string, unknown> | undefined): Promise<CallToolResult> {
    const args = rawArgs ?? {};

    if (this.options.catalog.has(name) && !this.routes.has(name)) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool not available: ${name}`);
    }

    const validation = this.validator.validate(name, args);
    if (!validation.valid) {
      this.logger.info('tool call rejected', {
        tool: name,
        codes: validation.errors.map(e => e.code),
      });
      return jsonResult(validation, true);
    }

    const route = this.routes.get(name);
    if (!route) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool not available: ${name}`);
    }

    try {
      return jsonResult(await route(args));
    } catch (error) {
      if (error instanceof ContextNotFoundError) {
        throw new McpError(ErrorCode.InvalidParams, error.message);
      }
      if (error instanceof McpError) {
        throw error;
      }
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error('tool handler failed', { tool: name, error: errorMessage });
      return {
        content: [{ type: 'text', text: `Error executing ${name}: ${errorMessage}` }],
        isError: true,
      };
    }
  }

  private registerBuiltins(): void {
    const { contexts, search } = this.options;

    this.addBuiltin(BUILTIN_TOOL_NAMES.validateToolCall, async args => {
      const parsed = parseArgs(validateToolCallArgsSchema, BUILTIN_TOOL_NAMES.validateToolCall, args);
      return this.validator.validate(parsed.tool_name, parsed.arguments);
    });

    this.addBuiltin(BUILTIN_TOOL_NAMES.getContextPage, async args => {
      const parsed = parseArgs(contextPageArgsSchema, BUILTIN_TOOL_NAMES.getContextPage, args);
      return contexts.getPage(parsed.context_id, parsed.page, parsed.page_size);
    });

    this.addBuiltin(BUILTIN_TOOL_NAMES.getContextInfo, async args => {
      const parsed = parseArgs(contextInfoArgsSchema, BUILTIN_TOOL_NAMES.getContextInfo, args);
      return contexts.getInfo(parsed.context_id);
    });

    if (search) {
      this.addBuiltin(BUILTIN_TOOL_NAMES.createSearchContext, async args => {
        const parsed = parseArgs(searchContextArgsSchema, BUILTIN_TOOL_NAMES.createSearchContext, args);
        const results = await search(parsed.search_criteria);
        return contexts.create(results, { pageSize: parsed.page_size, query: parsed.search_criteria });
      });
    }
  }

  // Built-ins still need a catalog schema; without one the tool stays hidden
  private addBuiltin(name: string, handler: ToolHandler): void {
    if (this.options.catalog.has(name)) {
      this.routes.set(name, handler);
    }
  }

  private async runDomainHandler(
    name: string,
    handler: ToolHandler,
    args: Record<string, unknown>,
  ): Promise<unknown> {
    const output = await handler(args);
    if (Array.isArray(output) && output.length > this.inlineResultLimit) {
      const context = this.options.contexts.create(output, { query: { tool: name, arguments: args } });
      this.logger.info('result wrapped into context', { tool: name, contextId: context.id, total: context.total });
      const reply: PaginatedReply = { paginated: true, context };
      return reply;
    }
    return output;
  }
}

export function createMarqueeServer(options: MarqueeServerOptions): Server {
  const dispatcher = new ToolDispatcher(options);
  const info = options.info ?? DEFAULT_CONFIG.server;

  const server = new Server(
    { name: info.name, version: info.version },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: dispatcher.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async request =>
    dispatcher.call(request.params.name, request.params.arguments),
  );

  return server;
}
