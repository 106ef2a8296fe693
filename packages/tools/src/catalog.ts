import { readFile, readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  type ToolDefinition,
  CatalogError,
  ToolNotFoundError,
  catalogFileSchema,
} from '@marquee/shared';
import { mcpToolToToolDefinition } from './mcp/schema-bridge.js';

export const BUILTIN_CATALOG_DIR = fileURLToPath(new URL('../catalog/', import.meta.url));

/**
 * The set of tool definitions the server knows about. Validator schemas and
 * the advertised tool list are both derived from it.
 */
export class ToolCatalog {
  private tools = new Map<string, ToolDefinition>();

  constructor(tools: Iterable<ToolDefinition> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new CatalogError(`duplicate tool name: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  require(name: string): ToolDefinition {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  /**
   * New catalog containing only the named tools. Without a list, or with an
   * empty one, every tool is kept. Unknown names are ignored.
   */
  createFiltered(allowedTools?: string[]): ToolCatalog {
    if (!allowedTools || allowedTools.length === 0) {
      return new ToolCatalog(this.tools.values());
    }
    const allowed = new Set(allowedTools);
    return new ToolCatalog(this.list().filter(t => allowed.has(t.name)));
  }

  withoutTools(disabledTools: string[]): ToolCatalog {
    const disabled = new Set(disabledTools);
    return new ToolCatalog(this.list().filter(t => !disabled.has(t.name)));
  }
}

export async function loadCatalogFile(path: string): Promise<ToolDefinition[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new CatalogError(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = catalogFileSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogError(
      `invalid tool file ${path}: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }

  const tag = basename(path, '.json');
  return result.data.map(tool => mcpToolToToolDefinition(tool, [tag]));
}

export async function loadCatalogDirectory(dir: string): Promise<ToolDefinition[]> {
  const files = (await readdir(dir)).filter(f => f.endsWith('.json')).sort();
  const tools: ToolDefinition[] = [];
  for (const file of files) {
    tools.push(...await loadCatalogFile(join(dir, file)));
  }
  return tools;
}

export interface LoadCatalogOptions {
  extraDirs?: string[];
  disabledTools?: string[];
  /** Skip the tool files shipped with this package. */
  skipBuiltin?: boolean;
}

export async function loadCatalog(options: LoadCatalogOptions = {}): Promise<ToolCatalog> {
  const dirs = options.skipBuiltin ? [] : [BUILTIN_CATALOG_DIR];
  dirs.push(...options.extraDirs ?? []);

  const catalog = new ToolCatalog();
  for (const dir of dirs) {
    for (const tool of await loadCatalogDirectory(dir)) {
      catalog.register(tool);
    }
  }

  return options.disabledTools?.length ? catalog.withoutTools(options.disabledTools) : catalog;
}
