import type { ToolDefinition, ValidationResult } from '@marquee/shared';

export function formatValidationResult(toolName: string, result: ValidationResult): string {
  if (result.valid) {
    return `[OK] ${toolName}: arguments are valid`;
  }

  const noun = result.errors.length === 1 ? 'error' : 'errors';
  const lines = [`[INVALID] ${toolName}: ${result.errors.length} ${noun}`];
  for (const err of result.errors) {
    const value = err.value === '' ? '' : ` (got: ${err.value})`;
    lines.push(`  ${err.code.padEnd(24)} ${err.field}: ${err.message}${value}`);
  }
  return lines.join('\n');
}

export function formatToolList(tools: readonly ToolDefinition[]): string {
  const lines: string[] = [`Available tools (${tools.length}):`, ''];
  for (const tool of tools) {
    const tags = tool.tags?.length ? ` [${tool.tags.join(', ')}]` : '';
    const required = tool.inputSchema.required.length
      ? ` (requires: ${tool.inputSchema.required.join(', ')})`
      : '';
    lines.push(`  ${tool.name}${tags}`);
    lines.push(`    ${tool.description}${required}`);
    lines.push('');
  }
  return lines.join('\n');
}

