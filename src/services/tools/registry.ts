// Tool Registry
// Resolves canonical tool names and their aliases, case-insensitively, to tool specs

import { AppError } from '../../utils/errors.js';
import type { ToolDefinition, ToolKind, ToolParameter, ToolSpec } from './types.js';

export class ToolRegistry<K extends string = ToolKind> {
  private tools: Map<K, ToolSpec<K>> = new Map();
  // lowercased canonical name or alias -> canonical name
  private names: Map<string, K> = new Map();

  /**
   * Registers a tool. Duplicate canonical names and aliases claimed by two
   * tools are configuration errors and throw immediately.
   */
  register(tool: ToolDefinition<K>): void {
    const canonicalKey = tool.name.toLowerCase();
    const owner = this.names.get(canonicalKey);
    if (owner !== undefined) {
      throw AppError.configuration(`Tool name "${tool.name}" is already registered by "${owner}"`);
    }

    const aliasKeys = new Set<string>();
    for (const alias of tool.aliases) {
      const aliasKey = alias.trim().toLowerCase();
      if (!aliasKey || aliasKey === canonicalKey) continue;

      const aliasOwner = this.names.get(aliasKey);
      if (aliasOwner !== undefined) {
        throw AppError.configuration(
          `Alias "${alias}" of tool "${tool.name}" is already registered by "${aliasOwner}"`,
        );
      }
      aliasKeys.add(aliasKey);
    }

    const spec: ToolSpec<K> = Object.freeze({
      name: tool.name,
      aliases: Object.freeze([...aliasKeys]),
      description: tool.description,
      parameters: Object.freeze(tool.parameters.map(p => Object.freeze({ ...p }))),
      execute: tool.execute,
    });

    this.tools.set(tool.name, spec);
    this.names.set(canonicalKey, tool.name);
    for (const aliasKey of aliasKeys) {
      this.names.set(aliasKey, tool.name);
    }
  }

  /** Returns null (NotFound) when neither a canonical name nor an alias matches. */
  resolve(name: string): ToolSpec<K> | null {
    const canonical = this.names.get(name.trim().toLowerCase());
    if (canonical === undefined) return null;
    return this.tools.get(canonical) ?? null;
  }

  has(name: string): boolean {
    return this.resolve(name) !== null;
  }

  list(): ToolSpec<K>[] {
    return Array.from(this.tools.values());
  }

  toolNames(): K[] {
    return Array.from(this.tools.keys());
  }
}

/** Renders a call signature such as `compare_spending("category1", "category2"?, "year"?)`. */
export function formatUsage(tool: Pick<ToolSpec<string>, 'name' | 'parameters'>): string {
  const params = tool.parameters.map((p: ToolParameter) => `"${p.name}"${p.default !== undefined ? '?' : ''}`);
  return `${tool.name}(${params.join(', ')})`;
}
