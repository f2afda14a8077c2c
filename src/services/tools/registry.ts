// Tool Registry - fixed set of tools known to the orchestrator
// Built once per agent; the catalog text is what the model sees.

import { isToolName, type ToolDefinition, type ToolName } from './types.js';

export class ToolRegistry {
  private readonly tools = new Map<ToolName, ToolDefinition>();

  constructor(tools: ToolDefinition[]) {
    for (const tool of tools) {
      if (!isToolName(tool.name)) {
        throw new Error(`Unknown tool name "${tool.name}"`);
      }
      if (this.tools.has(tool.name)) {
        throw new Error(`Tool "${tool.name}" registered twice`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  /** Looks up a name taken from model output. */
  get(name: string): ToolDefinition | undefined {
    return isToolName(name) ? this.tools.get(name) : undefined;
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  get size(): number {
    return this.tools.size;
  }

  renderCatalog(): string {
    return this.getAll()
      .map(tool => {
        const params = tool.parameters.map(p => {
          const flags = p.required ? p.type : `${p.type}, optional`;
          const choices = p.enum ? ` One of: ${p.enum.join(', ')}.` : '';
          return `    - ${p.name} (${flags}): ${p.description}${choices}`;
        });
        return [`- ${tool.name}: ${tool.description}`, ...params].join('\n');
      })
      .join('\n');
  }
}
