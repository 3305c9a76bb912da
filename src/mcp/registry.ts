// This module holds the immutable, ordered set of tools the engine advertises and dispatches to.

import { z, type ZodType, type ZodTypeDef } from 'zod';
import type { McpTool } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { toInputSchema } from './tool-schemas.js';

export type ToolOutcome = { ok: true; text: string } | { ok: false; message: string };

export interface ToolDefinition<TArgs> {
  name: string;
  description: string;
  schema: ZodType<TArgs, ZodTypeDef, unknown>;
  // Prefix for collaborator failures, e.g. "Weather API error".
  failureLabel: string;
  execute(args: TArgs): Promise<ToolOutcome>;
}

export interface RegisteredTool {
  descriptor: McpTool;
  failureLabel: string;
  invoke(rawArgs: Record<string, unknown>): Promise<ToolOutcome>;
}

// This helper binds a typed definition to its argument parser so the registry can hold tools of mixed shapes.
export function defineTool<TArgs>(definition: ToolDefinition<TArgs>): RegisteredTool {
  return {
    descriptor: {
      name: definition.name,
      description: definition.description,
      inputSchema: toInputSchema(definition.schema)
    },
    failureLabel: definition.failureLabel,
    async invoke(rawArgs) {
      try {
        return await definition.execute(definition.schema.parse(rawArgs));
      } catch (error) {
        if (error instanceof z.ZodError) {
          const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
          throw new AppError(400, 'validation_error', `Invalid arguments: ${issues.join('; ')}`, error.flatten());
        }
        throw error;
      }
    }
  };
}

export class ToolRegistry {
  private readonly byName: ReadonlyMap<string, RegisteredTool>;
  private readonly descriptors: readonly McpTool[];

  public constructor(tools: readonly RegisteredTool[]) {
    const byName = new Map<string, RegisteredTool>();
    for (const tool of tools) {
      if (byName.has(tool.descriptor.name)) {
        throw new AppError(500, 'duplicate_tool', `Tool already registered: ${tool.descriptor.name}`);
      }
      byName.set(tool.descriptor.name, tool);
    }

    this.byName = byName;
    this.descriptors = Object.freeze(tools.map((tool) => tool.descriptor));
  }

  // Registration order is the listing order.
  public list(): McpTool[] {
    return [...this.descriptors];
  }

  public get(name: string): RegisteredTool | undefined {
    return this.byName.get(name);
  }

  public get size(): number {
    return this.byName.size;
  }
}
