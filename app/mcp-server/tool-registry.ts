import z from 'zod/v3';

import { SchemaValidationError, UnknownToolError } from '@app/errors.js';

export type ToolGroup = 'category' | 'company' | 'invoice' | 'upload';

export type ToolInput<I extends z.ZodRawShape> = z.objectOutputType<I, z.ZodTypeAny>;
export type ToolOutput<O extends z.ZodRawShape> = z.objectOutputType<O, z.ZodTypeAny>;

export interface ToolDescriptor<I extends z.ZodRawShape = z.ZodRawShape, O extends z.ZodRawShape = z.ZodRawShape> {
  readonly name: string;
  readonly group: ToolGroup;
  readonly title: string;
  readonly description: string;
  readonly inputSchema: I;
  readonly outputSchema: O;
  invoke(input: ToolInput<I>): Promise<ToolOutput<O>>;
}

export function defineTool<I extends z.ZodRawShape, O extends z.ZodRawShape>(descriptor: ToolDescriptor<I, O>): ToolDescriptor<I, O> {
  return Object.freeze(descriptor);
}

/**
 * Name-indexed tool table. Every tool is registered before `seal()`; afterwards the table is
 * read-only and dispatch only looks names up.
 */
export class ToolRegistry {
  #tools = new Map<string, ToolDescriptor>();
  #sealed = false;

  get sealed(): boolean {
    return this.#sealed;
  }

  get size(): number {
    return this.#tools.size;
  }

  register<I extends z.ZodRawShape, O extends z.ZodRawShape>(descriptor: ToolDescriptor<I, O>): void {
    if (this.#sealed) {
      throw new Error(`Cannot register tool ${descriptor.name} after the registry is sealed`);
    }
    if (this.#tools.has(descriptor.name)) {
      throw new Error(`Tool ${descriptor.name} is already registered`);
    }
    this.#tools.set(descriptor.name, descriptor);
  }

  seal(): this {
    this.#sealed = true;
    return this;
  }

  list(): ToolDescriptor[] {
    return Array.from(this.#tools.values());
  }

  get(name: string): ToolDescriptor {
    const tool = this.#tools.get(name);
    if (tool === undefined) {
      throw new UnknownToolError(name);
    }
    return tool;
  }

  async dispatch(name: string, input: unknown): Promise<Record<string, unknown>> {
    const tool = this.get(name);
    const parsed = z.object(tool.inputSchema).safeParse(input ?? {});
    if (!parsed.success) {
      throw new SchemaValidationError(`Invalid arguments for tool ${name}`, parsed.error.issues.map(function (issue) {
        return { path: issue.path.join('.'), message: issue.message };
      }));
    }
    return tool.invoke(parsed.data);
  }
}
