import { isRootguardError } from "../core/errors.js";
import { defaultLogger, type ILogObj, type Logger } from "../logging/logger.js";
import { FileMutationEngine } from "../mutation/engine.js";
import { PathResolver } from "../paths/resolver.js";
import type { RootRegistry } from "../roots/registry.js";
import { TraversalEngine } from "../traversal/engine.js";
import { builtinTools } from "./builtins.js";
import { toInputJsonSchema } from "./create-tool.js";
import {
  DEFAULT_TOOL_LIMITS,
  type Tool,
  type ToolAnnotations,
  type ToolContext,
  type ToolInputSchema,
  type ToolLimits,
  type ToolResult,
} from "./types.js";

export interface ToolDispatcherOptions {
  registry: RootRegistry;
  resolver?: PathResolver;
  mutation?: FileMutationEngine;
  traversal?: TraversalEngine;
  limits?: Partial<ToolLimits>;
  logger?: Logger<ILogObj>;
  /** Tools to register instead of {@link builtinTools} */
  tools?: readonly Tool[];
}

/**
 * Listing entry for a registered tool.
 */
export interface ToolDescriptor {
  name: string;
  title: string;
  description: string;
  inputSchema: ToolInputSchema;
  annotations: ToolAnnotations & { title: string };
}

/**
 * Maps tool calls to the core engines.
 *
 * Each call works against one snapshot of the roots, taken when it starts,
 * so a concurrent roots update never changes the rules halfway through an
 * operation. Every failure comes back as an error result naming its code;
 * nothing is retried.
 *
 * @example
 * ```typescript
 * const dispatcher = new ToolDispatcher({ registry });
 * const result = await dispatcher.call("read_text_file", { path: "/srv/notes/todo.md" });
 * ```
 */
export class ToolDispatcher {
  private readonly tools = new Map<string, Tool>();
  private readonly registry: RootRegistry;
  private readonly resolver: PathResolver;
  private readonly mutation: FileMutationEngine;
  private readonly traversal: TraversalEngine;
  private readonly limits: ToolLimits;
  private readonly logger: Logger<ILogObj>;

  constructor(options: ToolDispatcherOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "dispatcher" });
    this.resolver =
      options.resolver ?? new PathResolver({ logger: this.logger.getSubLogger({ name: "resolver" }) });
    this.mutation =
      options.mutation ??
      new FileMutationEngine({ logger: this.logger.getSubLogger({ name: "mutation" }) });
    this.traversal =
      options.traversal ??
      new TraversalEngine({ logger: this.logger.getSubLogger({ name: "traversal" }) });
    this.limits = { ...DEFAULT_TOOL_LIMITS, ...options.limits };

    for (const tool of options.tools ?? builtinTools) {
      this.register(tool);
    }
  }

  /**
   * @throws Error when a tool with the same name is already registered
   */
  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listTools(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      title: tool.title,
      description: tool.description,
      inputSchema: toInputJsonSchema(tool),
      annotations: { title: tool.title, ...tool.annotations },
    }));
  }

  /**
   * Runs a tool. Never rejects: failures become `isError` results whose
   * text is `Error [CODE]: message`.
   */
  async call(name: string, args: unknown): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return errorResult("UNKNOWN_TOOL", `Unknown tool: ${name}`);
    }

    const snapshot = this.registry.snapshot();
    const context: ToolContext = {
      roots: snapshot.roots,
      resolve: (requestedPath, mustExist) => this.resolver.resolve(requestedPath, snapshot, mustExist),
      mutation: this.mutation,
      traversal: this.traversal,
      limits: this.limits,
    };

    try {
      const result = await tool.run(args, context);
      this.logger.debug("Tool call succeeded", { tool: name });
      return result;
    } catch (error) {
      if (isRootguardError(error)) {
        this.logger.debug("Tool call failed", { tool: name, code: error.code });
        return errorResult(error.code, error.message);
      }
      this.logger.error("Tool call failed unexpectedly", { tool: name, error });
      return errorResult("INTERNAL_ERROR", error instanceof Error ? error.message : String(error));
    }
  }
}

export function errorResult(code: string, message: string): ToolResult {
  return { isError: true, content: [{ type: "text", text: `Error [${code}]: ${message}` }] };
}
