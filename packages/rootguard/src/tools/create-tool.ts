/**
 * Function-based tool creation helper.
 *
 * Arguments are typed from the Zod schema and validated before `execute`
 * runs.
 *
 * @example
 * ```typescript
 * const echo = createTool({
 *   name: "echo",
 *   title: "Echo",
 *   description: "Returns its input",
 *   schema: z.object({ text: z.string() }),
 *   annotations: { readOnlyHint: true },
 *   execute: ({ text }) => text,
 * });
 * ```
 */

import * as z from "zod";
import { InvalidArgumentsError } from "../core/errors.js";
import type {
  Tool,
  ToolAnnotations,
  ToolContext,
  ToolExecuteReturn,
  ToolInputSchema,
  ToolResult,
} from "./types.js";

/**
 * Configuration for creating a tool.
 */
export interface CreateToolConfig<TSchema extends z.ZodType> {
  name: string;
  /** Short human-readable name */
  title: string;
  description: string;
  /** Zod schema for argument validation */
  schema: TSchema;
  annotations: ToolAnnotations;
  execute: (
    args: z.output<TSchema>,
    context: ToolContext,
  ) => ToolExecuteReturn | Promise<ToolExecuteReturn>;
}

export function createTool<TSchema extends z.ZodType>(config: CreateToolConfig<TSchema>): Tool {
  return {
    name: config.name,
    title: config.title,
    description: config.description,
    schema: config.schema,
    annotations: config.annotations,

    async run(args: unknown, context: ToolContext): Promise<ToolResult> {
      const parsed = config.schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new InvalidArgumentsError(
          `Invalid arguments for ${config.name}: ${z.prettifyError(parsed.error)}`,
        );
      }

      const output = await config.execute(parsed.data, context);
      return { content: typeof output === "string" ? [{ type: "text", text: output }] : output };
    },
  };
}

/**
 * JSON Schema of a tool's arguments, in the shape tool listings expect.
 */
export function toInputJsonSchema(tool: Tool): ToolInputSchema {
  const jsonSchema = z.toJSONSchema(tool.schema, { target: "draft-7", io: "input" });
  return { ...jsonSchema, type: "object" };
}
