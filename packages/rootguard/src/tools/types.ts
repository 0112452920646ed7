import type { ZodType } from "zod";
import type { FileMutationEngine } from "../mutation/engine.js";
import type { ResolvedPath } from "../paths/resolver.js";
import type { RootSet } from "../roots/registry.js";
import type { TraversalEngine } from "../traversal/engine.js";

export interface TextContent {
  type: "text";
  text: string;
}

export interface MediaContent {
  type: "image" | "audio";
  /** Base64-encoded bytes */
  data: string;
  mimeType: string;
}

export interface BlobResourceContent {
  type: "resource";
  resource: { uri: string; mimeType: string; blob: string };
}

export type ToolContent = TextContent | MediaContent | BlobResourceContent;

/**
 * Result of a tool call as it crosses the protocol boundary.
 */
export interface ToolResult {
  content: ToolContent[];
  isError?: boolean;
}

/**
 * Behaviour hints advertised to clients.
 */
export interface ToolAnnotations {
  readOnlyHint: boolean;
  idempotentHint?: boolean;
  destructiveHint?: boolean;
}

/**
 * Output limits applied by the tools.
 */
export interface ToolLimits {
  /** Characters returned by a whole-file text read before truncating */
  maxReadCharacters: number;
  /** Files read by one read_multiple_files call */
  maxFiles: number;
  treeMaxDepth: number;
  treeMaxEntries: number;
  /** Default page size of search_files */
  searchLimit: number;
  /** Default page size of the directory listings */
  listLimit: number;
}

export const DEFAULT_TOOL_LIMITS: ToolLimits = {
  maxReadCharacters: 500_000,
  maxFiles: 20,
  treeMaxDepth: 5,
  treeMaxEntries: 1000,
  searchLimit: 200,
  listLimit: 500,
};

/**
 * Everything a tool needs for one call. `roots` is the snapshot taken when
 * the call started; `resolve` confines paths against that same snapshot.
 */
export interface ToolContext {
  roots: RootSet;
  resolve(requestedPath: string, mustExist: boolean): Promise<ResolvedPath>;
  mutation: FileMutationEngine;
  traversal: TraversalEngine;
  limits: ToolLimits;
}

/**
 * What a tool's `execute` may return: plain text or full content blocks.
 */
export type ToolExecuteReturn = string | ToolContent[];

/**
 * JSON Schema of a tool's arguments as listed to clients.
 */
export interface ToolInputSchema {
  type: "object";
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

export interface Tool {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  /** Zod schema of the arguments */
  readonly schema: ZodType;
  readonly annotations: ToolAnnotations;
  /**
   * Validates raw arguments against {@link schema} and runs the tool.
   *
   * @throws InvalidArgumentsError, or whatever the operation rejects with
   */
  run(args: unknown, context: ToolContext): Promise<ToolResult>;
}
