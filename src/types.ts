// Aria snapshot tree. Nodes are created fresh per parse and owned by the caller.

export type AriaCheckedState = boolean | "mixed";

export interface AriaName {
  value: string;
  isRegex: boolean;
}

export interface AriaTemplateNode {
  kind: "node";
  role: string;
  name?: AriaName;
  ref?: string;
  checked?: AriaCheckedState;
  pressed?: AriaCheckedState;
  disabled?: boolean;
  expanded?: boolean;
  active?: boolean;
  selected?: boolean;
  level?: number;
  props: Record<string, string>;
  children: AriaChild[];
}

// Literal text content under a node.
export type AriaTextLeaf = string;

export type AriaChild = AriaTemplateNode | AriaTextLeaf;

export type AriaTree = AriaChild[];

export interface ParseError {
  line?: number;
  message: string;
}

export interface ParseResult {
  tree: AriaTree | undefined;
  errors: ParseError[];
}

// Plain data form, shared by the query engine, flattener, cache and formatter.
export interface SerializedName {
  value: string;
  is_regex: boolean;
}

export interface SerializedNode {
  role: string;
  name?: SerializedName;
  ref?: string;
  checked?: AriaCheckedState;
  disabled?: boolean;
  expanded?: boolean;
  active?: boolean;
  level?: number;
  pressed?: AriaCheckedState;
  selected?: boolean;
  props?: Record<string, string>;
  children: SerializedChild[];
}

export type SerializedChild = SerializedNode | string;

export type SerializedTree = SerializedChild[];

export interface FlatEntry {
  [key: string]: unknown;
  _depth: number;
  _parent_role: string | null;
  _index: number;
}

// Response errors
export type ErrorCode =
  | "PARSE_FAILED"
  | "QUERY_FAILED"
  | "CACHE_MISS"
  | "INVALID_ARGUMENT"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  code: ErrorCode;
  message: string;
}

export type OutputFormat = "json" | "yaml";

export interface Page {
  items: unknown[];
  total: number;
  offset: number;
  limit: number;
  hasMore: boolean;
}

export interface SnapshotRequest {
  snapshot?: string;
  sourceUrl?: string;
  cacheKey?: string;
  query?: string;
  flatten?: boolean;
  offset?: number;
  limit?: number;
  outputFormat?: OutputFormat;
  silent?: boolean;
  ttlSeconds?: number;
}

export interface SnapshotResponse {
  version: 1;
  ok: boolean;
  url: string;
  cacheKey: string;
  totalItems: number;
  offset: number;
  limit: number;
  hasMore: boolean;
  snapshot: string | null;
  queryApplied: string | null;
  outputFormat: OutputFormat;
  errors: ErrorDetail[];
  timingMs: number;
}

export interface BulkStep {
  query?: string;
  flatten?: boolean;
  offset?: number;
  limit?: number;
  outputFormat?: OutputFormat;
}

export interface BulkRequest {
  snapshot?: string;
  sourceUrl?: string;
  cacheKey?: string;
  steps: BulkStep[];
  stopOnError?: boolean;
}

export interface BulkResponse {
  version: 1;
  ok: boolean;
  cacheKey: string;
  executedCount: number;
  totalCount: number;
  results: SnapshotResponse[];
  stoppedAt: number | null;
  timingMs: number;
}
