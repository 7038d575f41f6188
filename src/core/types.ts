import type { Directive, SupportedLanguage } from "../types.js";

export enum FileCategory {
  CONTEXT = "context_file",
  MANIFEST = "manifest_file",
  SIGNAL = "signal_file",
  SOURCE = "source_file",
  OTHER = "other_file",
}

export type NodeKind = "file" | "directory";

export type ExclusionReason =
  | "pattern"
  | "too-large"
  | "binary"
  | "unreadable"
  | "symlink-cycle"
  | "symlink-duplicate"
  | "broken-symlink";

export interface RepositoryNode {
  readonly path: string;
  readonly kind: NodeKind;
  readonly size: number;
  readonly language: string | null;
  readonly include: boolean;
  readonly reason?: ExclusionReason;
}

export interface ScanIssue {
  readonly path: string;
  readonly message: string;
}

export interface ScanSummary {
  readonly totalFiles: number;
  readonly includedFiles: number;
  readonly binaryFiles: readonly string[];
  readonly languages: Readonly<Record<string, number>>;
  readonly primaryLanguage: SupportedLanguage | null;
}

export interface ScanResult {
  readonly root: string;
  readonly nodes: readonly RepositoryNode[];
  readonly issues: readonly ScanIssue[];
  readonly summary: ScanSummary;
}

export interface ExclusionPolicy {
  exclude: readonly string[];
  maxFileBytes: number;
  sniffBytes: number;
}

export type BudgetUnit = "chars" | "tokens";

export interface ContextExcerpt {
  readonly path: string;
  readonly language: string | null;
  readonly category: FileCategory;
  readonly score: number;
  readonly content: string;
  readonly size: number;
  readonly originalSize: number;
  readonly truncated: boolean;
}

export interface ContextChunk {
  readonly index: number;
  readonly excerpts: readonly ContextExcerpt[];
  readonly size: number;
}

export interface AssembledContext {
  readonly budget: number;
  readonly unit: BudgetUnit;
  readonly chunks: readonly ContextChunk[];
  /** Files left out because the chunk cap was reached. */
  readonly omitted: readonly string[];
  readonly truncated: readonly string[];
  readonly issues: readonly ScanIssue[];
}

export interface Dependencies {
  readonly ecosystem: string;
  readonly manifest: string;
  readonly packages: readonly string[];
}

export interface GitInfo {
  readonly branch: string | null;
  readonly remoteUrl: string | null;
  readonly lastCommit: {
    readonly hash: string;
    readonly subject: string;
    readonly author: string;
    readonly date: string;
  } | null;
}

/** Repository-level facts rendered ahead of the file excerpts. */
export interface RepositoryOverview {
  readonly name: string;
  readonly summary: ScanSummary;
  readonly files: readonly string[];
  readonly dependencies: readonly Dependencies[];
  readonly git: GitInfo | null;
  readonly omitted: readonly string[];
  readonly truncated: readonly string[];
}

export interface PromptPart {
  readonly index: number;
  readonly total: number;
}

export interface Prompt {
  readonly directive: Directive;
  readonly system: string;
  readonly body: string;
  readonly part: PromptPart;
}
