import type { SupportedLanguage } from "../types.js";
import { FileMetadata } from "./file-metadata.js";
import type { RepositoryNode } from "./types.js";

export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Salience ranking: higher scores first, if scores equal, shallowest depth
 * first, then path order. Only included files take part.
 */
export function rankFiles(
  nodes: readonly RepositoryNode[],
  primaryLanguage: SupportedLanguage | null,
): FileMetadata[] {
  const ranked = nodes
    .filter((n) => n.kind == "file" && n.include)
    .map((n) => new FileMetadata(n.path, primaryLanguage));

  ranked.sort(
    (a, b) =>
      b.score - a.score ||
      a.depth - b.depth ||
      comparePaths(a.filePath, b.filePath),
  );

  return ranked;
}
