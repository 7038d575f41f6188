import fs from "node:fs";
import path from "node:path";
import picomatch from "picomatch";
import {
  BINARY_EXTENSIONS,
  DEFAULT_EXCLUDES,
  DEFAULT_MAX_FILE_BYTES,
  DEFAULT_SNIFF_BYTES,
  LANGUAGE_BY_EXTENSION,
} from "../constants.js";
import { ScanError, errorMessage } from "../errors.js";
import { SupportedLanguage } from "../types.js";
import { dirExists } from "../utils.js";
import type {
  ExclusionPolicy,
  ExclusionReason,
  RepositoryNode,
  ScanIssue,
  ScanResult,
  ScanSummary,
} from "./types.js";

export const DEFAULT_POLICY: ExclusionPolicy = {
  exclude: DEFAULT_EXCLUDES,
  maxFileBytes: DEFAULT_MAX_FILE_BYTES,
  sniffBytes: DEFAULT_SNIFF_BYTES,
};

export function detectLanguage(filePath: string): string | null {
  const base = path.posix.basename(filePath).toLowerCase();
  if (base == "dockerfile") return "Docker";
  return LANGUAGE_BY_EXTENSION[path.posix.extname(base)] ?? null;
}

/** True when the first `sniffBytes` bytes of the file hold a NUL byte. */
export function hasNullByte(fullPath: string, sniffBytes: number): boolean {
  const fd = fs.openSync(fullPath, "r");
  try {
    const buffer = Buffer.alloc(sniffBytes);
    const read = fs.readSync(fd, buffer, 0, sniffBytes, 0);
    return buffer.subarray(0, read).includes(0);
  } finally {
    fs.closeSync(fd);
  }
}

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

class ScanWalker {
  public readonly nodes: RepositoryNode[] = [];
  public readonly issues: ScanIssue[] = [];
  /** Real paths of the directories on the current descent. */
  private readonly ancestors = new Set<string>();
  /** Targets outside the root already walked, by real path. */
  private readonly linkedTargets = new Map<string, string>();
  private rootReal = "";
  private readonly isExcluded: (relPath: string) => boolean;

  constructor(
    private readonly root: string,
    private readonly policy: ExclusionPolicy,
  ) {
    this.isExcluded =
      policy.exclude.length > 0
        ? picomatch([...policy.exclude], { dot: true })
        : () => false;
  }

  public walk(): void {
    this.rootReal = fs.realpathSync(this.root);
    this.ancestors.add(this.rootReal);
    this.walkDirectory(this.root, "");
  }

  private isInsideRoot(realPath: string): boolean {
    return realPath == this.rootReal || realPath.startsWith(this.rootReal + path.sep);
  }

  private walkDirectory(fullDir: string, relDir: string): void {
    let names: string[];
    try {
      names = fs.readdirSync(fullDir);
    } catch (err) {
      this.recordIssue(relDir || ".", `Cannot read directory: ${errorMessage(err)}`);
      if (relDir) this.replaceLast(relDir, "unreadable");
      return;
    }

    names.sort();

    for (const name of names) {
      const relPath = relDir ? `${relDir}/${name}` : name;
      this.visitEntry(path.join(fullDir, name), relPath);
    }
  }

  private visitEntry(fullPath: string, relPath: string): void {
    let stats: fs.Stats;
    let isLink = false;
    try {
      const lstats = fs.lstatSync(fullPath);
      isLink = lstats.isSymbolicLink();
      stats = isLink ? fs.statSync(fullPath) : lstats;
    } catch (err) {
      this.recordIssue(
        relPath,
        isLink
          ? `Broken symbolic link: ${errorMessage(err)}`
          : `Cannot stat path: ${errorMessage(err)}`,
      );
      this.push(relPath, "file", 0, isLink ? "broken-symlink" : "unreadable");
      return;
    }

    if (stats.isDirectory()) {
      if (this.isExcluded(relPath)) {
        this.push(relPath, "directory", 0, "pattern");
        return;
      }

      let realPath: string;
      try {
        realPath = fs.realpathSync(fullPath);
      } catch (err) {
        this.recordIssue(relPath, `Cannot resolve path: ${errorMessage(err)}`);
        this.push(relPath, "directory", 0, "unreadable");
        return;
      }

      if (this.ancestors.has(realPath)) {
        this.recordIssue(relPath, `Symbolic link cycle back to ${realPath}`);
        this.push(relPath, "directory", 0, "symlink-cycle");
        return;
      }

      if (isLink) {
        // A link into the repository is scanned under the real path instead.
        const seenAt = this.isInsideRoot(realPath)
          ? toPosix(path.relative(this.rootReal, realPath))
          : this.linkedTargets.get(realPath);
        if (seenAt !== undefined) {
          this.recordIssue(relPath, `Symbolic link to ${seenAt || "."}, scanned there`);
          this.push(relPath, "directory", 0, "symlink-duplicate");
          return;
        }
        this.linkedTargets.set(realPath, relPath);
      }

      this.ancestors.add(realPath);
      this.push(relPath, "directory", 0);
      this.walkDirectory(fullPath, relPath);
      this.ancestors.delete(realPath);
      return;
    }

    if (!stats.isFile()) {
      return;
    }

    this.push(relPath, "file", stats.size, this.fileExclusion(fullPath, relPath, stats.size));
  }

  private fileExclusion(
    fullPath: string,
    relPath: string,
    size: number,
  ): ExclusionReason | undefined {
    if (this.isExcluded(relPath)) return "pattern";
    if (BINARY_EXTENSIONS.has(path.posix.extname(relPath).toLowerCase())) {
      return "binary";
    }
    if (size > this.policy.maxFileBytes) return "too-large";

    try {
      if (hasNullByte(fullPath, this.policy.sniffBytes)) return "binary";
    } catch (err) {
      this.recordIssue(relPath, `Cannot read file: ${errorMessage(err)}`);
      return "unreadable";
    }

    return undefined;
  }

  private push(
    relPath: string,
    kind: RepositoryNode["kind"],
    size: number,
    reason?: ExclusionReason,
  ): void {
    this.nodes.push(
      Object.freeze({
        path: relPath,
        kind,
        size,
        language: kind == "file" ? detectLanguage(relPath) : null,
        include: reason === undefined,
        ...(reason ? { reason } : {}),
      }),
    );
  }

  /** Re-marks the directory node pushed just before its contents were read. */
  private replaceLast(relPath: string, reason: ExclusionReason): void {
    const last = this.nodes[this.nodes.length - 1];
    if (last && last.path == relPath) {
      this.nodes[this.nodes.length - 1] = Object.freeze({
        ...last,
        include: false,
        reason,
      });
    }
  }

  private recordIssue(relPath: string, message: string): void {
    this.issues.push({ path: relPath, message });
  }
}

function summarize(nodes: readonly RepositoryNode[]): ScanSummary {
  const files = nodes.filter((n) => n.kind == "file");
  const included = files.filter((n) => n.include);

  const languages: Record<string, number> = {};
  for (const file of included) {
    if (file.language) {
      languages[file.language] = (languages[file.language] ?? 0) + 1;
    }
  }

  return {
    totalFiles: files.length,
    includedFiles: included.length,
    binaryFiles: files.filter((n) => n.reason == "binary").map((n) => n.path),
    languages,
    primaryLanguage: primaryLanguageOf(languages),
  };
}

const SUPPORTED = new Set<string>(Object.values(SupportedLanguage));

function isSupportedLanguage(name: string): name is SupportedLanguage {
  return SUPPORTED.has(name);
}

/** Most frequent supported language; ties go to the alphabetically first name. */
export function primaryLanguageOf(
  languages: Readonly<Record<string, number>>,
): SupportedLanguage | null {
  let best: SupportedLanguage | null = null;
  let bestCount = 0;

  for (const name of Object.keys(languages).sort()) {
    const count = languages[name] ?? 0;
    if (isSupportedLanguage(name) && count > bestCount) {
      best = name;
      bestCount = count;
    }
  }

  return best;
}

/**
 * Walks a repository and classifies every entry. Unreadable entries are
 * excluded and recorded in `issues`; only an invalid root throws.
 */
export function scanRepository(
  root: string,
  policy: Partial<ExclusionPolicy> = {},
): ScanResult {
  const absoluteRoot = path.resolve(root);
  if (!dirExists(absoluteRoot)) {
    throw new ScanError(
      "Repository path does not exist or is not a directory.",
      absoluteRoot,
    );
  }

  const walker = new ScanWalker(absoluteRoot, { ...DEFAULT_POLICY, ...policy });
  walker.walk();

  const nodes = Object.freeze([...walker.nodes]);

  return Object.freeze({
    root: absoluteRoot,
    nodes,
    issues: Object.freeze([...walker.issues]),
    summary: summarize(nodes),
  });
}
