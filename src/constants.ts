/**
 * Application-wide constants and heuristics.
 *
 * Defines the language-specific manifest/entry-point definitions used by the
 * salience ranking, the default exclusion policy, the README section
 * vocabulary used by the merger, and the lookup tables loaded from `data/`.
 */

import fs from "node:fs";
import { z } from "zod";
import { FileCategory } from "./core/types.js";
import { SupportedLanguage } from "./types.js";

/** Language-specific heuristics for salience ranking. */
export interface LanguagesHeuristics {
  readonly manifests: readonly string[];
  readonly extensions: readonly string[];
  readonly signals: readonly string[];
  readonly ignoreDirs: readonly string[];
  /** Install/run conventions handed to the model for this language. */
  readonly hints: readonly string[];
}

const dataFile = (name: string) =>
  fs.readFileSync(new URL(`../data/${name}`, import.meta.url), "utf-8");

const HeuristicsSchema = z.object({
  manifests: z.array(z.string()),
  extensions: z.array(z.string()),
  signals: z.array(z.string()),
  ignoreDirs: z.array(z.string()),
  hints: z.array(z.string()),
});

const HeuristicsTableSchema = z.object({
  [SupportedLanguage.PY]: HeuristicsSchema,
  [SupportedLanguage.JS]: HeuristicsSchema,
  [SupportedLanguage.TS]: HeuristicsSchema,
  [SupportedLanguage.JAVA]: HeuristicsSchema,
  [SupportedLanguage.CS]: HeuristicsSchema,
  [SupportedLanguage.GO]: HeuristicsSchema,
  [SupportedLanguage.RUST]: HeuristicsSchema,
  [SupportedLanguage.CPP]: HeuristicsSchema,
  [SupportedLanguage.RUBY]: HeuristicsSchema,
  [SupportedLanguage.PHP]: HeuristicsSchema,
});

/** Language → heuristics mapping, loaded from `data/heuristics.json`. */
export const LANGUAGES_HEURISTICS: Record<SupportedLanguage, LanguagesHeuristics> =
  HeuristicsTableSchema.parse(JSON.parse(dataFile("heuristics.json")));

export const CATEGORY_SCORES: Record<FileCategory, number> = {
  [FileCategory.CONTEXT]: 100,
  [FileCategory.MANIFEST]: 80,
  [FileCategory.SIGNAL]: 60,
  [FileCategory.SOURCE]: 50,
  [FileCategory.OTHER]: 20,
} as const;

export const DEPTH_PENALTY = 5;
export const IGNORED_DIR_PENALTY = 100;

/** High-value context filenames (case-insensitive). */
export const UNIVERSAL_CONTEXT_FILES: readonly string[] = [
  "readme.md",
  "readme.txt",
  "architecture.md",
  "contributing.md",
  "design.md",
  "changelog.md",
  ".env.example",
  ".env.template",
  "docker-compose.yml",
  "docker-compose.yaml",
  "dockerfile",
  "makefile",
  "justfile",
  "procfile",
];

/** Exclusion globs applied by default, matched against repository-relative paths. */
export const DEFAULT_EXCLUDES: readonly string[] = [
  "**/.git",
  "**/node_modules",
  "**/__pycache__",
  "**/.venv",
  "**/venv",
  "**/target",
  "**/build",
  "**/dist",
  "**/.idea",
  "**/.vscode",
  "**/*.pyc",
  "**/*.pyo",
  "**/*.pyd",
  "**/.DS_Store",
  "**/*.log",
  "**/package-lock.json",
  "**/yarn.lock",
  "**/pnpm-lock.yaml",
  "**/go.sum",
  "**/cargo.lock",
  "**/Cargo.lock",
];

export const DEFAULT_MAX_FILE_BYTES = 256 * 1024;
export const DEFAULT_SNIFF_BYTES = 8000;

/** Section headings (normalized) the merger recognizes as README structure. */
export const RECOGNIZED_SECTIONS: readonly string[] = [
  "overview",
  "introduction",
  "about",
  "description",
  "features",
  "requirements",
  "prerequisites",
  "installation",
  "install",
  "setup",
  "getting started",
  "quick start",
  "quickstart",
  "usage",
  "examples",
  "configuration",
  "environment variables",
  "api",
  "api reference",
  "architecture",
  "project structure",
  "testing",
  "tests",
  "development",
  "deployment",
  "contributing",
  "license",
];

/** Headings whose sections are curated by hand unless explicitly marked generated. */
export const DEFAULT_PRESERVED_HEADINGS: readonly string[] = [
  "License",
  "Contributing",
  "Code of Conduct",
  "Security",
  "Authors",
  "Acknowledgements",
  "Changelog",
];

export const PRESERVE_MARKER = "<!-- readme-forge:preserve -->";
export const GENERATED_MARKER = "<!-- readme-forge:generated -->";

/** Extensions whose files are treated as binary without sniffing. */
export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set(
  z.array(z.string()).parse(JSON.parse(dataFile("binary-extensions.json"))),
);

/** Extension → language name, used for detection and the language histogram. */
export const LANGUAGE_BY_EXTENSION: Readonly<Record<string, string>> = z
  .record(z.string())
  .parse(JSON.parse(dataFile("languages.json")));
