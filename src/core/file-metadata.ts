import {
  CATEGORY_SCORES,
  DEPTH_PENALTY,
  IGNORED_DIR_PENALTY,
  LANGUAGES_HEURISTICS,
  UNIVERSAL_CONTEXT_FILES,
} from "../constants.js";
import { SupportedLanguage } from "../types.js";
import { FileCategory } from "./types.js";
import path from "node:path";

const ALL_LANGUAGES = Object.values(SupportedLanguage);

const ALL_MANIFESTS = new Set(
  ALL_LANGUAGES.flatMap((lang) => LANGUAGES_HEURISTICS[lang].manifests),
);

/** The heuristics language owning an extension, if any. */
export function languageForExtension(
  suffixLower: string,
): SupportedLanguage | null {
  return (
    ALL_LANGUAGES.find((lang) =>
      LANGUAGES_HEURISTICS[lang].extensions.includes(suffixLower),
    ) ?? null
  );
}

export class FileMetadata {
  public readonly nameLower: string;
  public readonly suffixLower: string;
  public readonly stemLower: string;
  public readonly depth: number;
  public readonly fileParentsLower: string[];
  public readonly score: number;
  public readonly category: FileCategory;

  /**
   * @param filePath - repository-relative path with POSIX separators
   * @param primaryLanguage - dominant language of the repository, when known
   */
  constructor(
    public readonly filePath: string,
    public readonly primaryLanguage: SupportedLanguage | null,
  ) {
    const parsed = path.posix.parse(filePath);

    this.nameLower = parsed.base.toLowerCase();
    this.stemLower = parsed.name.toLowerCase();
    this.suffixLower = parsed.ext.toLowerCase();

    this.fileParentsLower = parsed.dir
      .toLowerCase()
      .split("/")
      .filter(Boolean);
    this.depth = this.fileParentsLower.length;

    const { category, score } = this.calculateSignificance();
    this.category = category;
    this.score = score;
  }

  private calculateSignificance() {
    const ownLanguage = languageForExtension(this.suffixLower);

    let category: FileCategory = FileCategory.OTHER;

    if (
      UNIVERSAL_CONTEXT_FILES.includes(this.nameLower) ||
      this.nameLower.startsWith("readme") ||
      this.suffixLower == ".md"
    ) {
      category = FileCategory.CONTEXT;
    } else if (
      ALL_MANIFESTS.has(this.nameLower) ||
      ALL_MANIFESTS.has(this.suffixLower)
    ) {
      category = FileCategory.MANIFEST;
    } else if (
      ownLanguage &&
      LANGUAGES_HEURISTICS[ownLanguage].signals.includes(this.stemLower)
    ) {
      category = FileCategory.SIGNAL;
    } else if (ownLanguage) {
      category = FileCategory.SOURCE;
    }

    let score = CATEGORY_SCORES[category];
    if (this.depth > 1) {
      score -= (this.depth - 1) * DEPTH_PENALTY;
    }

    const ignoreDirs = new Set<string>();
    for (const lang of [ownLanguage, this.primaryLanguage]) {
      if (!lang) continue;
      for (const dir of LANGUAGES_HEURISTICS[lang].ignoreDirs) {
        ignoreDirs.add(dir.toLowerCase());
      }
    }

    if (this.fileParentsLower.some((dir) => ignoreDirs.has(dir))) {
      score -= IGNORED_DIR_PENALTY;
    }

    return { category, score };
  }
}
