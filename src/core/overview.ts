import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import type {
  AssembledContext,
  Dependencies,
  GitInfo,
  RepositoryOverview,
  ScanIssue,
  ScanResult,
} from "./types.js";

const PackageJsonSchema = z.object({
  dependencies: z.record(z.string()).optional(),
  devDependencies: z.record(z.string()).optional(),
});

type ManifestParser = (content: string) => string[];

const MANIFEST_PARSERS: Record<string, { ecosystem: string; parse: ManifestParser }> = {
  "package.json": {
    ecosystem: "node",
    parse: (content) => {
      const pkg = PackageJsonSchema.parse(JSON.parse(content));
      return [
        ...Object.entries(pkg.dependencies ?? {}).map(([n, v]) => `${n}@${v}`),
        ...Object.entries(pkg.devDependencies ?? {}).map(
          ([n, v]) => `${n}@${v} (dev)`,
        ),
      ];
    },
  },
  "requirements.txt": {
    ecosystem: "python",
    parse: (content) =>
      content
        .split("\n")
        .map((l) => l.trim())
        .filter((l) => l && !l.startsWith("#") && !l.startsWith("-")),
  },
  "go.mod": {
    ecosystem: "go",
    parse: (content) => {
      const packages: string[] = [];
      let inBlock = false;
      for (const raw of content.split("\n")) {
        const line = raw.replace(/\/\/.*$/, "").trim();
        if (line.startsWith("require (")) {
          inBlock = true;
        } else if (inBlock && line == ")") {
          inBlock = false;
        } else if (inBlock && line) {
          packages.push(line);
        } else if (line.startsWith("require ")) {
          packages.push(line.slice("require ".length).trim());
        }
      }
      return packages;
    },
  },
};

/** Reads the root-level manifests the scan kept and lists their dependencies. */
export function extractDependencies(scan: ScanResult): {
  dependencies: Dependencies[];
  issues: ScanIssue[];
} {
  const dependencies: Dependencies[] = [];
  const issues: ScanIssue[] = [];

  for (const node of scan.nodes) {
    const parser = Object.hasOwn(MANIFEST_PARSERS, node.path)
      ? MANIFEST_PARSERS[node.path]
      : undefined;
    if (!parser || node.kind != "file" || !node.include) continue;

    try {
      const content = fs.readFileSync(path.join(scan.root, node.path), "utf-8");
      dependencies.push({
        ecosystem: parser.ecosystem,
        manifest: node.path,
        packages: parser.parse(content),
      });
    } catch (err) {
      issues.push({
        path: node.path,
        message: `Cannot parse manifest: ${errorMessage(err)}`,
      });
    }
  }

  return { dependencies, issues };
}

export function buildOverview(
  scan: ScanResult,
  context: AssembledContext,
  dependencies: readonly Dependencies[],
  git: GitInfo | null,
): RepositoryOverview {
  return Object.freeze({
    name: path.basename(scan.root),
    summary: scan.summary,
    files: scan.nodes
      .filter((n) => n.kind == "file" && n.include)
      .map((n) => n.path),
    dependencies,
    git,
    omitted: context.omitted,
    truncated: context.truncated,
  });
}
