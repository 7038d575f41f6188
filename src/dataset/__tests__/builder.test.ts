import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { makeRepo, makeTempDir, removeRepo } from "../../__tests__/helpers.js";
import {
  buildDataset,
  discoverCorpus,
  loadDataset,
  type BuildDatasetOptions,
  type CorpusEntry,
} from "../builder.js";

const dirs: string[] = [];

afterEach(() => {
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

function repo(files: Record<string, string>, name = "demo"): CorpusEntry {
  const root = makeRepo(files, name);
  dirs.push(path.dirname(root));
  return { root, readmePath: path.join(root, "README.md") };
}

function outputFile(): string {
  const dir = makeTempDir();
  dirs.push(dir);
  return path.join(dir, "out", "dataset.jsonl");
}

function options(corpus: CorpusEntry[], outputPath: string): BuildDatasetOptions {
  return { corpus, outputPath, budget: 6000, unit: "chars", maxExampleSize: 100_000 };
}

const files = {
  "README.md": "# Demo\n\nA demo.\n",
  "main.py": "print('hi')\n",
};

describe("buildDataset", () => {
  it("should pair the repository prompt with its README", () => {
    const output = outputFile();
    const report = buildDataset(options([repo(files)], output));

    expect(report.added).toHaveLength(1);
    const [example] = report.added;
    expect(example).toMatchObject({
      repository: "demo",
      part: { index: 1, total: 1 },
      completion: "# Demo\n\nA demo.\n",
    });
    expect(example?.id).toMatch(/^[0-9a-f]{64}$/);
    expect(example?.prompt).toContain("print('hi')");
    expect(example?.prompt).not.toContain("A demo.");
    expect(loadDataset(output)).toEqual(report.added);
  });

  it("should append nothing when rebuilt from an unchanged corpus", () => {
    const output = outputFile();
    const corpus = [repo(files)];
    buildDataset(options(corpus, output));
    const before = fs.readFileSync(output, "utf-8");

    const report = buildDataset(options(corpus, output));

    expect(report.added).toEqual([]);
    expect(report.duplicates).toBe(1);
    expect(fs.readFileSync(output, "utf-8")).toBe(before);
  });

  it("should keep one example when two repositories render the same prompt", () => {
    const report = buildDataset(options([repo(files), repo(files)], outputFile()));

    expect(report.added).toHaveLength(1);
    expect(report.duplicates).toBe(1);
  });

  it("should skip a repository with an empty README", () => {
    const entry = repo({ "README.md": "  \n", "main.py": "x = 1\n" });
    const report = buildDataset(options([entry], outputFile()));

    expect(report.added).toEqual([]);
    expect(report.skipped.map((e) => [e.message, e.source])).toEqual([
      ["README is empty.", entry.readmePath],
    ]);
  });

  it("should skip examples over the training budget", () => {
    const entry = repo(files);
    const report = buildDataset({ ...options([entry], outputFile()), maxExampleSize: 10 });

    expect(report.added).toEqual([]);
    expect(report.skipped).toHaveLength(1);
    expect(report.skipped[0]?.message).toMatch(/^Example exceeds the training budget \(\d+ > 10 chars\)\.$/);
    expect(report.skipped[0]?.source).toBe(`${entry.root} part 1/1`);
  });

  it("should report corrupt lines and still append after them", () => {
    const output = outputFile();
    fs.mkdirSync(path.dirname(output), { recursive: true });
    fs.writeFileSync(output, "not json");

    const report = buildDataset(options([repo(files)], output));

    expect(report.skipped.map((e) => e.message)).toEqual([
      "Line 1 of the dataset is not a valid example.",
    ]);
    expect(fs.readFileSync(output, "utf-8").split("\n")[0]).toBe("not json");
    expect(loadDataset(output)).toHaveLength(1);
  });
});

describe("discoverCorpus", () => {
  it("should find subdirectories holding a README in any letter case", async () => {
    const dir = makeTempDir();
    dirs.push(dir);
    const layout: [string, string][] = [
      ["b", "readme.md"],
      ["a", "README.md"],
      ["c", "NOTES.md"],
    ];
    for (const [name, readme] of layout) {
      fs.mkdirSync(path.join(dir, name));
      fs.writeFileSync(path.join(dir, name, readme), "# X\n");
    }

    const corpus = await discoverCorpus(dir);

    expect(corpus.map((e) => path.basename(e.root))).toEqual(["a", "b"]);
    expect(corpus[1]?.readmePath).toBe(path.join(dir, "b", "readme.md"));
  });
});
