import { describe, expect, it } from "vitest";
import { SupportedLanguage } from "../../types.js";
import {
  SYSTEM_PROMPT,
  buildPrompt,
  fenceFor,
  renderOverview,
  renderPromptText,
} from "../prompts.js";
import {
  FileCategory,
  type ContextChunk,
  type ContextExcerpt,
  type RepositoryOverview,
} from "../types.js";

const overview: RepositoryOverview = {
  name: "demo",
  summary: {
    totalFiles: 4,
    includedFiles: 4,
    binaryFiles: [],
    languages: { Python: 3, Markdown: 1 },
    primaryLanguage: SupportedLanguage.PY,
  },
  files: ["README.md", "a.py"],
  dependencies: [{ ecosystem: "python", manifest: "requirements.txt", packages: ["requests"] }],
  git: null,
  omitted: [],
  truncated: [],
};

function excerpt(overrides: Partial<ContextExcerpt>): ContextExcerpt {
  return {
    path: "a.py",
    language: "Python",
    category: FileCategory.SOURCE,
    score: 50,
    content: "print('hi')\n",
    size: 12,
    originalSize: 12,
    truncated: false,
    ...overrides,
  };
}

function chunk(...excerpts: ContextExcerpt[]): ContextChunk {
  return { index: 0, excerpts, size: excerpts.reduce((s, e) => s + e.size, 0) };
}

describe("buildPrompt", () => {
  it("should render the same prompt for the same input", () => {
    const input = {
      directive: "generate" as const,
      overview,
      chunks: [chunk(excerpt({}))],
      unit: "chars",
    };

    expect(buildPrompt(input)).toEqual(buildPrompt(input));
    expect(renderPromptText(buildPrompt(input))).toBe(renderPromptText(buildPrompt(input)));
  });

  it("should start a generate prompt with the task and carry the system prompt", () => {
    const prompt = buildPrompt({ directive: "generate", overview, chunks: [], unit: "chars" });

    expect(prompt.system).toBe(SYSTEM_PROMPT);
    expect(prompt.body.startsWith("Task: write a complete README.md for this repository from scratch.")).toBe(true);
    expect(prompt.body).toContain("(no readable files)");
    expect(prompt.part).toEqual({ index: 1, total: 1 });
  });

  it("should fence file content with a fence longer than any backtick run inside", () => {
    const prompt = buildPrompt({
      directive: "generate",
      overview,
      chunks: [chunk(excerpt({ content: "x = '```'\n" }))],
      unit: "chars",
    });

    expect(prompt.body).toContain("#### File \"a.py\"\n````python\nx = '```'\n````");
  });

  it("should mark truncated files visibly", () => {
    const prompt = buildPrompt({
      directive: "generate",
      overview,
      chunks: [chunk(excerpt({ path: "b.txt", language: null, content: "b".repeat(20), size: 20, originalSize: 5000, truncated: true }))],
      unit: "chars",
    });

    expect(prompt.body).toContain(
      '[TRUNCATED: "b.txt" shows the first 20 of 5000 chars; the rest was cut to fit the context budget.]',
    );
  });

  it("should include the prior document and the preserved headings for update", () => {
    const prompt = buildPrompt({
      directive: "update",
      overview,
      chunks: [],
      unit: "chars",
      priorDocument: "# Demo\n\n## License\n\nMIT\n",
      preservedHeadings: ["License"],
    });

    expect(prompt.body.startsWith("Task: revise the existing README.md")).toBe(true);
    expect(prompt.body).toContain("### Existing README.md\n```markdown\n# Demo\n\n## License\n\nMIT\n```");
    expect(prompt.body).toContain('- "License"');
  });

  it("should explain which part of a multi-part run it is", () => {
    const prompt = buildPrompt({
      directive: "update",
      overview,
      chunks: [],
      unit: "chars",
      part: { index: 2, total: 3 },
      priorDocument: "# Demo\n",
    });

    expect(prompt.body).toContain(
      "This is part 2 of 3. The existing README was drafted from the earlier parts; extend and correct it with what this part shows.",
    );
  });

  it("should add the primary language's hints", () => {
    const prompt = buildPrompt({ directive: "generate", overview, chunks: [], unit: "chars" });
    expect(prompt.body).toContain("The repository is primarily Python.");
  });
});

describe("renderOverview", () => {
  it("should list languages by share, dependencies and files", () => {
    expect(renderOverview(overview)).toBe(
      [
        "Repository: demo",
        "Primary language: Python",
        "Languages:",
        "- Python: 3 files (75.0%)",
        "- Markdown: 1 files (25.0%)",
        "Dependencies (python, requirements.txt):",
        "- requests",
        "Files (2 included):",
        "- README.md",
        "- a.py",
      ].join("\n"),
    );
  });
});

describe("fenceFor", () => {
  it("should use at least three backticks", () => {
    expect(fenceFor("plain")).toBe("```");
    expect(fenceFor("a ````` b")).toBe("``````");
  });
});
