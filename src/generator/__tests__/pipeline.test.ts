import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_PRESERVED_HEADINGS } from "../../constants.js";
import { InferenceFatalError } from "../../errors.js";
import { InferenceClient } from "../../inference/client.js";
import { FakeProvider, makeRepo, removeRepo } from "../../__tests__/helpers.js";
import { processRepository, type PipelineOptions } from "../pipeline.js";

const roots: string[] = [];

function repo(files: Record<string, string>): string {
  const root = makeRepo(files);
  roots.push(root);
  return root;
}

afterEach(() => {
  for (const root of roots.splice(0)) removeRepo(root);
});

function clientFor(provider: FakeProvider): InferenceClient {
  return new InferenceClient(provider, { sleep: async () => {} });
}

function options(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return {
    directive: "generate",
    model: "llama3.2:3b",
    output: "README.md",
    budget: { size: 6000, unit: "chars", maxChunks: 4 },
    preserveHeadings: DEFAULT_PRESERVED_HEADINGS,
    git: false,
    ...overrides,
  };
}

const generated = "# Demo\n\nA demo.\n\n## Usage\n\nRun it.\n";
const original = "# Demo\n\nOld intro.\n\n## Usage\n\nRun it.\n\n## License\n\nMIT © Someone\n";

describe("processRepository", () => {
  it("should write the generated README", async () => {
    const root = repo({ "main.py": "print('hi')\n" });
    const provider = new FakeProvider([generated]);

    const outcome = await processRepository(root, clientFor(provider), options());

    expect(outcome).toMatchObject({
      status: "ok",
      repository: "demo",
      directive: "generate",
      parts: 1,
      text: generated,
      outputPath: path.join(root, "README.md"),
    });
    expect(fs.readFileSync(path.join(root, "README.md"), "utf-8")).toBe(generated);
    expect(provider.requests[0]?.prompt).toContain("print('hi')");
  });

  it("should keep hand-written sections when updating", async () => {
    const root = repo({ "main.py": "print('hi')\n", "README.md": original });
    const provider = new FakeProvider([
      "# Demo\n\nNew intro.\n\n## Installation\n\npip install demo\n\n## Usage\n\nRun `demo`.\n",
    ]);

    const outcome = await processRepository(
      root,
      clientFor(provider),
      options({ directive: "update" }),
    );

    const expected =
      "# Demo\n\nNew intro.\n\n## Installation\n\npip install demo\n\n## Usage\n\nRun `demo`.\n\n## License\n\nMIT © Someone\n";
    expect(outcome).toMatchObject({ status: "ok", directive: "update", reinserted: ["license"] });
    expect(fs.readFileSync(path.join(root, "README.md"), "utf-8")).toBe(expected);
    expect(provider.requests[0]?.prompt).toContain("### Existing README.md");
    expect(provider.requests[0]?.prompt).toContain('- "License"');
  });

  it("should generate when asked to update a repository without a README", async () => {
    const root = repo({ "main.py": "print('hi')\n" });

    const outcome = await processRepository(
      root,
      clientFor(new FakeProvider([generated])),
      options({ directive: "update" }),
    );

    expect(outcome).toMatchObject({ status: "ok", directive: "generate" });
  });

  it("should leave the README untouched when the reply fails validation", async () => {
    const root = repo({ "main.py": "print('hi')\n", "README.md": original });

    const outcome = await processRepository(
      root,
      clientFor(new FakeProvider(["Sorry, I cannot help with that."])),
      options({ directive: "update" }),
    );

    expect(outcome).toMatchObject({ status: "merge-failed", part: 1 });
    expect(fs.readFileSync(path.join(root, "README.md"), "utf-8")).toBe(original);
  });

  it("should report an inference failure without writing", async () => {
    const root = repo({ "main.py": "print('hi')\n" });
    const error = new InferenceFatalError("Model not found.", "", 404);

    const outcome = await processRepository(root, clientFor(new FakeProvider([error])), options());

    expect(outcome).toMatchObject({ status: "inference-failed", part: 1, error });
    expect(fs.existsSync(path.join(root, "README.md"))).toBe(false);
  });

  it("should stop before scanning when already cancelled", async () => {
    const root = repo({ "main.py": "print('hi')\n" });
    const controller = new AbortController();
    controller.abort();
    const provider = new FakeProvider([generated]);

    const outcome = await processRepository(
      root,
      clientFor(provider),
      options({ signal: controller.signal }),
    );

    expect(outcome).toEqual({
      status: "cancelled",
      repository: "demo",
      directive: "generate",
      issues: [],
      part: 0,
    });
    expect(provider.requests).toHaveLength(0);
  });

  it("should leave the README untouched when cancelled while waiting on the model", async () => {
    const root = repo({ "main.py": "print('hi')\n", "README.md": original });
    const controller = new AbortController();
    const provider = new FakeProvider([
      (request) =>
        new Promise((_resolve, reject) => {
          request.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          controller.abort();
        }),
    ]);

    const outcome = await processRepository(
      root,
      clientFor(provider),
      options({ directive: "update", signal: controller.signal }),
    );

    expect(outcome).toMatchObject({ status: "cancelled", directive: "update", part: 1 });
    expect(provider.requests).toHaveLength(1);
    expect(fs.readFileSync(path.join(root, "README.md"), "utf-8")).toBe(original);
  });

  it("should build the first prompt on a dry run without calling the model", async () => {
    const root = repo({ "main.py": "print('hi')\n" });
    const provider = new FakeProvider([]);

    const outcome = await processRepository(root, clientFor(provider), options({ dryRun: true }));

    expect(outcome.status).toBe("dry-run");
    if (outcome.status == "dry-run") {
      expect(outcome.parts).toBe(1);
      expect(outcome.prompt.directive).toBe("generate");
      expect(outcome.prompt.body).toContain("print('hi')");
    }
    expect(provider.requests).toHaveLength(0);
    expect(fs.existsSync(path.join(root, "README.md"))).toBe(false);
  });

  it("should refine the draft over every part", async () => {
    const root = repo({ "a.txt": "a".repeat(10), "b.txt": "b".repeat(10) });
    const provider = new FakeProvider([
      "# Demo\n\n## Usage\n\none\n",
      "# Demo\n\n## Usage\n\ntwo\n",
    ]);

    const outcome = await processRepository(
      root,
      clientFor(provider),
      options({ budget: { size: 10, unit: "chars", maxChunks: 4 } }),
    );

    expect(outcome).toMatchObject({ status: "ok", parts: 2, text: "# Demo\n\n## Usage\n\ntwo\n" });
    expect(provider.requests).toHaveLength(2);
    expect(provider.requests[0]?.prompt).toContain("This is part 1 of 2");
    expect(provider.requests[1]?.prompt).toContain("This is part 2 of 2");
    expect(provider.requests[1]?.prompt).toContain("## Usage\n\none");
  });
});
