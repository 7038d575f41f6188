import { describe, expect, it } from "vitest";
import { PRESERVE_MARKER } from "../../constants.js";
import { MergeValidationError } from "../../errors.js";
import { mergeDocument, unwrapModelOutput, validateStructure } from "../merger.js";

const original = "# Demo\n\nOld intro.\n\n## Usage\n\nRun it.\n\n## License\n\nMIT © Someone\n";

describe("mergeDocument", () => {
  it("should put back a preserved section the model left out", () => {
    const outcome = mergeDocument({
      directive: "update",
      original,
      modelOutput: "# Demo\n\nNew intro.\n\n## Installation\n\npip install demo\n\n## Usage\n\nRun `demo`.\n",
    });

    expect(outcome).toEqual({
      ok: true,
      text: "# Demo\n\nNew intro.\n\n## Installation\n\npip install demo\n\n## Usage\n\nRun `demo`.\n\n## License\n\nMIT © Someone\n",
      preserved: [],
      reinserted: ["license"],
    });
  });

  it("should restore preserved content the model rewrote", () => {
    const outcome = mergeDocument({
      directive: "update",
      original,
      modelOutput: "# Demo\n\n## Usage\n\nx\n\n## License\n\nGPL\n",
    });

    expect(outcome).toEqual({
      ok: true,
      text: "# Demo\n\n## Usage\n\nx\n\n## License\n\nMIT © Someone\n",
      preserved: ["license"],
      reinserted: [],
    });
  });

  it("should drop repeated copies of a preserved section", () => {
    const outcome = mergeDocument({
      directive: "update",
      original,
      modelOutput: "# Demo\n\n## License\n\nA\n\n## Usage\n\nx\n\n## License\n\nB\n",
    });

    expect(outcome.ok && outcome.text).toBe(
      "# Demo\n\n## License\n\nMIT © Someone\n\n## Usage\n\nx\n\n",
    );
  });

  it("should return the original unchanged when the model echoes it", () => {
    const outcome = mergeDocument({ directive: "update", original, modelOutput: original });
    expect(outcome.ok && outcome.text).toBe(original);
  });

  it("should honor a custom list of preserved headings", () => {
    const outcome = mergeDocument({
      directive: "update",
      original,
      modelOutput: "# Demo\n\n## Usage\n\nx\n\n## License\n\nGPL\n",
      preserveHeadings: ["Usage"],
    });

    expect(outcome.ok && outcome.text).toBe("# Demo\n\n## Usage\n\nRun it.\n\n## License\n\nGPL\n");
  });

  it("should put back a preserved subsection dropped from its parent", () => {
    const outcome = mergeDocument({
      directive: "update",
      original: "# Demo\n\n## About\n\nOld.\n\n### License\n\nMIT (c) Someone\n",
      modelOutput: "# Demo\n\n## About\n\nNew.\n\n## Usage\n\nx\n",
    });

    expect(outcome).toEqual({
      ok: true,
      text: "# Demo\n\n## About\n\nNew.\n\n### License\n\nMIT (c) Someone\n\n## Usage\n\nx\n",
      preserved: [],
      reinserted: ["license"],
    });
  });

  it("should take the model's update to a section whose subsection is preserved", () => {
    const outcome = mergeDocument({
      directive: "update",
      original: `# Demo\n\n## Usage\n\nold\n\n### Notes\n\n${PRESERVE_MARKER}\nkept\n`,
      modelOutput: "# Demo\n\n## Usage\n\nnew\n\n### Notes\n\nrewritten\n",
    });

    expect(outcome).toEqual({
      ok: true,
      text: `# Demo\n\n## Usage\n\nnew\n\n### Notes\n\n${PRESERVE_MARKER}\nkept\n`,
      preserved: ["notes"],
      reinserted: [],
    });
  });

  it("should put a dropped preserved preamble back at the top", () => {
    const badges = `${PRESERVE_MARKER}\n[![ci](b.svg)](x)\n\n`;
    const outcome = mergeDocument({
      directive: "update",
      original: `${badges}# Demo\n\nOld.\n\n## Usage\n\nold\n`,
      modelOutput: "# Demo\n\n## Usage\n\nnew\n",
    });

    expect(outcome).toEqual({
      ok: true,
      text: `${badges}# Demo\n\n## Usage\n\nnew\n`,
      preserved: [],
      reinserted: [""],
    });
  });

  it("should accept a generate reply wrapped in a markdown fence", () => {
    const outcome = mergeDocument({
      directive: "generate",
      modelOutput: "```markdown\n# T\n\n## Usage\n\nx\n```",
    });

    expect(outcome).toEqual({ ok: true, text: "# T\n\n## Usage\n\nx\n", preserved: [], reinserted: [] });
  });

  it("should reject output without a title", () => {
    const outcome = mergeDocument({ directive: "generate", modelOutput: "just text" });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(MergeValidationError);
      expect(outcome.error.message).toBe("Model output has no level-1 title.");
    }
  });
});

describe("validateStructure", () => {
  it("should require a recognized section", () => {
    expect(validateStructure("# T\n\n## Random\n")?.message).toBe(
      "Model output has no recognized README section.",
    );
    expect(validateStructure("# T\n\n## Quick Start\n")).toBeNull();
  });
});

describe("unwrapModelOutput", () => {
  it("should leave unfenced text alone", () => {
    expect(unwrapModelOutput("# T\n")).toBe("# T\n");
  });
});
