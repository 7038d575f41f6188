import fs from "node:fs";
import { afterEach, describe, expect, it } from "vitest";
import { makeTempDir } from "../../__tests__/helpers.js";
import { GitClient } from "../git.js";

const dirs: string[] = [];

afterEach(() => {
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe("GitClient.open", () => {
  it("should return null outside a git work tree", () => {
    const dir = makeTempDir();
    dirs.push(dir);

    expect(GitClient.open(dir)).toBeNull();
  });
});
