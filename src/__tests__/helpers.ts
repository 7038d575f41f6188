import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { LLMProvider } from "../providers/base.js";
import type { LLMRequest, LLMResponse, ModelInfo } from "../providers/types.js";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "readme-forge-"));
}

/** Writes `files` under a fresh directory named `name` and returns its path. */
export function makeRepo(
  files: Record<string, string | Uint8Array>,
  name = "demo",
): string {
  const root = path.join(makeTempDir(), name);
  fs.mkdirSync(root);
  for (const [relPath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relPath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
  }
  return root;
}

export function removeRepo(root: string): void {
  fs.rmSync(path.dirname(root), { recursive: true, force: true });
}

type Reply = string | Error | ((request: LLMRequest) => Promise<LLMResponse>);

/** Answers each request with the next scripted reply. */
export class FakeProvider extends LLMProvider {
  public readonly requests: LLMRequest[] = [];

  constructor(private readonly replies: Reply[]) {
    super("http://fake.test");
  }

  get name(): string {
    return "fake";
  }

  async generate(request: LLMRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("No scripted reply left.");
    if (reply instanceof Error) throw reply;
    if (typeof reply == "function") return reply(request);
    return { content: reply, model: request.model, truncated: false };
  }

  async listModels(): Promise<ModelInfo[]> {
    return [{ name: "fake-model" }];
  }
}
