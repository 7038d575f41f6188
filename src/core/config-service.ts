import envPaths from "env-paths";
import path from "node:path";
import fs from "node:fs/promises";
import { ConfigError, errorMessage } from "../errors.js";
import type { ConfigLayer } from "./config.js";

const paths = envPaths("readme-forge", { suffix: "" });

function isLayer(value: unknown): value is ConfigLayer {
  return typeof value == "object" && value !== null && !Array.isArray(value);
}

/** The user's saved settings, a config layer kept in the platform config dir. */
export class ConfigService {
  private constructor(
    private readonly configPath: string,
    private readonly configDir: string,
    private data: ConfigLayer | null,
  ) {}

  public static async create(configDir: string = paths.config): Promise<ConfigService> {
    const configPath = path.join(configDir, "settings.json");
    let data: ConfigLayer | null = null;

    let raw: string | null = null;
    try {
      raw = await fs.readFile(configPath, "utf-8");
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code == "ENOENT")) {
        throw new ConfigError("Cannot read your configuration.", errorMessage(err));
      }
    }

    if (raw !== null) {
      data = ConfigService.parse(raw, configPath);
    }

    return new ConfigService(configPath, configDir, data);
  }

  private static parse(raw: string, configPath: string): ConfigLayer {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError("Config corrupted", `${configPath}: ${errorMessage(err)}`);
    }
    if (!isLayer(parsed)) {
      throw new ConfigError("Config corrupted", `${configPath} must hold a JSON object.`);
    }
    return parsed;
  }

  get isInitialized(): boolean {
    return this.data !== null;
  }

  get path(): string {
    return this.configPath;
  }

  /** The saved layer, or an empty one before the first `configure`. */
  get layer(): ConfigLayer {
    return this.data ?? {};
  }

  public async save(layer: ConfigLayer): Promise<void> {
    try {
      this.data = layer;
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(this.data, null, 2), "utf-8");
    } catch (err) {
      throw new ConfigError(
        "Failed to save your configuration.",
        `Make sure readme-forge has write access to ${this.configDir}.\nError: ${errorMessage(err)}`,
      );
    }
  }
}
