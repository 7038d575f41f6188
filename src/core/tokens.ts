import { Tiktoken } from "js-tiktoken/lite";
import o200k_base from "js-tiktoken/ranks/o200k_base";
import type { BudgetUnit } from "./types.js";

/** Measures and cuts text in one budget unit. */
export interface SizeMeter {
  readonly unit: BudgetUnit;
  measure(text: string): number;
  /** Longest prefix of `text` whose measure is at most `limit`. */
  truncate(text: string, limit: number): string;
}

let encoder: Tiktoken | null = null;

function getEncoder(): Tiktoken {
  encoder ??= new Tiktoken(o200k_base);
  return encoder;
}

class CharMeter implements SizeMeter {
  public readonly unit = "chars" as const;

  measure(text: string): number {
    return text.length;
  }

  truncate(text: string, limit: number): string {
    return text.slice(0, Math.max(0, limit));
  }
}

class TokenMeter implements SizeMeter {
  public readonly unit = "tokens" as const;

  constructor(private readonly encoder: Tiktoken) {}

  measure(text: string): number {
    return this.encoder.encode(text).length;
  }

  truncate(text: string, limit: number): string {
    const tokens = this.encoder.encode(text);
    if (tokens.length <= limit) return text;

    // decoding a prefix can re-encode longer at the cut, so shrink until it fits
    let keep = Math.max(0, limit);
    let out = this.encoder.decode(tokens.slice(0, keep));
    while (keep > 0 && this.measure(out) > limit) {
      keep -= 1;
      out = this.encoder.decode(tokens.slice(0, keep));
    }
    return out;
  }
}

export function createMeter(unit: BudgetUnit): SizeMeter {
  return unit == "tokens" ? new TokenMeter(getEncoder()) : new CharMeter();
}

/** Running allowance for one chunk. */
export class BudgetManager {
  private pool: number;

  constructor(public readonly budget: number) {
    this.pool = budget;
  }

  public get spent(): number {
    return this.budget - this.pool;
  }

  public get isEmpty(): boolean {
    return this.pool == this.budget;
  }

  public trySpend(cost: number): boolean {
    if (this.pool >= cost) {
      this.pool -= cost;
      return true;
    }
    return false;
  }

  public reset(): void {
    this.pool = this.budget;
  }
}
