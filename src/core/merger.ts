import {
  DEFAULT_PRESERVED_HEADINGS,
  RECOGNIZED_SECTIONS,
} from "../constants.js";
import { MergeValidationError } from "../errors.js";
import { listHeadings, parseSections, type DocumentSection } from "./markdown.js";

export type MergeInput =
  | { directive: "generate"; modelOutput: string }
  | {
      directive: "update";
      modelOutput: string;
      original: string;
      preserveHeadings?: readonly string[];
    };

export type MergeOutcome =
  | {
      ok: true;
      text: string;
      /** Anchors of the preserved sections copied from the original. */
      preserved: string[];
      /** Preserved sections the model left out and that were put back. */
      reinserted: string[];
    }
  | { ok: false; error: MergeValidationError };

const WRAPPED_RE = /^\s*(`{3,}|~{3,})[ \t]*(?:markdown|md)?[ \t]*\r?\n([\s\S]*?)\r?\n[ \t]*\1[ \t]*\s*$/i;

/** Strips the code fence some models put around the whole reply. */
export function unwrapModelOutput(text: string): string {
  const match = WRAPPED_RE.exec(text);
  return match?.[2] !== undefined ? `${match[2]}\n` : text;
}

function isRecognized(anchor: string): boolean {
  return RECOGNIZED_SECTIONS.some(
    (name) =>
      anchor == name ||
      anchor.startsWith(`${name} `) ||
      anchor.endsWith(` ${name}`),
  );
}

/** Requires a level-1 title and at least one recognized section heading. */
export function validateStructure(text: string): MergeValidationError | null {
  const headings = listHeadings(text);

  if (!headings.some((h) => h.level == 1 && h.anchor)) {
    return new MergeValidationError(
      "Model output has no level-1 title.",
      text.slice(0, 200),
    );
  }

  if (!headings.some((h) => h.level > 1 && isRecognized(h.anchor))) {
    return new MergeValidationError(
      "Model output has no recognized README section.",
      `Expected a heading such as ${RECOGNIZED_SECTIONS.slice(0, 8).join(", ")}. Found: ${
        headings.map((h) => h.text).join(", ") || "none"
      }`,
    );
  }

  return null;
}

function joinSections(raws: readonly string[]): string {
  return raws
    .map((raw, i) => {
      if (i == raws.length - 1 || raw.endsWith("\n\n")) return raw;
      return raw.endsWith("\n") ? `${raw}\n` : `${raw}\n\n`;
    })
    .join("");
}

interface Entry {
  anchor: string;
  raw: string;
}

/**
 * Where a dropped preserved section goes back: after the nearest earlier
 * original section still present, else before the nearest later one, else
 * at the top.
 */
function insertionPoint(
  original: readonly DocumentSection[],
  index: number,
  entries: readonly Entry[],
): number {
  const positionOf = (k: number): number => {
    const section = original[k];
    return section ? entries.findIndex((e) => e.anchor == section.anchor) : -1;
  };

  for (let k = index - 1; k >= 0; k--) {
    const pos = positionOf(k);
    if (pos != -1) return pos + 1;
  }
  for (let k = index + 1; k < original.length; k++) {
    const pos = positionOf(k);
    if (pos != -1) return pos;
  }
  return 0;
}

function mergeSections(
  original: readonly DocumentSection[],
  model: readonly DocumentSection[],
): { entries: Entry[]; preserved: string[]; reinserted: string[] } {
  const preservedByAnchor = new Map<string, DocumentSection>();
  for (const section of original) {
    if (section.tag == "preserved" && !preservedByAnchor.has(section.anchor)) {
      preservedByAnchor.set(section.anchor, section);
    }
  }

  const entries: Entry[] = [];
  const placed = new Set<DocumentSection>();

  for (const section of model) {
    const kept = preservedByAnchor.get(section.anchor);
    if (!kept) {
      entries.push({ anchor: section.anchor, raw: section.raw });
    } else if (!placed.has(kept)) {
      entries.push({ anchor: section.anchor, raw: kept.raw });
      placed.add(kept);
    }
  }

  const preserved = [...placed].map((s) => s.anchor);
  const reinserted: string[] = [];

  original.forEach((section, index) => {
    if (section.tag != "preserved" || placed.has(section)) return;

    entries.splice(insertionPoint(original, index, entries), 0, {
      anchor: section.anchor,
      raw: section.raw,
    });
    placed.add(section);
    reinserted.push(section.anchor);
  });

  return { entries, preserved, reinserted };
}

/**
 * Produces the final document. For `generate` this is the model text once it
 * passes validation. For `update`, sections tagged preserved in the original
 * replace their counterparts in the model output byte-for-byte, and any the
 * model dropped are put back.
 */
export function mergeDocument(input: MergeInput): MergeOutcome {
  const output = unwrapModelOutput(input.modelOutput);

  if (input.directive == "generate") {
    const error = validateStructure(output);
    return error
      ? { ok: false, error }
      : { ok: true, text: output, preserved: [], reinserted: [] };
  }

  const originalSections = parseSections(
    input.original,
    input.preserveHeadings ?? DEFAULT_PRESERVED_HEADINGS,
  );
  const { entries, preserved, reinserted } = mergeSections(
    originalSections,
    parseSections(output),
  );
  const text = joinSections(entries.map((e) => e.raw));

  const lost = originalSections.filter(
    (s) => s.tag == "preserved" && !text.includes(s.raw),
  );
  if (lost.length > 0) {
    return {
      ok: false,
      error: new MergeValidationError(
        "Merged document lost preserved sections.",
        lost.map((s) => s.heading ?? "(preamble)").join(", "),
      ),
    };
  }

  const error = validateStructure(text);
  return error
    ? { ok: false, error }
    : { ok: true, text, preserved, reinserted };
}
