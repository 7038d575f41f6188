import { GENERATED_MARKER, PRESERVE_MARKER } from "../constants.js";

export type SectionTag = "generated" | "preserved";

export interface Heading {
  readonly level: number;
  readonly text: string;
  readonly anchor: string;
  /** Offset of the heading line in the document. */
  readonly offset: number;
}

export interface DocumentSection {
  /** Normalized heading text; empty for the content before the first heading. */
  readonly anchor: string;
  readonly heading: string | null;
  /** Heading level, 0 for the preamble. */
  readonly level: number;
  /** The exact slice of the source document, heading line included. */
  readonly raw: string;
  readonly tag: SectionTag;
}

const FENCE_RE = /^ {0,3}(`{3,}|~{3,})(.*)$/;
const HEADING_RE = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?(?:[ \t]+#+)?[ \t]*$/;

/**
 * Normalized anchor for a heading: case, inline markup, link targets, HTML,
 * leading numbering and punctuation are dropped.
 */
export function normalizeAnchor(heading: string): string {
  return heading
    .replace(/<!--[\s\S]*?-->/g, " ")
    .replace(/<[^>]+>/g, " ")
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, "$1")
    .toLowerCase()
    .replace(/^\s*(?:\d+[.)]?)+\s+/, "")
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** ATX headings outside fenced code blocks, in document order. */
export function listHeadings(text: string): Heading[] {
  const headings: Heading[] = [];
  let fence: { char: string; length: number } | null = null;
  let offset = 0;

  while (offset < text.length) {
    const newline = text.indexOf("\n", offset);
    const end = newline == -1 ? text.length : newline + 1;
    const line = text.slice(offset, end).replace(/\r?\n$/, "");

    const fenceMatch = FENCE_RE.exec(line);
    if (fence) {
      const marker = fenceMatch?.[1];
      if (
        marker &&
        marker[0] == fence.char &&
        marker.length >= fence.length &&
        !fenceMatch?.[2]?.trim()
      ) {
        fence = null;
      }
    } else if (fenceMatch?.[1]) {
      fence = { char: fenceMatch[1][0] ?? "`", length: fenceMatch[1].length };
    } else {
      const headingMatch = HEADING_RE.exec(line);
      if (headingMatch?.[1]) {
        const text = (headingMatch[2] ?? "").trim();
        headings.push({
          level: headingMatch[1].length,
          text,
          anchor: normalizeAnchor(text),
          offset,
        });
      }
    }

    offset = end;
  }

  return headings;
}

function tagFor(
  anchor: string,
  raw: string,
  preserved: ReadonlySet<string>,
): SectionTag {
  if (raw.includes(GENERATED_MARKER)) return "generated";
  if (raw.includes(PRESERVE_MARKER)) return "preserved";
  return anchor && preserved.has(anchor) ? "preserved" : "generated";
}

/**
 * Splits a document into sections. A section runs from its heading line to
 * the next heading of any level, so a subsection is a region of its own.
 */
export function parseSections(
  text: string,
  preserveHeadings: readonly string[] = [],
): DocumentSection[] {
  const preserved = new Set(preserveHeadings.map(normalizeAnchor));
  const headings = listHeadings(text);
  const sections: DocumentSection[] = [];

  const firstOffset = headings[0]?.offset ?? text.length;
  if (firstOffset > 0) {
    const raw = text.slice(0, firstOffset);
    sections.push({
      anchor: "",
      heading: null,
      level: 0,
      raw,
      tag: tagFor("", raw, preserved),
    });
  }

  headings.forEach((head, i) => {
    const raw = text.slice(head.offset, headings[i + 1]?.offset ?? text.length);
    sections.push({
      anchor: head.anchor,
      heading: head.text,
      level: head.level,
      raw,
      tag: tagFor(head.anchor, raw, preserved),
    });
  });

  return sections;
}
