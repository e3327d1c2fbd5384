// packages/engine/src/core/sanitizer.ts
import { findMatchingBrace } from "./brace-scanner.js";
import { PatchError } from "./errors.js";
import type { FragmentSpec } from "./types.js";

const DEFAULT_MAX_LINES = 16;
const SKIPPABLE = /^\s*($|\/\/|\/\*|\*)/;

export type FragmentSpan = {
  /** The line break ending the line before the marker; blank lines above it stay. */
  start: number;
  markerAt: number;
  /** Exclusive; the line break after the fragment stays in place. */
  end: number;
};

type Line = { start: number; end: number; text: string };

function lineAfter(doc: string, lineEnd: number): Line | null {
  if (lineEnd >= doc.length) return null;
  const start = lineEnd + 1;
  const nl = doc.indexOf("\n", start);
  const end = nl === -1 ? doc.length : nl;
  return { start, end, text: doc.slice(start, end) };
}

function lineEndFrom(doc: string, pos: number): number {
  const nl = doc.indexOf("\n", pos);
  return nl === -1 ? doc.length : nl;
}

/**
 * Bounds the fragment whose marker sits at `markerAt`: the marker line, up to
 * `shape.maxLines` flat lines matching `shape.line`, then the `shape.block`
 * block through its matching brace. Returns null when the marker is absent.
 */
export function locateFragment(
  doc: string,
  spec: FragmentSpec,
  markerAt = doc.indexOf(spec.marker)
): FragmentSpan | null {
  if (markerAt < 0) return null;

  const { shape } = spec;
  const fail = (why: string, cause?: unknown) =>
    new PatchError(
      "PatternNotFound",
      `Cannot bound fragment '${spec.id}' at index ${markerAt}: ${why}`,
      { cause }
    );

  // back to the start of the marker line, then over the one line break before it
  let start = markerAt;
  while (start > 0 && (doc[start - 1] === " " || doc[start - 1] === "\t")) start--;
  if (start > 0 && doc[start - 1] === "\n") start--;
  if (start > 0 && doc[start - 1] === "\r") start--;

  const afterMarker = markerAt + spec.marker.length;
  let lineEnd = lineEndFrom(doc, afterMarker);
  if (doc.slice(afterMarker, lineEnd).trim() !== "") {
    throw fail("unexpected text after the marker on the same line");
  }
  let end = afterMarker;

  // flat declaration lines
  let owned = 0;
  if (shape.line) {
    const pattern = new RegExp(shape.line.source, shape.line.flags.replace("g", ""));
    const max = shape.maxLines ?? DEFAULT_MAX_LINES;
    while (owned < max) {
      const line = lineAfter(doc, lineEnd);
      if (!line || !pattern.test(line.text)) break;
      end = line.start + line.text.trimEnd().length;
      lineEnd = line.end;
      owned++;
    }

    // an owned line further down, past blanks or comments, means the fragment was edited by hand
    for (let line = lineAfter(doc, lineEnd); line; line = lineAfter(doc, line.end)) {
      if (line.text.includes(spec.marker)) break;
      if (pattern.test(line.text)) {
        throw fail(`'${line.text.trim()}' is separated from the fragment`);
      }
      if (!SKIPPABLE.test(line.text)) break;
    }
  }

  // trailing block
  if (shape.block) {
    let p = end;
    while (p < doc.length && /\s/.test(doc[p])) p++;
    if (!doc.startsWith(shape.block, p)) {
      throw fail(`expected '${shape.block}' block after the marker`);
    }
    p += shape.block.length;
    while (p < doc.length && /\s/.test(doc[p])) p++;
    if (doc[p] !== "{") {
      throw fail(`'${shape.block}' is not followed by '{'`);
    }
    try {
      end = findMatchingBrace(doc, p) + 1;
    } catch (e) {
      throw fail(`'${shape.block}' block is never closed`, e);
    }
  } else if (owned === 0) {
    throw fail("no declaration lines follow the marker");
  }

  return { start, markerAt, end };
}

export function countMarkers(doc: string, marker: string): number {
  let count = 0;
  for (let i = doc.indexOf(marker); i >= 0; i = doc.indexOf(marker, i + marker.length)) {
    count++;
  }
  return count;
}

/**
 * Deletes every copy of the fragment. An absent marker is a no-op; a marker
 * whose surroundings do not match the declared shape aborts with PatternNotFound.
 */
export function removeFragment(doc: string, spec: FragmentSpec): string {
  let out = doc;
  for (let span = locateFragment(out, spec); span; span = locateFragment(out, spec)) {
    out = out.slice(0, span.start) + out.slice(span.end);
  }
  return out;
}
