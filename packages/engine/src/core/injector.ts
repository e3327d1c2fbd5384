// packages/engine/src/core/injector.ts
import { renderFragment } from "./fragment.js";
import { PatchError } from "./errors.js";
import type { FragmentSpec, TargetVersionSet } from "./types.js";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function indentLines(text: string, indent: string): string {
  return text
    .split("\n")
    .map((line) => (line ? indent + line : line))
    .join("\n");
}

/**
 * Index of the `{` opening the first `<block> {` header, or -1.
 * `testDependencies {` and `foo.dependencies {` do not count as `dependencies`.
 */
export function findBlockOpen(doc: string, block: string): number {
  const rx = new RegExp(`(?:^|[^\\w.$])${escapeRegExp(block)}\\s*\\{`);
  const m = rx.exec(doc);
  if (!m) return -1;
  return m.index + m[0].length - 1;
}

export function insertFragment(
  doc: string,
  spec: FragmentSpec,
  set: TargetVersionSet,
  indent = "    "
): string {
  if (doc.includes(spec.marker)) return doc;

  const rendered = renderFragment(spec, set);

  if (spec.anchor.kind === "end-of-file") {
    const trimmed = doc.trimEnd();
    return trimmed ? `${trimmed}\n\n${rendered}\n` : `${rendered}\n`;
  }

  const open = findBlockOpen(doc, spec.anchor.block);
  if (open < 0) {
    throw new PatchError(
      "AnchorNotFound",
      `No '${spec.anchor.block} {' block to hold fragment '${spec.id}'`
    );
  }

  const rest = doc.slice(open + 1);
  // `dependencies { foo }` on one line: keep foo off the fragment's last line
  const tail = /^[ \t]*(\r?\n|$)/.test(rest) ? "" : "\n";
  return doc.slice(0, open + 1) + "\n" + indentLines(rendered, indent) + tail + rest;
}
