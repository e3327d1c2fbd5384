// packages/engine/src/core/validator.ts
import { renderRequirements } from "./fragment.js";
import { PatchError } from "./errors.js";
import { countMarkers, locateFragment } from "./sanitizer.js";
import type { FragmentSpec, FragmentState, FragmentStates, TargetVersionSet } from "./types.js";

/**
 * absent  : marker not in the document
 * correct : exactly one marker, span bounded, every required literal inside it
 * stale   : anything else (old versions, duplicates, a span we cannot bound)
 */
export function classifyFragment(
  doc: string,
  spec: FragmentSpec,
  set: TargetVersionSet
): FragmentState {
  const occurrences = countMarkers(doc, spec.marker);
  if (occurrences === 0) return "absent";
  if (occurrences > 1) return "stale";

  let region: string;
  try {
    const span = locateFragment(doc, spec);
    if (!span) return "absent";
    region = doc.slice(span.markerAt, span.end);
  } catch (e) {
    if (e instanceof PatchError && e.kind === "PatternNotFound") return "stale";
    throw e;
  }

  const required = renderRequirements(spec, set);
  return required.every((literal) => region.includes(literal)) ? "correct" : "stale";
}

export function classify(
  doc: string,
  specs: FragmentSpec[],
  set: TargetVersionSet
): FragmentStates {
  const states: FragmentStates = {};
  for (const spec of specs) {
    states[spec.marker] = classifyFragment(doc, spec, set);
  }
  return states;
}
