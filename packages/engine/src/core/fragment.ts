// packages/engine/src/core/fragment.ts
import { PatchError } from "./errors.js";
import type { FragmentSpec, TargetVersionSet } from "./types.js";

const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*\}\}/g;

export function defineVersionSet(
  name: string,
  versions: Record<string, string>
): TargetVersionSet {
  return Object.freeze({ name, versions: Object.freeze({ ...versions }) });
}

export function renderTemplate(template: string, set: TargetVersionSet): string {
  return template.replace(PLACEHOLDER, (_match, key: string) => {
    const value = set.versions[key];
    if (value === undefined) {
      throw new PatchError(
        "InvalidFragmentSpec",
        `Version set '${set.name}' has no value for {{${key}}}`
      );
    }
    return value;
  });
}

/** Marker line followed by the rendered body, without indentation. */
export function renderFragment(spec: FragmentSpec, set: TargetVersionSet): string {
  const body = renderTemplate(spec.template, set).replace(/^\s*\n/, "").trimEnd();
  return body ? `${spec.marker}\n${body}` : spec.marker;
}

export function renderRequirements(spec: FragmentSpec, set: TargetVersionSet): string[] {
  return spec.requires.map((r) => renderTemplate(r, set));
}

/**
 * Rejects definitions the patcher cannot handle safely:
 * duplicate ids or markers, a marker repeated inside its own body,
 * a shape that bounds nothing, unknown or cyclic dependencies,
 * placeholders the version set cannot fill.
 */
export function validateSpecs(specs: FragmentSpec[], set: TargetVersionSet): void {
  const ids = new Set<string>();
  const markers = new Set<string>();

  for (const spec of specs) {
    if (!spec.marker.trim()) {
      throw new PatchError("InvalidFragmentSpec", `Fragment '${spec.id}' has an empty marker`);
    }
    if (ids.has(spec.id)) {
      throw new PatchError("InvalidFragmentSpec", `Duplicate fragment id '${spec.id}'`);
    }
    if (markers.has(spec.marker)) {
      throw new PatchError("InvalidFragmentSpec", `Duplicate marker '${spec.marker}'`);
    }
    ids.add(spec.id);
    markers.add(spec.marker);

    if (!spec.shape.line && !spec.shape.block) {
      throw new PatchError(
        "InvalidFragmentSpec",
        `Fragment '${spec.id}' declares neither owned lines nor an owned block`
      );
    }

    const body = renderTemplate(spec.template, set);
    if (body.includes(spec.marker)) {
      throw new PatchError(
        "InvalidFragmentSpec",
        `Fragment '${spec.id}' repeats its marker inside the template body`
      );
    }
    renderRequirements(spec, set);
  }

  orderSpecs(specs);
}

/**
 * Dependency order (`dependsOn` first), otherwise declaration order.
 */
export function orderSpecs(specs: FragmentSpec[]): FragmentSpec[] {
  const byId = new Map(specs.map((s) => [s.id, s] as const));
  const ordered: FragmentSpec[] = [];
  const done = new Set<string>();
  const visiting = new Set<string>();

  const visit = (spec: FragmentSpec): void => {
    if (done.has(spec.id)) return;
    if (visiting.has(spec.id)) {
      throw new PatchError("InvalidFragmentSpec", `Dependency cycle through '${spec.id}'`);
    }
    visiting.add(spec.id);
    for (const dep of spec.dependsOn ?? []) {
      const target = byId.get(dep);
      if (!target) {
        throw new PatchError(
          "InvalidFragmentSpec",
          `Fragment '${spec.id}' depends on unknown fragment '${dep}'`
        );
      }
      visit(target);
    }
    visiting.delete(spec.id);
    done.add(spec.id);
    ordered.push(spec);
  };

  specs.forEach(visit);
  return ordered;
}
