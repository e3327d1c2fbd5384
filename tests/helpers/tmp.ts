import fs from "fs-extra";
import os from "os";
import path from "path";
import { Logger } from "../../packages/engine/src/core/logger.js";
import { defineVersionSet } from "../../packages/engine/src/core/fragment.js";
import type { FragmentSpec } from "../../packages/engine/src/core/types.js";

export const FIXTURE_TEMPLATE = path.join(__dirname, "..", "fixtures", "mainTemplate.gradle");

export const quiet = () => new Logger({ silent: true });

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "gradlefix-"));
}

export function writeGradle(dir: string, content: string, name = "build.gradle"): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content, "utf8");
  return file;
}

export const v18 = defineVersionSet("v18", { core: "1.8.0" });
export const v115 = defineVersionSet("v115", { core: "1.15.0" });

/** Minimal fragment: one flat declaration inside `dependencies { }`. */
export const coreSpec: FragmentSpec = {
  id: "core",
  marker: "// marker",
  template: "implementation 'x:core:{{core}}'",
  anchor: { kind: "block", block: "dependencies" },
  requires: ["implementation 'x:core:{{core}}'"],
  shape: { line: /^\s*implementation\s+'x:[^']+'\s*$/ },
};

/** Minimal end-of-file block fragment. */
export const strategySpec: FragmentSpec = {
  id: "strategy",
  marker: "// strategy",
  template: "configurations.all {\n    resolutionStrategy {\n        force 'x:core:{{core}}'\n    }\n}",
  anchor: { kind: "end-of-file" },
  requires: ["force 'x:core:{{core}}'"],
  shape: { block: "configurations.all" },
};
