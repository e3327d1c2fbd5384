import { describe, test, expect } from "@jest/globals";
import { findBlockOpen, insertFragment } from "../packages/engine/src/core/injector.js";
import { PatchError } from "../packages/engine/src/core/errors.js";
import { coreSpec, strategySpec, v18 } from "./helpers/tmp.js";

describe("findBlockOpen", () => {
  test("skips look-alike block names", () => {
    expect(findBlockOpen("testDependencies {\n}\ndependencies {\n}", "dependencies")).toBe(34);
  });

  test("ignores qualified names", () => {
    expect(findBlockOpen("foo.dependencies {\n}\n", "dependencies")).toBe(-1);
  });

  test("tolerates whitespace before the brace", () => {
    expect(findBlockOpen("dependencies\n{\n}", "dependencies")).toBe(13);
  });
});

describe("insertFragment", () => {
  test("inserts right after the anchor block's opening brace", () => {
    expect(insertFragment("dependencies {\n}\n", coreSpec, v18)).toBe(
      "dependencies {\n    // marker\n    implementation 'x:core:1.8.0'\n}\n"
    );
  });

  test("uses the configured indent", () => {
    expect(insertFragment("dependencies {\n}\n", coreSpec, v18, "\t")).toBe(
      "dependencies {\n\t// marker\n\timplementation 'x:core:1.8.0'\n}\n"
    );
  });

  test("moves trailing same-line content of a one-line block to its own line", () => {
    expect(insertFragment("dependencies { implementation 'a:b:1' }\n", coreSpec, v18)).toBe(
      "dependencies {\n    // marker\n    implementation 'x:core:1.8.0'\n implementation 'a:b:1' }\n"
    );
  });

  test("appends end-of-file fragments after trimming trailing whitespace", () => {
    expect(insertFragment("android {\n}\n\n\n", strategySpec, v18)).toBe(
      "android {\n}\n\n// strategy\nconfigurations.all {\n    resolutionStrategy {\n        force 'x:core:1.8.0'\n    }\n}\n"
    );
  });

  test("end-of-file fragment into an empty document", () => {
    expect(insertFragment("", strategySpec, v18)).toBe(
      "// strategy\nconfigurations.all {\n    resolutionStrategy {\n        force 'x:core:1.8.0'\n    }\n}\n"
    );
  });

  test("does nothing when the marker is already present", () => {
    const doc = "dependencies {\n    // marker\n    implementation 'x:core:1.0.0'\n}\n";
    expect(insertFragment(doc, coreSpec, v18)).toBe(doc);
  });

  test("fails with AnchorNotFound when the block is missing", () => {
    let kind: string | undefined;
    try {
      insertFragment("android {\n}\n", coreSpec, v18);
    } catch (e) {
      kind = e instanceof PatchError ? e.kind : "other";
    }
    expect(kind).toBe("AnchorNotFound");
  });
});
