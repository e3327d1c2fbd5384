// packages/engine/src/fragments/android.ts
import type { FragmentSpec } from "../core/types.js";

export const DEPENDENCY_MARKER = "// [gradlefix] Dependencies";
export const RESOLUTION_MARKER = "// [gradlefix] Conflict Resolution";

const LISTENABLEFUTURE_STUB =
  "com.google.guava:listenablefuture:9999.0-empty-to-avoid-conflict-with-guava";

// ─────────────────────────────────────────────────────────────────────────────
// dependencies { ... } 안에 들어가는 라이브러리 선언
// ─────────────────────────────────────────────────────────────────────────────
export const androidDependencies: FragmentSpec = {
  id: "android-dependencies",
  marker: DEPENDENCY_MARKER,
  template: [
    "implementation 'androidx.browser:browser:{{browser}}'",
    "implementation 'androidx.versionedparcelable:versionedparcelable:{{versionedparcelable}}'",
    "implementation 'com.google.guava:guava:{{guava}}'",
    `implementation '${LISTENABLEFUTURE_STUB}'`,
  ].join("\n"),
  anchor: { kind: "block", block: "dependencies" },
  requires: [
    "implementation 'androidx.browser:browser:{{browser}}'",
    "implementation 'androidx.versionedparcelable:versionedparcelable:{{versionedparcelable}}'",
    "implementation 'com.google.guava:guava:{{guava}}'",
    `implementation '${LISTENABLEFUTURE_STUB}'`,
  ],
  shape: {
    // only the groups this fragment owns, so a user's own line right below survives
    line: /^\s*implementation\s+['"](androidx\.browser|androidx\.versionedparcelable|com\.google\.guava):[^'"]+['"]\s*$/,
    maxLines: 8,
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Duplicate class 오류 방지: 파일 끝에 붙는 configurations.all 블록
// ─────────────────────────────────────────────────────────────────────────────
export const androidConflictResolution: FragmentSpec = {
  id: "android-conflict-resolution",
  marker: RESOLUTION_MARKER,
  template: [
    "configurations.all {",
    "    exclude group: 'com.google.guava', module: 'listenablefuture'",
    "    resolutionStrategy {",
    "        force 'androidx.core:core:{{core}}'",
    "    }",
    "}",
  ].join("\n"),
  anchor: { kind: "end-of-file" },
  requires: [
    "exclude group: 'com.google.guava', module: 'listenablefuture'",
    "force 'androidx.core:core:{{core}}'",
  ],
  shape: { block: "configurations.all" },
};

export const ANDROID_FRAGMENTS: FragmentSpec[] = [androidDependencies, androidConflictResolution];
