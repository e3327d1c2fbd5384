// packages/engine/src/fragments/profiles.ts
import { defineVersionSet } from "../core/fragment.js";
import type { TargetVersionSet } from "../core/types.js";

/** compileSdk 34+ (current Android Gradle Plugin). */
export const MODERN_PROFILE = defineVersionSet("modern", {
  browser: "1.8.0",
  versionedparcelable: "1.1.1",
  guava: "33.0.0-android",
  core: "1.13.0",
});

/** Older toolchains stuck on compileSdk 33. */
export const LEGACY_PROFILE = defineVersionSet("legacy", {
  browser: "1.5.0",
  versionedparcelable: "1.1.1",
  guava: "31.1-android",
  core: "1.10.1",
});

export const VERSION_PROFILES: Readonly<Record<string, TargetVersionSet>> = Object.freeze({
  modern: MODERN_PROFILE,
  legacy: LEGACY_PROFILE,
});

export function resolveVersionProfile(name: string): TargetVersionSet | undefined {
  return Object.prototype.hasOwnProperty.call(VERSION_PROFILES, name)
    ? VERSION_PROFILES[name]
    : undefined;
}

export function profileForCompileSdk(compileSdk: number): TargetVersionSet {
  return compileSdk >= 34 ? MODERN_PROFILE : LEGACY_PROFILE;
}
