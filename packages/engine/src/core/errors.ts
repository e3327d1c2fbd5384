// packages/engine/src/core/errors.ts
import type { FailureKind } from "./types.js";

export type ErrorKind = Exclude<FailureKind, "None">;

const RECOVERABLE: ReadonlySet<FailureKind> = new Set<FailureKind>([
  "FileMissing",
  "AnchorNotFound",
  "PatternNotFound",
]);

export class PatchError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PatchError";
    this.kind = kind;
  }
}

/** Missing setup or a file that needs a manual edit; the user can act on it. */
export function isRecoverable(kind: FailureKind): boolean {
  return RECOVERABLE.has(kind);
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
