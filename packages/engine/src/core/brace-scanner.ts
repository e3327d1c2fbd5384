// packages/engine/src/core/brace-scanner.ts
import { PatchError } from "./errors.js";

const OPEN = "{";
const CLOSE = "}";

export type BalanceReport = {
  balanced: boolean;
  /** Depth left at end of text. */
  depth: number;
  /** Index of the first `}` that drove depth below zero, or -1. */
  negativeAt: number;
};

/**
 * Index of the `}` matching the `{` at `openIndex`. Pure depth counting: braces
 * inside strings or comments count like any other.
 */
export function findMatchingBrace(text: string, openIndex: number): number {
  if (text[openIndex] !== OPEN) {
    throw new PatchError("UnbalancedStructure", `No opening brace at index ${openIndex}`);
  }

  let depth = 0;
  for (let i = openIndex; i < text.length; i++) {
    const ch = text[i];
    if (ch === OPEN) depth++;
    else if (ch === CLOSE) {
      depth--;
      if (depth === 0) return i;
    }
  }

  throw new PatchError(
    "UnbalancedStructure",
    `Block opened at index ${openIndex} is never closed (depth ${depth} at end of text)`
  );
}

export function checkBalance(text: string): BalanceReport {
  let depth = 0;
  let negativeAt = -1;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === OPEN) depth++;
    else if (ch === CLOSE) {
      depth--;
      if (depth < 0 && negativeAt === -1) negativeAt = i;
    }
  }

  return { balanced: depth === 0 && negativeAt === -1, depth, negativeAt };
}

export function assertBalanced(text: string, what: string): void {
  const report = checkBalance(text);
  if (report.balanced) return;

  const detail =
    report.negativeAt >= 0
      ? `unexpected '}' at index ${report.negativeAt}`
      : `${report.depth} unclosed block(s)`;
  throw new PatchError("StructuralCorruption", `${what} is not brace-balanced: ${detail}`);
}
