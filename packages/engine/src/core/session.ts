// packages/engine/src/core/session.ts
import path from "path";

/**
 * "Already patched this session" flags, owned by whoever triggers the patcher
 * (editor load, build hook, menu command). Lives as long as the process.
 */
export class PatchSession {
  private readonly patched = new Set<string>();

  hasPatched(filePath: string): boolean {
    return this.patched.has(path.resolve(filePath));
  }

  markPatched(filePath: string): void {
    this.patched.add(path.resolve(filePath));
  }

  reset(): void {
    this.patched.clear();
  }
}
