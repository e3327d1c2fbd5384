// packages/engine/src/core/atomic-writer.ts
import path from "path";
import crypto from "crypto";
import fs from "fs-extra";
import { assertBalanced } from "./brace-scanner.js";
import { PatchError, errorMessage } from "./errors.js";
import { Logger } from "./logger.js";

export interface ContentWriter {
  commit(filePath: string, content: string): void;
}

function errnoCode(e: unknown): string | undefined {
  return e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined;
}

/**
 * Sibling temp file + rename. Readers see either the old file or the new one.
 */
export class AtomicWriter implements ContentWriter {
  constructor(private readonly logger: Logger) {}

  commit(filePath: string, content: string): void {
    assertBalanced(content, path.basename(filePath));

    const tmp = `${filePath}.tmp-${process.pid}-${crypto.randomBytes(4).toString("hex")}`;
    try {
      const mode = fs.pathExistsSync(filePath) ? fs.statSync(filePath).mode & 0o777 : 0o644;
      fs.writeFileSync(tmp, content, { encoding: "utf8", mode });
      this.replace(tmp, filePath);
    } catch (e) {
      this.cleanup(tmp);
      throw new PatchError("IOFailure", `Could not write ${filePath}: ${errorMessage(e)}`, {
        cause: e,
      });
    }
  }

  private replace(tmp: string, target: string): void {
    try {
      fs.renameSync(tmp, target);
    } catch (e) {
      const code = errnoCode(e);
      // Windows refuses to rename over a file that is open elsewhere
      if (process.platform !== "win32" || (code !== "EPERM" && code !== "EEXIST" && code !== "EACCES")) {
        throw e;
      }
      this.logger.warning(`Atomic replace refused (${code}); falling back to delete + rename`);
      fs.removeSync(target);
      fs.renameSync(tmp, target);
    }
  }

  private cleanup(tmp: string): void {
    try {
      fs.removeSync(tmp);
    } catch (e) {
      this.logger.warning(`Could not remove temp file ${tmp}: ${errorMessage(e)}`);
    }
  }
}
