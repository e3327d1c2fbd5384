// packages/engine/src/core/config.ts
import path from "path";
import { Logger } from "./logger.js";
import type { BackupPolicy, PatchOptions } from "./types.js";

/**
 * Defaults, overridable through the environment:
 *   GRADLEFIX_BACKUP_DIR, GRADLEFIX_BACKUP_RETENTION,
 *   GRADLEFIX_BACKUP_POLICY (strict | best-effort), GRADLEFIX_INDENT
 */
export const DEFAULT_BACKUP_RETENTION = 5;
export const DEFAULT_BACKUP_POLICY: BackupPolicy = "best-effort";
export const DEFAULT_INDENT = "    ";

type Env = Record<string, string | undefined>;

function parseRetention(raw: string | undefined): number {
  const n = raw === undefined ? NaN : parseInt(raw, 10);
  return Number.isFinite(n) && n >= 1 ? n : DEFAULT_BACKUP_RETENTION;
}

function parsePolicy(raw: string | undefined): BackupPolicy {
  return raw === "strict" || raw === "best-effort" ? raw : DEFAULT_BACKUP_POLICY;
}

export function resolvePatchOptions(
  overrides: Partial<PatchOptions> = {},
  env: Env = process.env
): PatchOptions {
  return {
    backupDir: overrides.backupDir ?? env.GRADLEFIX_BACKUP_DIR ?? path.join(process.cwd(), ".gradlefix-backups"),
    retention: overrides.retention ?? parseRetention(env.GRADLEFIX_BACKUP_RETENTION),
    backupPolicy: overrides.backupPolicy ?? parsePolicy(env.GRADLEFIX_BACKUP_POLICY),
    indent: overrides.indent ?? env.GRADLEFIX_INDENT ?? DEFAULT_INDENT,
    logger: overrides.logger ?? new Logger(),
    onCommit: overrides.onCommit,
  };
}
