import { describe, test, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "fs-extra";
import path from "path";
import { BackupManager } from "../packages/engine/src/core/backup-manager.js";
import { PatchError } from "../packages/engine/src/core/errors.js";
import { makeTmpDir, quiet, writeGradle } from "./helpers/tmp.js";

function ticking(start: string): () => Date {
  let t = new Date(start).getTime();
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

describe("BackupManager", () => {
  let dir: string;
  let backupDir: string;
  let file: string;

  beforeEach(() => {
    dir = makeTmpDir();
    backupDir = path.join(dir, "backups");
    file = writeGradle(dir, "dependencies {\n}\n");
  });

  afterEach(() => {
    fs.removeSync(dir);
  });

  test("copies the file under a timestamped name, creating the directory", () => {
    const manager = new BackupManager(quiet(), {
      backupDir,
      retention: 5,
      now: () => new Date("2026-10-18T10:15:30.123Z"),
    });

    const record = manager.snapshot(file);

    expect(path.dirname(record.path)).toBe(backupDir);
    expect(path.basename(record.path)).toMatch(/^build\.gradle\.[0-9a-f]{8}\.20261018T101530123-000\.bak$/);
    expect(fs.readFileSync(record.path, "utf8")).toBe("dependencies {\n}\n");
    expect(record.source).toBe(path.resolve(file));
    expect(record.createdAt.toISOString()).toBe("2026-10-18T10:15:30.123Z");
  });

  test("keeps exactly N backups after N+1 snapshots, evicting the oldest", () => {
    const manager = new BackupManager(quiet(), {
      backupDir,
      retention: 3,
      now: ticking("2026-10-18T10:00:00.000Z"),
    });

    const records = [1, 2, 3, 4].map(() => manager.snapshot(file));
    const kept = manager.listBackups(file);

    expect(kept).toEqual([records[3].path, records[2].path, records[1].path]);
    expect(fs.pathExistsSync(records[0].path)).toBe(false);
  });

  test("snapshots within the same millisecond get distinct names", () => {
    const manager = new BackupManager(quiet(), {
      backupDir,
      retention: 5,
      now: () => new Date("2026-10-18T10:15:30.123Z"),
    });

    const first = manager.snapshot(file);
    const second = manager.snapshot(file);

    expect(first.path).not.toBe(second.path);
    expect(second.path.endsWith("-001.bak")).toBe(true);
    expect(manager.listBackups(file)).toEqual([second.path, first.path]);
  });

  test("retention is per file", () => {
    const other = writeGradle(dir, "android {\n}\n", "settings.gradle");
    const manager = new BackupManager(quiet(), {
      backupDir,
      retention: 1,
      now: ticking("2026-10-18T10:00:00.000Z"),
    });

    manager.snapshot(file);
    manager.snapshot(other);
    manager.snapshot(file);

    expect(manager.listBackups(file)).toHaveLength(1);
    expect(manager.listBackups(other)).toHaveLength(1);
  });

  test("lists nothing when the directory does not exist", () => {
    const manager = new BackupManager(quiet(), { backupDir, retention: 5 });
    expect(manager.listBackups(file)).toEqual([]);
  });

  test("fails with BackupFailed when the source is missing", () => {
    const manager = new BackupManager(quiet(), { backupDir, retention: 5 });
    let kind: string | undefined;
    try {
      manager.snapshot(path.join(dir, "missing.gradle"));
    } catch (e) {
      kind = e instanceof PatchError ? e.kind : "other";
    }
    expect(kind).toBe("BackupFailed");
  });
});
