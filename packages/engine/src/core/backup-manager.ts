import path from 'path';
import crypto from 'crypto';
import fs from 'fs-extra';
import { Logger } from './logger.js';
import { PatchError, errorMessage } from './errors.js';
import type { BackupRecord } from './types.js';

export interface BackupManagerOptions {
  backupDir: string;
  retention: number;
  now?: () => Date;
}

const STAMP = /^\d{8}T\d{9}-\d{3}$/;

function stamp(date: Date): string {
  // 2026-10-18T10:15:30.123Z -> 20261018T101530123
  return date.toISOString().replace(/[-:.Z]/g, '');
}

export class BackupManager {
  private readonly backupDir: string;
  private readonly retention: number;
  private readonly now: () => Date;

  constructor(private logger: Logger, options: BackupManagerOptions) {
    this.backupDir = options.backupDir;
    this.retention = Math.max(1, Math.floor(options.retention));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Copies `filePath` to `<backupDir>/<name>.<pathHash>.<stamp>-<seq>.bak`,
   * then evicts the oldest copies of the same file beyond the retention count.
   */
  snapshot(filePath: string): BackupRecord {
    const source = path.resolve(filePath);
    const createdAt = this.now();
    let target = '';

    try {
      fs.ensureDirSync(this.backupDir);
      const base = `${this.prefixFor(source)}${stamp(createdAt)}`;
      let seq = 0;
      target = path.join(this.backupDir, `${base}-${String(seq).padStart(3, '0')}.bak`);
      while (fs.pathExistsSync(target)) {
        seq++;
        target = path.join(this.backupDir, `${base}-${String(seq).padStart(3, '0')}.bak`);
      }
      fs.copySync(source, target, { overwrite: false, errorOnExist: true });
    } catch (e) {
      throw new PatchError('BackupFailed', `Could not back up ${source}: ${errorMessage(e)}`, {
        cause: e,
      });
    }

    this.logger.success(`Backup created: ${target}`);
    this.prune(source);
    return { path: target, source, createdAt };
  }

  /** Newest first. */
  listBackups(filePath: string): string[] {
    if (!fs.pathExistsSync(this.backupDir)) {
      return [];
    }

    const prefix = this.prefixFor(path.resolve(filePath));
    return fs
      .readdirSync(this.backupDir)
      .filter(
        (file) =>
          file.startsWith(prefix) &&
          file.endsWith('.bak') &&
          STAMP.test(file.slice(prefix.length, -'.bak'.length))
      )
      .sort()
      .reverse()
      .map((file) => path.join(this.backupDir, file));
  }

  private prune(source: string): void {
    const stale = this.listBackups(source).slice(this.retention);
    for (const file of stale) {
      try {
        fs.removeSync(file);
      } catch (e) {
        this.logger.warning(`Could not evict old backup ${file}: ${errorMessage(e)}`);
      }
    }
  }

  private prefixFor(source: string): string {
    const hash = crypto.createHash('sha1').update(source).digest('hex').slice(0, 8);
    return `${path.basename(source)}.${hash}.`;
  }
}
