// packages/engine/src/core/patch-orchestrator.ts
import path from 'path';
import fs from 'fs-extra';
import type {
  BackupPolicy,
  BackupRecord,
  FragmentSpec,
  FragmentStates,
  PatchOptions,
  PatchRequest,
  PatchResult,
  TargetVersionSet,
} from './types.js';
import { resolvePatchOptions } from './config.js';
import { PatchError, errorMessage, isRecoverable, type ErrorKind } from './errors.js';
import { assertBalanced } from './brace-scanner.js';
import { orderSpecs, validateSpecs } from './fragment.js';
import { classify } from './validator.js';
import { removeFragment } from './sanitizer.js';
import { insertFragment } from './injector.js';
import { BackupManager } from './backup-manager.js';
import { AtomicWriter, type ContentWriter } from './atomic-writer.js';
import { ANDROID_FRAGMENTS } from '../fragments/android.js';

export type PatchPhase = 'start' | 'validated' | 'sanitizing' | 'injecting' | 'committed' | 'aborted';

const FAILURE_HEADLINES: Record<ErrorKind, string> = {
  FileMissing: 'Setup required',
  AnchorNotFound: 'Manual edit required',
  PatternNotFound: 'Manual cleanup required',
  StructuralCorruption: 'Internal error, file left untouched',
  UnbalancedStructure: 'Internal error, file left untouched',
  BackupFailed: 'Backup failed, file left untouched',
  IOFailure: 'I/O failure',
  InvalidFragmentSpec: 'Invalid fragment definitions',
};

export interface OrchestratorDeps {
  backups?: BackupManager;
  writer?: ContentWriter;
}

type RunState = {
  phase: PatchPhase;
  states: FragmentStates;
  backup?: BackupRecord;
  warnings: string[];
};

export class PatchOrchestrator {
  private readonly options: PatchOptions;
  private readonly backups: BackupManager;
  private readonly writer: ContentWriter;

  constructor(options: Partial<PatchOptions> = {}, deps: OrchestratorDeps = {}) {
    this.options = resolvePatchOptions(options);
    this.backups =
      deps.backups ??
      new BackupManager(this.options.logger, {
        backupDir: this.options.backupDir,
        retention: this.options.retention,
      });
    this.writer = deps.writer ?? new AtomicWriter(this.options.logger);
  }

  run(request: PatchRequest): PatchResult {
    const { logger } = this.options;
    const filePath = path.resolve(request.filePath);
    const name = path.basename(filePath);
    const specs = request.specs ?? ANDROID_FRAGMENTS;
    const set = request.versions;
    const dry = Boolean(request.dryRun);

    if (request.enabled === false) {
      return this.skipped(`${name}: patching not requested for this run; nothing checked.`);
    }
    if (request.session?.hasPatched(filePath)) {
      return this.skipped(`${name}: already checked this session.`);
    }

    const run: RunState = { phase: 'start', states: {}, warnings: [] };

    try {
      validateSpecs(specs, set);
      const ordered = orderSpecs(specs);

      logger.step(`Checking ${filePath} (${set.name} versions)...`);
      const original = this.read(filePath);
      assertBalanced(original, `${name} (before patching)`);

      run.states = classify(original, ordered, set);
      run.phase = 'validated';

      const stale = ordered.filter((s) => run.states[s.marker] === 'stale');
      let doc = original;

      if (stale.length > 0) {
        run.phase = 'sanitizing';
        logger.step(`Removing stale fragments: ${stale.map((s) => s.id).join(', ')}`);
        // destructive edit: no backup, no edit
        if (!dry) this.takeBackup(filePath, 'strict', run);
        for (const spec of stale) {
          doc = removeFragment(doc, spec);
        }
      }

      const missing = ordered.filter((s) => !doc.includes(s.marker));
      if (missing.length > 0) {
        run.phase = 'injecting';
        logger.step(`Injecting fragments: ${missing.map((s) => s.id).join(', ')}`);
        for (const spec of missing) {
          doc = insertFragment(doc, spec, set, this.options.indent);
        }
      }

      const changed = doc !== original;
      if (changed) {
        this.assertConverged(doc, ordered, set, run);
        assertBalanced(doc, `${name} (patched)`);
        if (!dry) {
          // additive-only run: snapshot once the edit is known to be written
          if (!run.backup && stale.length === 0) {
            this.takeBackup(filePath, this.options.backupPolicy, run);
          }
          this.writer.commit(filePath, doc);
          this.notifyCommitted(filePath, run);
        }
      }
      run.phase = 'committed';

      if (!dry) request.session?.markPatched(filePath);

      const message = this.summarize(name, set, ordered, stale, missing, changed, dry, run);
      if (changed) logger.success(message.split('\n')[0]);
      else logger.info(message.split('\n')[0]);

      return {
        success: true,
        changed,
        skipped: false,
        message,
        failureKind: 'None',
        recoverable: false,
        states: run.states,
        backup: run.backup,
        warnings: run.warnings,
      };
    } catch (e) {
      return this.aborted(name, e, run);
    }
  }

  private read(filePath: string): string {
    if (!fs.pathExistsSync(filePath)) {
      throw new PatchError('FileMissing', `${filePath} does not exist`);
    }
    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch (e) {
      throw new PatchError('IOFailure', `Could not read ${filePath}: ${errorMessage(e)}`, { cause: e });
    }
  }

  private takeBackup(filePath: string, policy: BackupPolicy, run: RunState): void {
    try {
      run.backup = this.backups.snapshot(filePath);
    } catch (e) {
      if (policy === 'strict') throw e;
      const warning = `Continuing without backup: ${errorMessage(e)}`;
      this.options.logger.warning(warning);
      run.warnings.push(warning);
    }
  }

  /** Runs after the write, so a failure is reported as a warning. */
  private notifyCommitted(filePath: string, run: RunState): void {
    try {
      this.options.onCommit?.(filePath);
    } catch (e) {
      const warning = `File written, but the commit hook failed: ${errorMessage(e)}`;
      this.options.logger.warning(warning);
      run.warnings.push(warning);
    }
  }

  /** A fragment that is not correct right after injection would be rewritten on every run. */
  private assertConverged(doc: string, specs: FragmentSpec[], set: TargetVersionSet, run: RunState): void {
    const after = classify(doc, specs, set);
    const off = specs.filter((s) => after[s.marker] !== 'correct');
    if (off.length > 0) {
      throw new PatchError(
        'InvalidFragmentSpec',
        `Fragments do not satisfy their own requirements once injected: ${off.map((s) => s.id).join(', ')}`
      );
    }
    run.states = after;
  }

  private summarize(
    name: string,
    set: TargetVersionSet,
    specs: FragmentSpec[],
    stale: FragmentSpec[],
    missing: FragmentSpec[],
    changed: boolean,
    dry: boolean,
    run: RunState
  ): string {
    const lines: string[] = [];
    if (!changed) {
      lines.push(`${name}: all ${specs.length} fragment(s) already up to date ('${set.name}' versions).`);
    } else {
      lines.push(`${name}: ${dry ? 'would patch' : 'patched'} with '${set.name}' versions.`);
    }
    lines.push(`Checked: ${specs.map((s) => s.id).join(', ')}.`);

    const replaced = new Set(stale.map((s) => s.id));
    if (stale.length > 0) {
      lines.push(`Replaced stale: ${stale.map((s) => s.id).join(', ')}.`);
    }
    const added = missing.filter((s) => !replaced.has(s.id));
    if (added.length > 0) {
      lines.push(`Injected: ${added.map((s) => s.id).join(', ')}.`);
    }
    if (run.backup) lines.push(`Backup: ${run.backup.path}`);
    lines.push(...run.warnings);
    return lines.join('\n');
  }

  private skipped(message: string): PatchResult {
    this.options.logger.info(message);
    return {
      success: true,
      changed: false,
      skipped: true,
      message,
      failureKind: 'None',
      recoverable: false,
      states: {},
      warnings: [],
    };
  }

  private aborted(name: string, e: unknown, run: RunState): PatchResult {
    const kind = this.failureKindOf(e, run.phase);
    const detail = errorMessage(e);
    const headline = FAILURE_HEADLINES[kind];
    const message = [`${headline}: ${detail}`, `${name} was not modified.`, ...run.warnings].join('\n');

    run.phase = 'aborted';
    this.options.logger.error(`${headline}: ${detail}`);

    return {
      success: false,
      changed: false,
      skipped: false,
      message,
      failureKind: kind,
      recoverable: isRecoverable(kind),
      states: run.states,
      backup: run.backup,
      warnings: run.warnings,
    };
  }

  private failureKindOf(e: unknown, phase: PatchPhase): ErrorKind {
    if (!(e instanceof PatchError)) return 'IOFailure';
    if (e.kind !== 'UnbalancedStructure') return e.kind;
    return phase === 'sanitizing' ? 'PatternNotFound' : 'StructuralCorruption';
  }
}

export function patchFile(request: PatchRequest, options: Partial<PatchOptions> = {}): PatchResult {
  return new PatchOrchestrator(options).run(request);
}
