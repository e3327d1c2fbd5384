// packages/engine/src/core/types.ts
import type { Logger } from "./logger.js";
import type { PatchSession } from "./session.js";

/**
 * 실패 종류
 * - None: 성공 (또는 건너뜀)
 * - UnbalancedStructure 는 스캐너 내부용. 결과에는 오케스트레이터가 매핑한 값만 나간다.
 */
export type FailureKind =
  | "None"
  | "FileMissing"
  | "AnchorNotFound"
  | "PatternNotFound"
  | "StructuralCorruption"
  | "UnbalancedStructure"
  | "BackupFailed"
  | "IOFailure"
  | "InvalidFragmentSpec";

/**
 * 프래그먼트를 넣을 위치
 */
export type FragmentAnchor =
  | { kind: "block"; block: string }
  | { kind: "end-of-file" };

/**
 * 제거 범위 선언 (마커 ~ 계산된 블록 끝)
 */
export interface FragmentShape {
  /** Pattern every flat declaration line owned by the fragment matches. */
  line?: RegExp;
  /** Upper bound on flat lines consumed after the marker. Defaults to 16. */
  maxLines?: number;
  /** Header of the trailing block the fragment owns, e.g. `configurations.all`. */
  block?: string;
}

/**
 * 필수 프래그먼트 정의
 */
export interface FragmentSpec {
  id: string;
  marker: string;
  /** Body lines after the marker; `{{name}}` is replaced from the version set. */
  template: string;
  anchor: FragmentAnchor;
  /** Literal templates that must all appear verbatim inside the fragment. */
  requires: string[];
  shape: FragmentShape;
  /** Ids of fragments that have to be injected before this one. */
  dependsOn?: string[];
}

/**
 * 버전 묶음 (modern / legacy 등). 한 번의 실행 동안 불변.
 */
export interface TargetVersionSet {
  readonly name: string;
  readonly versions: Readonly<Record<string, string>>;
}

export type FragmentState = "absent" | "correct" | "stale";

export type FragmentStates = Record<string, FragmentState>;

export interface BackupRecord {
  path: string;
  source: string;
  createdAt: Date;
}

export type BackupPolicy = "strict" | "best-effort";

/**
 * 실행 옵션 (config.ts 에서 기본값/환경변수와 병합)
 */
export interface PatchOptions {
  backupDir: string;
  retention: number;
  /** Policy for snapshots taken before additive-only edits. Destructive edits are always strict. */
  backupPolicy: BackupPolicy;
  indent: string;
  logger: Logger;
  /** Runs after a successful commit, e.g. to refresh an editor's asset index. */
  onCommit?: (filePath: string) => void;
}

export interface PatchRequest {
  filePath: string;
  versions: TargetVersionSet;
  specs?: FragmentSpec[];
  /** Go/no-go decided by the caller (active platform, build target). */
  enabled?: boolean;
  session?: PatchSession;
  dryRun?: boolean;
}

export interface PatchResult {
  success: boolean;
  changed: boolean;
  skipped: boolean;
  message: string;
  failureKind: FailureKind;
  recoverable: boolean;
  states: FragmentStates;
  backup?: BackupRecord;
  warnings: string[];
}
