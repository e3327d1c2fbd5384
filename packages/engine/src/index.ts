import express from "express";
import cors from "cors";

import makePatchRoutes from "./routes/patch.js";
import { PatchOrchestrator, patchFile } from "./core/patch-orchestrator.js";
import { Logger } from "./core/logger.js";

/* ========================= Public API =======================*/
export type {
  BackupPolicy,
  BackupRecord,
  FailureKind,
  FragmentAnchor,
  FragmentShape,
  FragmentSpec,
  FragmentState,
  FragmentStates,
  PatchOptions,
  PatchRequest,
  PatchResult,
  TargetVersionSet,
} from "./core/types.js";

export { PatchOrchestrator, patchFile };
export type { OrchestratorDeps, PatchPhase } from "./core/patch-orchestrator.js";
export { PatchError, isRecoverable } from "./core/errors.js";
export { Logger } from "./core/logger.js";
export { resolvePatchOptions } from "./core/config.js";
export { PatchSession } from "./core/session.js";
export { findMatchingBrace, checkBalance, assertBalanced } from "./core/brace-scanner.js";
export { defineVersionSet, renderFragment, renderTemplate, validateSpecs, orderSpecs } from "./core/fragment.js";
export { classify, classifyFragment } from "./core/validator.js";
export { locateFragment, removeFragment } from "./core/sanitizer.js";
export { insertFragment, findBlockOpen } from "./core/injector.js";
export { BackupManager } from "./core/backup-manager.js";
export { AtomicWriter } from "./core/atomic-writer.js";
export type { ContentWriter } from "./core/atomic-writer.js";
export {
  ANDROID_FRAGMENTS,
  DEPENDENCY_MARKER,
  RESOLUTION_MARKER,
  androidConflictResolution,
  androidDependencies,
} from "./fragments/android.js";
export {
  LEGACY_PROFILE,
  MODERN_PROFILE,
  VERSION_PROFILES,
  profileForCompileSdk,
  resolveVersionProfile,
} from "./fragments/profiles.js";
export { locateGradleTemplate, SETUP_INSTRUCTIONS } from "./utils/root.js";
export { makePatchRoutes };

/* ========================= Express App (서버 진입점) =======================*/
const logger = new Logger();
const orchestrator = new PatchOrchestrator({ logger });

const app = express();
app.use(cors());
app.use(express.json({ limit: "1mb" }));
app.use("/api/patch", makePatchRoutes({ patch: (req) => orchestrator.run(req), logger }));
app.get("/health", (_req, res) => res.json({ ok: true }));

// listen은 테스트에서 하지 않음
export { app };
