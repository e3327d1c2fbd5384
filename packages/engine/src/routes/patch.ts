import { Router } from "express";
import path from "path";
import { locateGradleTemplate, SETUP_INSTRUCTIONS } from "../utils/root.js";
import { resolveVersionProfile } from "../fragments/profiles.js";
import type { PatchRequest, PatchResult } from "../core/types.js";
import type { PatchSession } from "../core/session.js";
import type { Logger } from "../core/logger.js";

type MakePatchRoutesDeps = {
  patch: (request: PatchRequest) => PatchResult;
  session?: PatchSession;
  logger?: Pick<Logger, "step" | "error">;
  /** 선택: 샌드박스 루트 밖 접근 차단 */
  allowedRootDir?: string;
};

type PatchRequestBody = {
  projectPath?: unknown;
  filePath?: unknown;
  profile?: unknown;
  enabled?: unknown;
  dryRun?: unknown;
};

function statusFor(result: PatchResult): number {
  if (result.success) return 200;
  if (result.failureKind === "FileMissing") return 404;
  return result.recoverable ? 422 : 500;
}

function isInside(candidate: string, root: string): boolean {
  const norm = (p: string) => p.replace(/\\/g, "/");
  const allowed = norm(path.resolve(root));
  const target = norm(path.resolve(candidate));
  return target === allowed || target.startsWith(allowed + "/");
}

/**
 * POST /api/patch
 * body: { projectPath | filePath, profile?: "modern" | "legacy", enabled?, dryRun? }
 * - projectPath 만 오면 mainTemplate.gradle 을 찾아서 패치
 * - 응답은 항상 { ok, filePath?, result?, error?, instructions? }
 */
export default function makePatchRoutes(deps: MakePatchRoutesDeps) {
  const { patch, session, logger, allowedRootDir } = deps;
  const router = Router();

  router.post("/", async (req, res) => {
    try {
      const body: PatchRequestBody = req.body ?? {};
      const { projectPath, filePath } = body;

      // 1) 입력 검증
      const given = typeof filePath === "string" && filePath.trim() ? filePath
        : typeof projectPath === "string" && projectPath.trim() ? projectPath
        : null;
      if (!given) {
        return res.status(400).json({ ok: false, error: "projectPath or filePath (string) required" });
      }

      const profileName = body.profile === undefined ? "modern" : body.profile;
      const versions = typeof profileName === "string" ? resolveVersionProfile(profileName) : undefined;
      if (!versions) {
        return res.status(400).json({ ok: false, error: `Unknown version profile: ${String(profileName)}` });
      }

      if (allowedRootDir && !isInside(given, allowedRootDir)) {
        return res.status(403).json({
          ok: false,
          error: `Access outside allowed root is forbidden (${path.resolve(allowedRootDir)}).`,
        });
      }

      // 2) 대상 파일 결정
      const target =
        typeof filePath === "string" && filePath.trim()
          ? path.resolve(filePath)
          : await locateGradleTemplate(given);
      if (!target) {
        return res.status(404).json({
          ok: false,
          error: `No Gradle template found under ${path.resolve(given)}`,
          instructions: SETUP_INSTRUCTIONS,
        });
      }

      // 3) 패치
      logger?.step(`Patching ${target}...`);
      const result = patch({
        filePath: target,
        versions,
        session,
        enabled: body.enabled === false ? false : undefined,
        dryRun: body.dryRun === true,
      });

      const payload: Record<string, unknown> = { ok: result.success, filePath: target, result };
      if (result.failureKind === "FileMissing") payload.instructions = SETUP_INSTRUCTIONS;
      return res.status(statusFor(result)).json(payload);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger?.error(message);
      return res.status(500).json({ ok: false, error: message });
    }
  });

  return router;
}
