import { describe, test, expect, beforeEach, afterEach } from "@jest/globals";
import express from "express";
import request from "supertest";
import fs from "fs-extra";
import path from "path";
import makePatchRoutes from "../packages/engine/src/routes/patch.js";
import { PatchOrchestrator } from "../packages/engine/src/core/patch-orchestrator.js";
import { app } from "../packages/engine/src/index.js";
import { SETUP_INSTRUCTIONS } from "../packages/engine/src/utils/root.js";
import { FIXTURE_TEMPLATE, makeTmpDir, quiet, writeGradle } from "./helpers/tmp.js";

describe("POST /api/patch", () => {
  let dir: string;
  let server: express.Express;

  const mount = (allowedRootDir?: string) => {
    const orchestrator = new PatchOrchestrator({ logger: quiet(), backupDir: path.join(dir, "backups") });
    const a = express();
    a.use(express.json());
    a.use("/api/patch", makePatchRoutes({ patch: (req) => orchestrator.run(req), allowedRootDir }));
    return a;
  };

  beforeEach(() => {
    dir = makeTmpDir();
    server = mount();
  });

  afterEach(() => {
    fs.removeSync(dir);
  });

  test("400 without a path", async () => {
    const res = await request(server).post("/api/patch").send({});
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: "projectPath or filePath (string) required" });
  });

  test("400 for an unknown version profile", async () => {
    const res = await request(server).post("/api/patch").send({ filePath: "x.gradle", profile: "future" });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Unknown version profile: future");
  });

  test("404 with setup instructions when the project has no template", async () => {
    const res = await request(server).post("/api/patch").send({ projectPath: dir });
    expect(res.status).toBe(404);
    expect(res.body.ok).toBe(false);
    expect(res.body.instructions).toBe(SETUP_INSTRUCTIONS);
  });

  test("404 with setup instructions when the named file is missing", async () => {
    const res = await request(server)
      .post("/api/patch")
      .send({ filePath: path.join(dir, "mainTemplate.gradle") });
    expect(res.status).toBe(404);
    expect(res.body.result.failureKind).toBe("FileMissing");
    expect(res.body.instructions).toBe(SETUP_INSTRUCTIONS);
  });

  test("patches a project's template once, then reports it up to date", async () => {
    const target = path.join(dir, "Assets", "Plugins", "Android", "mainTemplate.gradle");
    fs.ensureDirSync(path.dirname(target));
    fs.copySync(FIXTURE_TEMPLATE, target);

    const first = await request(server).post("/api/patch").send({ projectPath: dir, profile: "legacy" });
    const second = await request(server).post("/api/patch").send({ projectPath: dir, profile: "legacy" });

    expect(first.status).toBe(200);
    expect(first.body.filePath).toBe(target);
    expect(first.body.result.changed).toBe(true);
    expect(second.status).toBe(200);
    expect(second.body.result.changed).toBe(false);
    expect(fs.readFileSync(target, "utf8")).toContain("implementation 'androidx.browser:browser:1.5.0'");
  });

  test("422 when the file has nowhere to put the dependencies", async () => {
    const file = writeGradle(dir, "android {\n}\n");
    const res = await request(server).post("/api/patch").send({ filePath: file });
    expect(res.status).toBe(422);
    expect(res.body.ok).toBe(false);
    expect(res.body.result.failureKind).toBe("AnchorNotFound");
    expect(fs.readFileSync(file, "utf8")).toBe("android {\n}\n");
  });

  test("dry run leaves the file alone", async () => {
    const file = writeGradle(dir, "dependencies {\n}\n");
    const res = await request(server).post("/api/patch").send({ filePath: file, dryRun: true });
    expect(res.status).toBe(200);
    expect(res.body.result.changed).toBe(true);
    expect(fs.readFileSync(file, "utf8")).toBe("dependencies {\n}\n");
  });

  test("403 outside the allowed root", async () => {
    const sandbox = path.join(dir, "sandbox");
    fs.ensureDirSync(sandbox);
    const res = await request(mount(sandbox))
      .post("/api/patch")
      .send({ filePath: path.join(dir, "build.gradle") });
    expect(res.status).toBe(403);
  });
});

describe("GET /health", () => {
  test("answers ok", async () => {
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });
});
