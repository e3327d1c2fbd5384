// packages/engine/src/utils/root.ts
import fs from "fs-extra";
import path from "path";

export const GRADLE_TEMPLATE_RELATIVE = path.join("Assets", "Plugins", "Android", "mainTemplate.gradle");

export const SETUP_INSTRUCTIONS =
  "Android build setup required!\n" +
  "1. Go to: Edit -> Project Settings -> Player -> Android -> Publishing Settings\n" +
  "2. Check the box: 'Custom Main Gradle Template'\n" +
  "3. Then build again or re-run the dependency fix.";

/**
 * 프로젝트 루트에서 mainTemplate.gradle 을 찾는다.
 * 1) 경로 자체가 .gradle 파일이면 그대로 사용
 * 2) <root>/Assets/Plugins/Android/mainTemplate.gradle
 * 3) ZIP 을 풀어 한 겹 더 감싸진 경우: __MACOSX 등을 무시하고
 *    템플릿을 가진 하위 디렉터리가 정확히 하나면 그것을 사용
 * 못 찾으면 null (호출 측에서 SETUP_INSTRUCTIONS 안내)
 */
export async function locateGradleTemplate(projectPath: string): Promise<string | null> {
  const abs = path.resolve(projectPath);
  const stat = await fs.stat(abs).catch(() => null);
  if (!stat) return null;
  if (stat.isFile()) return abs.endsWith(".gradle") ? abs : null;

  const direct = path.join(abs, GRADLE_TEMPLATE_RELATIVE);
  if (await fs.pathExists(direct)) return direct;

  const entries = await fs.readdir(abs).catch((): string[] => []);
  const ignore = new Set(["__MACOSX", ".DS_Store", "Library", "Temp"]);
  const candidates: string[] = [];
  for (const name of entries) {
    if (ignore.has(name)) continue;
    const p = path.join(abs, name, GRADLE_TEMPLATE_RELATIVE);
    if (await fs.pathExists(p)) candidates.push(p);
  }

  return candidates.length === 1 ? candidates[0] : null;
}
