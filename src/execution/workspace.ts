import { constants as fsConstants, promises as fs } from "fs";
import path from "path";
import { ConfigurationError, isErrnoException } from "../core/errors.js";

function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

export { safeJoin };

/**
 * Artifacts of one work item live side by side in one output directory and are
 * named `{id}_{stage}`, so a re-run overwrites rather than collides.
 */
export interface UnitWorkspace {
  outDir: string;
  artifactPath(itemId: string, stage: string): string;
}

export function unitWorkspace(outDir: string): UnitWorkspace {
  const root = path.resolve(outDir);
  return {
    outDir: root,
    artifactPath: (itemId: string, stage: string) => safeJoin(root, `${itemId}_${stage}`)
  };
}

export async function ensureWritableDir(dir: string): Promise<string> {
  const resolved = path.resolve(dir);
  try {
    await fs.mkdir(resolved, { recursive: true });
    await fs.access(resolved, fsConstants.W_OK);
  } catch (e) {
    throw new ConfigurationError(`output directory is not writable: ${resolved}`, { cause: e });
  }
  return resolved;
}

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const st = await fs.stat(filePath);
    return st.isFile();
  } catch (e) {
    if (isErrnoException(e) && (e.code === "ENOENT" || e.code === "ENOTDIR")) return false;
    throw e;
  }
}
