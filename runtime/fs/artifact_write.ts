import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

const NEW_ARTIFACT_MODE = 0o644;

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/** Hidden sibling of the target, so an interrupted write never looks like a review file. */
export function buildTempPath(targetPath: string): string {
  return path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.${randomUUID()}.tmp`);
}

async function resolveArtifactMode(targetPath: string): Promise<number> {
  try {
    const stat = await fs.stat(targetPath);
    return stat.mode & 0o777;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return NEW_ARTIFACT_MODE;
    }
    throw error;
  }
}

async function syncDirectory(dirPath: string): Promise<void> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(dirPath, "r");
  } catch (error) {
    // win32 cannot open a directory for syncing
    if (errnoCode(error) === "EISDIR" || errnoCode(error) === "EPERM") {
      return;
    }
    throw error;
  }
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Replaces the sidecar or the annotated copy in one rename. A file that
 * already exists keeps its permission bits across rewrites; new files get 0644.
 */
export async function replaceArtifact(targetPath: string, data: string): Promise<void> {
  const dirPath = path.dirname(targetPath);
  await fs.mkdir(dirPath, { recursive: true });

  const mode = await resolveArtifactMode(targetPath);
  const tempPath = buildTempPath(targetPath);
  const handle = await fs.open(tempPath, "wx", mode);

  let renamed = false;
  try {
    try {
      await handle.writeFile(data, "utf8");
      // the open mode is filtered by the umask
      await handle.chmod(mode);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, targetPath);
    renamed = true;
  } finally {
    if (!renamed) {
      await fs.rm(tempPath, { force: true });
    }
  }

  await syncDirectory(dirPath);
}

/** Deletes an artifact. Returns false when there was nothing to delete. */
export async function removeArtifact(targetPath: string): Promise<boolean> {
  try {
    await fs.unlink(targetPath);
    return true;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
}
