// apps/publisher/src/fsUtils.ts
import path from "node:path";
import { copyFile, mkdir, readdir } from "node:fs/promises";

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function ensureDir(p: string): Promise<void> {
  await mkdir(p, { recursive: true });
}

export function resolveFromRoot(projectRoot: string, p: string): string {
  if (path.isAbsolute(p)) return p;
  return path.resolve(projectRoot, p);
}

/** Forward-slash path of `absPath` relative to `fromDir`, for log lines. */
export function normRel(fromDir: string, absPath: string): string {
  return path.relative(fromDir, absPath).split(path.sep).join("/");
}

/** Copies the contents of `srcDir` into `destDir`, creating directories as needed. */
export async function copyDirRecursive(srcDir: string, destDir: string): Promise<number> {
  await ensureDir(destDir);
  const entries = await readdir(srcDir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  let copied = 0;
  for (const entry of entries) {
    const src = path.join(srcDir, entry.name);
    const dest = path.join(destDir, entry.name);
    if (entry.isDirectory()) {
      copied += await copyDirRecursive(src, dest);
    } else if (entry.isFile()) {
      await copyFile(src, dest);
      copied += 1;
    }
  }
  return copied;
}
