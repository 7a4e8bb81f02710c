// apps/publisher/src/pathNormalizer.ts

/**
 * Strips everything up to and including the last occurrence of `workspaceRoot`
 * in `sourcePath`. A path that does not contain the root (symlinked checkout,
 * different casing) comes back unchanged.
 */
export function relativizeSourcePath(sourcePath: string, workspaceRoot: string): string {
  if (!workspaceRoot) return sourcePath;
  const position = sourcePath.lastIndexOf(workspaceRoot);
  if (position < 0) return sourcePath;
  return sourcePath.slice(position + workspaceRoot.length);
}
