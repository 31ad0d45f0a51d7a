import path from "path";

export function ensureTrailingSlash(remotePath: string): string {
  if (!remotePath.endsWith("/")) {
    return `${remotePath}/`;
  }
  return remotePath;
}

export function ensureNoTrailingSlash(remotePath: string): string {
  return remotePath.replace(/\/+$/, "");
}

/**
 * rsync reads a trailing `/` on the source as "copy what is inside this
 * directory"; without it the directory itself is copied, so `/etc/init.d`
 * synced to `/tmp` lands in `/tmp/init.d/`. Getting this wrong next to
 * `--delete` can wipe unrelated files at the destination, so callers state
 * the intent as a flag and the path is rewritten to match.
 */
export function formatSyncSource(sourcePath: string, syncContents = false): string {
  if (syncContents) {
    return ensureTrailingSlash(sourcePath);
  }
  return ensureNoTrailingSlash(sourcePath);
}

export function joinRemotePath(...parts: string[]): string {
  return path.posix.join(...parts);
}

export function toPosixRelative(filePath: string): string {
  return filePath.split(path.sep).join("/");
}
