import fs from "fs";
import path from "path";
import { TransferError } from "../errors";
import type { RemoteSession } from "../ssh/session";
import { joinRemotePath, toPosixRelative } from "../utils/path";
import type { ProgressReporter } from "../utils/progress";
import { shellJoin } from "../utils/shell-quote";
import { withTempFile } from "../utils/temp";
import { walkLocalTree } from "../utils/walk";

export interface FileAttributes {
  owner?: string;
  mode?: string;
}

export interface UploadDirOptions {
  ignore?: string[];
  progress?: ProgressReporter;
}

/** `sudo chown <owner> <remotePath>`. Callers skip it when there is no owner. */
export async function applyOwnership(session: RemoteSession, remotePath: string, owner: string): Promise<void> {
  await session.runPrivileged(shellJoin(["chown", owner, remotePath]));
}

/** `sudo chmod <mode> <remotePath>`. The mode is not validated. */
export async function applyMode(session: RemoteSession, remotePath: string, mode: string): Promise<void> {
  await session.runPrivileged(shellJoin(["chmod", mode, remotePath]));
}

/**
 * Owner is applied before mode; an empty or missing field issues no command.
 */
export async function applyAttributes(
  session: RemoteSession,
  remotePath: string,
  attrs: FileAttributes = {}
): Promise<void> {
  if (attrs.owner) {
    await applyOwnership(session, remotePath, attrs.owner);
  }
  if (attrs.mode) {
    await applyMode(session, remotePath, attrs.mode);
  }
}

export async function uploadFile(
  session: RemoteSession,
  localPath: string,
  remotePath: string,
  attrs: FileAttributes = {},
  progress?: ProgressReporter
): Promise<void> {
  const placedPath = await session.copyFile(localPath, remotePath, true, progress);
  await applyAttributes(session, placedPath, attrs);
}

/**
 * Uploads `content` through a temp file that is removed whether or not the
 * upload succeeds.
 */
export async function uploadString(
  session: RemoteSession,
  content: string | Buffer,
  remotePath: string,
  attrs: FileAttributes = {}
): Promise<void> {
  await withTempFile("upload", content, (filePath) => uploadFile(session, filePath, remotePath, attrs));
}

/** `sudo mkdir -p`, then ownership and mode on the directory itself. */
export async function makeDir(session: RemoteSession, remotePath: string, attrs: FileAttributes = {}): Promise<void> {
  await session.runPrivileged(shellJoin(["mkdir", "-p", remotePath]));
  await applyAttributes(session, remotePath, attrs);
}

/**
 * Mirrors `localDir` under `remoteDir`. Directories are created before the
 * files inside them, one remote call at a time; the first failure stops the
 * walk and nothing already uploaded is undone.
 */
export async function uploadDir(
  session: RemoteSession,
  localDir: string,
  remoteDir: string,
  attrs: FileAttributes = {},
  options: UploadDirOptions = {}
): Promise<void> {
  if (!fs.existsSync(localDir) || !fs.statSync(localDir).isDirectory()) {
    throw new TransferError(localDir, remoteDir, "local directory not found");
  }

  for (const { dirPath, files } of walkLocalTree(localDir, { ignore: options.ignore })) {
    const rel = path.relative(localDir, dirPath);
    const remoteDirPath = rel === "" ? remoteDir : joinRemotePath(remoteDir, toPosixRelative(rel));

    await makeDir(session, remoteDirPath, attrs);
    for (const fileName of files) {
      await uploadFile(
        session,
        path.join(dirPath, fileName),
        joinRemotePath(remoteDirPath, fileName),
        attrs,
        options.progress
      );
    }
  }
}
