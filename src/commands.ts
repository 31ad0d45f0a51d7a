import fs from "fs";
import path from "path";
import { ensureHost, getActiveHost, readConfig, removeHost, writeConfig } from "./config";
import { promptForHostConfig } from "./prompts";
import {
  applyAttributes,
  makeDir,
  uploadDir,
  uploadFile,
  uploadString,
  type FileAttributes,
} from "./provision/provision";
import { connectSession, type RemoteSession } from "./ssh/session";
import { printHosts, printKeyValue } from "./utils/output";
import { parseBool, parseMode } from "./utils/parse";
import { formatSyncSource } from "./utils/path";
import { formatBytes, TransferProgress } from "./utils/progress";
import { walkLocalTree } from "./utils/walk";

export interface RemoteCommandOptions {
  host?: string;
  owner?: string;
  mode?: string;
  verbose?: boolean;
}

export function attributesFrom(options: RemoteCommandOptions): FileAttributes {
  return {
    owner: options.owner,
    mode: options.mode !== undefined ? parseMode(options.mode) : undefined,
  };
}

async function withSession<T>(
  options: RemoteCommandOptions,
  handler: (session: RemoteSession) => Promise<T>
): Promise<T> {
  const host = getActiveHost(readConfig(), options.host);
  const session = await connectSession(host, { verbose: options.verbose });
  try {
    return await handler(session);
  } finally {
    await session.close();
  }
}

type ContentSource = NodeJS.ReadableStream & { isTTY?: boolean };

async function readAll(input: ContentSource): Promise<Buffer> {
  if (input.isTTY) {
    throw new Error("No content given. Pass --content or pipe data on stdin.");
  }
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export async function handleHostAdd(name: string): Promise<void> {
  const config = readConfig();
  const host = await promptForHostConfig(name, config.hosts[name]);
  ensureHost(config, host);
  config.activeHost = name;
  writeConfig(config);
  console.log(`Saved host ${name} (${host.username}@${host.host}:${host.port}).`);
}

export function handleHostUse(name: string): void {
  const config = readConfig();
  if (!config.hosts[name]) {
    throw new Error(`Host ${name} not found in config.`);
  }
  config.activeHost = name;
  writeConfig(config);
  console.log(`Active host: ${name}`);
}

export function handleHostList(): void {
  printHosts(readConfig());
}

export function handleHostShow(name?: string): void {
  const host = getActiveHost(readConfig(), name);
  printKeyValue({
    name: host.name,
    host: host.host,
    port: String(host.port),
    username: host.username,
    auth: host.auth.type,
    key: host.auth.type === "key" ? host.auth.privateKeyPath : undefined,
    staging: host.stagingDir,
  });
}

export function handleHostRemove(name: string): void {
  const config = readConfig();
  removeHost(config, name);
  writeConfig(config);
  console.log(`Removed host ${name}.`);
}

export async function handlePut(localPath: string, remotePath: string, options: RemoteCommandOptions): Promise<void> {
  const attrs = attributesFrom(options);
  if (!fs.existsSync(localPath)) {
    throw new Error(`Local file not found: ${localPath}`);
  }

  const size = fs.statSync(localPath).size;
  console.log(`Uploading 1 file (${formatBytes(size)})`);
  const progress = new TransferProgress(size, "Uploading");

  try {
    await withSession(options, (session) => uploadFile(session, localPath, remotePath, attrs, progress));
  } finally {
    progress.finish();
  }

  console.log(`Uploaded ${localPath} -> ${remotePath}`);
}

export async function handleWrite(
  remotePath: string,
  options: RemoteCommandOptions & { content?: string },
  input: ContentSource = process.stdin
): Promise<void> {
  const attrs = attributesFrom(options);
  const content = options.content ?? (await readAll(input));

  await withSession(options, (session) => uploadString(session, content, remotePath, attrs));
  console.log(`Wrote ${Buffer.byteLength(content)} bytes to ${remotePath}`);
}

export async function handleMkdir(remotePath: string, options: RemoteCommandOptions): Promise<void> {
  const attrs = attributesFrom(options);
  await withSession(options, (session) => makeDir(session, remotePath, attrs));
  console.log(`Created ${remotePath}`);
}

export async function handleChattr(remotePath: string, options: RemoteCommandOptions): Promise<void> {
  const attrs = attributesFrom(options);
  if (!attrs.owner && !attrs.mode) {
    throw new Error("Nothing to change. Pass --owner and/or --mode.");
  }
  await withSession(options, (session) => applyAttributes(session, remotePath, attrs));
  console.log(`Updated ${remotePath}`);
}

export async function handlePutDir(
  localDir: string,
  remoteDir: string,
  options: RemoteCommandOptions & { ignore?: string[] }
): Promise<void> {
  const attrs = attributesFrom(options);
  if (!fs.existsSync(localDir) || !fs.statSync(localDir).isDirectory()) {
    throw new Error("Local path must be a directory.");
  }

  let fileCount = 0;
  let totalBytes = 0;
  for (const { dirPath, files } of walkLocalTree(localDir, { ignore: options.ignore })) {
    for (const fileName of files) {
      fileCount += 1;
      totalBytes += fs.statSync(path.join(dirPath, fileName)).size;
    }
  }

  console.log(`Uploading ${fileCount} files (${formatBytes(totalBytes)})`);
  const progress = new TransferProgress(totalBytes, "Uploading");

  try {
    await withSession(options, (session) =>
      uploadDir(session, localDir, remoteDir, attrs, { ignore: options.ignore, progress })
    );
  } finally {
    progress.finish();
  }

  console.log(`Uploaded ${fileCount} files to ${remoteDir}`);
}

export function handleSyncPath(sourcePath: string, options: { contents?: string }): void {
  console.log(formatSyncSource(sourcePath, parseBool(options.contents)));
}
