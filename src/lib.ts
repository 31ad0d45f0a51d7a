export { CommandError, TransferError } from "./errors";
export {
  applyAttributes,
  applyMode,
  applyOwnership,
  makeDir,
  uploadDir,
  uploadFile,
  uploadString,
  type FileAttributes,
  type UploadDirOptions,
} from "./provision/provision";
export { connectSession, type CommandResult, type RemoteSession, type SessionOptions } from "./ssh/session";
export type { HostConfig, SshAuth } from "./config";
export { parseBool } from "./utils/parse";
export { ensureNoTrailingSlash, ensureTrailingSlash, formatSyncSource, joinRemotePath } from "./utils/path";
export { walkLocalTree, type WalkEntry, type WalkOptions } from "./utils/walk";
