export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string, options?: { cause?: unknown }) {
    const detail = stderr.trim();
    const status = exitCode === null ? "no exit status" : `exit ${exitCode}`;
    super(`Remote command failed (${status}): ${command}${detail ? `: ${detail}` : ""}`, options);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class TransferError extends Error {
  readonly localPath: string;
  readonly remotePath: string;

  constructor(localPath: string, remotePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Upload ${localPath} -> ${remotePath} failed: ${reason}`, options);
    this.name = "TransferError";
    this.localPath = localPath;
    this.remotePath = remotePath;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
