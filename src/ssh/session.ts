import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { Client, type ConnectConfig } from "ssh2";
import SftpClient from "ssh2-sftp-client";
import { DEFAULT_STAGING_DIR, type HostConfig } from "../config";
import { CommandError, TransferError, describeError } from "../errors";
import { joinRemotePath } from "../utils/path";
import type { ProgressReporter } from "../utils/progress";
import { shellJoin, shellQuote } from "../utils/shell-quote";

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * What the provisioning operations need from a remote host. Failures are
 * raised as `CommandError` and `TransferError`, never returned.
 */
export interface RemoteSession {
  runPrivileged(command: string): Promise<CommandResult>;
  /** Resolves to the remote file path the content ended up at. */
  copyFile(localPath: string, remotePath: string, elevated: boolean, progress?: ProgressReporter): Promise<string>;
  close(): Promise<void>;
}

export interface SessionOptions {
  verbose?: boolean;
}

interface ExecOutcome {
  code: number | null;
  stdout: string;
  stderr: string;
}

export function buildConnectConfig(host: HostConfig): ConnectConfig {
  const options: ConnectConfig = {
    host: host.host,
    port: host.port,
    username: host.username,
  };

  if (host.auth.type === "password") {
    options.password = host.auth.password;
  } else {
    const keyPath = path.resolve(host.auth.privateKeyPath);
    options.privateKey = fs.readFileSync(keyPath, "utf8");
    if (host.auth.passphrase) {
      options.passphrase = host.auth.passphrase;
    }
  }

  return options;
}

// -S reads the password from stdin; -n fails instead of prompting.
export function buildSudoCommand(command: string, withPassword: boolean): string {
  const flags = withPassword ? "-S -p ''" : "-n";
  return `sudo ${flags} sh -c ${shellQuote(command)}`;
}

export async function putWithProgress(
  client: SftpClient,
  localPath: string,
  remotePath: string,
  progress?: ProgressReporter
): Promise<void> {
  if (!progress) {
    await client.put(localPath, remotePath);
    return;
  }

  const readStream = fs.createReadStream(localPath);
  readStream.on("data", (chunk) => {
    progress.add(chunk.length);
  });
  await client.put(readStream, remotePath);
}

function openShell(options: ConnectConfig): Promise<Client> {
  return new Promise((resolve, reject) => {
    const conn = new Client();
    conn.once("error", reject);
    conn.once("ready", () => {
      conn.removeListener("error", reject);
      conn.on("error", (error: Error) => {
        console.error(`SSH connection error: ${error.message}`);
      });
      resolve(conn);
    });
    conn.connect(options);
  });
}

function execCommand(conn: Client, command: string, input?: string): Promise<ExecOutcome> {
  return new Promise((resolve, reject) => {
    conn.exec(command, (error, stream) => {
      if (error) {
        reject(error);
        return;
      }

      let stdout = "";
      let stderr = "";
      let code: number | null = null;

      stream.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      stream.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });
      // exit carries (code) on a normal exit, (null, signal, ...) when killed.
      stream.on("exit", (...args: unknown[]) => {
        code = typeof args[0] === "number" ? args[0] : null;
      });
      stream.on("close", () => {
        resolve({ code, stdout, stderr });
      });

      if (input !== undefined) {
        stream.end(input);
      } else {
        stream.end();
      }
    });
  });
}

class SshSession implements RemoteSession {
  constructor(
    private readonly host: HostConfig,
    private readonly shell: Client,
    private readonly sftp: SftpClient,
    private readonly verbose: boolean
  ) {}

  async runPrivileged(command: string): Promise<CommandResult> {
    if (this.verbose) {
      console.log(`[sudo] ${command}`);
    }

    const password = this.host.sudoPassword;
    const wrapped = buildSudoCommand(command, Boolean(password));

    let outcome: ExecOutcome;
    try {
      outcome = await execCommand(this.shell, wrapped, password ? `${password}\n` : undefined);
    } catch (error) {
      throw new CommandError(command, null, "", { cause: error });
    }

    if (outcome.code !== 0) {
      throw new CommandError(command, outcome.code, outcome.stderr);
    }
    return { stdout: outcome.stdout, stderr: outcome.stderr, code: outcome.code };
  }

  /**
   * Elevated copies are staged in a scratch path the login user can write,
   * then moved into place with sudo. An existing remote directory receives
   * the file under its local basename.
   */
  async copyFile(
    localPath: string,
    remotePath: string,
    elevated: boolean,
    progress?: ProgressReporter
  ): Promise<string> {
    if (!fs.existsSync(localPath)) {
      throw new TransferError(localPath, remotePath, "local file not found");
    }

    let destination: string;
    try {
      destination = (await this.sftp.exists(remotePath)) === "d"
        ? joinRemotePath(remotePath, path.basename(localPath))
        : remotePath;
    } catch (error) {
      throw new TransferError(localPath, remotePath, describeError(error), { cause: error });
    }

    const target = elevated
      ? joinRemotePath(this.host.stagingDir || DEFAULT_STAGING_DIR, `rprov-${randomUUID()}`)
      : destination;

    try {
      await putWithProgress(this.sftp, localPath, target, progress);
    } catch (error) {
      throw new TransferError(localPath, destination, describeError(error), { cause: error });
    }

    if (!elevated) {
      return destination;
    }

    try {
      await this.runPrivileged(shellJoin(["mv", target, destination]));
    } catch (error) {
      await this.discardStaged(target);
      throw new TransferError(localPath, destination, describeError(error), { cause: error });
    }
    return destination;
  }

  async close(): Promise<void> {
    try {
      await this.sftp.end();
    } finally {
      this.shell.end();
    }
  }

  private async discardStaged(stagedPath: string): Promise<void> {
    try {
      await this.sftp.delete(stagedPath);
    } catch (error) {
      console.error(`Failed to remove staged file ${stagedPath}: ${describeError(error)}`);
    }
  }
}

export async function connectSession(host: HostConfig, options: SessionOptions = {}): Promise<RemoteSession> {
  const connectConfig = buildConnectConfig(host);
  const shell = await openShell(connectConfig);

  const sftp = new SftpClient();
  try {
    await sftp.connect(connectConfig);
  } catch (error) {
    shell.end();
    throw error;
  }

  return new SshSession(host, shell, sftp, Boolean(options.verbose));
}
