import os from "os";
import inquirer from "inquirer";
import { DEFAULT_PORT, DEFAULT_STAGING_DIR, type HostConfig, type SshAuth } from "./config";

// A type literal, not an interface: inquirer wants an index-compatible shape.
type HostAnswers = {
  host?: string;
  port?: number;
  username?: string;
  authType?: string;
  password?: string;
  key?: string;
  passphrase?: string;
  sudoPassword?: string;
  stagingDir?: string;
};

export async function promptForHostConfig(name: string, preset?: Partial<HostConfig>): Promise<HostConfig> {
  const answers = await inquirer.prompt<HostAnswers>([
    {
      type: "input",
      name: "host",
      message: "SSH host",
      default: preset?.host,
    },
    {
      type: "number",
      name: "port",
      message: "SSH port",
      default: preset?.port || DEFAULT_PORT,
    },
    {
      type: "input",
      name: "username",
      message: "SSH username",
      default: preset?.username,
    },
    {
      type: "list",
      name: "authType",
      message: "Authentication method",
      choices: ["key", "password"],
    },
    {
      type: "password",
      name: "password",
      message: "SSH password",
      when: (response: HostAnswers) => response.authType === "password",
    },
    {
      type: "input",
      name: "key",
      message: "Path to private key",
      default: "~/.ssh/id_ed25519",
      when: (response: HostAnswers) => response.authType === "key",
    },
    {
      type: "password",
      name: "passphrase",
      message: "Private key passphrase (optional)",
      when: (response: HostAnswers) => response.authType === "key",
    },
    {
      type: "password",
      name: "sudoPassword",
      message: "sudo password (leave empty for passwordless sudo)",
    },
    {
      type: "input",
      name: "stagingDir",
      message: "Remote staging directory",
      default: preset?.stagingDir || DEFAULT_STAGING_DIR,
    },
  ]);

  const host = (answers.host || "").toString();
  const port = Number(answers.port || DEFAULT_PORT);
  const username = (answers.username || "").toString();

  if (!host || !username) {
    throw new Error("SSH host and username are required.");
  }

  let auth: SshAuth;
  if (answers.authType === "key") {
    const keyPath = expandHome((answers.key || "").toString());
    if (!keyPath) {
      throw new Error("Private key path is required.");
    }
    auth = {
      type: "key",
      privateKeyPath: keyPath,
      passphrase: answers.passphrase || undefined,
    };
  } else {
    const password = (answers.password || "").toString();
    if (!password) {
      throw new Error("SSH password is required.");
    }
    auth = { type: "password", password };
  }

  return {
    name,
    host,
    port,
    username,
    auth,
    sudoPassword: answers.sudoPassword || undefined,
    stagingDir: answers.stagingDir || undefined,
  };
}

function expandHome(filePath: string): string {
  if (filePath === "~" || filePath.startsWith("~/")) {
    return `${os.homedir()}${filePath.slice(1)}`;
  }
  return filePath;
}
