import fs from "fs";
import os from "os";
import path from "path";

export interface SshAuthPassword {
  type: "password";
  password: string;
}

export interface SshAuthKey {
  type: "key";
  privateKeyPath: string;
  passphrase?: string;
}

export type SshAuth = SshAuthPassword | SshAuthKey;

export interface HostConfig {
  name: string;
  host: string;
  port: number;
  username: string;
  auth: SshAuth;
  sudoPassword?: string;
  stagingDir?: string;
}

export interface ConfigFile {
  activeHost?: string;
  hosts: Record<string, HostConfig>;
}

export const DEFAULT_PORT = 22;
export const DEFAULT_STAGING_DIR = "/tmp";

export function getConfigPath(): string {
  const platform = os.platform();
  if (platform === "win32") {
    const appData = process.env.APPDATA || path.join(os.homedir(), "AppData", "Roaming");
    return path.join(appData, "remote-provision", "config.json");
  }

  const configHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(configHome, "remote-provision", "config.json");
}

export function readConfig(): ConfigFile {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return { hosts: {} };
  }

  const raw = fs.readFileSync(configPath, "utf8");
  const parsed = JSON.parse(raw) as Partial<ConfigFile>;
  return {
    activeHost: parsed.activeHost,
    hosts: parsed.hosts || {},
  };
}

export function writeConfig(config: ConfigFile): void {
  const configPath = getConfigPath();
  const dir = path.dirname(configPath);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { encoding: "utf8", mode: 0o600 });
}

/**
 * Resolves the host a command should talk to: the named one, or the active
 * one. `RPROV_SUDO_PASSWORD` overrides the stored sudo password.
 */
export function getActiveHost(config: ConfigFile, name?: string): HostConfig {
  const selected = name || config.activeHost;
  if (!selected) {
    throw new Error("No active host. Run `rprov host add <name>` first.");
  }

  const host = config.hosts[selected];
  if (!host) {
    throw new Error(`Host ${selected} not found in config.`);
  }

  const sudoPassword = process.env.RPROV_SUDO_PASSWORD || host.sudoPassword;
  return sudoPassword ? { ...host, sudoPassword } : { ...host };
}

export function ensureHost(config: ConfigFile, host: HostConfig): HostConfig {
  config.hosts[host.name] = host;
  return host;
}

export function removeHost(config: ConfigFile, name: string): void {
  if (!config.hosts[name]) {
    throw new Error(`Host ${name} not found in config.`);
  }
  delete config.hosts[name];
  if (config.activeHost === name) {
    config.activeHost = undefined;
  }
}
