import fs from "fs";
import os from "os";
import path from "path";
import {
  ensureHost,
  getActiveHost,
  getConfigPath,
  readConfig,
  removeHost,
  writeConfig,
  type ConfigFile,
  type HostConfig,
} from "../config";

const web: HostConfig = {
  name: "web",
  host: "web.example.test",
  port: 22,
  username: "deploy",
  auth: { type: "key", privateKeyPath: "/home/deploy/.ssh/id_ed25519" },
};

const db: HostConfig = {
  name: "db",
  host: "10.0.0.5",
  port: 2222,
  username: "admin",
  auth: { type: "password", password: "test-password" },
  sudoPassword: "test-sudo",
};

describe("config file", () => {
  let tmp: string;
  const saved = { xdg: process.env.XDG_CONFIG_HOME, sudo: process.env.RPROV_SUDO_PASSWORD };

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "rprov-config-"));
    process.env.XDG_CONFIG_HOME = tmp;
    delete process.env.RPROV_SUDO_PASSWORD;
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
    if (saved.xdg === undefined) {
      delete process.env.XDG_CONFIG_HOME;
    } else {
      process.env.XDG_CONFIG_HOME = saved.xdg;
    }
    if (saved.sudo !== undefined) {
      process.env.RPROV_SUDO_PASSWORD = saved.sudo;
    }
  });

  it("lives under XDG_CONFIG_HOME", () => {
    expect(getConfigPath()).toBe(path.join(tmp, "remote-provision", "config.json"));
  });

  it("reads an empty config when no file exists", () => {
    expect(readConfig()).toEqual({ activeHost: undefined, hosts: {} });
  });

  it("round-trips saved hosts", () => {
    const config: ConfigFile = { hosts: {} };
    ensureHost(config, web);
    ensureHost(config, db);
    config.activeHost = "web";
    writeConfig(config);

    expect(readConfig()).toEqual({ activeHost: "web", hosts: { web, db } });
  });

  it("fills in missing sections of a hand-written file", () => {
    fs.mkdirSync(path.dirname(getConfigPath()), { recursive: true });
    fs.writeFileSync(getConfigPath(), "{}");
    expect(readConfig()).toEqual({ activeHost: undefined, hosts: {} });
  });

  it("resolves the active host or a named one", () => {
    const config: ConfigFile = { activeHost: "web", hosts: { web, db } };
    expect(getActiveHost(config)).toEqual(web);
    expect(getActiveHost(config, "db")).toEqual(db);
  });

  it("explains when no host is selected or the name is unknown", () => {
    expect(() => getActiveHost({ hosts: {} })).toThrow("No active host. Run `rprov host add <name>` first.");
    expect(() => getActiveHost({ hosts: { web } }, "cache")).toThrow("Host cache not found in config.");
  });

  it("lets RPROV_SUDO_PASSWORD override the stored sudo password", () => {
    process.env.RPROV_SUDO_PASSWORD = "test-from-env";
    const config: ConfigFile = { activeHost: "db", hosts: { web, db } };
    expect(getActiveHost(config).sudoPassword).toBe("test-from-env");
    expect(getActiveHost(config, "web").sudoPassword).toBe("test-from-env");
    expect(config.hosts.db.sudoPassword).toBe("test-sudo");
  });

  it("clears the active host when it is removed", () => {
    const config: ConfigFile = { activeHost: "web", hosts: { web, db } };
    removeHost(config, "web");
    expect(config).toEqual({ activeHost: undefined, hosts: { db } });
    expect(() => removeHost(config, "web")).toThrow("Host web not found in config.");
  });
});
