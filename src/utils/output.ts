import type { ConfigFile } from "../config";

export function formatTable(header: string[], rows: string[][]): string[] {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  const formatRow = (row: string[]): string =>
    row
      .map((cell, i) => cell.padEnd(widths[i]))
      .join("  ")
      .trimEnd();

  return [formatRow(header), widths.map((w) => "-".repeat(w)).join("  "), ...rows.map(formatRow)];
}

export function printHosts(config: ConfigFile): void {
  const hosts = Object.values(config.hosts);
  if (hosts.length === 0) {
    console.log("No saved hosts.");
    return;
  }

  const rows = hosts.map((host) => [
    host.name === config.activeHost ? "*" : "",
    host.name,
    `${host.username}@${host.host}:${host.port}`,
    host.auth.type,
    host.sudoPassword ? "yes" : "no",
  ]);

  for (const line of formatTable(["", "Name", "Target", "Auth", "Sudo password"], rows)) {
    console.log(line);
  }
}

export function printKeyValue(values: Record<string, string | undefined>): void {
  const entries = Object.entries(values).filter(([, value]) => value !== undefined);
  for (const [key, value] of entries) {
    console.log(`${key}: ${value}`);
  }
}
