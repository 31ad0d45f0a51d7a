export interface ProgressReporter {
  add(bytes: number): void;
  finish(): void;
}

const UNITS = ["B", "KB", "MB", "GB", "TB"];
const BAR_WIDTH = 24;
const RENDER_INTERVAL_MS = 100;

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return "0 B";
  }

  let size = bytes;
  let unitIndex = 0;
  while (size >= 1024 && unitIndex < UNITS.length - 1) {
    size /= 1024;
    unitIndex += 1;
  }

  const precision = unitIndex === 0 || size >= 10 ? 0 : 1;
  return `${size.toFixed(precision)} ${UNITS[unitIndex]}`;
}

export interface ProgressSnapshot {
  label: string;
  transferred: number;
  total: number;
  bytesPerSecond: number;
}

export function formatProgressLine(snapshot: ProgressSnapshot, columns: number): string {
  const { label, transferred, total, bytesPerSecond } = snapshot;
  const ratio = total > 0 ? Math.min(transferred / total, 1) : 1;
  const filled = Math.round(ratio * BAR_WIDTH);
  const bar = "#".repeat(filled) + "-".repeat(BAR_WIDTH - filled);
  const percent = String(Math.round(ratio * 100)).padStart(3, " ");

  const line =
    `${label} [${bar}] ${percent}% ` +
    `${formatBytes(transferred)}/${formatBytes(total)} ${formatBytes(bytesPerSecond)}/s`;
  return line.length > columns - 1 ? line.slice(0, columns - 1) : line;
}

/** Single-line progress bar on stdout; silent when stdout is not a TTY. */
export class TransferProgress implements ProgressReporter {
  private transferred = 0;
  private readonly total: number;
  private readonly startedAt = Date.now();
  private lastRenderAt = 0;
  private widest = 0;
  private readonly enabled = Boolean(process.stdout.isTTY);

  constructor(total: number, private readonly label: string) {
    this.total = Math.max(0, total);
    this.render(true);
  }

  add(bytes: number): void {
    if (!Number.isFinite(bytes) || bytes <= 0) {
      return;
    }
    this.transferred += bytes;
    this.render(false);
  }

  finish(): void {
    this.render(true);
    if (this.enabled) {
      process.stdout.write("\n");
    }
  }

  private render(force: boolean): void {
    if (!this.enabled) {
      return;
    }

    const now = Date.now();
    if (!force && now - this.lastRenderAt < RENDER_INTERVAL_MS) {
      return;
    }
    this.lastRenderAt = now;

    const elapsedSeconds = Math.max(0.001, (now - this.startedAt) / 1000);
    const line = formatProgressLine(
      {
        label: this.label,
        transferred: this.transferred,
        total: this.total,
        bytesPerSecond: this.transferred / elapsedSeconds,
      },
      process.stdout.columns || 80
    );

    process.stdout.write(`\r${line.padEnd(this.widest, " ")}`);
    this.widest = Math.max(this.widest, line.length);
  }
}
