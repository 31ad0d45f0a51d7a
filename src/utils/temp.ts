import fs from "fs";
import os from "os";
import path from "path";
import { describeError } from "../errors";

export function createTempDir(prefix: string): string {
  const tempBase = path.join(os.tmpdir(), "remote-provision");
  fs.mkdirSync(tempBase, { recursive: true });
  return fs.mkdtempSync(path.join(tempBase, `${prefix}-`));
}

/**
 * Writes `content` to a file in a fresh temp directory, hands its path to
 * `handler`, and removes the directory once the handler settles. A failed
 * cleanup never replaces the handler's own error.
 */
export async function withTempFile<T>(
  prefix: string,
  content: string | Buffer,
  handler: (filePath: string) => Promise<T>
): Promise<T> {
  const tempDir = createTempDir(prefix);
  const filePath = path.join(tempDir, "content");

  let result: T;
  try {
    fs.writeFileSync(filePath, content);
    result = await handler(filePath);
  } catch (error) {
    try {
      fs.rmSync(tempDir, { recursive: true, force: true });
    } catch (cleanupError) {
      console.error(`Failed to remove temp directory ${tempDir}: ${describeError(cleanupError)}`);
    }
    throw error;
  }

  fs.rmSync(tempDir, { recursive: true, force: true });
  return result;
}
