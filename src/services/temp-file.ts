import fs from "fs-extra";
import os from "os";
import path from "path";

/**
 * Run `fn` with a path inside a fresh private temp directory. The directory
 * is removed when `fn` settles, on process exit, and on SIGINT/SIGTERM.
 *
 * Used for service account key material, which must not outlive the step
 * that reads it.
 */
export async function withTempFile<T>(
  prefix: string,
  fileName: string,
  fn: (filePath: string) => Promise<T>
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
  await fs.chmod(dir, 0o700);
  const filePath = path.join(dir, fileName);

  const cleanupSync = (): void => {
    fs.removeSync(dir);
  };
  const onSignal = (signal: NodeJS.Signals): void => {
    cleanupSync();
    process.exit(signal === "SIGTERM" ? 143 : 130);
  };

  process.once("exit", cleanupSync);
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    return await fn(filePath);
  } finally {
    process.removeListener("exit", cleanupSync);
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    await fs.remove(dir);
  }
}
