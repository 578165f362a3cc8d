import { execFile, spawn } from "child_process";
import type { IShellService, ShellResult } from "../interfaces/shell.interface";

const COMMAND_TIMEOUT_MS = 300_000;
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Runs provider CLIs with child_process.
 */
export class ShellService implements IShellService {
  run(command: string, args: string[]): Promise<ShellResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        { timeout: COMMAND_TIMEOUT_MS, maxBuffer: MAX_OUTPUT_BYTES, encoding: "utf-8" },
        (error, stdout, stderr) => {
          if (error && typeof error.code !== "number") {
            reject(new Error(`Command failed: ${command} ${args.join(" ")}\n${stderr || error.message}`));
            return;
          }
          resolve({
            stdout: stdout.trim(),
            stderr: stderr.trim(),
            exitCode: error && typeof error.code === "number" ? error.code : 0,
          });
        }
      );
    });
  }

  runInteractive(command: string, args: string[]): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: "inherit" });
      child.on("error", (err) => {
        reject(new Error(`Command failed: ${command} ${args.join(" ")}\n${err.message}`));
      });
      child.on("close", (code) => {
        resolve(code ?? 1);
      });
    });
  }

  async commandExists(command: string): Promise<boolean> {
    try {
      const result = await this.run(command, ["--version"]);
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
