/**
 * Shell Service Interface
 *
 * Runs provider CLIs (gcloud, az). Arguments are passed as an array, never
 * through a shell.
 */
export interface ShellResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface IShellService {
  /** Run a command and capture its output. Resolves even on a non-zero exit. */
  run(command: string, args: string[]): Promise<ShellResult>;
  /** Run a command attached to the terminal (interactive login flows). */
  runInteractive(command: string, args: string[]): Promise<number>;
  /** Whether a command is available on PATH. */
  commandExists(command: string): Promise<boolean>;
}
