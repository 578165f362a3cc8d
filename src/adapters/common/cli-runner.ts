import type { ZodType, ZodTypeDef } from "zod";
import type { IShellService, ShellResult } from "../../interfaces/shell.interface";
import type { CloudProviderKind } from "../../core/types";
import {
  ProviderError,
  ProviderErrorType,
  classifyStderr,
  errorMessage,
  getErrorSuggestions,
} from "./errors";

/**
 * Thin wrapper around a provider CLI binary. Failures become ProviderError
 * with the command line and stderr attached.
 */
export class CliRunner {
  constructor(
    private readonly shell: IShellService,
    readonly binary: string,
    private readonly provider: CloudProviderKind
  ) {}

  /**
   * Run and return stdout; a non-zero exit throws.
   */
  async exec(args: string[]): Promise<string> {
    const result = await this.probe(args);
    if (result.exitCode !== 0) {
      const type = classifyStderr(result.stderr);
      throw new ProviderError(
        `${this.describe(args)} failed (exit ${result.exitCode})${result.stderr ? `: ${result.stderr}` : ""}`,
        type,
        this.describe(args),
        result.stderr,
        getErrorSuggestions(type, this.provider)
      );
    }
    return result.stdout;
  }

  /**
   * Run and parse stdout as JSON against `schema`.
   */
  async json<T>(args: string[], schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const stdout = await this.exec(args);
    return this.parse(args, stdout, schema);
  }

  /**
   * Run without treating a non-zero exit as an error (existence checks).
   */
  async probe(args: string[]): Promise<ShellResult> {
    try {
      return await this.shell.run(this.binary, args);
    } catch (error) {
      throw new ProviderError(
        errorMessage(error),
        ProviderErrorType.COMMAND_FAILED,
        this.describe(args)
      );
    }
  }

  parse<T>(args: string[], stdout: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      throw new ProviderError(
        `${this.describe(args)} returned output that is not JSON`,
        ProviderErrorType.INVALID_RESPONSE,
        this.describe(args)
      );
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError(
        `${this.describe(args)} returned an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        ProviderErrorType.INVALID_RESPONSE,
        this.describe(args)
      );
    }
    return parsed.data;
  }

  private describe(args: string[]): string {
    return [this.binary, ...args].join(" ");
  }
}
