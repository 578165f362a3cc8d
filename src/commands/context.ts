import chalk from "chalk";
import { AzureOnboardingProvider } from "../adapters/azure/azure-provider";
import { OnboardingError, ProviderError } from "../adapters/common/errors";
import type { OnboardingProvider } from "../adapters/common/provider";
import { GcpOnboardingProvider } from "../adapters/gcp/gcp-provider";
import type { FetchFn } from "../backend/registration-client";
import type { CloudProviderKind } from "../core/types";
import type { IOutputService } from "../interfaces/output.interface";
import type { IPromptService } from "../interfaces/prompt.interface";
import type { IShellService } from "../interfaces/shell.interface";
import { OutputService } from "../services/output.service";
import { PromptService } from "../services/prompt.service";
import { ShellService } from "../services/shell.service";

/**
 * Everything a command touches outside the process. Tests swap in fakes.
 */
export interface CommandContext {
  output: IOutputService;
  prompt: IPromptService;
  shell: IShellService;
  fetchFn: FetchFn;
  env: Record<string, string | undefined>;
  cwd: string;
  createProvider(kind: CloudProviderKind): OnboardingProvider;
}

export function createDefaultContext(): CommandContext {
  const output = new OutputService();
  const shell = new ShellService();
  return {
    output,
    prompt: new PromptService(),
    shell,
    fetchFn: fetch,
    env: process.env,
    cwd: process.cwd(),
    createProvider: (kind) =>
      kind === "gcp"
        ? new GcpOnboardingProvider(shell, output)
        : new AzureOnboardingProvider(shell, output),
  };
}

/**
 * Print a fatal error the way every command does and return the exit code.
 */
export function reportFatal(output: IOutputService, error: unknown, env: CommandContext["env"]): number {
  output.stopSpinner();
  output.newline();

  const message = error instanceof Error ? error.message : String(error);
  output.error(message);

  if (error instanceof OnboardingError || error instanceof ProviderError) {
    for (const suggestion of error.suggestions ?? []) {
      output.dim(`  ${chalk.yellow("Fix:")} ${suggestion}`);
    }
  }

  if (env.DEBUG && error instanceof Error && error.stack) {
    output.dim(error.stack);
  }
  return 1;
}
