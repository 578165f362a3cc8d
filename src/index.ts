#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import chalk from "chalk";
import { connect } from "./commands/connect";
import type { ConnectOptions } from "./commands/connect";
import { doctor } from "./commands/doctor";
import { onboard } from "./commands/onboard";
import type { OnboardingFlags } from "./core/config";
import type { CloudProviderKind } from "./core/types";
import { GPU_CONNECT_VERSION } from "./version";

const program = new Command();

program
  .name("gpu-connect")
  .description("Connect Google Cloud projects and Azure subscriptions to GPU cost monitoring")
  .version(GPU_CONNECT_VERSION);

const providerArgument = (value: string): CloudProviderKind => {
  if (value !== "gcp" && value !== "azure") {
    throw new InvalidArgumentError("Expected gcp or azure.");
  }
  return value;
};

// Onboarding commands
program
  .command("gcp")
  .description("Create a read-only service account in selected projects and register it")
  .option("--projects <ids>", "Comma-separated project IDs to onboard (env: PROJECT_IDS)")
  .addOption(new Option("--project-ids <ids>", "Alias for --projects").hideHelp())
  .option("--allow-control <bool>", "Also grant instance control roles: true|false (env: ALLOW_CONTROL)")
  .option("--auto-run [bool]", "Skip prompts; onboard GPU projects, or the first project (env: AUTO_RUN)")
  .option("--auth-token <token>", "Backend token; without one, registration is skipped (env: AUTH_TOKEN)")
  .option("--backend-url <url>", "Backend base URL (env: BACKEND_URL)")
  .option("--sa-name <name>", "Service account name (env: SA_NAME)")
  .allowExcessArguments(false)
  .action(async (options: OnboardingFlags) => {
    process.exitCode = await onboard("gcp", options);
  });

program
  .command("azure")
  .description("Deploy a managed identity into a resource group and register it")
  .option("--resource-group <name>", "Resource group, created if missing (env: RESOURCE_GROUP)")
  .option("--location <location>", "Region for a new resource group (env: LOCATION)")
  .option("--allow-control <bool>", "Also grant VM control: true|false (env: ALLOW_CONTROL)")
  .option("--auto-run [bool]", "Skip prompts and use the default resource group (env: AUTO_RUN)")
  .option("--auth-token <token>", "Backend token; without one, registration is skipped (env: AUTH_TOKEN)")
  .option("--backend-url <url>", "Backend base URL (env: BACKEND_URL)")
  .option("--template-file <path>", "ARM template for the managed identity (env: AZURE_TEMPLATE_FILE)")
  .allowExcessArguments(false)
  .action(async (options: OnboardingFlags) => {
    process.exitCode = await onboard("azure", options);
  });

// Magic-link entry point
program
  .command("connect")
  .description("Exchange a one-time TOKEN_ID for credentials and onboard automatically")
  .argument("<provider>", "gcp or azure", providerArgument)
  .option("--token-id <id>", "One-time token id, or the Cloud Shell URL containing it (env: TOKEN_ID)")
  .option("--allow-control <bool>", "Also grant control roles: true|false (env: ALLOW_CONTROL)")
  .option("--backend-url <url>", "Backend used for the token exchange (env: BACKEND_URL)")
  .allowExcessArguments(false)
  .action(async (provider: CloudProviderKind, options: ConnectOptions) => {
    process.exitCode = await connect(provider, options);
  });

// Diagnostics
program
  .command("doctor")
  .description("Check that gcloud / az are installed and signed in")
  .argument("[provider]", "gcp or azure", providerArgument)
  .action(async (provider: CloudProviderKind | undefined) => {
    process.exitCode = await doctor(provider);
  });

program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error: unknown) {
    const code = typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
    if (code === "commander.help" || code === "commander.helpDisplayed" || code === "commander.version") {
      process.exit(0);
    }
    if (typeof code !== "string" || !code.startsWith("commander.")) {
      console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
    }
    process.exit(1);
  }
  process.exit(process.exitCode ?? 0);
}

void main();
