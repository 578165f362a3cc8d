import { OnboardingError } from "../adapters/common/errors";
import type { OnboardingProvider } from "../adapters/common/provider";
import { RegistrationClient } from "../backend/registration-client";
import { loadOnboardingConfig } from "../core/config";
import type { OnboardingFlags } from "../core/config";
import type { CloudProviderKind, OnboardingRequest, OnboardingRunResult } from "../core/types";
import { OnboardingOrchestrator, exitCodeFor } from "../onboarding/orchestrator";
import { createDefaultContext, reportFatal } from "./context";
import type { CommandContext } from "./context";

/**
 * `gpu-connect gcp` / `gpu-connect azure`.
 *
 * @returns process exit code
 */
export async function onboard(
  kind: CloudProviderKind,
  flags: OnboardingFlags,
  ctx: CommandContext = createDefaultContext()
): Promise<number> {
  try {
    const request = loadOnboardingConfig(kind, flags, ctx.env);
    return await runOnboarding(request, ctx);
  } catch (error) {
    return reportFatal(ctx.output, error, ctx.env);
  }
}

/**
 * Run a fully assembled request. Errors propagate to the caller.
 */
export async function runOnboarding(request: OnboardingRequest, ctx: CommandContext): Promise<number> {
  const { output } = ctx;
  const provider = ctx.createProvider(request.provider);

  output.header(`${provider.displayName} onboarding`, "🚀");
  output.dim(
    request.allowControl
      ? "Access: read-only roles plus instance control"
      : "Access: read-only roles"
  );
  output.newline();

  await assertPrerequisites(provider);

  const orchestrator = new OnboardingOrchestrator({
    provider,
    output,
    prompt: ctx.prompt,
    registration: new RegistrationClient(ctx.fetchFn),
  });
  const result = await orchestrator.run(request);

  printSummary(ctx, result);
  return exitCodeFor(request.provider, result);
}

async function assertPrerequisites(provider: OnboardingProvider): Promise<void> {
  const checks = await provider.checkPrerequisites();
  const failed = checks.filter((check) => !check.passed);
  if (failed.length > 0) {
    throw new OnboardingError(
      failed.map((check) => check.message).join("\n"),
      "PRECONDITION",
      failed.flatMap((check) => (check.fix ? [check.fix] : []))
    );
  }
}

function printSummary(ctx: CommandContext, result: OnboardingRunResult): void {
  const { output } = ctx;
  output.newline();
  output.step("Summary");

  for (const item of result.results) {
    switch (item.status) {
      case "registered":
        output.success(`${item.candidateId}: registered`);
        break;
      case "skipped":
        output.warn(`${item.candidateId}: provisioned, registration skipped`);
        break;
      case "registration-failed":
        output.error(`${item.candidateId}: provisioned, registration failed`);
        break;
      case "provisioning-failed":
        output.error(`${item.candidateId}: ${item.error.message}`);
        break;
    }
  }
}
