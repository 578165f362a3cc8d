import type { PrerequisiteCheck } from "../adapters/common/provider";
import type { CloudProviderKind } from "../core/types";
import { createDefaultContext, reportFatal } from "./context";
import type { CommandContext } from "./context";

/**
 * `gpu-connect doctor [provider]`: report whether the provider CLIs are
 * installed and signed in.
 */
export async function doctor(
  kind: CloudProviderKind | undefined,
  ctx: CommandContext = createDefaultContext()
): Promise<number> {
  const { output } = ctx;
  const kinds: CloudProviderKind[] = kind ? [kind] : ["gcp", "azure"];

  try {
    output.header("gpu-connect doctor", "🔧");
    output.newline();

    let failures = 0;
    for (const providerKind of kinds) {
      const provider = ctx.createProvider(providerKind);
      output.step(provider.displayName);

      const checks: PrerequisiteCheck[] = await provider.checkPrerequisites();
      if (checks.every((check) => check.passed)) {
        checks.push(await sessionCheck(providerKind, ctx));
      }

      for (const check of checks) {
        if (check.passed) {
          output.success(`${check.name}: ${check.message}`);
        } else {
          failures++;
          output.error(`${check.name}: ${check.message}`);
          if (check.fix) {
            output.dim(`    Fix: ${check.fix}`);
          }
        }
      }
      output.newline();
    }

    return failures > 0 ? 1 : 0;
  } catch (error) {
    return reportFatal(output, error, ctx.env);
  }
}

async function sessionCheck(kind: CloudProviderKind, ctx: CommandContext): Promise<PrerequisiteCheck> {
  const [command, args, fix]: [string, string[], string] =
    kind === "gcp"
      ? ["gcloud", ["auth", "list", "--filter=status:ACTIVE", "--format=value(account)"], "Run 'gcloud auth login'"]
      : ["az", ["account", "show", "--query", "user.name", "--output", "tsv"], "Run 'az login'"];

  const result = await ctx.shell.run(command, args);
  const account = result.stdout.split("\n")[0]?.trim() ?? "";
  if (result.exitCode === 0 && account.length > 0) {
    return { name: "Signed in", passed: true, message: account };
  }
  return { name: "Signed in", passed: false, message: "No active account", fix };
}
