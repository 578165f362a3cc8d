import fs from "fs-extra";
import path from "path";
import { OnboardingError } from "../adapters/common/errors";
import { TokenExchangeClient, extractTokenId } from "../backend/token-exchange-client";
import { DEFAULT_BACKEND_URL, loadOnboardingConfig, loginUrlFor } from "../core/config";
import type { OnboardingFlags } from "../core/config";
import type { CloudProviderKind } from "../core/types";
import { createDefaultContext, reportFatal } from "./context";
import type { CommandContext } from "./context";
import { runOnboarding } from "./onboard";

export interface ConnectOptions {
  tokenId?: string;
  allowControl?: string | boolean;
  backendUrl?: string;
}

const TOKEN_ID_FILE = ".token_id";

/**
 * `gpu-connect connect <provider>`: the entry point opened from a magic link.
 * Exchanges the one-time token id for a bearer token, then onboards in
 * auto-run mode.
 */
export async function connect(
  kind: CloudProviderKind,
  options: ConnectOptions,
  ctx: CommandContext = createDefaultContext()
): Promise<number> {
  const { output, env } = ctx;
  const defaultBackend = options.backendUrl ?? env.BACKEND_URL ?? DEFAULT_BACKEND_URL;

  try {
    output.header(`${kind === "gcp" ? "GCP" : "Azure"} auto-setup`, "🔑");
    output.newline();

    const tokenId = await resolveTokenId(kind, options, ctx);
    if (!tokenId) {
      throw new OnboardingError("No TOKEN_ID provided", "TOKEN_EXCHANGE", [
        `Go to ${connectUrlFor(defaultBackend, kind)} and start the connection again`,
        "Copy the TOKEN_ID from the Cloud Shell URL and run this command again",
      ]);
    }

    output.startSpinner("Fetching authentication token...");
    const exchange = await new TokenExchangeClient(defaultBackend, ctx.fetchFn).exchange(tokenId);
    output.succeedSpinner("Authentication successful!");

    const flags: OnboardingFlags = {
      allowControl: options.allowControl,
      autoRun: true,
      authToken: exchange.authToken,
      backendUrl: exchange.backendUrl,
    };
    return await runOnboarding(loadOnboardingConfig(kind, flags, env), ctx);
  } catch (error) {
    return reportFatal(output, error, env);
  }
}

/**
 * Token id from, in order: --token-id, TOKEN_ID, a .token_id file in the
 * working directory, then a prompt.
 */
export async function resolveTokenId(
  kind: CloudProviderKind,
  options: ConnectOptions,
  ctx: CommandContext
): Promise<string> {
  if (options.tokenId) {
    return extractTokenId(options.tokenId);
  }
  if (ctx.env.TOKEN_ID) {
    return extractTokenId(ctx.env.TOKEN_ID);
  }

  const tokenFile = path.join(ctx.cwd, TOKEN_ID_FILE);
  if (await fs.pathExists(tokenFile)) {
    return extractTokenId(await fs.readFile(tokenFile, "utf-8"));
  }

  ctx.output.warn("Could not detect TOKEN_ID automatically");
  ctx.output.dim("It's the part after TOKEN_ID= in the Cloud Shell URL.");
  const answer = await ctx.prompt.input(
    kind === "gcp" ? "Paste the full Cloud Shell URL here:" : "TOKEN_ID:"
  );
  return extractTokenId(answer);
}

function connectUrlFor(backendUrl: string, kind: CloudProviderKind): string {
  return loginUrlFor(backendUrl).replace(/\/login$/, `/connect/${kind}`);
}
