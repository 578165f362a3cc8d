import { errorMessage } from "../adapters/common/errors";
import type { OnboardingProvider } from "../adapters/common/provider";
import type { RegistrationClient } from "../backend/registration-client";
import { loginUrlFor } from "../core/config";
import { formatCandidateList, resolveSelection } from "../core/selection";
import type { SelectionPolicy, SelectionPrompt } from "../core/selection";
import type {
  CandidateResult,
  CloudAccountCandidate,
  OnboardingPhase,
  OnboardingRequest,
  OnboardingRunResult,
  RegistrationPayload,
} from "../core/types";
import type { IOutputService } from "../interfaces/output.interface";
import type { IPromptService } from "../interfaces/prompt.interface";

const PHASE_ORDER: readonly OnboardingPhase[] = [
  "Discovering",
  "Selecting",
  "Provisioning",
  "Registering",
  "Done",
];

export interface OnboardingDependencies {
  provider: OnboardingProvider;
  output: IOutputService;
  prompt: IPromptService;
  registration: Pick<RegistrationClient, "register">;
  /** Defaults to a prompt built on `prompt` */
  selectionPrompt?: SelectionPrompt;
  onPhaseChange?: (phase: OnboardingPhase) => void;
}

interface ProvisionedCandidate {
  candidateId: string;
  payload: RegistrationPayload;
}

/**
 * Interactive selection on top of IPromptService: prints the numbered list,
 * then asks for indexes or IDs.
 */
export class PromptSelection implements SelectionPrompt {
  constructor(
    private readonly prompt: IPromptService,
    private readonly output: IOutputService
  ) {}

  async ask(candidates: readonly CloudAccountCandidate[], policy: SelectionPolicy): Promise<string> {
    const plural = policy.multiple ? "(s)" : "";
    if (candidates.length > 0) {
      this.output.info(`Available ${policy.noun}s:`);
      for (const line of formatCandidateList(candidates)) {
        this.output.info(line);
      }
    }

    const question = policy.defaultCandidate
      ? `Enter ${policy.noun} name or index (or press Enter to use '${policy.defaultCandidate}'):`
      : `Enter ${policy.noun}${plural} by ID or index (comma-separated):`;
    return this.prompt.input(question);
  }
}

/**
 * Drives a run through Discovering -> Selecting -> Provisioning ->
 * Registering -> Done. Candidates are handled one after another; a failed
 * candidate is reported and the rest continue.
 */
export class OnboardingOrchestrator {
  private phase: OnboardingPhase | null = null;
  private readonly selectionPrompt: SelectionPrompt;

  constructor(private readonly deps: OnboardingDependencies) {
    this.selectionPrompt = deps.selectionPrompt ?? new PromptSelection(deps.prompt, deps.output);
  }

  get currentPhase(): OnboardingPhase | null {
    return this.phase;
  }

  async run(request: OnboardingRequest): Promise<OnboardingRunResult> {
    const { provider, output } = this.deps;

    this.enter("Discovering");
    const candidates = await provider.discover();

    this.enter("Selecting");
    const selection = await resolveSelection({
      explicit: request.explicitSelection,
      autoRun: request.autoRun,
      candidates,
      policy: provider.selectionPolicy,
      prompt: this.selectionPrompt,
    });
    if (selection.source === "auto-run") {
      output.info(`Auto-running for: ${selection.ids.join(", ")}`);
    }

    this.enter("Provisioning");
    const results: CandidateResult[] = [];
    const provisioned: ProvisionedCandidate[] = [];

    for (const candidateId of selection.ids) {
      output.newline();
      output.step(`---- Onboarding ${provider.selectionPolicy.noun}: ${candidateId} ----`);
      try {
        const identity = await provider.provision(candidateId, request);
        output.success(`Granted ${identity.roles.join(", ")} for ${candidateId}`);
        provisioned.push({
          candidateId,
          payload: provider.buildPayload(identity, request.allowControl),
        });
      } catch (error) {
        if (!provider.selectionPolicy.multiple) {
          throw error;
        }
        output.error(`Onboarding ${candidateId} failed: ${errorMessage(error)}`);
        results.push({
          candidateId,
          status: "provisioning-failed",
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }

    this.enter("Registering");
    if (provisioned.length > 0) {
      const authToken = request.authToken ?? (await this.askForToken(request));
      for (const item of provisioned) {
        results.push(await this.registerOrRecord(item, request, authToken));
      }
    }

    this.enter("Done");
    return { selection: selection.ids, results };
  }

  /**
   * Registration errors become a registration-failed result; the loop over
   * candidates never stops on one.
   */
  private async registerOrRecord(
    item: ProvisionedCandidate,
    request: OnboardingRequest,
    authToken: string | undefined
  ): Promise<CandidateResult> {
    try {
      return await this.register(item, request, authToken);
    } catch (error) {
      const { output } = this.deps;
      output.failSpinner(`Registering ${item.candidateId} failed: ${errorMessage(error)}`);
      this.printManualRegistration(item, request);
      return {
        candidateId: item.candidateId,
        status: "registration-failed",
        payload: item.payload,
        outcome: { kind: "network-error", message: errorMessage(error) },
      };
    }
  }

  private async register(
    item: ProvisionedCandidate,
    request: OnboardingRequest,
    authToken: string | undefined
  ): Promise<CandidateResult> {
    const { provider, output, registration } = this.deps;
    const url = `${request.backendUrl}${provider.registrationPath}`;

    if (!authToken) {
      output.newline();
      output.warn(`Skipping backend registration for ${item.candidateId}.`);
      this.printManualRegistration(item, request);
      output.dim(`Tokens are issued at ${loginUrlFor(request.backendUrl)}`);
      return { candidateId: item.candidateId, status: "skipped", payload: item.payload };
    }

    output.startSpinner(`Posting credentials to backend at ${url} ...`);
    const outcome = await registration.register(
      {
        backendUrl: request.backendUrl,
        path: provider.registrationPath,
        failureResponsePath: provider.failureResponsePath,
      },
      item.payload,
      authToken
    );

    switch (outcome.kind) {
      case "success":
        output.succeedSpinner(`Success! ${item.candidateId} registered with the backend.`);
        return { candidateId: item.candidateId, status: "registered", payload: item.payload };
      case "http-error":
        output.failSpinner(
          outcome.bodyPath
            ? `Backend responded with status ${outcome.status}. See ${outcome.bodyPath} for details.`
            : `Backend responded with status ${outcome.status}.`
        );
        if (outcome.logError) {
          output.warn(`Could not write ${provider.failureResponsePath}: ${outcome.logError}`);
        }
        if (outcome.body) {
          output.dim(outcome.body);
        }
        break;
      case "network-error":
        output.failSpinner(`Could not reach the backend: ${outcome.message}`);
        this.printManualRegistration(item, request);
        break;
    }
    return { candidateId: item.candidateId, status: "registration-failed", payload: item.payload, outcome };
  }

  private printManualRegistration(item: ProvisionedCandidate, request: OnboardingRequest): void {
    const { provider, output } = this.deps;
    output.info(`To manually register, POST this data to ${request.backendUrl}${provider.registrationPath}:`);
    if (provider.kind === "gcp") {
      output.dim("The payload contains a private key; treat it as a secret.");
    }
    output.json(item.payload);
  }

  /**
   * Asked once per run, auto-run included. Without a terminal to ask on,
   * registration is skipped.
   */
  private async askForToken(request: OnboardingRequest): Promise<string | undefined> {
    const { output, prompt } = this.deps;
    if (!prompt.isInteractive()) {
      return undefined;
    }
    output.newline();
    output.info("To register this account with the backend, you need an authentication token.");
    output.info(`Get your token by logging in at ${loginUrlFor(request.backendUrl)}`);
    const token = await prompt.secret("Enter your auth token (or press Enter to skip):");
    return token.length > 0 ? token : undefined;
  }

  private enter(next: OnboardingPhase): void {
    const from = this.phase === null ? -1 : PHASE_ORDER.indexOf(this.phase);
    const to = PHASE_ORDER.indexOf(next);
    if (to <= from) {
      throw new Error(`Invalid phase transition: ${this.phase} -> ${next}`);
    }
    this.phase = next;
    this.deps.onPhaseChange?.(next);
  }
}

/**
 * Process exit code for a finished run.
 */
export function exitCodeFor(provider: OnboardingProvider["kind"], result: OnboardingRunResult): number {
  const failedProvisioning = result.results.filter((r) => r.status === "provisioning-failed").length;
  if (failedProvisioning > 0 && failedProvisioning === result.selection.length) {
    return 1;
  }
  if (provider === "azure" && result.results.some((r) => r.status === "registration-failed")) {
    return 1;
  }
  return 0;
}
