import { OnboardingError } from "../adapters/common/errors";
import { splitList } from "./schemas";
import type { CloudAccountCandidate } from "./types";

/**
 * How selection behaves for a given provider.
 */
export interface SelectionPolicy {
  /** Whether more than one candidate may be onboarded in a run */
  multiple: boolean;
  /** Candidate used by auto-run and by an empty interactive answer (Azure default resource group) */
  defaultCandidate?: string;
  /** Noun used in prompts and errors ("project", "resource group") */
  noun: string;
}

/**
 * Source of interactive answers. The CLI backs this with inquirer; tests
 * pass a scripted implementation.
 */
export interface SelectionPrompt {
  ask(candidates: readonly CloudAccountCandidate[], policy: SelectionPolicy): Promise<string>;
}

export interface SelectionInput {
  explicit: readonly string[];
  autoRun: boolean;
  candidates: readonly CloudAccountCandidate[];
  policy: SelectionPolicy;
  prompt: SelectionPrompt;
}

export type SelectionSource = "explicit" | "auto-run" | "interactive";

export interface ResolvedSelection {
  source: SelectionSource;
  ids: string[];
}

/**
 * Resolve which candidates to onboard. First match wins:
 * explicit list, then auto-run, then the interactive prompt.
 */
export async function resolveSelection(input: SelectionInput): Promise<ResolvedSelection> {
  const { explicit, autoRun, candidates, policy, prompt } = input;

  if (explicit.length > 0) {
    return finalize("explicit", [...explicit], policy);
  }

  if (autoRun) {
    return finalize("auto-run", autoSelect(candidates, policy), policy);
  }

  const answer = await prompt.ask(candidates, policy);
  let ids = parseSelectionAnswer(answer, candidates);
  if (ids.length === 0 && answer.trim() === "" && policy.defaultCandidate) {
    ids = [policy.defaultCandidate];
  }
  return finalize("interactive", ids, policy);
}

/**
 * Auto-run picks every GPU-bearing candidate, or the first one when none has
 * GPUs. A provider default, when set, takes the place of discovery.
 */
export function autoSelect(
  candidates: readonly CloudAccountCandidate[],
  policy: SelectionPolicy
): string[] {
  if (policy.defaultCandidate) {
    return [policy.defaultCandidate];
  }
  const withGpu = candidates.filter((c) => c.hasGpu).map((c) => c.id);
  if (withGpu.length > 0) {
    return withGpu;
  }
  return candidates.length > 0 ? [candidates[0].id] : [];
}

/**
 * Parse an interactive answer: comma-separated 1-based indexes or literal IDs.
 * Out-of-range indexes are dropped.
 */
export function parseSelectionAnswer(
  answer: string,
  candidates: readonly CloudAccountCandidate[]
): string[] {
  const selected: string[] = [];

  for (const entry of splitList(answer)) {
    if (/^[0-9]+$/.test(entry)) {
      const candidate = candidates[Number(entry) - 1];
      if (candidate) {
        selected.push(candidate.id);
      }
    } else {
      selected.push(entry);
    }
  }

  return selected;
}

/**
 * Numbered listing shown before the interactive prompt.
 */
export function formatCandidateList(candidates: readonly CloudAccountCandidate[]): string[] {
  return candidates.map((candidate, index) => {
    const marker = candidate.hasGpu ? " (GPU)" : "";
    return `  [${index + 1}] ${candidate.id}${marker}`;
  });
}

function finalize(source: SelectionSource, ids: string[], policy: SelectionPolicy): ResolvedSelection {
  const unique = Array.from(new Set(ids));
  if (unique.length === 0) {
    throw new OnboardingError(`No ${policy.noun}s selected.`, "SELECTION", [
      `Pass --${policy.noun === "project" ? "projects" : "resource-group"} or enter at least one ${policy.noun}`,
    ]);
  }
  return { source, ids: policy.multiple ? unique : [unique[0]] };
}
