import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import type { MutationPlan } from "../app/sweep/sweep-engine.js";

// =============================================================================
// CONFIRMATION
// =============================================================================

export type AskFn = (question: string) => Promise<string>;

export async function askOnConsole(question: string): Promise<string> {
  const rl = createInterface({ input, output });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

export function formatConfirmationQuestion(plan: MutationPlan): string {
  return (
    `About to enable litigation hold for ${plan.needsAction} of ${plan.totalEligible} eligible ` +
    `mailboxes (${plan.alreadyCompliant} already on hold). Continue? [y/N] `
  );
}

export function isAffirmative(answer: string): boolean {
  return /^(y|yes)$/i.test(answer.trim());
}

export function createMutationConfirmer(ask: AskFn = askOnConsole) {
  return async (plan: MutationPlan): Promise<boolean> =>
    isAffirmative(await ask(formatConfirmationQuestion(plan)));
}
