import type { PromptOutcome, PromptVariant } from "../types/prompt";

export type PromptOutcomeEvent =
  | { type: "promptAccepted"; variant: PromptVariant; timesShown: number }
  | { type: "promptDismissed"; variant: PromptVariant; timesShown: number }
  | { type: "promptDismissedPermanently"; variant: PromptVariant; timesShown: number };

/** Operational events: recording a definite outcome failed. */
export type PromptDebugEvent =
  | { type: "historySaveFailed"; variant: PromptVariant; outcome: PromptOutcome; errorCode: string }
  | { type: "historyLoadFailed"; errorCode: string };

export type PromptEvent = PromptOutcomeEvent | PromptDebugEvent;

export function outcomeEvent(outcome: PromptOutcome, variant: PromptVariant, timesShown: number): PromptOutcomeEvent {
  switch (outcome) {
    case "accepted":
      return { type: "promptAccepted", variant, timesShown };
    case "dismissed":
      return { type: "promptDismissed", variant, timesShown };
    case "dismissedPermanently":
      return { type: "promptDismissedPermanently", variant, timesShown };
  }
}
