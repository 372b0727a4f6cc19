export { decidePrompt } from "./decider";
export { SUPPRESS_REASONS } from "./types";
export type { DecisionInput, PromptDecision, SuppressReason } from "./types";
