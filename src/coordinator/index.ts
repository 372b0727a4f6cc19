export { PromptCoordinator } from "./coordinator";
export type { DecisionPreview } from "./coordinator";
export { outcomeEvent } from "./events";
export type { PromptDebugEvent, PromptEvent, PromptOutcomeEvent } from "./events";
export type { CoordinatorState, PromptCoordinatorOptions, PromptCycleResult } from "./types";
