export { describePromptState, formatPromptStateReport } from "./state-report";
export type { PromptStateReport, StateReportSources } from "./state-report";
