export { ScrapeOrchestrator } from "./scrapeOrchestrator";
export type { OrchestratorDeps } from "./scrapeOrchestrator";
export { canTransition, isFinalState, ScrapeStateMachine } from "./stateMachine";
export type { ScrapeState } from "./stateMachine";
