export type ScrapeState = "idle" | "logging_in" | "enumerating" | "parsing" | "downloading" | "completed" | "failed";

const TRANSITIONS: Record<ScrapeState, readonly ScrapeState[]> = {
  idle: ["logging_in", "failed"],
  logging_in: ["enumerating", "failed"],
  enumerating: ["parsing", "downloading", "failed"],
  parsing: ["enumerating", "downloading", "failed"],
  downloading: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: ScrapeState, to: ScrapeState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isFinalState(state: ScrapeState): boolean {
  return TRANSITIONS[state].length === 0;
}

export class ScrapeStateMachine {
  private current: ScrapeState = "idle";
  private readonly history: ScrapeState[] = ["idle"];

  constructor(private readonly onTransition?: (from: ScrapeState, to: ScrapeState) => void) {}

  get state(): ScrapeState {
    return this.current;
  }

  get visited(): readonly ScrapeState[] {
    return this.history;
  }

  transition(to: ScrapeState): void {
    const from = this.current;
    if (from === to && (to === "enumerating" || to === "parsing")) {
      return;
    }
    if (!canTransition(from, to)) {
      throw new Error(`illegal scrape state transition ${from} -> ${to}`);
    }
    this.current = to;
    this.history.push(to);
    this.onTransition?.(from, to);
  }
}
