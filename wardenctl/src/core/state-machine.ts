/**
 * States one gateway invocation moves through, in order.
 */
export const GATEWAY_STATES = [
  "start",
  "looked_up",
  "evaluated",
  "intent_checked",
  "decided",
  "installed",
  "skipped",
  "audited",
  "done",
  "aborted",
] as const;

export type GatewayState = (typeof GATEWAY_STATES)[number];

export type TerminalState = "done" | "aborted";

/**
 * Legal transitions. `start → audited` is the not-found abort edge,
 * `decided → audited` the unsupported-ecosystem and installer-unavailable edge.
 */
const TRANSITIONS: Readonly<Record<GatewayState, readonly GatewayState[]>> = {
  start: ["looked_up", "audited"],
  looked_up: ["evaluated"],
  evaluated: ["intent_checked", "decided"],
  intent_checked: ["decided"],
  decided: ["installed", "skipped", "audited"],
  installed: ["audited"],
  skipped: ["audited"],
  audited: ["done", "aborted"],
  done: [],
  aborted: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: GatewayState,
    readonly to: GatewayState,
  ) {
    super(`Illegal gateway transition: ${from} → ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export function canTransition(from: GatewayState, to: GatewayState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Pure function: returns `to` when the move is legal, throws otherwise. */
export function transition(from: GatewayState, to: GatewayState): GatewayState {
  if (!canTransition(from, to)) throw new IllegalTransitionError(from, to);
  return to;
}

export function isTerminal(state: GatewayState): state is TerminalState {
  return state === "done" || state === "aborted";
}

/**
 * Records the visited states of one invocation. Every `to` goes through
 * `transition`, so a trace is always a legal path.
 */
export class StateTrace {
  private readonly visited: GatewayState[] = ["start"];

  get current(): GatewayState {
    return this.visited[this.visited.length - 1];
  }

  to(next: GatewayState): this {
    this.visited.push(transition(this.current, next));
    return this;
  }

  states(): readonly GatewayState[] {
    return Object.freeze([...this.visited]);
  }
}
