import { SessionStateError } from "../errors";

export type SessionState =
  | "Idle"
  | "RequestingDevice"
  | "Connecting"
  | "Streaming"
  | "Stopping"
  | "Stopped"
  | "Failed";

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  Idle: ["RequestingDevice", "Failed"],
  RequestingDevice: ["Connecting", "Failed"],
  Connecting: ["Streaming", "Failed"],
  Streaming: ["Stopping", "Failed"],
  Stopping: ["Stopped", "Failed"],
  Stopped: [],
  Failed: [],
};

export function isTerminal(state: SessionState): boolean {
  return state === "Stopped" || state === "Failed";
}

type StateListener = (next: SessionState, previous: SessionState) => void;

export class SessionStateMachine {
  private current: SessionState = "Idle";
  private readonly listeners = new Set<StateListener>();

  get value(): SessionState {
    return this.current;
  }

  canTransition(next: SessionState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  transition(next: SessionState) {
    if (!this.canTransition(next)) {
      throw new SessionStateError(`Cannot move session from ${this.current} to ${next}.`);
    }
    const previous = this.current;
    this.current = next;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }

  onChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
