import type { TurnPhase } from "./types";

export class ConversationState {
  private current: TurnPhase = "IDLE";

  get value(): TurnPhase {
    return this.current;
  }

  set(next: TurnPhase) {
    this.current = next;
  }
}
