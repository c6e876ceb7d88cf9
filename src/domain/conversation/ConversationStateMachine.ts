import { ConversationState } from "./ConversationState";
import type { TurnPhase } from "./types";

export type PhaseListener = (from: TurnPhase, to: TurnPhase) => void;

/**
 * Tracks which step of a turn the agent is in:
 * AWAITING_INITIAL -> PARSING -> DONE, or
 * AWAITING_INITIAL -> PARSING -> EXECUTING_TOOLS -> AWAITING_FINAL -> CLEANING -> DONE.
 * Events that do not apply to the current phase are ignored.
 */
export class ConversationStateMachine {
  constructor(
    private readonly state: ConversationState,
    private readonly onChange?: PhaseListener
  ) {}

  get phase(): TurnPhase {
    return this.state.value;
  }

  onTurnStarted() {
    if (this.state.value === "IDLE" || this.state.value === "DONE" || this.state.value === "FAILED") {
      this.move("AWAITING_INITIAL");
    }
  }

  onInitialResponse() {
    if (this.state.value === "AWAITING_INITIAL") {
      this.move("PARSING");
    }
  }

  onToolsNeeded() {
    if (this.state.value === "PARSING") {
      this.move("EXECUTING_TOOLS");
    }
  }

  onToolsFinished() {
    if (this.state.value === "EXECUTING_TOOLS") {
      this.move("AWAITING_FINAL");
    }
  }

  onFinalResponse() {
    if (this.state.value === "AWAITING_FINAL") {
      this.move("CLEANING");
    }
  }

  onReplyReady() {
    if (this.state.value === "PARSING" || this.state.value === "CLEANING") {
      this.move("DONE");
    }
  }

  onFailure() {
    if (this.state.value !== "IDLE") {
      this.move("FAILED");
    }
  }

  onReset() {
    this.move("IDLE");
  }

  private move(next: TurnPhase) {
    const prev = this.state.value;
    if (prev === next) return;
    this.state.set(next);
    this.onChange?.(prev, next);
  }
}
