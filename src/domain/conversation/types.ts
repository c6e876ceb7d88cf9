export type TurnRole = "user" | "model";

export interface Turn {
  role: TurnRole;
  text: string;
}

export type TurnPhase =
  | "IDLE"
  | "AWAITING_INITIAL"
  | "PARSING"
  | "EXECUTING_TOOLS"
  | "AWAITING_FINAL"
  | "CLEANING"
  | "DONE"
  | "FAILED";
