import type { Turn, TurnRole } from "./types";

/**
 * In-memory turn log for a single chat session. Turns are only ever
 * appended; `reset` drops all of them.
 */
export class Conversation {
  private turns: Turn[] = [];

  get length(): number {
    return this.turns.length;
  }

  addUser(text: string) {
    this.append("user", text);
  }

  addModel(text: string) {
    this.append("model", text);
  }

  lastUserText(): string | null {
    for (let i = this.turns.length - 1; i >= 0; i--) {
      const turn = this.turns[i];
      if (turn.role === "user") return turn.text;
    }
    return null;
  }

  snapshot(): Turn[] {
    return this.turns.map((turn) => ({ ...turn }));
  }

  reset() {
    this.turns = [];
  }

  private append(role: TurnRole, text: string) {
    this.turns.push({ role, text });
  }
}
