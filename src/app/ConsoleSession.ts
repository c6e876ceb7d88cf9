import { existsSync, statSync } from "fs";
import path from "path";
import { createInterface } from "node:readline/promises";
import type { ToolResult } from "../ports/tools/ToolRegistryPort";
import { describeError } from "../shared/errors";

/** The slice of ChatAgent the console needs. */
export interface ChatAgentLike {
  processMessage(message: string): Promise<string>;
  resetConversation(): void;
  toggleDebugMode(): string;
  isDebugMode(): boolean;
}

export interface DocumentIngestor {
  supports(filePath: string): boolean;
  exec(params: { file_path: string }): Promise<ToolResult>;
}

export interface ConsoleSessionOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  documents?: DocumentIngestor;
}

export const HELP_TEXT = [
  "Commands:",
  "  exit | quit     end the session",
  "  reset           start a new conversation",
  "  debug           toggle debug logging on the console",
  "  read <path>     ask the agent to review a document",
  "  help            show this message",
  "Anything else is sent to the agent. A path to a supported document is read and reviewed.",
].join("\n");

export function documentPrompt(fileName: string, content: string): string {
  return `Please review the document "${fileName}" and summarize its key points.\n\n${content}`;
}

function unquote(value: string): string {
  const trimmed = value.trim();
  const match = /^(["'])(.*)\1$/.exec(trimmed);
  return match ? match[2] : trimmed;
}

function isFile(filePath: string): boolean {
  return existsSync(filePath) && statSync(filePath).isFile();
}

export class ConsoleSession {
  private readonly output: NodeJS.WritableStream;

  constructor(
    private readonly agent: ChatAgentLike,
    private readonly options: ConsoleSessionOptions = {}
  ) {
    this.output = options.output ?? process.stdout;
  }

  /** Reads lines until `exit`/`quit` or end of input. */
  async run(): Promise<void> {
    const rl = createInterface({
      input: this.options.input ?? process.stdin,
      output: this.output,
      terminal: false,
    });

    this.print("=".repeat(50));
    this.print("🤖 TOOLCHAT AGENT");
    this.print("=".repeat(50));
    this.print("Type 'help' for commands, 'exit' or 'quit' to leave.");

    try {
      for await (const line of rl) {
        const keepGoing = await this.handleLine(line);
        if (!keepGoing) break;
      }
    } finally {
      rl.close();
    }
  }

  /** Handles one input line; resolves false when the session should end. */
  async handleLine(line: string): Promise<boolean> {
    const input = line.trim();
    if (!input) return true;
    const command = input.toLowerCase();

    if (command === "exit" || command === "quit") {
      this.print("👋 Goodbye!");
      return false;
    }
    if (command === "reset") {
      this.agent.resetConversation();
      this.print("🔄 Conversation history has been reset.");
      return true;
    }
    if (command === "debug") {
      this.print(this.agent.toggleDebugMode());
      return true;
    }
    if (command === "help") {
      this.print(HELP_TEXT);
      this.print(`Debug mode is ${this.agent.isDebugMode() ? "on" : "off"}.`);
      return true;
    }

    try {
      const docPath = this.documentPath(input, command);
      if (docPath) {
        await this.ingest(docPath);
      } else {
        await this.converse(input);
      }
    } catch (err) {
      this.print(`Error: ${describeError(err)}`);
    }
    return true;
  }

  private documentPath(input: string, command: string): string | null {
    if (!this.options.documents) return null;
    if (command.startsWith("read ")) {
      return unquote(input.slice(5));
    }
    const candidate = unquote(input);
    if (this.options.documents.supports(candidate) && isFile(path.resolve(candidate))) {
      return candidate;
    }
    return null;
  }

  private async ingest(filePath: string) {
    const documents = this.options.documents;
    if (!documents) return;
    const result = await documents.exec({ file_path: filePath });
    if (result.status !== "success" || typeof result.content !== "string") {
      this.print(`Error: ${result.message ?? "could not read document"}`);
      return;
    }
    const fileName = typeof result.file_name === "string" ? result.file_name : path.basename(filePath);
    this.print(`📄 Loaded ${fileName}${result.truncated === true ? " (truncated)" : ""}`);
    await this.converse(documentPrompt(fileName, result.content));
  }

  private async converse(message: string) {
    this.print("🧠 Thinking...");
    const reply = await this.agent.processMessage(message);
    this.print(`\n🤖 Agent: ${reply}\n`);
  }

  private print(text: string) {
    this.output.write(`${text}\n`);
  }
}
