import type { ToolDefinition } from "../ports/tools/ToolRegistryPort";

const GUIDANCE: Record<string, string[]> = {
  web_search: [
    "Only use web_search for recent events, specific facts you do not know, time-sensitive information (news, prices) or detailed research.",
    "Always use the EXACT query the user provides. Do not modify, correct or expand it.",
  ],
  create_file: [
    "Choose a descriptive filename with an extension that fits the content; without one, .txt is used.",
    "Write well-formatted content for the file type. Code files need valid syntax and comments.",
  ],
  read_document: ["Pass the path exactly as the user gave it."],
};

function describeTool(def: ToolDefinition): string {
  const params = Object.entries(def.parameters)
    .map(([name, spec]) => `    ${name}${spec.required ? "" : " (optional)"}: ${spec.description}`)
    .join("\n");
  const notes = (GUIDANCE[def.name] ?? []).map((line) => `  * ${line}`).join("\n");
  const lines = [`- ${def.name}: ${def.description}`];
  if (params) lines.push("  Parameters:", params);
  if (notes) lines.push(notes);
  return lines.join("\n");
}

export function buildSystemPrompt(tools: ToolDefinition[]): string {
  const catalogue = tools.length ? tools.map(describeTool).join("\n\n") : "(no tools available)";
  return `You are an AI assistant that can use tools to help answer questions.

IMPORTANT: Only use tools when they are TRULY NECESSARY to answer the question properly.
For greetings, acknowledgments, opinions and everyday conversation, just respond directly.
Do not use web_search for common knowledge or chitchat.

If you DO need tools, respond in the following format, one JSON object per line:

[TOOL_REQUESTS]
{"tool_name": "tool_name", "parameters": {"param1": "value1", "param2": "value2"}}
[/TOOL_REQUESTS]

Then explain what tools you need and why.

Available tools:

${catalogue}

You can use several tools in sequence. For example, search with web_search first,
then use create_file to save the findings or content based on the results.

If you don't need any tools, just respond normally without the tool format.`;
}
