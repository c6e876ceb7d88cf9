import { CREATE_FILE_TOOL, type ParseContext, type ToolRequest, type ToolRequestMatcher } from "../types";

export const DEFAULT_FILE_NAME = "generated_code";
export const DEFAULT_FILE_TYPE = "txt";

const LANGUAGE_EXTENSIONS: Readonly<Record<string, string>> = {
  python: "py",
  py: "py",
  javascript: "js",
  js: "js",
  typescript: "ts",
  ts: "ts",
  html: "html",
  css: "css",
  java: "java",
  c: "c",
  cpp: "cpp",
  "c++": "cpp",
  csharp: "cs",
  "c#": "cs",
  php: "php",
  ruby: "rb",
  go: "go",
  rust: "rs",
  markdown: "md",
  json: "json",
  xml: "xml",
  sql: "sql",
  bash: "sh",
  shell: "sh",
};

const FENCED_BLOCK = /```(\w*)\n([\s\S]*?)```/;

const FILE_NAME = `["']?([a-zA-Z0-9_\\-.]+\\.\\w+)["']?`;
const FILE_NAME_PATTERNS: readonly RegExp[] = [
  new RegExp(`save (?:this|the code) (?:as|to) ${FILE_NAME}`, "i"),
  new RegExp(`filename:? ?${FILE_NAME}`, "i"),
  new RegExp(`create (?:a|the) file ${FILE_NAME}`, "i"),
  /# ([a-zA-Z0-9_\-.]+\.\w+)/i,
];

export function extensionForLanguage(tag: string): string {
  const lang = tag.trim().toLowerCase();
  if (!lang) return DEFAULT_FILE_TYPE;
  return LANGUAGE_EXTENSIONS[lang] ?? lang;
}

export function findFileName(reply: string): string | null {
  for (const pattern of FILE_NAME_PATTERNS) {
    const match = pattern.exec(reply);
    if (match?.[1]) return match[1];
  }
  return null;
}

/** Turns the first fenced code block of a reply into a `create_file` request. */
export class CodeBlockMatcher implements ToolRequestMatcher {
  readonly kind = "code-block" as const;

  match(reply: string, context: ParseContext): ToolRequest[] {
    if (!reply.includes("```")) return [];

    const block = FENCED_BLOCK.exec(reply);
    if (!block) return [];

    const [, language, body] = block;
    const content = body.trim();
    const explicitName = findFileName(reply);

    if (explicitName) {
      context.logger?.info(`Creating file with detected filename: ${explicitName}`);
      return [{ toolName: CREATE_FILE_TOOL, parameters: { filename: explicitName, content } }];
    }

    const fileType = extensionForLanguage(language);
    context.logger?.info(`Creating file with name: ${DEFAULT_FILE_NAME} and type: ${fileType}`);
    return [
      {
        toolName: CREATE_FILE_TOOL,
        parameters: { filename: DEFAULT_FILE_NAME, content, file_type: fileType },
      },
    ];
  }
}
