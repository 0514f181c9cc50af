import {
  GeneratedFile,
  JobWarningCode,
  OracleStructuredResponse,
  oracleReferenceResponseSchema,
  oracleStructuredResponseSchema,
  RegistryEntry
} from "@/lib/models";
import { ParseError } from "@/lib/services/errors";
import { isApiFilePath, normalizeGeneratedPath } from "@/lib/services/sanitize";

export type ParseNote = {
  code: JobWarningCode;
  message: string;
};

export type ParsedOracleResponse =
  | {
      kind: "structured" | "degraded";
      uiFiles: GeneratedFile[];
      apiFiles: GeneratedFile[];
      registryEntries: RegistryEntry[];
      notes: ParseNote[];
    }
  | {
      kind: "reference";
      registryRef: string;
      notes: ParseNote[];
    };

type FileResponse = Extract<ParsedOracleResponse, { kind: "structured" | "degraded" }>;

// `File: path` / `### path` / `**path**` header line followed by a fenced block
const FILE_BLOCK_PATTERN =
  /^[ \t]*(?:#{1,6}[ \t]*)?(?:\*\*)?(?:File:[ \t]*)?(?:\*\*)?[ \t]*`?([\w@./\\-]+\.[A-Za-z0-9]+)`?(?:\*\*)?[ \t]*:?[ \t]*\r?\n+```[\w+-]*[ \t]*\r?\n([\s\S]*?)\r?\n```/gm;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonCandidates(text: string): string[] {
  const candidates: string[] = [];
  const trimmed = text.trim();
  if (trimmed.startsWith("{")) candidates.push(trimmed);

  for (const match of text.matchAll(/```(?:json)?\s*(\{[\s\S]*?\})\s*```/gi)) {
    if (match[1]) candidates.push(match[1].trim());
  }

  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    candidates.push(text.slice(firstBrace, lastBrace + 1));
  }
  return [...new Set(candidates)];
}

function recordToFiles(value: unknown): unknown {
  if (!isRecord(value)) return value;
  return Object.entries(value).map(([path, content]) => ({ path, content }));
}

// Older prompts asked for `{frontend: {path: content}, backend: {...}}`; models still drift to it
function normalizeSchemaDrift(value: unknown): unknown {
  if (!isRecord(value)) return value;
  const output: Record<string, unknown> = { ...value };

  if (output.files === undefined && output.frontend !== undefined) output.files = output.frontend;
  if (output.backendFiles === undefined && output.backend !== undefined) output.backendFiles = output.backend;
  output.files = recordToFiles(output.files);
  output.backendFiles = recordToFiles(output.backendFiles);
  delete output.frontend;
  delete output.backend;

  if (output.registryRef === undefined && typeof output.registry_ref === "string") {
    output.registryRef = output.registry_ref;
  }

  const renameEntry = (entry: unknown): unknown => {
    if (!isRecord(entry)) return entry;
    if (entry.componentName === undefined && typeof entry.name === "string") {
      return { ...entry, componentName: entry.name };
    }
    return entry;
  };
  if (Array.isArray(output.registryEntry)) {
    output.registryEntry = output.registryEntry.map(renameEntry);
  } else if (isRecord(output.registryEntry)) {
    // An empty `{}` entry means "no component"
    output.registryEntry = Object.keys(output.registryEntry).length === 0 ? undefined : renameEntry(output.registryEntry);
  }
  return output;
}

function hasFiles(value: unknown): boolean {
  if (!isRecord(value)) return false;
  const files = value.files;
  const backendFiles = value.backendFiles;
  return (Array.isArray(files) && files.length > 0) || (Array.isArray(backendFiles) && backendFiles.length > 0);
}

function collectFiles(files: GeneratedFile[], seen: Set<string>, notes: ParseNote[]): GeneratedFile[] {
  const output: GeneratedFile[] = [];
  for (const file of files) {
    const path = normalizeGeneratedPath(file.path);
    if (!path) {
      notes.push({ code: "unsafe_path", message: `Dropped file with unsafe path "${file.path}"` });
      continue;
    }
    if (seen.has(path)) {
      notes.push({ code: "path_collision", message: `Duplicate path "${path}" in one response; kept the first` });
      continue;
    }
    seen.add(path);
    output.push({ path, content: file.content });
  }
  return output;
}

function fromStructured(data: OracleStructuredResponse, notes: ParseNote[]): FileResponse {
  const seen = new Set<string>();
  const uiFiles = collectFiles(data.files, seen, notes);
  const apiFiles = collectFiles(data.backendFiles, seen, notes);
  const entries = data.registryEntry === undefined ? [] : Array.isArray(data.registryEntry) ? data.registryEntry : [data.registryEntry];
  const registryEntries: RegistryEntry[] = [];
  for (const entry of entries) {
    const path = normalizeGeneratedPath(entry.path);
    if (!path || entry.componentName.trim().length === 0) {
      notes.push({ code: "unsafe_path", message: `Ignored registry entry "${entry.componentName}" (${entry.path})` });
      continue;
    }
    registryEntries.push({ ...entry, path });
  }
  return { kind: "structured", uiFiles, apiFiles, registryEntries, notes };
}

// A reply cut off by the token limit leaves its last fence open
function closeTruncatedFence(raw: string): string | undefined {
  const fences = raw.match(/^[ \t]*```/gm) ?? [];
  if (fences.length % 2 === 0) return undefined;
  return `${raw.trimEnd()}\n\`\`\``;
}

function fromFreeText(raw: string): FileResponse | undefined {
  const notes: ParseNote[] = [];
  const blocks: GeneratedFile[] = [];
  const closed = closeTruncatedFence(raw);
  for (const match of (closed ?? raw).matchAll(FILE_BLOCK_PATTERN)) {
    const [, path, content] = match;
    if (path && content !== undefined) blocks.push({ path, content });
  }
  if (blocks.length === 0) return undefined;

  const truncated = closed === undefined ? undefined : blocks[blocks.length - 1];
  const files = collectFiles(blocks, new Set(), notes);
  if (files.length === 0) return undefined;
  notes.unshift({
    code: "parse_fallback",
    message: `Response was not structured; recovered ${files.length} file(s) from text`
  });
  if (truncated) {
    notes.push({
      code: "parse_fallback",
      message: `Response was truncated inside "${truncated.path}"; kept the partial content`
    });
  }
  return {
    kind: "degraded",
    uiFiles: files.filter((file) => !isApiFilePath(file.path)),
    apiFiles: files.filter((file) => isApiFilePath(file.path)),
    registryEntries: [],
    notes
  };
}

/**
 * Parses an oracle reply. Structured JSON wins, then a bare registry
 * reference, then file blocks recovered from free text.
 */
export function parseOracleResponse(raw: string): ParsedOracleResponse {
  for (const candidate of jsonCandidates(raw)) {
    let value: unknown;
    try {
      value = JSON.parse(candidate);
    } catch {
      continue;
    }

    const normalized = normalizeSchemaDrift(value);
    const reference = oracleReferenceResponseSchema.safeParse(normalized);
    if (reference.success && !hasFiles(normalized) && reference.data.registryRef.trim().length > 0) {
      return { kind: "reference", registryRef: reference.data.registryRef.trim(), notes: [] };
    }

    const notes: ParseNote[] = [];
    let structured = oracleStructuredResponseSchema.safeParse(normalized);
    if (!structured.success && isRecord(normalized) && normalized.registryEntry !== undefined) {
      notes.push({ code: "parse_fallback", message: "Ignored malformed registry entry in oracle response" });
      structured = oracleStructuredResponseSchema.safeParse({ ...normalized, registryEntry: undefined });
    }
    if (!structured.success) continue;

    const parsed = fromStructured(structured.data, notes);
    if (parsed.uiFiles.length + parsed.apiFiles.length + parsed.registryEntries.length > 0) {
      return parsed;
    }
  }

  const degraded = fromFreeText(raw);
  if (degraded) return degraded;

  throw new ParseError("Oracle response contained no usable files or registry reference", raw);
}
