export const APP_NAME = "ScreenWeave";

function readInt(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const CHUNKING = {
  nodeThreshold: readInt("CHUNK_NODE_THRESHOLD", 10_000),
  screenCapacity: readInt("SCREEN_NODE_CAPACITY", 10_000),
  // document -> page -> frame
  screenDepth: readInt("SCREEN_DEPTH", 2),
  maxSplitDepth: readInt("MAX_SPLIT_DEPTH", 4),
  // Levels below a screen root; deeper trees cannot be copied or serialized safely
  maxNesting: readInt("SCREEN_MAX_NESTING", 512)
} as const;

export const ORACLE = {
  concurrency: readInt("ORACLE_CONCURRENCY", 3),
  maxAttempts: readInt("ORACLE_MAX_ATTEMPTS", 3),
  baseDelayMs: readInt("ORACLE_BASE_DELAY_MS", 2_000),
  maxDelayMs: readInt("ORACLE_MAX_DELAY_MS", 30_000),
  // Anthropic gateway drops connections around 300s; stay below that
  timeoutMs: readInt("ORACLE_TIMEOUT_MS", 240_000),
  maxTokens: readInt("ORACLE_MAX_TOKENS", 8192)
} as const;

export const ANTHROPIC_MODEL = process.env.ANTHROPIC_MODEL ?? "claude-sonnet-4-5-20250929";
export const ANTHROPIC_API_BASE = process.env.ANTHROPIC_API_BASE ?? "https://api.anthropic.com/v1";
export const ANTHROPIC_KEY = process.env.ANTHROPIC_API_KEY;
