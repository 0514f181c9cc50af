import { createHash } from "node:crypto";
import {
  ComponentDescriptorInput,
  GeneratedArtifact,
  GeneratedFile,
  GenerationOptions,
  RegistryEntry,
  Screen,
  ScreenError,
  ScreenNode
} from "@/lib/models";
import { ORACLE } from "@/lib/services/config";
import { sleep } from "@/lib/services/concurrency";
import { describeScreenError, errorMessage, isTransientOracleError, TransientOracleError } from "@/lib/services/errors";
import { ParsedOracleResponse, parseOracleResponse } from "@/lib/services/oracle-response";
import { buildScreenPrompt } from "@/lib/services/prompt-builder";

export type OracleRequest = {
  screenId: string;
  screenName: string;
  subtree: ScreenNode;
  prompt: string;
  knownComponents: string[];
  options: GenerationOptions;
  // Aborted when the per-call timeout expires
  signal: AbortSignal;
};

export type OracleReply = {
  text: string;
  costUnits: number;
};

export interface CodeOracle {
  generate(request: OracleRequest): Promise<OracleReply>;
}

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  // Fraction of the delay added or removed at random
  jitter: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: ORACLE.maxAttempts,
  baseDelayMs: ORACLE.baseDelayMs,
  maxDelayMs: ORACLE.maxDelayMs,
  jitter: 0.1
};

export type OracleAdapter = {
  oracle: CodeOracle;
  retry?: Partial<RetryPolicy>;
  timeoutMs?: number;
  // Job cancellation; in-flight calls run to completion, no new attempt starts
  signal?: AbortSignal;
  random?: () => number;
};

export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  const spread = exponential * policy.jitter;
  return Math.max(0, Math.round(exponential - spread + random() * spread * 2));
}

export function contentHash(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

async function callWithTimeout(
  oracle: CodeOracle,
  request: Omit<OracleRequest, "signal">,
  timeoutMs: number
): Promise<OracleReply> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TransientOracleError("timeout", `Oracle call timed out after ${timeoutMs}ms`);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([oracle.generate({ ...request, signal: controller.signal }), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function buildComponents(
  entries: RegistryEntry[],
  files: GeneratedFile[]
): ComponentDescriptorInput[] {
  return entries.map((entry) => {
    const file = files.find((candidate) => candidate.path === entry.path);
    return {
      name: entry.componentName.trim(),
      path: entry.path,
      tokens: entry.tokens,
      variants: entry.variants,
      dependencies: entry.dependencies,
      apiEndpoints: entry.apiEndpoints,
      contentHash: contentHash(file?.content ?? entry.path)
    };
  });
}

/**
 * Sends one screen to the oracle and turns the reply into an artifact.
 * Never throws: failures come back as `success: false` with a screen error.
 */
export async function generateScreenArtifact(
  screen: Screen,
  knownComponents: string[],
  options: GenerationOptions,
  adapter: OracleAdapter
): Promise<GeneratedArtifact> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...adapter.retry };
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const timeoutMs = adapter.timeoutMs ?? ORACLE.timeoutMs;
  const label = `[oracle:${screen.id}]`;
  const startedAt = Date.now();

  let attempts = 0;
  let rawResponse = "";
  let costUnits = 0;

  const failure = (error: ScreenError): GeneratedArtifact => ({
    screenId: screen.id,
    ordinal: screen.ordinal,
    success: false,
    uiFiles: [],
    apiFiles: [],
    components: [],
    reusedComponentPaths: [],
    rawResponse,
    notes: [],
    error,
    attempts,
    costUnits,
    elapsedMs: Date.now() - startedAt
  });

  let prompt: string;
  try {
    prompt = buildScreenPrompt(screen, knownComponents, options);
  } catch (error) {
    console.warn(`${label} could not build the prompt: ${errorMessage(error)}`);
    return failure(describeScreenError(error));
  }

  const request: Omit<OracleRequest, "signal"> = {
    screenId: screen.id,
    screenName: screen.name,
    subtree: screen.subtree,
    prompt,
    knownComponents,
    options
  };

  for (;;) {
    attempts += 1;
    try {
      const reply = await callWithTimeout(adapter.oracle, request, timeoutMs);
      rawResponse = reply.text;
      costUnits += reply.costUnits;
      break;
    } catch (error) {
      console.warn(`${label} attempt ${attempts}/${maxAttempts} failed: ${errorMessage(error)}`);
      if (!isTransientOracleError(error) || attempts >= maxAttempts) {
        return failure(describeScreenError(error));
      }
      if (adapter.signal?.aborted) {
        return failure({ kind: "cancelled", message: `Job cancelled before attempt ${attempts + 1}` });
      }
      const delay = backoffDelay(attempts, policy, adapter.random);
      if (delay > 0) console.warn(`${label} waiting ${delay}ms before retry`);
      await sleep(delay);
      if (adapter.signal?.aborted) {
        return failure({ kind: "cancelled", message: `Job cancelled before attempt ${attempts + 1}` });
      }
    }
  }

  let parsed: ParsedOracleResponse;
  try {
    parsed = parseOracleResponse(rawResponse);
  } catch (error) {
    console.warn(`${label} ${errorMessage(error)}`);
    return failure(describeScreenError(error));
  }

  const notes = parsed.notes.map((note) => ({ ...note, screenId: screen.id }));
  const base = {
    screenId: screen.id,
    ordinal: screen.ordinal,
    success: true,
    reusedComponentPaths: [],
    rawResponse,
    parseMode: parsed.kind,
    notes,
    attempts,
    costUnits
  };

  if (parsed.kind === "reference") {
    console.log(`${label} reuses component "${parsed.registryRef}"`);
    return {
      ...base,
      uiFiles: [],
      apiFiles: [],
      components: [],
      registryRef: parsed.registryRef,
      elapsedMs: Date.now() - startedAt
    };
  }

  const components = buildComponents(parsed.registryEntries, [...parsed.uiFiles, ...parsed.apiFiles]);
  console.log(
    `${label} ${parsed.kind}: ${parsed.uiFiles.length} UI file(s), ${parsed.apiFiles.length} API file(s), ` +
      `${components.length} component(s) in ${attempts} attempt(s)`
  );
  return {
    ...base,
    uiFiles: parsed.uiFiles,
    apiFiles: parsed.apiFiles,
    components,
    elapsedMs: Date.now() - startedAt
  };
}
