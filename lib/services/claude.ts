import { z, ZodTypeAny } from "zod";
import { ANTHROPIC_API_BASE, ANTHROPIC_KEY, ANTHROPIC_MODEL, ORACLE } from "@/lib/services/config";
import type { CodeOracle, OracleReply, OracleRequest } from "@/lib/services/code-oracle";
import { OracleRequestError, TransientOracleError } from "@/lib/services/errors";

const SYSTEM_PROMPT =
  "You are a code generator for UI screens. Return only valid JSON matching the requested schema. " +
  "Do not include markdown fences, comments, or prose.";

const messageResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number().default(0),
      output_tokens: z.number().default(0)
    })
    .optional()
});

export type ClaudeOracleConfig = {
  apiKey?: string;
  model?: string;
  apiBase?: string;
  maxTokens?: number;
};

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status === 529 || status >= 500;
}

function transientReason(status: number): "rate_limit" | "timeout" | "server" {
  if (status === 429) return "rate_limit";
  if (status === 408) return "timeout";
  return "server";
}

/** Anthropic Messages API transport. Cost units are input plus output tokens. */
export function createClaudeOracle(config: ClaudeOracleConfig = {}): CodeOracle {
  const apiKey = config.apiKey ?? ANTHROPIC_KEY;
  const model = config.model ?? ANTHROPIC_MODEL;
  const apiBase = config.apiBase ?? ANTHROPIC_API_BASE;
  const maxTokens = config.maxTokens ?? ORACLE.maxTokens;

  return {
    async generate(request: OracleRequest): Promise<OracleReply> {
      if (!apiKey) {
        throw new OracleRequestError("ANTHROPIC_API_KEY is not configured.");
      }

      let response: Response;
      try {
        response = await fetch(`${apiBase}/messages`, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "x-api-key": apiKey,
            "anthropic-version": "2023-06-01"
          },
          body: JSON.stringify({
            model,
            max_tokens: maxTokens,
            system: SYSTEM_PROMPT,
            messages: [{ role: "user", content: request.prompt }]
          }),
          signal: request.signal
        });
      } catch (error) {
        // undici reports connection failures as `TypeError: fetch failed`
        if (error instanceof TypeError) {
          throw new TransientOracleError("network", `Anthropic request failed: ${error.message}`);
        }
        throw error;
      }

      if (!response.ok) {
        const text = await response.text();
        const message = `Anthropic API error ${response.status}: ${text.slice(0, 400)}`;
        if (isTransientStatus(response.status)) {
          throw new TransientOracleError(transientReason(response.status), message, response.status);
        }
        throw new OracleRequestError(message, response.status);
      }

      const parsed = messageResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new OracleRequestError("Anthropic response did not match the Messages API shape.");
      }
      const text = parsed.data.content.find((item) => item.type === "text")?.text;
      if (!text) {
        throw new OracleRequestError("Anthropic response did not contain text content.");
      }

      if (parsed.data.stop_reason === "max_tokens") {
        console.warn(`[anthropic] response for ${request.screenId} truncated at max_tokens=${maxTokens}`);
      }

      const usage = parsed.data.usage;
      return { text, costUnits: usage ? usage.input_tokens + usage.output_tokens : 0 };
    }
  };
}

export function schemaAsJson(schema: ZodTypeAny): string {
  return JSON.stringify(zodToShape(schema), null, 2);
}

function zodToShape(schema: ZodTypeAny): unknown {
  if (schema instanceof z.ZodObject) {
    const output: Record<string, unknown> = {};
    for (const [key, value] of Object.entries<ZodTypeAny>(schema.shape)) {
      output[key] = zodToShape(value);
    }
    return output;
  }

  if (schema instanceof z.ZodArray) {
    return [zodToShape(schema.element)];
  }

  if (schema instanceof z.ZodEnum) {
    return schema.options;
  }

  if (schema instanceof z.ZodUnion) {
    // Describe the first alternative; prompts list the others in prose
    const [first] = schema.options;
    return first ? zodToShape(first) : "unknown";
  }

  if (schema instanceof z.ZodString) return "string";
  if (schema instanceof z.ZodNumber) return "number";
  if (schema instanceof z.ZodBoolean) return "boolean";
  if (schema instanceof z.ZodRecord) {
    return { "<key>": zodToShape(schema._def.valueType) };
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return zodToShape(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return zodToShape(schema.removeDefault());
  }

  return "unknown";
}
