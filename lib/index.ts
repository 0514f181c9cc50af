export * from "@/lib/models";
export { loadDesignGraph } from "@/lib/services/graph-loader";
export { classifyGraph } from "@/lib/services/size-classifier";
export { analyzeStructure, planWholeGraph, resolveChunkingLimits } from "@/lib/services/structure-analyzer";
export { extractScreen, extractScreens } from "@/lib/services/screen-extractor";
export { isTerminal, transitionScreen } from "@/lib/services/screen-lifecycle";
export { generateScreenArtifact, backoffDelay, DEFAULT_RETRY_POLICY } from "@/lib/services/code-oracle";
export type { CodeOracle, OracleAdapter, OracleReply, OracleRequest, RetryPolicy } from "@/lib/services/code-oracle";
export { parseOracleResponse } from "@/lib/services/oracle-response";
export type { ParsedOracleResponse, ParseNote } from "@/lib/services/oracle-response";
export { createClaudeOracle } from "@/lib/services/claude";
export { ComponentRegistry, normalizeComponentName } from "@/lib/services/component-registry";
export { buildNavigation, slugify } from "@/lib/services/navigation";
export { mergeResults } from "@/lib/services/result-merger";
export { runCodegenJob } from "@/lib/services/pipeline";
export type { CodegenJobOptions } from "@/lib/services/pipeline";
export { writeAggregateResult } from "@/lib/services/workspace";
export * from "@/lib/services/errors";
