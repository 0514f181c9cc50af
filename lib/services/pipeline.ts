import {
  AggregateResult,
  ChunkingLimits,
  GeneratedArtifact,
  GenerationOptionsInput,
  generationOptionsSchema,
  JobWarning,
  Screen,
  ScreenPlan,
  ScreenProgressEvent,
  RejectedSubtree
} from "@/lib/models";
import { createClaudeOracle } from "@/lib/services/claude";
import { CodeOracle, generateScreenArtifact, RetryPolicy } from "@/lib/services/code-oracle";
import { ComponentRegistry } from "@/lib/services/component-registry";
import { runWithConcurrency } from "@/lib/services/concurrency";
import { ORACLE } from "@/lib/services/config";
import { describeScreenError, UnknownComponentReferenceError } from "@/lib/services/errors";
import { loadDesignGraph } from "@/lib/services/graph-loader";
import { buildNavigation } from "@/lib/services/navigation";
import { mergeResults } from "@/lib/services/result-merger";
import { extractScreens } from "@/lib/services/screen-extractor";
import { transitionScreen } from "@/lib/services/screen-lifecycle";
import { classifyGraph } from "@/lib/services/size-classifier";
import {
  analyzeStructure,
  computeSubtreeHeights,
  computeSubtreeSizes,
  planWholeGraph,
  resolveChunkingLimits
} from "@/lib/services/structure-analyzer";

export type CodegenJobOptions = {
  oracle?: CodeOracle;
  generation?: GenerationOptionsInput;
  limits?: Partial<ChunkingLimits>;
  retry?: Partial<RetryPolicy>;
  concurrency?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  onProgress?: (event: ScreenProgressEvent) => void;
  clock?: () => Date;
};

function newJobId(): string {
  return `job_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

export function logProgress(event: ScreenProgressEvent): void {
  const head = `[codegen] ${event.jobId} #${event.ordinal} ${event.name} (${event.screenId}): ${event.status}`;
  if (event.error) {
    console.warn(`${head} after ${event.attempts ?? 0} attempt(s): ${event.error.message}`);
    return;
  }
  console.log(event.status === "succeeded" ? `${head} in ${event.elapsedMs}ms` : head);
}

async function applyToRegistry(screen: Screen, artifact: GeneratedArtifact, registry: ComponentRegistry): Promise<void> {
  if (artifact.registryRef) {
    const descriptor = await registry.recordUsage(artifact.registryRef, screen.id);
    if (!descriptor) throw new UnknownComponentReferenceError(artifact.registryRef);
    screen.resolvedComponents.push(descriptor.name);
    return;
  }

  for (const component of artifact.components) {
    const outcome = await registry.register(component, screen.id);
    // Another screen owns this component; its copy of the file is left out of the merge
    if (outcome.status !== "created" && outcome.descriptor.firstScreenId !== screen.id) {
      artifact.reusedComponentPaths.push(component.path);
    }
  }
}

async function resolveCrossReferences(screens: Screen[], registry: ComponentRegistry): Promise<JobWarning[]> {
  const warnings: JobWarning[] = [];
  for (const screen of screens) {
    if (screen.status !== "succeeded") continue;
    for (const ref of screen.componentRefs) {
      const descriptor = await registry.recordUsage(ref.name, screen.id);
      if (!descriptor) {
        warnings.push({
          code: "unresolved_reference",
          message: `Screen ${screen.id} uses component "${ref.name}" (${ref.componentId}) that no screen generated`,
          screenId: screen.id
        });
        continue;
      }
      if (!screen.resolvedComponents.includes(descriptor.name)) screen.resolvedComponents.push(descriptor.name);
    }
  }
  return warnings;
}

function rejectionWarnings(rejected: RejectedSubtree[]): JobWarning[] {
  return rejected.map((subtree): JobWarning => ({ code: "oversized_subtree", message: subtree.message }));
}

/**
 * Turns a design document into generated code: load, classify, split into
 * screens, generate each screen through the oracle, then merge. Only an
 * unreadable document rejects; screen failures are reported in the result.
 */
export async function runCodegenJob(rawDocument: unknown, options: CodegenJobOptions = {}): Promise<AggregateResult> {
  const clock = options.clock ?? (() => new Date());
  const startedAt = Date.now();
  const jobId = newJobId();
  const createdAt = clock().toISOString();
  const onProgress = options.onProgress ?? logProgress;
  const signal = options.signal;

  const graph = loadDesignGraph(rawDocument);
  const generation = generationOptionsSchema.parse(options.generation ?? {});
  const limits = resolveChunkingLimits(options.limits);
  const mode = classifyGraph(graph, limits.nodeThreshold);

  let plans: ScreenPlan[];
  let rejected: RejectedSubtree[] = [];
  const rootSize = computeSubtreeSizes(graph).get(graph.root.id) ?? graph.nodeCount;
  const rootHeight = computeSubtreeHeights(graph).get(graph.root.id) ?? 1;
  if (mode === "standard" && rootSize <= limits.screenCapacity && rootHeight <= limits.maxNesting) {
    plans = [planWholeGraph(graph)];
  } else {
    ({ plans, rejected } = analyzeStructure(graph, limits));
  }

  const screens = extractScreens(graph, plans);
  console.log(
    `[codegen] ${jobId}: "${graph.name}" has ${graph.nodeCount} nodes (${mode}); ` +
      `${screens.length} screen(s), ${rejected.length} rejected subtree(s)`
  );

  const oracle = options.oracle ?? createClaudeOracle();
  const registry = new ComponentRegistry(clock);
  const artifacts = new Map<string, GeneratedArtifact>();

  const report = (screen: Screen, artifact?: GeneratedArtifact): void => {
    onProgress({
      jobId,
      screenId: screen.id,
      name: screen.name,
      ordinal: screen.ordinal,
      status: screen.status,
      elapsedMs: artifact?.elapsedMs ?? 0,
      ...(artifact ? { attempts: artifact.attempts } : {}),
      ...(artifact?.error ? { error: artifact.error } : {})
    });
  };

  await runWithConcurrency(screens, options.concurrency ?? ORACLE.concurrency, async (screen) => {
    if (signal?.aborted) {
      transitionScreen(screen, "skipped");
      report(screen);
      return;
    }

    transitionScreen(screen, "processing");
    report(screen);

    const known = await registry.knownNames();
    const artifact = await generateScreenArtifact(screen, known, generation, {
      oracle,
      retry: options.retry,
      timeoutMs: options.timeoutMs,
      signal
    });

    if (artifact.success) {
      try {
        await applyToRegistry(screen, artifact, registry);
      } catch (error) {
        artifact.success = false;
        artifact.error = describeScreenError(error);
      }
    }

    artifacts.set(screen.id, artifact);
    transitionScreen(screen, artifact.success ? "succeeded" : "failed");
    report(screen, artifact);
  });

  const warnings: JobWarning[] = [...rejectionWarnings(rejected), ...registry.warnings()];
  warnings.push(...(await resolveCrossReferences(screens, registry)));

  const skipped = screens.filter((screen) => screen.status === "skipped").length;
  const cancelled = signal?.aborted ?? false;
  if (cancelled) {
    warnings.push({ code: "cancelled", message: `Job cancelled; ${skipped} screen(s) skipped` });
  }

  const result = mergeResults({
    jobId,
    designName: graph.name,
    mode,
    createdAt,
    cancelled,
    screens,
    artifacts,
    components: await registry.snapshot(),
    navigation: buildNavigation(screens, artifacts),
    rejectedSubtrees: rejected,
    warnings,
    elapsedMs: Date.now() - startedAt
  });

  console.log(`[codegen] ${jobId}: ${result.summary}`);
  return result;
}
