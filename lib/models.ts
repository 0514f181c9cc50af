import { z } from "zod";

export const MODEL_VERSION = "1.0.0";

// ---------------------------------------------------------------------------
// Raw design documents
// ---------------------------------------------------------------------------

export const rawNodeSchema = z
  .object({
    id: z.string().min(1),
    type: z.string().min(1),
    name: z.string().optional(),
    children: z.array(z.unknown()).optional(),
    shared: z.boolean().optional(),
    componentId: z.string().optional()
  })
  .passthrough();
export type RawNode = z.infer<typeof rawNodeSchema>;

export const treeDocumentSchema = z.object({
  name: z.string().min(1),
  document: z.unknown()
});

export const flatDocumentSchema = z.object({
  name: z.string().min(1),
  rootId: z.string().min(1),
  nodes: z.array(z.unknown())
});

// ---------------------------------------------------------------------------
// In-memory graph (immutable after load)
// ---------------------------------------------------------------------------

export type DesignNode = {
  readonly id: string;
  readonly type: string;
  readonly name: string;
  readonly shared: boolean;
  readonly componentId?: string;
  readonly attributes: Readonly<Record<string, unknown>>;
  readonly children: readonly DesignNode[];
};

export type DesignGraph = {
  readonly name: string;
  readonly root: DesignNode;
  readonly nodeCount: number;
  readonly nodes: ReadonlyMap<string, DesignNode>;
  readonly depths: ReadonlyMap<string, number>;
  readonly parents: ReadonlyMap<string, string>;
};

export const processingModeSchema = z.enum(["standard", "chunked"]);
export type ProcessingMode = z.infer<typeof processingModeSchema>;

export type ChunkingLimits = {
  nodeThreshold: number;
  screenCapacity: number;
  screenDepth: number;
  maxSplitDepth: number;
  maxNesting: number;
};

// ---------------------------------------------------------------------------
// Screens
// ---------------------------------------------------------------------------

export const screenStatusSchema = z.enum(["pending", "processing", "succeeded", "failed", "skipped"]);
export type ScreenStatus = z.infer<typeof screenStatusSchema>;

export type ScreenNode = {
  id: string;
  type: string;
  name: string;
  attributes: Record<string, unknown>;
  componentId?: string;
  children: ScreenNode[];
};

export type AncestorRef = {
  id: string;
  name: string;
  type: string;
};

export type ComponentReference = {
  componentId: string;
  name: string;
};

export type ScreenPlan = {
  id: string;
  rootId: string;
  // Children of rootId included in a virtual sub-screen; undefined means the whole subtree
  memberRootIds?: string[];
  name: string;
  ancestorPath: AncestorRef[];
  ownedNodeIds: string[];
  nodeCount: number;
  part?: number;
};

export type Screen = {
  id: string;
  rootId: string;
  name: string;
  ordinal: number;
  part?: number;
  ancestorPath: AncestorRef[];
  subtree: ScreenNode;
  nodeCount: number;
  ownedNodeIds: string[];
  sharedNodeIds: string[];
  componentRefs: ComponentReference[];
  resolvedComponents: string[];
  status: ScreenStatus;
};

// ---------------------------------------------------------------------------
// Generation options and oracle responses
// ---------------------------------------------------------------------------

export const generationOptionsSchema = z.object({
  frontend: z.string().min(1).default("react"),
  backend: z.string().min(1).default("express"),
  includeTests: z.boolean().default(false),
  includeDocs: z.boolean().default(false),
  userMessage: z.string().optional()
});
export type GenerationOptions = z.output<typeof generationOptionsSchema>;
export type GenerationOptionsInput = z.input<typeof generationOptionsSchema>;

export const generatedFileSchema = z.object({
  path: z.string().min(1),
  content: z.string()
});
export type GeneratedFile = z.infer<typeof generatedFileSchema>;

export const registryEntrySchema = z.object({
  componentName: z.string().min(1),
  path: z.string().min(1),
  variants: z.array(z.string()).default([]),
  tokens: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  apiEndpoints: z.array(z.string()).default([])
});
export type RegistryEntry = z.infer<typeof registryEntrySchema>;

export const oracleStructuredResponseSchema = z.object({
  files: z.array(generatedFileSchema).default([]),
  backendFiles: z.array(generatedFileSchema).default([]),
  registryEntry: z.union([registryEntrySchema, z.array(registryEntrySchema)]).optional()
});
export type OracleStructuredResponse = z.infer<typeof oracleStructuredResponseSchema>;

export const oracleReferenceResponseSchema = z.object({
  registryRef: z.string().min(1)
});

export const parseModeSchema = z.enum(["structured", "reference", "degraded"]);
export type ParseMode = z.infer<typeof parseModeSchema>;

// ---------------------------------------------------------------------------
// Component registry
// ---------------------------------------------------------------------------

export const componentDescriptorSchema = z.object({
  key: z.string(),
  name: z.string(),
  path: z.string(),
  tokens: z.array(z.string()),
  variants: z.array(z.string()),
  screensUsed: z.array(z.string()),
  dependencies: z.array(z.string()),
  apiEndpoints: z.array(z.string()),
  contentHash: z.string(),
  generatedAt: z.string(),
  firstScreenId: z.string()
});
export type ComponentDescriptor = z.infer<typeof componentDescriptorSchema>;

export type ComponentDescriptorInput = {
  name: string;
  path: string;
  tokens: string[];
  variants: string[];
  dependencies: string[];
  apiEndpoints: string[];
  contentHash: string;
};

// ---------------------------------------------------------------------------
// Per-screen artifacts and job result
// ---------------------------------------------------------------------------

export const screenErrorKindSchema = z.enum([
  "oversized_unsplittable",
  "transient_oracle",
  "oracle_request",
  "parse",
  "unknown_component",
  "cancelled",
  "unexpected"
]);
export type ScreenErrorKind = z.infer<typeof screenErrorKindSchema>;

export const screenErrorSchema = z.object({
  kind: screenErrorKindSchema,
  message: z.string()
});
export type ScreenError = z.infer<typeof screenErrorSchema>;

export type GeneratedArtifact = {
  screenId: string;
  ordinal: number;
  success: boolean;
  uiFiles: GeneratedFile[];
  apiFiles: GeneratedFile[];
  components: ComponentDescriptorInput[];
  registryRef?: string;
  // Component files another screen registered first; left out of the merge
  reusedComponentPaths: string[];
  rawResponse: string;
  parseMode?: ParseMode;
  notes: JobWarning[];
  error?: ScreenError;
  attempts: number;
  costUnits: number;
  elapsedMs: number;
};

export const jobWarningCodeSchema = z.enum([
  "registry_collision",
  "path_collision",
  "parse_fallback",
  "unsafe_path",
  "unresolved_reference",
  "screen_failed",
  "oversized_subtree",
  "cancelled"
]);
export type JobWarningCode = z.infer<typeof jobWarningCodeSchema>;

export const jobWarningSchema = z.object({
  code: jobWarningCodeSchema,
  message: z.string(),
  screenId: z.string().optional()
});
export type JobWarning = z.infer<typeof jobWarningSchema>;

export const navigationRouteSchema = z.object({
  screenId: z.string(),
  name: z.string(),
  slug: z.string(),
  path: z.string(),
  ordinal: z.number().int(),
  entryFile: z.string().optional()
});
export type NavigationRoute = z.infer<typeof navigationRouteSchema>;

export const navigationMapSchema = z.object({
  home: z.string().optional(),
  routes: z.array(navigationRouteSchema)
});
export type NavigationMap = z.infer<typeof navigationMapSchema>;

export const screenStatusEntrySchema = z.object({
  screenId: z.string(),
  name: z.string(),
  ordinal: z.number().int(),
  nodeCount: z.number().int(),
  status: screenStatusSchema,
  attempts: z.number().int(),
  elapsedMs: z.number(),
  parseMode: parseModeSchema.optional(),
  error: screenErrorSchema.optional()
});
export type ScreenStatusEntry = z.infer<typeof screenStatusEntrySchema>;

export const rejectedSubtreeSchema = z.object({
  rootId: z.string(),
  name: z.string(),
  nodeCount: z.number().int(),
  depth: z.number().int(),
  nodeIds: z.array(z.string()),
  message: z.string()
});
export type RejectedSubtree = z.infer<typeof rejectedSubtreeSchema>;

export const mergedFileSchema = generatedFileSchema.extend({
  screenId: z.string(),
  renamedFrom: z.string().optional()
});
export type MergedFile = z.infer<typeof mergedFileSchema>;

export const jobStatisticsSchema = z.object({
  screensTotal: z.number().int(),
  screensAttempted: z.number().int(),
  screensSucceeded: z.number().int(),
  screensFailed: z.number().int(),
  screensSkipped: z.number().int(),
  rejectedSubtrees: z.number().int(),
  uiFiles: z.number().int(),
  apiFiles: z.number().int(),
  totalFiles: z.number().int(),
  components: z.number().int(),
  oracleCalls: z.number().int(),
  costUnits: z.number(),
  elapsedMs: z.number()
});
export type JobStatistics = z.infer<typeof jobStatisticsSchema>;

export const aggregateResultSchema = z.object({
  version: z.string(),
  jobId: z.string(),
  designName: z.string(),
  mode: processingModeSchema,
  createdAt: z.string(),
  cancelled: z.boolean(),
  summary: z.string(),
  uiFiles: z.array(mergedFileSchema),
  apiFiles: z.array(mergedFileSchema),
  components: z.array(componentDescriptorSchema),
  navigation: navigationMapSchema,
  screens: z.array(screenStatusEntrySchema),
  rejectedSubtrees: z.array(rejectedSubtreeSchema),
  statistics: jobStatisticsSchema,
  warnings: z.array(jobWarningSchema)
});
export type AggregateResult = z.infer<typeof aggregateResultSchema>;

export type ScreenProgressEvent = {
  jobId: string;
  screenId: string;
  name: string;
  ordinal: number;
  status: ScreenStatus;
  elapsedMs: number;
  attempts?: number;
  error?: ScreenError;
};
