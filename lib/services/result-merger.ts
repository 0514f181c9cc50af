import {
  AggregateResult,
  aggregateResultSchema,
  ComponentDescriptor,
  GeneratedArtifact,
  GeneratedFile,
  JobStatistics,
  JobWarning,
  MergedFile,
  MODEL_VERSION,
  NavigationMap,
  ProcessingMode,
  RejectedSubtree,
  Screen,
  ScreenStatusEntry
} from "@/lib/models";

export type MergeInput = {
  jobId: string;
  designName: string;
  mode: ProcessingMode;
  createdAt: string;
  cancelled: boolean;
  screens: Screen[];
  artifacts: Map<string, GeneratedArtifact>;
  components: ComponentDescriptor[];
  navigation: NavigationMap;
  rejectedSubtrees: RejectedSubtree[];
  warnings: JobWarning[];
  elapsedMs: number;
};

function splitExtension(path: string): [string, string] {
  const slash = path.lastIndexOf("/");
  const dot = path.lastIndexOf(".");
  // A leading dot (".env") is part of the name
  if (dot <= slash + 1) return [path, ""];
  return [path.slice(0, dot), path.slice(dot)];
}

export function renameForScreen(path: string, ordinal: number, taken: ReadonlySet<string>): string {
  const [stem, extension] = splitExtension(path);
  let candidate = `${stem}-${ordinal}${extension}`;
  for (let n = 2; taken.has(candidate); n += 1) {
    candidate = `${stem}-${ordinal}-${n}${extension}`;
  }
  return candidate;
}

type FileIndex = {
  files: MergedFile[];
  byPath: Map<string, MergedFile>;
};

function addFile(
  index: FileIndex,
  file: GeneratedFile,
  screen: Screen,
  renames: Map<string, string>,
  warnings: JobWarning[]
): void {
  const existing = index.byPath.get(file.path);
  if (!existing) {
    const merged: MergedFile = { path: file.path, content: file.content, screenId: screen.id };
    index.files.push(merged);
    index.byPath.set(merged.path, merged);
    return;
  }
  if (existing.content === file.content) return;

  const path = renameForScreen(file.path, screen.ordinal, new Set(index.byPath.keys()));
  const merged: MergedFile = { path, content: file.content, screenId: screen.id, renamedFrom: file.path };
  index.files.push(merged);
  index.byPath.set(path, merged);
  renames.set(file.path, path);
  warnings.push({
    code: "path_collision",
    message: `${file.path} from screen ${screen.id} conflicts with ${existing.screenId}; written as ${path}`,
    screenId: screen.id
  });
}

function statusEntry(screen: Screen, artifact: GeneratedArtifact | undefined, cancelled: boolean): ScreenStatusEntry {
  const entry: ScreenStatusEntry = {
    screenId: screen.id,
    name: screen.name,
    ordinal: screen.ordinal,
    nodeCount: screen.nodeCount,
    status: screen.status,
    attempts: artifact?.attempts ?? 0,
    elapsedMs: artifact?.elapsedMs ?? 0
  };
  if (artifact?.parseMode) entry.parseMode = artifact.parseMode;
  if (artifact?.error) entry.error = artifact.error;
  if (screen.status === "skipped" && !entry.error) {
    entry.error = {
      kind: "cancelled",
      message: cancelled ? "Job cancelled before the screen started" : "Screen was not processed"
    };
  }
  return entry;
}

function summarize(statistics: JobStatistics): string {
  return `${statistics.screensSucceeded}/${statistics.screensTotal} screens succeeded`;
}

/**
 * Folds per-screen artifacts into one result. Succeeded screens contribute in
 * ordinal order, so the earliest screen keeps a contested path.
 */
export function mergeResults(input: MergeInput): AggregateResult {
  const screens = [...input.screens].sort((a, b) => a.ordinal - b.ordinal);
  const ui: FileIndex = { files: [], byPath: new Map() };
  const api: FileIndex = { files: [], byPath: new Map() };
  const mergeWarnings: JobWarning[] = [];
  const renamesByScreen = new Map<string, Map<string, string>>();
  const noteWarnings: JobWarning[] = [];
  const failureWarnings: JobWarning[] = [];

  for (const screen of screens) {
    const artifact = input.artifacts.get(screen.id);
    if (artifact) noteWarnings.push(...artifact.notes);

    if (screen.status === "failed") {
      failureWarnings.push({
        code: "screen_failed",
        message: `Screen ${screen.id} (${screen.name}) failed: ${artifact?.error?.message ?? "unknown error"}`,
        screenId: screen.id
      });
    }
    if (screen.status !== "succeeded" || !artifact) continue;

    const reused = new Set(artifact.reusedComponentPaths);
    const renames = new Map<string, string>();
    for (const file of artifact.uiFiles) {
      if (!reused.has(file.path)) addFile(ui, file, screen, renames, mergeWarnings);
    }
    for (const file of artifact.apiFiles) {
      if (!reused.has(file.path)) addFile(api, file, screen, renames, mergeWarnings);
    }
    renamesByScreen.set(screen.id, renames);
  }

  const navigation: NavigationMap = {
    home: input.navigation.home,
    routes: input.navigation.routes.map((route) => {
      const renamed = route.entryFile ? renamesByScreen.get(route.screenId)?.get(route.entryFile) : undefined;
      return renamed ? { ...route, entryFile: renamed } : route;
    })
  };

  const artifacts = [...input.artifacts.values()];
  const count = (status: Screen["status"]) => screens.filter((screen) => screen.status === status).length;
  const statistics: JobStatistics = {
    screensTotal: screens.length,
    screensAttempted: count("succeeded") + count("failed"),
    screensSucceeded: count("succeeded"),
    screensFailed: count("failed"),
    screensSkipped: count("skipped"),
    rejectedSubtrees: input.rejectedSubtrees.length,
    uiFiles: ui.files.length,
    apiFiles: api.files.length,
    totalFiles: ui.files.length + api.files.length,
    components: input.components.length,
    oracleCalls: artifacts.reduce((sum, artifact) => sum + artifact.attempts, 0),
    costUnits: artifacts.reduce((sum, artifact) => sum + artifact.costUnits, 0),
    elapsedMs: input.elapsedMs
  };

  return aggregateResultSchema.parse({
    version: MODEL_VERSION,
    jobId: input.jobId,
    designName: input.designName,
    mode: input.mode,
    createdAt: input.createdAt,
    cancelled: input.cancelled,
    summary: summarize(statistics),
    uiFiles: ui.files,
    apiFiles: api.files,
    components: input.components,
    navigation,
    screens: screens.map((screen) => statusEntry(screen, input.artifacts.get(screen.id), input.cancelled)),
    rejectedSubtrees: input.rejectedSubtrees,
    statistics,
    warnings: [...input.warnings, ...noteWarnings, ...mergeWarnings, ...failureWarnings]
  });
}
