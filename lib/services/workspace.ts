import { mkdir, rename, writeFile } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import { AggregateResult, MergedFile } from "@/lib/models";

const RUNS_ROOT = process.env.SCREENWEAVE_RUNS_DIR ?? join(process.cwd(), ".runs");

export function artifactsDir(jobId: string, root: string = RUNS_ROOT): string {
  return join(root, jobId, "artifacts");
}

export async function writeTextArtifact(directory: string, fileName: string, content: string): Promise<string> {
  const filePath = resolve(directory, fileName);
  if (filePath !== resolve(directory) && !filePath.startsWith(resolve(directory) + sep)) {
    throw new Error(`Refusing to write outside ${directory}: ${fileName}`);
  }
  await mkdir(dirname(filePath), { recursive: true });
  const tmp = filePath + ".tmp";
  await writeFile(tmp, content, "utf8");
  // Atomic rename via overwrite
  await rename(tmp, filePath);
  return filePath;
}

export function writeArtifact(directory: string, fileName: string, data: unknown): Promise<string> {
  return writeTextArtifact(directory, fileName, JSON.stringify(data, null, 2));
}

async function writeFiles(directory: string, files: MergedFile[]): Promise<void> {
  for (const file of files) {
    await writeTextArtifact(directory, file.path, file.content);
  }
}

/**
 * Lays out a job result as
 * `<root>/<jobId>/artifacts/{frontend,backend}/...` plus the registry,
 * navigation map and full result as JSON.
 */
export async function writeAggregateResult(result: AggregateResult, root: string = RUNS_ROOT): Promise<string> {
  const directory = artifactsDir(result.jobId, root);
  await mkdir(directory, { recursive: true });
  await writeFiles(join(directory, "frontend"), result.uiFiles);
  await writeFiles(join(directory, "backend"), result.apiFiles);
  await writeArtifact(directory, "component-registry.json", result.components);
  await writeArtifact(directory, "navigation.json", result.navigation);
  await writeArtifact(directory, "result.json", result);
  return directory;
}
