import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { GenerationOptionsInput } from "../models";
import { runCodegenJob } from "../services/pipeline";
import { writeAggregateResult } from "../services/workspace";

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

type CliArgs = {
  designPath: string;
  generation: GenerationOptionsInput;
  concurrency?: number;
  threshold?: number;
};

function usage(): never {
  console.error("Usage:");
  console.error(
    "  npm run codegen -- --design <file.json> [--frontend <stack>] [--backend <stack>] [--tests] [--docs] " +
      "[--concurrency <n>] [--threshold <nodes>]"
  );
  process.exit(1);
}

function readValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("--")) {
    console.error(`Missing value for ${flag}`);
    usage();
  }
  return value;
}

function readPositiveInt(args: string[], index: number, flag: string): number {
  const value = Number.parseInt(readValue(args, index, flag), 10);
  if (!Number.isFinite(value) || value < 1) {
    console.error(`${flag} expects a positive integer`);
    usage();
  }
  return value;
}

function parseArgs(argv: string[]): CliArgs {
  let designPath: string | undefined;
  const generation: GenerationOptionsInput = {};
  let concurrency: number | undefined;
  let threshold: number | undefined;

  const args = argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--design":
        designPath = readValue(args, ++i, arg);
        break;
      case "--frontend":
        generation.frontend = readValue(args, ++i, arg);
        break;
      case "--backend":
        generation.backend = readValue(args, ++i, arg);
        break;
      case "--tests":
        generation.includeTests = true;
        break;
      case "--docs":
        generation.includeDocs = true;
        break;
      case "--concurrency":
        concurrency = readPositiveInt(args, ++i, arg);
        break;
      case "--threshold":
        threshold = readPositiveInt(args, ++i, arg);
        break;
      default:
        console.error(`Unknown argument: ${arg}`);
        usage();
    }
  }

  if (!designPath) usage();
  return { designPath: resolve(designPath), generation, concurrency, threshold };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const { designPath, generation, concurrency, threshold } = parseArgs(process.argv);

  console.log("ScreenWeave");
  console.log(`Design: ${designPath}`);
  console.log("");

  const document: unknown = JSON.parse(await readFile(designPath, "utf8"));

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("Cancelling: screens already running will finish, the rest are skipped");
    controller.abort();
  });

  const result = await runCodegenJob(document, {
    generation,
    concurrency,
    limits: threshold === undefined ? undefined : { nodeThreshold: threshold },
    signal: controller.signal
  });
  const artifactPath = await writeAggregateResult(result);

  // Summary
  console.log("");
  console.log("--- Job Complete ---");
  console.log(`Job ID:      ${result.jobId}`);
  console.log(`Mode:        ${result.mode}`);
  console.log(`Summary:     ${result.summary}`);
  console.log(`Files:       ${result.statistics.uiFiles} UI / ${result.statistics.apiFiles} API`);
  console.log(`Components:  ${result.statistics.components}`);
  console.log(`Artifacts:   ${artifactPath}`);

  for (const screen of result.screens) {
    const icon = screen.status === "succeeded" ? "+" : screen.status === "failed" ? "!" : "-";
    const reason = screen.error ? ` (${screen.error.message})` : "";
    console.log(`  [${icon}] #${screen.ordinal} ${screen.name}${reason}`);
  }
  for (const warning of result.warnings) {
    console.log(`  warning ${warning.code}: ${warning.message}`);
  }

  if (result.statistics.screensSucceeded === 0 && result.statistics.screensTotal > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
