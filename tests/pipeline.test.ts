import { describe, it, expect, vi, beforeEach } from "vitest";
import { MalformedInputError, runCodegenJob } from "@/lib";
import type { CodeOracle, OracleRequest, ScreenProgressEvent } from "@/lib";
import { chain, designFromFrames, designWithScreens, frame, leaves } from "./helpers/design";

const chunked = { nodeThreshold: 10, screenCapacity: 10 };
const fastRetry = { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 };
const silent = () => {};

function pageResponse(name: string): string {
  return JSON.stringify({
    files: [{ path: `src/pages/${name}.tsx`, content: `export const ${name} = () => null;` }]
  });
}

function buttonResponse(page: string, content: string): string {
  return JSON.stringify({
    files: [
      { path: `src/pages/${page}.tsx`, content: `export const ${page} = () => null;` },
      { path: "src/components/Button.tsx", content }
    ],
    registryEntry: { componentName: "Button", path: "src/components/Button.tsx" }
  });
}

function scriptedOracle(replies: Record<string, string>, onCall?: (request: OracleRequest, call: number) => void) {
  const requests: OracleRequest[] = [];
  const oracle: CodeOracle = {
    async generate(request) {
      requests.push(request);
      onCall?.(request, requests.length);
      return { text: replies[request.screenName] ?? pageResponse(request.screenName), costUnits: 1 };
    }
  };
  return { oracle, requests };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("runCodegenJob", () => {
  it("keeps successful screens when one screen fails to parse", async () => {
    const { oracle } = scriptedOracle({ Broken: "I'm sorry, I can't help with that." });
    const events: ScreenProgressEvent[] = [];

    const result = await runCodegenJob(designWithScreens(["Home", "Search", "Broken", "Cart", "Profile"]), {
      oracle,
      limits: chunked,
      retry: fastRetry,
      concurrency: 2,
      onProgress: (event) => events.push(event)
    });

    expect(result.mode).toBe("chunked");
    expect(result.screens.map((screen) => screen.status)).toEqual([
      "succeeded",
      "succeeded",
      "failed",
      "succeeded",
      "succeeded"
    ]);
    expect(result.screens[2]?.error?.kind).toBe("parse");
    expect(result.summary).toBe("4/5 screens succeeded");
    expect(result.uiFiles.map((file) => file.path)).toEqual([
      "src/pages/Home.tsx",
      "src/pages/Search.tsx",
      "src/pages/Cart.tsx",
      "src/pages/Profile.tsx"
    ]);
    expect(result.navigation.routes.map((route) => route.slug)).toEqual(["home", "search", "cart", "profile"]);
    expect(result.navigation.home).toBe("home");
    expect(result.warnings.filter((warning) => warning.code === "screen_failed").map((w) => w.screenId)).toEqual([
      "screen-3"
    ]);
    expect(events).toHaveLength(10);
    expect(events.filter((event) => event.screenId === "screen-3").map((event) => event.status)).toEqual([
      "processing",
      "failed"
    ]);
  });

  it("skips screens that had not started when the job is cancelled", async () => {
    const controller = new AbortController();
    const { oracle } = scriptedOracle({}, (_request, call) => {
      if (call === 2) controller.abort();
    });

    const result = await runCodegenJob(designWithScreens(["One", "Two", "Three", "Four", "Five"]), {
      oracle,
      limits: chunked,
      retry: fastRetry,
      concurrency: 1,
      signal: controller.signal,
      onProgress: silent
    });

    expect(result.cancelled).toBe(true);
    expect(result.screens.map((screen) => screen.status)).toEqual([
      "succeeded",
      "succeeded",
      "skipped",
      "skipped",
      "skipped"
    ]);
    expect(result.statistics.oracleCalls).toBe(2);
    expect(result.summary).toBe("2/5 screens succeeded");
    expect(result.uiFiles.map((file) => file.path)).toEqual(["src/pages/One.tsx", "src/pages/Two.tsx"]);
    expect(result.warnings).toContainEqual({ code: "cancelled", message: "Job cancelled; 3 screen(s) skipped" });
  });

  it("resolves registry references and fails unknown ones", async () => {
    const { oracle, requests } = scriptedOracle({
      Home: buttonResponse("Home", "button"),
      Settings: '{"registryRef": "button"}',
      Modal: '{"registryRef": "Dialog"}'
    });

    const result = await runCodegenJob(designWithScreens(["Home", "Settings", "Modal"]), {
      oracle,
      limits: chunked,
      retry: fastRetry,
      concurrency: 1,
      onProgress: silent
    });

    expect(requests[1]?.knownComponents).toEqual(["Button"]);
    expect(result.components).toHaveLength(1);
    expect(result.components[0]?.screensUsed).toEqual(["screen-1", "screen-2"]);
    expect(result.screens.map((screen) => screen.status)).toEqual(["succeeded", "succeeded", "failed"]);
    expect(result.screens[2]?.error).toEqual({
      kind: "unknown_component",
      message: 'Oracle referenced unknown component "Dialog"'
    });
    expect(result.uiFiles.map((file) => file.path)).toEqual(["src/pages/Home.tsx", "src/components/Button.tsx"]);
  });

  it("keeps the first version of a component generated twice", async () => {
    const { oracle } = scriptedOracle({
      Home: buttonResponse("Home", "button-v1"),
      Settings: buttonResponse("Settings", "button-v2")
    });

    const result = await runCodegenJob(designWithScreens(["Home", "Settings"]), {
      oracle,
      limits: chunked,
      retry: fastRetry,
      concurrency: 1,
      onProgress: silent
    });

    expect(result.uiFiles.map((file) => [file.path, file.screenId])).toEqual([
      ["src/pages/Home.tsx", "screen-1"],
      ["src/components/Button.tsx", "screen-1"],
      ["src/pages/Settings.tsx", "screen-2"]
    ]);
    expect(result.uiFiles[1]?.content).toBe("button-v1");
    expect(result.components[0]?.screensUsed).toEqual(["screen-1", "screen-2"]);
    expect(result.warnings.map((warning) => warning.code)).toEqual(["registry_collision"]);
  });

  it("dedupes a component both screens generated identically", async () => {
    const { oracle } = scriptedOracle({
      Home: buttonResponse("Home", "button"),
      Settings: buttonResponse("Settings", "button")
    });

    const result = await runCodegenJob(designWithScreens(["Home", "Settings"]), {
      oracle,
      limits: chunked,
      retry: fastRetry,
      concurrency: 1,
      onProgress: silent
    });

    expect(result.statistics.uiFiles).toBe(3);
    expect(result.statistics.components).toBe(1);
    expect(result.warnings).toEqual([]);
  });

  it("gives colliding screen names distinct routes", async () => {
    const { oracle } = scriptedOracle({
      Home: pageResponse("Home"),
      "home ": pageResponse("HomeAlt")
    });

    const result = await runCodegenJob(designWithScreens(["Home", "home "]), {
      oracle,
      limits: chunked,
      retry: fastRetry,
      onProgress: silent
    });

    expect(result.navigation.routes.map((route) => [route.slug, route.path])).toEqual([
      ["home", "/home"],
      ["home-2", "/home-2"]
    ]);
    expect(result.navigation.home).toBe("home");
  });

  it("records usage of components instanced on other screens", async () => {
    const design = designFromFrames([
      frame("home", "Home", [{ id: "cmp-button", type: "COMPONENT", name: "Button" }]),
      frame("cart", "Cart", [
        { id: "use-button", type: "INSTANCE", name: "Checkout", componentId: "cmp-button" },
        { id: "use-banner", type: "INSTANCE", name: "Promo banner", componentId: "cmp-missing" }
      ])
    ]);
    const { oracle } = scriptedOracle({ Home: buttonResponse("Home", "button") });

    const result = await runCodegenJob(design, {
      oracle,
      limits: { nodeThreshold: 5, screenCapacity: 10 },
      retry: fastRetry,
      onProgress: silent
    });

    expect(result.components[0]?.screensUsed).toEqual(["home", "cart"]);
    expect(result.warnings).toEqual([
      {
        code: "unresolved_reference",
        message: 'Screen cart uses component "Promo banner" (cmp-missing) that no screen generated',
        screenId: "cart"
      }
    ]);
  });

  it("processes a small design as a single screen", async () => {
    const { oracle, requests } = scriptedOracle({});

    const result = await runCodegenJob(designWithScreens(["Home", "Cart"]), { oracle, onProgress: silent });

    expect(result.mode).toBe("standard");
    expect(requests.map((request) => request.screenId)).toEqual(["doc"]);
    expect(result.navigation.routes.map((route) => route.slug)).toEqual(["demo"]);
  });

  it("rejects a frame nested too deep and generates the rest", async () => {
    const { oracle, requests } = scriptedOracle({});
    const design = designFromFrames([frame("home", "Home", leaves("h", 2)), frame("deep", "Deep", [chain("c", 3000)])]);

    const result = await runCodegenJob(design, {
      oracle,
      limits: { nodeThreshold: 10_000, screenCapacity: 10_000, screenDepth: 2, maxNesting: 512 },
      retry: fastRetry,
      onProgress: silent
    });

    expect(result.mode).toBe("standard");
    expect(requests.map((request) => request.screenName)).toEqual(["Home"]);
    expect(result.summary).toBe("1/1 screens succeeded");
    expect(result.rejectedSubtrees.map((subtree) => subtree.message)).toEqual([
      "Subtree deep nests 3001 levels deep; screens allow at most 512"
    ]);
    expect(result.warnings.map((warning) => warning.code)).toEqual(["oversized_subtree"]);
  });

  it("rejects malformed documents before calling the oracle", async () => {
    const { oracle, requests } = scriptedOracle({});

    await expect(runCodegenJob({ name: "Broken" }, { oracle, onProgress: silent })).rejects.toBeInstanceOf(
      MalformedInputError
    );
    expect(requests).toEqual([]);
  });
});
