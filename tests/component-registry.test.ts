import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ComponentDescriptorInput } from "@/lib/models";
import { ComponentRegistry, normalizeComponentName } from "@/lib/services/component-registry";

const fixedClock = () => new Date("2026-01-01T00:00:00.000Z");

function button(overrides: Partial<ComponentDescriptorInput> = {}): ComponentDescriptorInput {
  return {
    name: "Button",
    path: "src/components/Button.tsx",
    tokens: ["color.primary"],
    variants: ["primary"],
    dependencies: [],
    apiEndpoints: [],
    contentHash: "hash-a",
    ...overrides
  };
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("ComponentRegistry", () => {
  it("stores the first registration as given", async () => {
    const registry = new ComponentRegistry(fixedClock);
    const outcome = await registry.register(button({ name: " Button " }), "screen-1");

    expect(outcome.status).toBe("created");
    expect(outcome.descriptor).toEqual({
      key: "button",
      name: "Button",
      path: "src/components/Button.tsx",
      tokens: ["color.primary"],
      variants: ["primary"],
      screensUsed: ["screen-1"],
      dependencies: [],
      apiEndpoints: [],
      contentHash: "hash-a",
      generatedAt: "2026-01-01T00:00:00.000Z",
      firstScreenId: "screen-1"
    });
  });

  it("merges variants and usage for identical content", async () => {
    const registry = new ComponentRegistry(fixedClock);
    await registry.register(button(), "screen-1");
    const outcome = await registry.register(button({ name: "BUTTON", variants: ["primary", "ghost"] }), "screen-2");

    expect(outcome.status).toBe("merged");
    expect(outcome.descriptor.variants).toEqual(["primary", "ghost"]);
    expect(outcome.descriptor.screensUsed).toEqual(["screen-1", "screen-2"]);
    expect(registry.warnings()).toEqual([]);
  });

  it("keeps the first writer when content differs", async () => {
    const registry = new ComponentRegistry(fixedClock);
    await registry.register(button(), "screen-1");
    const outcome = await registry.register(button({ contentHash: "hash-b" }), "screen-3");

    expect(outcome.status).toBe("conflict");
    expect(outcome.descriptor.contentHash).toBe("hash-a");
    expect(outcome.descriptor.screensUsed).toEqual(["screen-1", "screen-3"]);
    expect(registry.warnings()).toEqual([
      {
        code: "registry_collision",
        message:
          'Component "Button" from screen screen-3 differs from the version registered by screen-1 ' +
          "(src/components/Button.tsx); keeping the first",
        screenId: "screen-3"
      }
    ]);
  });

  it("serializes concurrent registrations in call order", async () => {
    const registry = new ComponentRegistry(fixedClock);
    const [first, second] = await Promise.all([
      registry.register(button({ contentHash: "hash-a" }), "screen-1"),
      registry.register(button({ contentHash: "hash-b" }), "screen-2")
    ]);

    expect(first.status).toBe("created");
    expect(second.status).toBe("conflict");
    expect((await registry.snapshot()).map((entry) => entry.contentHash)).toEqual(["hash-a"]);
  });

  it("resolves names case-insensitively and records usage", async () => {
    const registry = new ComponentRegistry(fixedClock);
    await registry.register(button(), "screen-1");

    expect((await registry.resolve("  button"))?.name).toBe("Button");
    expect((await registry.recordUsage("BUTTON", "screen-4"))?.screensUsed).toEqual(["screen-1", "screen-4"]);
    expect(await registry.recordUsage("Modal", "screen-4")).toBeUndefined();
    expect(await registry.knownNames()).toEqual(["Button"]);
  });

  it("returns copies that cannot change stored entries", async () => {
    const registry = new ComponentRegistry(fixedClock);
    const { descriptor } = await registry.register(button(), "screen-1");
    descriptor.screensUsed.push("tampered");

    expect((await registry.resolve("Button"))?.screensUsed).toEqual(["screen-1"]);
  });

  it("rejects blank names", async () => {
    const registry = new ComponentRegistry(fixedClock);
    await expect(registry.register(button({ name: "   " }), "screen-1")).rejects.toThrow(
      "Component name must not be blank"
    );
    expect(normalizeComponentName("  Nav Bar ")).toBe("nav bar");
  });
});
