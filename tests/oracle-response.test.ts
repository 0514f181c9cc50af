import { describe, it, expect } from "vitest";
import { parseOracleResponse } from "@/lib/services/oracle-response";
import { ParseError } from "@/lib/services/errors";

describe("parseOracleResponse", () => {
  it("parses the structured shape", () => {
    const parsed = parseOracleResponse(
      JSON.stringify({
        files: [{ path: "src/pages/Home.tsx", content: "export const Home = () => null;" }],
        backendFiles: [{ path: "api/home.ts", content: "export {};" }],
        registryEntry: { componentName: "Button", path: "src/components/Button.tsx", variants: ["primary"] }
      })
    );

    expect(parsed).toEqual({
      kind: "structured",
      uiFiles: [{ path: "src/pages/Home.tsx", content: "export const Home = () => null;" }],
      apiFiles: [{ path: "api/home.ts", content: "export {};" }],
      registryEntries: [
        {
          componentName: "Button",
          path: "src/components/Button.tsx",
          variants: ["primary"],
          tokens: [],
          dependencies: [],
          apiEndpoints: []
        }
      ],
      notes: []
    });
  });

  it("finds fenced JSON surrounded by prose", () => {
    const raw = [
      "Here is the screen:",
      "```json",
      '{"files": [{"path": "src/App.tsx", "content": "app"}]}',
      "```",
      "Let me know if you need changes."
    ].join("\n");

    const parsed = parseOracleResponse(raw);
    expect(parsed.kind).toBe("structured");
    if (parsed.kind === "reference") return;
    expect(parsed.uiFiles).toEqual([{ path: "src/App.tsx", content: "app" }]);
  });

  it("accepts the path-to-content record shape", () => {
    const parsed = parseOracleResponse(
      JSON.stringify({ frontend: { "src/App.tsx": "ui" }, backend: { "server/index.ts": "api" } })
    );
    if (parsed.kind === "reference") throw new Error("expected files");
    expect(parsed.uiFiles).toEqual([{ path: "src/App.tsx", content: "ui" }]);
    expect(parsed.apiFiles).toEqual([{ path: "server/index.ts", content: "api" }]);
  });

  it("maps `name` to `componentName` in registry entries", () => {
    const parsed = parseOracleResponse(
      JSON.stringify({
        files: [{ path: "src/Card.tsx", content: "card" }],
        registryEntry: [{ name: "Card", path: "src/Card.tsx" }]
      })
    );
    if (parsed.kind === "reference") throw new Error("expected files");
    expect(parsed.registryEntries.map((entry) => entry.componentName)).toEqual(["Card"]);
  });

  it("returns a reference for a bare registryRef", () => {
    expect(parseOracleResponse('{"registryRef": " Button "}')).toEqual({
      kind: "reference",
      registryRef: "Button",
      notes: []
    });
    expect(parseOracleResponse('{"registry_ref": "Modal"}')).toEqual({
      kind: "reference",
      registryRef: "Modal",
      notes: []
    });
  });

  it("drops unsafe and duplicate paths with notes", () => {
    const parsed = parseOracleResponse(
      JSON.stringify({
        files: [
          { path: "../etc/passwd", content: "x" },
          { path: "./src\\App.tsx", content: "first" },
          { path: "src/App.tsx", content: "second" }
        ]
      })
    );
    if (parsed.kind === "reference") throw new Error("expected files");
    expect(parsed.uiFiles).toEqual([{ path: "src/App.tsx", content: "first" }]);
    expect(parsed.notes).toEqual([
      { code: "unsafe_path", message: 'Dropped file with unsafe path "../etc/passwd"' },
      { code: "path_collision", message: 'Duplicate path "src/App.tsx" in one response; kept the first' }
    ]);
  });

  it("keeps files when the registry entry is malformed", () => {
    const parsed = parseOracleResponse(
      JSON.stringify({ files: [{ path: "src/Card.tsx", content: "card" }], registryEntry: { componentName: "Card" } })
    );
    if (parsed.kind === "reference") throw new Error("expected files");
    expect(parsed.uiFiles).toHaveLength(1);
    expect(parsed.registryEntries).toEqual([]);
    expect(parsed.notes).toEqual([
      { code: "parse_fallback", message: "Ignored malformed registry entry in oracle response" }
    ]);
  });

  it("recovers file blocks from free text", () => {
    const raw = [
      "File: src/pages/Home.tsx",
      "```tsx",
      "export const Home = () => null;",
      "```",
      "",
      "### routes/home.ts",
      "```ts",
      "export default {};",
      "```"
    ].join("\n");

    const parsed = parseOracleResponse(raw);
    expect(parsed).toEqual({
      kind: "degraded",
      uiFiles: [{ path: "src/pages/Home.tsx", content: "export const Home = () => null;" }],
      apiFiles: [{ path: "routes/home.ts", content: "export default {};" }],
      registryEntries: [],
      notes: [{ code: "parse_fallback", message: "Response was not structured; recovered 2 file(s) from text" }]
    });
  });

  it("keeps the last file of a reply cut off before its closing fence", () => {
    const raw = [
      "File: src/pages/Home.tsx",
      "```tsx",
      "export const Home = () => null;",
      "```",
      "",
      "File: src/components/Card.tsx",
      "```tsx",
      "export const Card = () => (",
      "  <div>",
      ""
    ].join("\n");

    const parsed = parseOracleResponse(raw);
    expect(parsed).toEqual({
      kind: "degraded",
      uiFiles: [
        { path: "src/pages/Home.tsx", content: "export const Home = () => null;" },
        { path: "src/components/Card.tsx", content: "export const Card = () => (\n  <div>" }
      ],
      apiFiles: [],
      registryEntries: [],
      notes: [
        { code: "parse_fallback", message: "Response was not structured; recovered 2 file(s) from text" },
        {
          code: "parse_fallback",
          message: 'Response was truncated inside "src/components/Card.tsx"; kept the partial content'
        }
      ]
    });
  });

  it("throws a ParseError when nothing is usable", () => {
    expect(() => parseOracleResponse("I cannot generate this screen.")).toThrow(ParseError);
    expect(() => parseOracleResponse('{"files": []}')).toThrow(
      "Oracle response contained no usable files or registry reference"
    );
  });
});
