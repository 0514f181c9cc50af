import { GenerationOptions, oracleStructuredResponseSchema, Screen, ScreenNode } from "@/lib/models";
import { schemaAsJson } from "@/lib/services/claude";
import { estimateTokens, sanitizeTextForPrompt } from "@/lib/services/sanitize";

// Above this the subtree is sent without indentation
const PRETTY_SUBTREE_TOKEN_LIMIT = 20_000;

function markdownBullets(items: string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

/**
 * Node attributes the oracle needs to lay out and style a screen. Everything
 * else is dropped from the prompt; the screen itself keeps its full attributes.
 */
export const PROMPT_ATTRIBUTE_KEYS: ReadonlySet<string> = new Set([
  "visible",
  "locked",
  "absoluteBoundingBox",
  "constraints",
  "layoutAlign",
  "layoutGrow",
  "layoutMode",
  "itemSpacing",
  "paddingLeft",
  "paddingRight",
  "paddingTop",
  "paddingBottom",
  "fills",
  "strokes",
  "strokeWeight",
  "strokeAlign",
  "cornerRadius",
  "cornerSmoothing",
  "characters",
  "style",
  "characterStyleOverrides",
  "styleOverrideTable",
  "lineTypes",
  "lineIndentations"
]);

export type PromptNode = {
  id: string;
  type: string;
  name: string;
  componentId?: string;
  attributes?: Record<string, unknown>;
  children?: PromptNode[];
};

function promptNodeOf(node: ScreenNode): PromptNode {
  const copy: PromptNode = { id: node.id, type: node.type, name: node.name };
  if (node.componentId) copy.componentId = node.componentId;
  const kept = Object.entries(node.attributes).filter(([key]) => PROMPT_ATTRIBUTE_KEYS.has(key));
  if (kept.length > 0) copy.attributes = Object.fromEntries(kept);
  return copy;
}

/** The subtree as sent to the oracle: kept attributes only, no empty fields. */
export function promptTree(root: ScreenNode): PromptNode {
  const top = promptNodeOf(root);
  const stack: Array<{ source: ScreenNode; target: PromptNode }> = [{ source: root, target: top }];
  for (let item = stack.pop(); item; item = stack.pop()) {
    if (item.source.children.length === 0) continue;
    const children: PromptNode[] = [];
    for (const child of item.source.children) {
      const copy = promptNodeOf(child);
      children.push(copy);
      stack.push({ source: child, target: copy });
    }
    item.target.children = children;
  }
  return top;
}

function subtreeJson(screen: Screen): string {
  const tree = promptTree(screen.subtree);
  const pretty = JSON.stringify(tree, null, 2);
  if (estimateTokens(pretty) <= PRETTY_SUBTREE_TOKEN_LIMIT) return pretty;
  return JSON.stringify(tree);
}

export function buildScreenPrompt(screen: Screen, knownComponents: string[], options: GenerationOptions): string {
  const location = screen.ancestorPath.map((ancestor) => ancestor.name).join(" / ");
  const extras = [
    options.includeTests ? "- include unit tests next to each component" : "",
    options.includeDocs ? "- include a README.md describing the screen" : ""
  ].filter(Boolean);

  const sections = [
    "Return valid JSON only.",
    `Task: generate ${options.frontend} UI components and ${options.backend} API handlers for the screen "${sanitizeTextForPrompt(screen.name)}".`,
    location ? `Screen location: ${sanitizeTextForPrompt(location)}` : "",
    "Output schema:",
    schemaAsJson(oracleStructuredResponseSchema),
    "Rules:",
    markdownBullets([
      "files[] holds UI files, backendFiles[] holds API handlers; every path is relative",
      "registryEntry describes each reusable component you created (componentName, path, variants, tokens, dependencies, apiEndpoints)",
      'if the whole screen is an existing component, return {"registryRef": "<component name>"} and nothing else',
      "reuse known components by name instead of generating them again",
      "no prose outside JSON"
    ]),
    ...extras,
    "Known components:",
    knownComponents.length ? markdownBullets(knownComponents.map(sanitizeTextForPrompt)) : "- none yet",
    screen.componentRefs.length
      ? `Component instances defined on other screens:\n${markdownBullets(screen.componentRefs.map((ref) => sanitizeTextForPrompt(ref.name)))}`
      : "",
    options.userMessage ? `Additional instructions:\n${sanitizeTextForPrompt(options.userMessage)}` : "",
    "Screen design tree:",
    sanitizeTextForPrompt(subtreeJson(screen))
  ];

  return sections.filter((section) => section.length > 0).join("\n\n");
}
