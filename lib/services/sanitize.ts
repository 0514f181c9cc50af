const PROMPT_INJECTION_MARKERS = [
  "ignore previous instructions",
  "system prompt",
  "developer instructions",
  "jailbreak"
];

const UI_EXTENSIONS = new Set(["tsx", "jsx", "vue", "svelte", "css", "scss", "sass", "less", "html"]);

const API_PATH_MARKERS = [
  /(^|\/)api\//,
  /(^|\/)routes?\//,
  /(^|\/)controllers?\//,
  /(^|\/)server\//,
  /(^|\/)middleware\//,
  /(^|\/)server\.[jt]s$/
];

export function estimateTokens(input: string): number {
  return Math.ceil(input.length / 4);
}

export function fileExtension(path: string): string {
  const clean = path.split("?")[0] ?? path;
  const name = clean.slice(clean.lastIndexOf("/") + 1);
  const idx = name.lastIndexOf(".");
  if (idx <= 0 || idx === name.length - 1) return "";
  return name.slice(idx + 1).toLowerCase();
}

export function sanitizeTextForPrompt(content: string): string {
  const lowered = content.toLowerCase();
  let sanitized = content;
  for (const marker of PROMPT_INJECTION_MARKERS) {
    if (lowered.includes(marker)) {
      const regex = new RegExp(marker, "gi");
      sanitized = sanitized.replace(regex, "[filtered-marker]");
    }
  }
  return sanitized;
}

/**
 * Normalizes an oracle-supplied file path to a relative POSIX path. Returns
 * undefined for paths that would leave the output directory.
 */
export function normalizeGeneratedPath(path: string): string | undefined {
  const segments = path
    .trim()
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment.length > 0 && segment !== ".");
  if (segments.length === 0) return undefined;
  if (segments.some((segment) => segment === ".." || segment.includes(":"))) return undefined;
  return segments.join("/");
}

/** Server-side files go to the API list; everything else is UI. */
export function isApiFilePath(path: string): boolean {
  const lowered = path.toLowerCase();
  if (UI_EXTENSIONS.has(fileExtension(lowered))) return false;
  if (API_PATH_MARKERS.some((marker) => marker.test(lowered))) return true;
  return fileExtension(lowered) === "py";
}
