import { GeneratedArtifact, NavigationMap, NavigationRoute, Screen } from "@/lib/models";

const ENTRY_DIRECTORY = /(^|\/)(pages|screens|views|app)\//;

export function slugify(name: string): string {
  const slug = name
    .normalize("NFC")
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "-")
    .replace(/[^\p{L}\p{M}\p{N}-]/gu, "")
    .replace(/-{2,}/g, "-");
  return slug || "screen";
}

export function primaryEntryFile(artifact: GeneratedArtifact | undefined): string | undefined {
  if (!artifact) return undefined;
  const entry = artifact.uiFiles.find((file) => ENTRY_DIRECTORY.test(file.path));
  return (entry ?? artifact.uiFiles[0])?.path;
}

/**
 * One route per succeeded screen in ordinal order. The first route is home.
 */
export function buildNavigation(screens: Screen[], artifacts: Map<string, GeneratedArtifact>): NavigationMap {
  const taken = new Set<string>();
  const routes: NavigationRoute[] = [];

  const ordered = screens.filter((screen) => screen.status === "succeeded").sort((a, b) => a.ordinal - b.ordinal);
  for (const screen of ordered) {
    const base = slugify(screen.name);
    let slug = base;
    if (taken.has(slug)) {
      slug = `${base}-${screen.ordinal}`;
      for (let n = 2; taken.has(slug); n += 1) {
        slug = `${base}-${screen.ordinal}-${n}`;
      }
    }
    taken.add(slug);

    const entryFile = primaryEntryFile(artifacts.get(screen.id));
    routes.push({
      screenId: screen.id,
      name: screen.name,
      slug,
      path: `/${slug}`,
      ordinal: screen.ordinal,
      ...(entryFile ? { entryFile } : {})
    });
  }

  return { home: routes[0]?.slug, routes };
}
