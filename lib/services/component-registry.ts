import { ComponentDescriptor, ComponentDescriptorInput, JobWarning } from "@/lib/models";
import { Mutex } from "@/lib/services/concurrency";

export type RegistrationStatus = "created" | "merged" | "conflict";

export type RegistrationOutcome = {
  status: RegistrationStatus;
  // Always the stored (first-writer) descriptor
  descriptor: ComponentDescriptor;
};

export function normalizeComponentName(name: string): string {
  return name.trim().toLowerCase();
}

function addUnique(target: string[], values: readonly string[]): void {
  for (const value of values) {
    if (!target.includes(value)) target.push(value);
  }
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/**
 * Job-scoped component registry. Every read and write goes through one lock,
 * so two screens registering the same component cannot both become its first
 * writer.
 */
export class ComponentRegistry {
  private readonly entries = new Map<string, ComponentDescriptor>();
  private readonly lock = new Mutex();
  private readonly collisions: JobWarning[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  register(input: ComponentDescriptorInput, screenId: string): Promise<RegistrationOutcome> {
    return this.lock.runExclusive(() => {
      const key = normalizeComponentName(input.name);
      if (!key) {
        throw new Error("Component name must not be blank");
      }

      const existing = this.entries.get(key);
      if (!existing) {
        const descriptor: ComponentDescriptor = {
          key,
          name: input.name.trim(),
          path: input.path,
          tokens: unique(input.tokens),
          variants: unique(input.variants),
          screensUsed: [screenId],
          dependencies: unique(input.dependencies),
          apiEndpoints: unique(input.apiEndpoints),
          contentHash: input.contentHash,
          generatedAt: this.clock().toISOString(),
          firstScreenId: screenId
        };
        this.entries.set(key, descriptor);
        return { status: "created", descriptor: structuredClone(descriptor) };
      }

      if (existing.path === input.path && existing.contentHash === input.contentHash) {
        addUnique(existing.variants, input.variants);
        addUnique(existing.screensUsed, [screenId]);
        return { status: "merged", descriptor: structuredClone(existing) };
      }

      // First writer wins; the later screen only gains a usage edge
      addUnique(existing.screensUsed, [screenId]);
      const message =
        `Component "${input.name.trim()}" from screen ${screenId} differs from the version ` +
        `registered by ${existing.firstScreenId} (${existing.path}); keeping the first`;
      this.collisions.push({ code: "registry_collision", message, screenId });
      console.warn(`[registry] ${message}`);
      return { status: "conflict", descriptor: structuredClone(existing) };
    });
  }

  recordUsage(name: string, screenId: string): Promise<ComponentDescriptor | undefined> {
    return this.lock.runExclusive(() => {
      const existing = this.entries.get(normalizeComponentName(name));
      if (!existing) return undefined;
      addUnique(existing.screensUsed, [screenId]);
      return structuredClone(existing);
    });
  }

  resolve(name: string): Promise<ComponentDescriptor | undefined> {
    return this.lock.runExclusive(() => {
      const existing = this.entries.get(normalizeComponentName(name));
      return existing ? structuredClone(existing) : undefined;
    });
  }

  knownNames(): Promise<string[]> {
    return this.lock.runExclusive(() => [...this.entries.values()].map((entry) => entry.name));
  }

  snapshot(): Promise<ComponentDescriptor[]> {
    return this.lock.runExclusive(() => [...this.entries.values()].map((entry) => structuredClone(entry)));
  }

  warnings(): JobWarning[] {
    return [...this.collisions];
  }
}
