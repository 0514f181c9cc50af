import { z } from "zod";
import {
  DesignGraph,
  DesignNode,
  flatDocumentSchema,
  RawNode,
  rawNodeSchema,
  treeDocumentSchema
} from "@/lib/models";
import { MalformedInputError } from "@/lib/services/errors";

const MODELLED_KEYS = new Set(["id", "type", "name", "children", "shared", "componentId"]);

type NodeRecord = {
  raw: RawNode;
  childIds: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseRawNode(value: unknown, where: string): RawNode {
  const result = rawNodeSchema.safeParse(value);
  if (!result.success) {
    throw new MalformedInputError(`Invalid node at ${where}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function lookup<T>(map: ReadonlyMap<string, T>, id: string): T {
  const value = map.get(id);
  if (value === undefined) {
    throw new MalformedInputError(`Node "${id}" is not defined`);
  }
  return value;
}

function isSharedLeaf(record: NodeRecord): boolean {
  return record.raw.shared === true && record.childIds.length === 0;
}

// ---------------------------------------------------------------------------
// Document shapes -> flat node table
// ---------------------------------------------------------------------------

function tableFromTree(document: unknown): { rootId: string; table: Map<string, NodeRecord> } {
  const table = new Map<string, NodeRecord>();
  const rootRaw = parseRawNode(document, "document");
  const stack: Array<{ value: unknown; where: string }> = [{ value: document, where: "document" }];

  for (let item = stack.pop(); item; item = stack.pop()) {
    const { value, where } = item;
    const raw = parseRawNode(value, where);
    const children = raw.children ?? [];
    const childIds: string[] = [];
    const pending: Array<{ value: unknown; where: string }> = [];

    children.forEach((child, index) => {
      const childWhere = `${where}.children[${index}]`;
      if (!isRecord(child)) {
        throw new MalformedInputError(`Invalid node at ${childWhere}: expected an object`);
      }
      const childRaw = parseRawNode(child, childWhere);
      childIds.push(childRaw.id);
      pending.push({ value: child, where: childWhere });
    });

    const record: NodeRecord = { raw, childIds };
    const existing = table.get(raw.id);
    if (existing) {
      if (isSharedLeaf(existing) && isSharedLeaf(record)) continue;
      throw new MalformedInputError(`Duplicate node id "${raw.id}" at ${where}`);
    }
    table.set(raw.id, record);

    // Reverse so children are visited in document order
    for (let i = pending.length - 1; i >= 0; i -= 1) {
      stack.push(pending[i]);
    }
  }

  return { rootId: rootRaw.id, table };
}

function tableFromFlat(nodes: unknown[]): Map<string, NodeRecord> {
  const table = new Map<string, NodeRecord>();
  nodes.forEach((value, index) => {
    const where = `nodes[${index}]`;
    const raw = parseRawNode(value, where);
    const childIds: string[] = [];
    for (const child of raw.children ?? []) {
      if (typeof child !== "string" || child.length === 0) {
        throw new MalformedInputError(`Invalid node at ${where}: children must be node ids`);
      }
      childIds.push(child);
    }
    if (table.has(raw.id)) {
      throw new MalformedInputError(`Duplicate node id "${raw.id}" at ${where}`);
    }
    table.set(raw.id, { raw, childIds });
  });
  return table;
}

// ---------------------------------------------------------------------------
// Table -> validated, frozen graph
// ---------------------------------------------------------------------------

function deepFreeze(value: unknown): void {
  const stack: unknown[] = [value];
  while (stack.length > 0) {
    const item = stack.pop();
    if (typeof item !== "object" || item === null || Object.isFrozen(item)) continue;
    Object.freeze(item);
    stack.push(...Object.values(item));
  }
}

function attributesOf(raw: RawNode): Record<string, unknown> {
  const attributes: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!MODELLED_KEYS.has(key)) attributes[key] = structuredClone(value);
  }
  deepFreeze(attributes);
  return attributes;
}

function freezeNode(record: NodeRecord, children: DesignNode[]): DesignNode {
  const { raw } = record;
  const node: DesignNode = {
    id: raw.id,
    type: raw.type,
    name: raw.name ?? "",
    shared: raw.shared === true,
    attributes: attributesOf(raw),
    children: Object.freeze(children),
    ...(raw.componentId ? { componentId: raw.componentId } : {})
  };
  return Object.freeze(node);
}

function buildGraph(name: string, rootId: string, table: Map<string, NodeRecord>): DesignGraph {
  if (!table.has(rootId)) {
    throw new MalformedInputError(`Root node "${rootId}" is not defined`);
  }

  const built = new Map<string, DesignNode>();
  const depths = new Map<string, number>();
  const parents = new Map<string, string>();
  const visited = new Set<string>([rootId]);
  const onPath = new Set<string>([rootId]);
  const frames: Array<{ id: string; next: number }> = [{ id: rootId, next: 0 }];
  depths.set(rootId, 0);

  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    const record = lookup(table, frame.id);

    if (frame.next < record.childIds.length) {
      const childId = record.childIds[frame.next];
      frame.next += 1;

      const childRecord = table.get(childId);
      if (!childRecord) {
        throw new MalformedInputError(`Node "${frame.id}" references missing child "${childId}"`);
      }
      if (onPath.has(childId)) {
        throw new MalformedInputError(`Cycle detected: node "${childId}" is its own ancestor`);
      }
      if (visited.has(childId)) {
        if (isSharedLeaf(childRecord)) continue;
        throw new MalformedInputError(`Node "${childId}" has more than one parent`);
      }

      visited.add(childId);
      onPath.add(childId);
      depths.set(childId, frames.length);
      parents.set(childId, frame.id);
      frames.push({ id: childId, next: 0 });
      continue;
    }

    const children = record.childIds.map((id) => lookup(built, id));
    built.set(frame.id, freezeNode(record, children));
    onPath.delete(frame.id);
    frames.pop();
  }

  if (visited.size !== table.size) {
    const orphans = [...table.keys()].filter((id) => !visited.has(id));
    throw new MalformedInputError(
      `${orphans.length} node(s) unreachable from root: ${orphans.slice(0, 5).join(", ")}`
    );
  }

  return Object.freeze({
    name,
    root: lookup(built, rootId),
    nodeCount: built.size,
    nodes: built,
    depths,
    parents
  });
}

export function loadDesignGraph(raw: unknown): DesignGraph {
  if (!isRecord(raw)) {
    throw new MalformedInputError("Design document must be a JSON object");
  }

  if ("nodes" in raw) {
    const parsed = flatDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedInputError(`Invalid design document: ${formatIssues(parsed.error)}`);
    }
    return buildGraph(parsed.data.name, parsed.data.rootId, tableFromFlat(parsed.data.nodes));
  }

  const parsed = treeDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedInputError(`Invalid design document: ${formatIssues(parsed.error)}`);
  }
  if (parsed.data.document === undefined) {
    throw new MalformedInputError("Invalid design document: document: Required");
  }
  const { rootId, table } = tableFromTree(parsed.data.document);
  return buildGraph(parsed.data.name, rootId, table);
}
