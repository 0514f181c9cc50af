import {
  AncestorRef,
  ChunkingLimits,
  DesignGraph,
  DesignNode,
  RejectedSubtree,
  ScreenPlan
} from "@/lib/models";
import { CHUNKING } from "@/lib/services/config";
import { OversizedUnsplittableScreenError, ScreenTooDeepError } from "@/lib/services/errors";

export type StructureAnalysis = {
  plans: ScreenPlan[];
  rejected: RejectedSubtree[];
};

type Candidate = {
  node: DesignNode;
  ancestorPath: AncestorRef[];
  structuralBefore: string[];
};

export function resolveChunkingLimits(overrides: Partial<ChunkingLimits> = {}): ChunkingLimits {
  const limits: ChunkingLimits = { ...CHUNKING, ...overrides };
  if (!Number.isInteger(limits.screenCapacity) || limits.screenCapacity < 2) {
    throw new RangeError(`screenCapacity must be an integer >= 2 (got ${limits.screenCapacity})`);
  }
  if (!Number.isInteger(limits.screenDepth) || limits.screenDepth < 0) {
    throw new RangeError(`screenDepth must be a non-negative integer (got ${limits.screenDepth})`);
  }
  if (!Number.isInteger(limits.maxSplitDepth) || limits.maxSplitDepth < 0) {
    throw new RangeError(`maxSplitDepth must be a non-negative integer (got ${limits.maxSplitDepth})`);
  }
  if (!Number.isInteger(limits.maxNesting) || limits.maxNesting < 1) {
    throw new RangeError(`maxNesting must be a positive integer (got ${limits.maxNesting})`);
  }
  return limits;
}

export function screenName(node: DesignNode): string {
  return node.name.length > 0 ? node.name : node.id;
}

function ancestorRef(node: DesignNode): AncestorRef {
  return { id: node.id, name: node.name, type: node.type };
}

// ---------------------------------------------------------------------------
// Subtree helpers (iterative; graphs can be deep)
// ---------------------------------------------------------------------------

// Children before parents; shared leaves appear once
function postOrder(graph: DesignGraph): DesignNode[] {
  const order: DesignNode[] = [];
  const seen = new Set<string>();
  const stack: DesignNode[] = [graph.root];
  for (let node = stack.pop(); node; node = stack.pop()) {
    if (seen.has(node.id)) continue;
    seen.add(node.id);
    order.push(node);
    for (const child of node.children) stack.push(child);
  }
  return order.reverse();
}

/** Subtree sizes as the oracle sees them: shared leaves count once per occurrence. */
export function computeSubtreeSizes(graph: DesignGraph): Map<string, number> {
  const sizes = new Map<string, number>();
  for (const node of postOrder(graph)) {
    let size = 1;
    for (const child of node.children) size += sizes.get(child.id) ?? 1;
    sizes.set(node.id, size);
  }
  return sizes;
}

/** Levels in each subtree, counting the node itself: a leaf has height 1. */
export function computeSubtreeHeights(graph: DesignGraph): Map<string, number> {
  const heights = new Map<string, number>();
  for (const node of postOrder(graph)) {
    let tallest = 0;
    for (const child of node.children) tallest = Math.max(tallest, heights.get(child.id) ?? 1);
    heights.set(node.id, tallest + 1);
  }
  return heights;
}

export function subtreeIds(node: DesignNode): string[] {
  const ids: string[] = [];
  const seen = new Set<string>();
  const stack: DesignNode[] = [node];
  for (let current = stack.pop(); current; current = stack.pop()) {
    if (seen.has(current.id)) continue;
    seen.add(current.id);
    ids.push(current.id);
    for (let i = current.children.length - 1; i >= 0; i -= 1) stack.push(current.children[i]);
  }
  return ids;
}

// ---------------------------------------------------------------------------
// Screen-root discovery
// ---------------------------------------------------------------------------

function collectCandidates(
  graph: DesignGraph,
  screenDepth: number
): { candidates: Candidate[]; trailingStructural: string[] } {
  const candidates: Candidate[] = [];
  const candidateIds = new Set<string>();
  let structural: string[] = [];
  const stack: Array<{ node: DesignNode; depth: number; path: AncestorRef[] }> = [
    { node: graph.root, depth: 0, path: [] }
  ];

  for (let item = stack.pop(); item; item = stack.pop()) {
    const { node, depth, path } = item;
    if (depth === screenDepth) {
      // A shared leaf reached twice stays with its first screen
      if (candidateIds.has(node.id)) continue;
      candidateIds.add(node.id);
      candidates.push({ node, ancestorPath: path, structuralBefore: structural });
      structural = [];
      continue;
    }
    if (!structural.includes(node.id)) structural.push(node.id);
    const childPath = [...path, ancestorRef(node)];
    for (let i = node.children.length - 1; i >= 0; i -= 1) {
      stack.push({ node: node.children[i], depth: depth + 1, path: childPath });
    }
  }

  if (candidates.length === 0) {
    return { candidates: [{ node: graph.root, ancestorPath: [], structuralBefore: [] }], trailingStructural: [] };
  }
  return { candidates, trailingStructural: structural };
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

export function analyzeStructure(graph: DesignGraph, overrides: Partial<ChunkingLimits> = {}): StructureAnalysis {
  const limits = resolveChunkingLimits(overrides);
  const sizes = computeSubtreeSizes(graph);
  const heights = computeSubtreeHeights(graph);
  const plans: ScreenPlan[] = [];
  const rejected: RejectedSubtree[] = [];
  // Ids not yet owned by any plan; claimed by the next plan emitted
  let pending: string[] = [];

  const sizeOf = (node: DesignNode): number => sizes.get(node.id) ?? 1;

  function emit(plan: ScreenPlan): void {
    plan.ownedNodeIds = [...new Set([...pending, ...plan.ownedNodeIds])];
    pending = [];
    plans.push(plan);
  }

  function reject(node: DesignNode, error: OversizedUnsplittableScreenError): void {
    console.warn(`[analyzer] ${error.message}`);
    rejected.push({
      rootId: node.id,
      name: screenName(node),
      nodeCount: sizeOf(node),
      depth: error.depth,
      nodeIds: subtreeIds(node),
      message: error.message
    });
  }

  function planSubtree(node: DesignNode, ancestorPath: AncestorRef[], level: number): void {
    const size = sizeOf(node);
    // Split parts keep a shell of `node`, so splitting never reduces height
    const height = heights.get(node.id) ?? 1;
    if (height > limits.maxNesting) {
      reject(node, new ScreenTooDeepError(node.id, size, level, height, limits.maxNesting));
      return;
    }
    if (size <= limits.screenCapacity) {
      emit({
        id: node.id,
        rootId: node.id,
        name: screenName(node),
        ancestorPath,
        ownedNodeIds: subtreeIds(node),
        nodeCount: size
      });
      return;
    }
    if (level >= limits.maxSplitDepth) {
      reject(node, new OversizedUnsplittableScreenError(node.id, size, level));
      return;
    }
    splitSubtree(node, ancestorPath, level + 1);
  }

  // Packs children into virtual sub-screens that each carry a shell copy of `node`
  function splitSubtree(node: DesignNode, ancestorPath: AncestorRef[], level: number): void {
    const budget = limits.screenCapacity - 1;
    const childPath = [...ancestorPath, ancestorRef(node)];
    let group: DesignNode[] = [];
    let groupSize = 0;
    let part = 0;

    pending.push(node.id);

    const flush = (): void => {
      if (group.length === 0) return;
      part += 1;
      emit({
        id: `${node.id}::part-${part}`,
        rootId: node.id,
        memberRootIds: group.map((child) => child.id),
        name: `${screenName(node)} (part ${part})`,
        ancestorPath,
        ownedNodeIds: group.flatMap((child) => subtreeIds(child)),
        nodeCount: 1 + groupSize,
        part
      });
      group = [];
      groupSize = 0;
    };

    for (const child of node.children) {
      const childSize = sizeOf(child);
      if (childSize > budget) {
        flush();
        planSubtree(child, childPath, level);
        continue;
      }
      if (groupSize + childSize > budget) flush();
      group.push(child);
      groupSize += childSize;
    }
    flush();
  }

  const { candidates, trailingStructural } = collectCandidates(graph, limits.screenDepth);
  for (const candidate of candidates) {
    pending.push(...candidate.structuralBefore);
    planSubtree(candidate.node, candidate.ancestorPath, 0);
  }
  pending.push(...trailingStructural);

  if (pending.length > 0) {
    const lastPlan = plans[plans.length - 1];
    const lastRejected = rejected[rejected.length - 1];
    if (lastPlan) lastPlan.ownedNodeIds.push(...pending);
    else if (lastRejected) lastRejected.nodeIds.push(...pending);
    pending = [];
  }

  return { plans, rejected };
}

/** Whole graph as one screen, for graphs under the chunking threshold. */
export function planWholeGraph(graph: DesignGraph): ScreenPlan {
  return {
    id: graph.root.id,
    rootId: graph.root.id,
    name: screenName(graph.root),
    ancestorPath: [],
    ownedNodeIds: subtreeIds(graph.root),
    nodeCount: computeSubtreeSizes(graph).get(graph.root.id) ?? graph.nodeCount
  };
}
