import {
  ComponentReference,
  DesignGraph,
  DesignNode,
  Screen,
  ScreenNode,
  ScreenPlan
} from "@/lib/models";
import { MalformedInputError } from "@/lib/services/errors";

function shallowCopy(node: DesignNode): ScreenNode {
  const copy: ScreenNode = {
    id: node.id,
    type: node.type,
    name: node.name,
    attributes: structuredClone({ ...node.attributes }),
    children: []
  };
  if (node.componentId) copy.componentId = node.componentId;
  return copy;
}

// Explicit stack; screens can nest far deeper than the call stack allows
function copyNode(node: DesignNode, children: readonly DesignNode[]): ScreenNode {
  const root = shallowCopy(node);
  const stack: Array<{ source: readonly DesignNode[]; target: ScreenNode[] }> = [{ source: children, target: root.children }];
  for (let item = stack.pop(); item; item = stack.pop()) {
    for (const child of item.source) {
      const copy = shallowCopy(child);
      item.target.push(copy);
      stack.push({ source: child.children, target: copy.children });
    }
  }
  return root;
}

function walkCopy(root: ScreenNode, visit: (node: ScreenNode) => void): void {
  const stack: ScreenNode[] = [root];
  for (let node = stack.pop(); node; node = stack.pop()) {
    visit(node);
    for (const child of node.children) stack.push(child);
  }
}

/**
 * Materializes one plan as a self-contained screen. Instance references to
 * components outside the copied subtree are detached and listed in
 * `componentRefs` so the registry can resolve them after generation.
 */
export function extractScreen(graph: DesignGraph, plan: ScreenPlan, ordinal: number): Screen {
  const root = graph.nodes.get(plan.rootId);
  if (!root) {
    throw new MalformedInputError(`Screen root "${plan.rootId}" is not in the graph`);
  }

  const memberIds = plan.memberRootIds ? new Set(plan.memberRootIds) : undefined;
  const members = memberIds ? root.children.filter((child) => memberIds.has(child.id)) : root.children;
  const subtree = copyNode(root, members);

  const localIds = new Set<string>();
  let nodeCount = 0;
  walkCopy(subtree, (node) => {
    localIds.add(node.id);
    nodeCount += 1;
  });

  const componentRefs: ComponentReference[] = [];
  const sharedNodeIds: string[] = [];
  walkCopy(subtree, (node) => {
    if (graph.nodes.get(node.id)?.shared && !sharedNodeIds.includes(node.id)) {
      sharedNodeIds.push(node.id);
    }
    const componentId = node.componentId;
    if (!componentId || localIds.has(componentId)) return;
    delete node.componentId;
    if (componentRefs.some((ref) => ref.componentId === componentId)) return;
    const target = graph.nodes.get(componentId);
    componentRefs.push({ componentId, name: target?.name || node.name });
  });

  return {
    id: plan.id,
    rootId: plan.rootId,
    name: plan.name,
    ordinal,
    ...(plan.part !== undefined ? { part: plan.part } : {}),
    ancestorPath: plan.ancestorPath,
    subtree,
    nodeCount,
    ownedNodeIds: plan.ownedNodeIds,
    sharedNodeIds,
    componentRefs,
    resolvedComponents: [],
    status: "pending"
  };
}

export function extractScreens(graph: DesignGraph, plans: ScreenPlan[]): Screen[] {
  return plans.map((plan, index) => extractScreen(graph, plan, index + 1));
}
