import { DesignGraph, ProcessingMode } from "@/lib/models";
import { CHUNKING } from "@/lib/services/config";

/** Routes graphs with at least `threshold` nodes to chunked processing. */
export function classifyGraph(graph: DesignGraph, threshold: number = CHUNKING.nodeThreshold): ProcessingMode {
  return graph.nodeCount < threshold ? "standard" : "chunked";
}
