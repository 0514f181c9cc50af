import { describe, it, expect } from "vitest";
import { loadDesignGraph } from "@/lib/services/graph-loader";
import { MalformedInputError } from "@/lib/services/errors";
import { designWithScreens } from "./helpers/design";

describe("loadDesignGraph", () => {
  it("loads a nested document with depths, parents and attributes", () => {
    const graph = loadDesignGraph({
      name: "Shop",
      document: {
        id: "doc",
        type: "DOCUMENT",
        children: [
          {
            id: "page",
            type: "CANVAS",
            name: "Page",
            children: [{ id: "cta", type: "TEXT", name: "Buy", fills: [{ color: "#ff0000" }] }]
          }
        ]
      }
    });

    expect(graph.name).toBe("Shop");
    expect(graph.nodeCount).toBe(3);
    expect(graph.root.name).toBe("");
    expect(graph.depths.get("cta")).toBe(2);
    expect(graph.parents.get("cta")).toBe("page");
    expect(graph.nodes.get("cta")?.attributes).toEqual({ fills: [{ color: "#ff0000" }] });
    expect(Object.isFrozen(graph.root)).toBe(true);
  });

  it("loads the flat node-table form in child order", () => {
    const graph = loadDesignGraph({
      name: "Flat",
      rootId: "a",
      nodes: [
        { id: "a", type: "DOCUMENT", children: ["c", "b"] },
        { id: "b", type: "FRAME" },
        { id: "c", type: "FRAME" }
      ]
    });

    expect(graph.root.children.map((child) => child.id)).toEqual(["c", "b"]);
    expect(graph.nodeCount).toBe(3);
  });

  it("counts every unique node", () => {
    const graph = loadDesignGraph(designWithScreens(["Home", "Cart"], 3));
    // doc + page + 2 frames + 6 leaves
    expect(graph.nodeCount).toBe(10);
  });

  it("accepts a shared leaf referenced from two frames", () => {
    const logo = { id: "logo", type: "IMAGE", shared: true };
    const graph = loadDesignGraph({
      name: "Shared",
      document: {
        id: "doc",
        type: "DOCUMENT",
        children: [
          { id: "f1", type: "FRAME", children: [logo] },
          { id: "f2", type: "FRAME", children: [logo] }
        ]
      }
    });

    expect(graph.nodeCount).toBe(4);
    expect(graph.nodes.get("f2")?.children[0]?.id).toBe("logo");
  });

  it("rejects a duplicated id that is not a shared leaf", () => {
    expect(() =>
      loadDesignGraph({
        name: "Dup",
        document: {
          id: "doc",
          type: "DOCUMENT",
          children: [
            { id: "x", type: "FRAME" },
            { id: "x", type: "FRAME" }
          ]
        }
      })
    ).toThrow('Duplicate node id "x"');
  });

  it("rejects cycles", () => {
    expect(() =>
      loadDesignGraph({
        name: "Loop",
        rootId: "a",
        nodes: [
          { id: "a", type: "DOCUMENT", children: ["b"] },
          { id: "b", type: "FRAME", children: ["a"] }
        ]
      })
    ).toThrow('Cycle detected: node "a" is its own ancestor');
  });

  it("rejects dangling child references", () => {
    expect(() =>
      loadDesignGraph({
        name: "Dangling",
        rootId: "a",
        nodes: [{ id: "a", type: "DOCUMENT", children: ["zz"] }]
      })
    ).toThrow('Node "a" references missing child "zz"');
  });

  it("rejects nodes with two parents", () => {
    expect(() =>
      loadDesignGraph({
        name: "Diamond",
        rootId: "a",
        nodes: [
          { id: "a", type: "DOCUMENT", children: ["b", "c"] },
          { id: "b", type: "FRAME", children: ["d"] },
          { id: "c", type: "FRAME", children: ["d"] },
          { id: "d", type: "TEXT" }
        ]
      })
    ).toThrow('Node "d" has more than one parent');
  });

  it("rejects nodes unreachable from the root", () => {
    expect(() =>
      loadDesignGraph({
        name: "Orphan",
        rootId: "a",
        nodes: [
          { id: "a", type: "DOCUMENT" },
          { id: "c", type: "FRAME" }
        ]
      })
    ).toThrow("1 node(s) unreachable from root: c");
  });

  it("rejects non-object input and nodes without ids", () => {
    expect(() => loadDesignGraph("nope")).toThrow(MalformedInputError);
    expect(() => loadDesignGraph({ name: "Bad", document: { type: "DOCUMENT" } })).toThrow(
      "Invalid node at document: id: Required"
    );
  });

  it("loads very deep chains without recursion", () => {
    const depth = 20_000;
    const nodes = Array.from({ length: depth }, (_, index) => ({
      id: `n${index}`,
      type: "GROUP",
      children: index + 1 < depth ? [`n${index + 1}`] : []
    }));

    const graph = loadDesignGraph({ name: "Deep", rootId: "n0", nodes });

    expect(graph.nodeCount).toBe(depth);
    expect(graph.depths.get(`n${depth - 1}`)).toBe(depth - 1);
  });
});
