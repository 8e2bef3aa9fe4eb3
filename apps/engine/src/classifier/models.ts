// apps/engine/src/classifier/models.ts
//
// Margin functions for the supported artifact kinds. Both return one raw
// margin per class; softmax turns margins into probabilities.

import type {
  ClassifierModelV1,
  LinearSoftmaxModelV1,
  RegressionTreeV1,
  TreeEnsembleModelV1,
  TreeNodeV1,
} from "@cogwatch/contracts";

export type MarginFn = (x: ReadonlyArray<number | null>) => number[];

export function softmax(margins: ReadonlyArray<number>): number[] {
  const max = Math.max(...margins);
  const exps = margins.map((m) => Math.exp(m - max));
  const sum = exps.reduce((a, b) => a + b, 0);
  return exps.map((e) => e / sum);
}

function indexTree(tree: RegressionTreeV1): Map<number, TreeNodeV1> {
  const m = new Map<number, TreeNodeV1>();
  for (const node of tree.nodes) m.set(node.node_id, node);
  return m;
}

function scoreTree(nodes: Map<number, TreeNodeV1>, rootId: number, x: ReadonlyArray<number | null>): number {
  let node = nodes.get(rootId);
  // A well-formed tree reaches a leaf in fewer steps than it has nodes.
  for (let steps = 0; node && steps <= nodes.size; steps++) {
    if ("leaf" in node) return node.leaf;
    const v = x[node.feature];
    const next = v === null || v === undefined || Number.isNaN(v) ? node.missing : v < node.threshold ? node.yes : node.no;
    node = nodes.get(next);
  }
  throw new Error("TREE_WALK_FAILED");
}

/** Structural checks for one tree: children exist, feature indices in range, no cycles. */
export function validateTree(tree: RegressionTreeV1, featureCount: number): string[] {
  const errors: string[] = [];
  const nodes = indexTree(tree);
  if (nodes.size !== tree.nodes.length) errors.push("duplicate node_id");
  const root = tree.nodes[0];

  const visiting = new Set<number>();
  const walk = (id: number): void => {
    const node = nodes.get(id);
    if (!node) {
      errors.push(`missing node ${id}`);
      return;
    }
    if (visiting.has(id)) {
      errors.push(`cycle at node ${id}`);
      return;
    }
    if ("leaf" in node) return;
    if (node.feature >= featureCount) errors.push(`node ${id} reads feature ${node.feature} of ${featureCount}`);
    visiting.add(id);
    for (const child of new Set([node.yes, node.no, node.missing])) walk(child);
    visiting.delete(id);
  };
  walk(root.node_id);
  return errors;
}

function treeEnsembleMargins(model: TreeEnsembleModelV1, numClass: number): MarginFn {
  const indexed = model.trees.map((t) => ({ class_index: t.class_index, root: t.nodes[0].node_id, nodes: indexTree(t) }));
  return (x) => {
    const margins = new Array<number>(numClass).fill(model.base_score);
    for (const t of indexed) margins[t.class_index] += scoreTree(t.nodes, t.root, x);
    return margins;
  };
}

function linearSoftmaxMargins(model: LinearSoftmaxModelV1): MarginFn {
  return (x) =>
    model.weights.map((row, k) => {
      let m = model.bias[k];
      // a missing feature contributes nothing
      row.forEach((w, j) => {
        const v = x[j];
        if (typeof v === "number" && Number.isFinite(v)) m += w * v;
      });
      return m;
    });
}

export function marginFnFor(model: ClassifierModelV1, numClass: number): MarginFn {
  switch (model.kind) {
    case "tree_ensemble":
      return treeEnsembleMargins(model, numClass);
    case "linear_softmax":
      return linearSoftmaxMargins(model);
    default: {
      const _never: never = model;
      throw new Error(`UNREACHABLE_MODEL_KIND: ${JSON.stringify(_never)}`);
    }
  }
}
