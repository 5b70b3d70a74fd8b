import { debugLogger, LogComponent } from './debug-logger';

/** A field of a table row. */
export type Value = string | number | boolean;

/** A row of equal-length fields, one of which is the class label. */
export type Row = readonly Value[];

/**
 * Types of nodes in a decision tree:
 */
export const enum TreeKind {
  Leaf, // a decision
  Branch, // a test on one feature
}

export type Leaf = { kind: TreeKind.Leaf; decision: Value };

/** Tests the feature at index `feature`, with one child per observed value. */
export type Branch = {
  kind: TreeKind.Branch;
  feature: number;
  children: Map<Value, DecisionNode>;
};

export type DecisionNode = Leaf | Branch;

function labelCounts(rows: readonly Row[], target: number): Map<Value, number> {
  const counts = new Map<Value, number>();
  for (const row of rows) {
    const label = row[target];
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return counts;
}

/**
 * Shannon entropy (base 2) of the label column.
 */
export function entropy(rows: readonly Row[], target: number): number {
  let h = 0;
  for (const count of labelCounts(rows, target).values()) {
    const p = count / rows.length;
    h -= p * Math.log2(p);
  }
  return h;
}

/**
 * Groups rows by the value of a feature, in order of first appearance.
 */
export function splitBy(rows: readonly Row[], feature: number): Map<Value, Row[]> {
  const subsets = new Map<Value, Row[]>();
  for (const row of rows) {
    const value = row[feature];
    const subset = subsets.get(value);
    if (subset) subset.push(row);
    else subsets.set(value, [row]);
  }
  return subsets;
}

/**
 * Reduction in label entropy obtained by splitting on a feature.
 */
export function informationGain(
  rows: readonly Row[],
  feature: number,
  target: number
): number {
  let weighted = 0;
  for (const subset of splitBy(rows, feature).values()) {
    weighted += (subset.length / rows.length) * entropy(subset, target);
  }
  return entropy(rows, target) - weighted;
}

/**
 * Most common label; ties go to the label seen first.
 */
export function majorityLabel(rows: readonly Row[], target: number): Value {
  let best: Value = rows[0][target];
  let bestCount = 0;
  for (const [label, count] of labelCounts(rows, target)) {
    if (count > bestCount) {
      best = label;
      bestCount = count;
    }
  }
  return best;
}

function grow(rows: readonly Row[], features: readonly number[], target: number): DecisionNode {
  const labels = labelCounts(rows, target);
  if (labels.size === 1) {
    return { kind: TreeKind.Leaf, decision: rows[0][target] };
  }
  if (features.length === 0) {
    return { kind: TreeKind.Leaf, decision: majorityLabel(rows, target) };
  }

  let bestFeature = features[0];
  let bestGain = -Infinity;
  for (const feature of features) {
    const gain = informationGain(rows, feature, target);
    if (gain > bestGain) {
      bestGain = gain;
      bestFeature = feature;
    }
  }

  if (bestGain <= 0) {
    return { kind: TreeKind.Leaf, decision: majorityLabel(rows, target) };
  }

  debugLogger.debug(
    LogComponent.DECISION_TREE,
    `Splitting ${rows.length} rows on feature ${bestFeature} (gain ${bestGain.toFixed(3)})`
  );

  const remaining = features.filter((f) => f !== bestFeature);
  const children = new Map<Value, DecisionNode>();
  for (const [value, subset] of splitBy(rows, bestFeature)) {
    children.set(value, grow(subset, remaining, target));
  }
  return { kind: TreeKind.Branch, feature: bestFeature, children };
}

/**
 * Builds a decision tree by ID3: each node splits on the remaining feature
 * with the highest information gain about the label at `targetIndex`. A
 * negative `targetIndex` counts from the end of the row, so the default reads
 * the label from the last field.
 *
 * @returns the tree, or undefined when there are no rows
 */
export function build(
  rows: readonly Row[],
  featureIndices: readonly number[],
  targetIndex = -1
): DecisionNode | undefined {
  if (rows.length === 0) return undefined;

  const width = rows[0].length;
  if (rows.some((row) => row.length !== width)) {
    throw new RangeError('all rows must have the same number of fields');
  }
  const target = targetIndex < 0 ? width + targetIndex : targetIndex;
  if (target < 0 || target >= width) {
    throw new RangeError(`target index ${targetIndex} is out of range for rows of ${width} fields`);
  }
  for (const feature of featureIndices) {
    if (feature < 0 || feature >= width || feature === target) {
      throw new RangeError(`feature index ${feature} is not a feature column`);
    }
  }

  return grow(rows, [...new Set(featureIndices)], target);
}

/**
 * Follows a row down the tree. Returns undefined if the row has a value the
 * tree never saw at some branch.
 */
export function classify(tree: DecisionNode, row: Row): Value | undefined {
  let node: DecisionNode | undefined = tree;
  while (node && node.kind === TreeKind.Branch) {
    node = node.children.get(row[node.feature]);
  }
  return node?.decision;
}
