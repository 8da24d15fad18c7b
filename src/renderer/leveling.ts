export interface LevelingResult {
  /** Level of each node, indexed like the node arena. */
  levels: number[];
  /** Relaxation passes that changed at least one level. */
  iterations: number;
  /** False when the pass cap was hit before the levels settled. */
  converged: boolean;
  /** The edge set contains at least one cycle (self edges included). */
  cyclic: boolean;
}

export type IndexEdge = readonly [source: number, target: number];

/**
 * Assigns every node a level by repeated edge relaxation.
 *
 * Nodes without incoming edges start at level 0 and each pass lowers
 * `level[v]` to `level[u] + 1` whenever that is smaller. Changing passes are
 * capped at `maxIterations` (default: node count) so cyclic input always
 * terminates. When a pass settles with nodes still unreached (a cycle with no
 * entry), the first such node in insertion order is seeded at level 0; any
 * node still unreached at the cap ends up at level 0.
 */
export function assignLevels(
  nodeCount: number,
  edges: ReadonlyArray<IndexEdge>,
  maxIterations: number = nodeCount
): LevelingResult {
  if (nodeCount <= 0) return { levels: [], iterations: 0, converged: true, cyclic: false };

  const valid = edges.filter(([u, v]) => inRange(u, nodeCount) && inRange(v, nodeCount));
  const levels: number[] = new Array<number>(nodeCount).fill(Infinity);
  const hasIncoming = new Array<boolean>(nodeCount).fill(false);
  for (const [, v] of valid) hasIncoming[v] = true;
  hasIncoming.forEach((incoming, i) => {
    if (!incoming) levels[i] = 0;
  });

  let iterations = 0;
  let converged = false;
  while (iterations < maxIterations) {
    let changed = false;
    for (const [u, v] of valid) {
      const from = levels[u] ?? Infinity;
      if (from === Infinity) continue;
      if ((levels[v] ?? Infinity) > from + 1) {
        levels[v] = from + 1;
        changed = true;
      }
    }
    if (changed) {
      iterations++;
      continue;
    }
    const unreached = levels.indexOf(Infinity);
    if (unreached === -1) {
      converged = true;
      break;
    }
    levels[unreached] = 0;
  }

  if (!converged && !levels.includes(Infinity) && isSettled(levels, valid)) converged = true;

  return {
    levels: levels.map((l) => (l === Infinity ? 0 : l)),
    iterations,
    converged,
    cyclic: hasCycle(nodeCount, valid),
  };
}

function inRange(i: number, n: number): boolean {
  return Number.isInteger(i) && i >= 0 && i < n;
}

function isSettled(levels: number[], edges: ReadonlyArray<IndexEdge>): boolean {
  return edges.every(([u, v]) => (levels[v] ?? 0) <= (levels[u] ?? 0) + 1);
}

// Kahn's algorithm: anything left with a positive in-degree sits on a cycle.
export function hasCycle(nodeCount: number, edges: ReadonlyArray<IndexEdge>): boolean {
  const indegree = new Array<number>(nodeCount).fill(0);
  const out: number[][] = Array.from({ length: nodeCount }, () => []);
  for (const [u, v] of edges) {
    indegree[v] = (indegree[v] ?? 0) + 1;
    out[u]?.push(v);
  }
  const queue: number[] = [];
  indegree.forEach((d, i) => {
    if (d === 0) queue.push(i);
  });
  let visited = 0;
  while (queue.length > 0) {
    const u = queue.shift();
    if (u === undefined) break;
    visited++;
    for (const v of out[u] ?? []) {
      const d = (indegree[v] ?? 0) - 1;
      indegree[v] = d;
      if (d === 0) queue.push(v);
    }
  }
  return visited < nodeCount;
}
