export interface DependencyNode {
  id: string;
  /** Position in declaration order; ties in the sort are broken by it */
  index: number;
  dependsOn: string[];
  dependents: string[];
}

export type DependencyGraph = Map<string, DependencyNode>;

export interface TopologicalSortResult {
  sortedIds: string[];
  hasCycle: boolean;
  cycleNodes?: string[];
}

/**
 * Build a dependency graph. Edges to ids outside the node set are dropped.
 */
export const buildGraph = ({
  nodes,
}: {
  nodes: Array<{ id: string; dependsOn: string[] }>;
}): DependencyGraph => {
  const graph: DependencyGraph = new Map();

  nodes.forEach((node, index) => {
    graph.set(node.id, {
      id: node.id,
      index,
      dependsOn: [],
      dependents: [],
    });
  });

  nodes.forEach((node) => {
    const graphNode = graph.get(node.id);
    if (!graphNode) return;

    const validDependencies = [...new Set(node.dependsOn)].filter((depId) => graph.has(depId));
    graphNode.dependsOn = validDependencies;

    validDependencies.forEach((depId) => {
      graph.get(depId)?.dependents.push(node.id);
    });
  });

  return graph;
};

/**
 * Detect cycles using DFS; returns the first cycle found as a closed path (a -> b -> a)
 */
export const detectCycle = ({
  graph,
}: {
  graph: DependencyGraph;
}): { hasCycle: boolean; cycleNodes: string[] } => {
  const visited = new Set<string>();
  const onPath = new Set<string>();
  const cycleNodes: string[] = [];

  const dfs = (nodeId: string, path: string[]): boolean => {
    visited.add(nodeId);
    onPath.add(nodeId);

    const node = graph.get(nodeId);
    for (const depId of node?.dependsOn ?? []) {
      if (onPath.has(depId)) {
        const cycleStart = path.indexOf(depId);
        cycleNodes.push(...path.slice(cycleStart), depId);
        return true;
      }
      if (!visited.has(depId) && dfs(depId, [...path, depId])) {
        return true;
      }
    }

    onPath.delete(nodeId);
    return false;
  };

  for (const nodeId of graph.keys()) {
    if (!visited.has(nodeId) && dfs(nodeId, [nodeId])) {
      return { hasCycle: true, cycleNodes };
    }
  }

  return { hasCycle: false, cycleNodes: [] };
};

/**
 * Topological sort using Kahn's algorithm. Among nodes that are ready at the
 * same time, the one declared first comes first.
 */
export const topologicalSort = ({
  graph,
}: {
  graph: DependencyGraph;
}): TopologicalSortResult => {
  const cycleResult = detectCycle({ graph });
  if (cycleResult.hasCycle) {
    return {
      sortedIds: [],
      hasCycle: true,
      cycleNodes: cycleResult.cycleNodes,
    };
  }

  const inDegree = new Map<string, number>();
  graph.forEach((node, nodeId) => {
    inDegree.set(nodeId, node.dependsOn.length);
  });

  const ready: DependencyNode[] = [];
  graph.forEach((node) => {
    if (node.dependsOn.length === 0) {
      ready.push(node);
    }
  });

  const sortedIds: string[] = [];
  while (ready.length > 0) {
    ready.sort((a, b) => a.index - b.index);
    const node = ready.shift();
    if (!node) break;

    sortedIds.push(node.id);

    node.dependents.forEach((depId) => {
      const newDegree = (inDegree.get(depId) ?? 0) - 1;
      inDegree.set(depId, newDegree);

      const dependent = graph.get(depId);
      if (newDegree === 0 && dependent) {
        ready.push(dependent);
      }
    });
  }

  return {
    sortedIds,
    hasCycle: false,
  };
};

/**
 * All nodes that depend on the given node, directly or transitively
 */
export const findDependents = ({
  graph,
  nodeId,
}: {
  graph: DependencyGraph;
  nodeId: string;
}): string[] => {
  const found = new Set<string>();
  const pending = [...(graph.get(nodeId)?.dependents ?? [])];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined || found.has(current)) continue;
    found.add(current);
    pending.push(...(graph.get(current)?.dependents ?? []));
  }

  return [...found];
};

/**
 * All nodes the given node depends on, directly or transitively
 */
export const findDependencies = ({
  graph,
  nodeId,
}: {
  graph: DependencyGraph;
  nodeId: string;
}): string[] => {
  const found = new Set<string>();
  const pending = [...(graph.get(nodeId)?.dependsOn ?? [])];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined || found.has(current)) continue;
    found.add(current);
    pending.push(...(graph.get(current)?.dependsOn ?? []));
  }

  return [...found];
};
