import { CyclicDependencyError } from './errors';

/**
 * Minimal node shape the graph functions need
 */
export interface DependencyNode {
  name: string;
  dependsOn: readonly string[];
}

/**
 * Edges dependency -> dependents, restricted to names present in `nodes`
 */
export function buildDependentsMap(
  nodes: readonly DependencyNode[],
): Map<string, Set<string>> {
  const known = new Set(nodes.map((node) => node.name));
  const adjacency = new Map<string, Set<string>>();

  for (const node of nodes) {
    adjacency.set(node.name, new Set());
  }

  for (const node of nodes) {
    for (const dependency of node.dependsOn) {
      if (known.has(dependency)) {
        adjacency.get(dependency)?.add(node.name);
      }
    }
  }

  return adjacency;
}

/**
 * Finds one cycle by DFS over the adjacency map, or returns an empty array.
 * The cycle is reported in dependency order, starting at the first node of
 * the cycle that the DFS reached.
 */
export function findDependencyCycle(
  adjacency: Map<string, Set<string>>,
): string[] {
  const visited = new Set<string>();
  const inStack = new Set<string>();
  const path: string[] = [];

  const visit = (node: string): string[] | null => {
    visited.add(node);
    inStack.add(node);
    path.push(node);

    for (const neighbor of adjacency.get(node) ?? []) {
      if (!visited.has(neighbor)) {
        const result = visit(neighbor);

        if (result) {
          return result;
        }
      } else if (inStack.has(neighbor)) {
        return path.slice(path.indexOf(neighbor));
      }
    }

    inStack.delete(node);
    path.pop();
    return null;
  };

  for (const node of adjacency.keys()) {
    if (visited.has(node)) {
      continue;
    }

    const result = visit(node);

    if (result) {
      return result;
    }
  }

  return [];
}

/**
 * Kahn's algorithm. Among the nodes whose dependencies are all placed, the
 * one inserted first goes next, so independent services keep their
 * declaration order.
 *
 * @throws CyclicDependencyError when not every node can be placed
 */
export function topologicalOrder(nodes: readonly DependencyNode[]): string[] {
  const insertionIndex = new Map(
    nodes.map((node, index) => [node.name, index]),
  );
  const adjacency = buildDependentsMap(nodes);
  const inDegree = new Map<string, number>();

  for (const node of nodes) {
    inDegree.set(node.name, 0);
  }

  for (const dependents of adjacency.values()) {
    for (const dependent of dependents) {
      inDegree.set(dependent, (inDegree.get(dependent) ?? 0) + 1);
    }
  }

  const available: string[] = nodes
    .filter((node) => inDegree.get(node.name) === 0)
    .map((node) => node.name);

  const order: string[] = [];

  while (available.length > 0) {
    available.sort(
      (a, b) => (insertionIndex.get(a) ?? 0) - (insertionIndex.get(b) ?? 0),
    );

    const next = available.shift();

    if (next === undefined) {
      break;
    }

    order.push(next);

    for (const dependent of adjacency.get(next) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);

      if (remaining === 0) {
        available.push(dependent);
      }
    }
  }

  if (order.length !== nodes.length) {
    const cycle = findDependencyCycle(adjacency);
    const placed = new Set(order);

    throw new CyclicDependencyError({
      cycle:
        cycle.length > 0
          ? cycle
          : nodes.map((node) => node.name).filter((name) => !placed.has(name)),
    });
  }

  return order;
}

/**
 * Every name `name` depends on, directly or transitively
 */
export function transitiveDependencies(
  nodes: readonly DependencyNode[],
  name: string,
): Set<string> {
  const byName = new Map(nodes.map((node) => [node.name, node]));
  const result = new Set<string>();
  const stack = [...(byName.get(name)?.dependsOn ?? [])];

  while (stack.length > 0) {
    const current = stack.pop();

    if (current === undefined || result.has(current)) {
      continue;
    }

    result.add(current);
    stack.push(...(byName.get(current)?.dependsOn ?? []));
  }

  return result;
}
