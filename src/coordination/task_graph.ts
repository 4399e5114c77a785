/**
 * @fileoverview Dependency graph checks for workflows
 *
 * Only edges between members of the given node set are considered; a
 * dependency on a task outside the set does not take part in cycle detection
 * or ordering.
 */

export interface DependencyNode {
  id: string;
  dependencies: readonly string[];
}

/**
 * Returns one dependency cycle as a closed path (first id repeated at the
 * end), or null when the graph is acyclic.
 */
export function findCycle(nodes: readonly DependencyNode[]): string[] | null {
  const byId = new Map(nodes.map((node) => [node.id, node]));
  const state = new Map<string, 'visiting' | 'done'>();
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    const mark = state.get(id);
    if (mark === 'done') return null;
    if (mark === 'visiting') {
      return [...path.slice(path.indexOf(id)), id];
    }
    state.set(id, 'visiting');
    path.push(id);
    for (const dependency of byId.get(id)?.dependencies ?? []) {
      if (!byId.has(dependency)) continue;
      const cycle = visit(dependency);
      if (cycle) return cycle;
    }
    path.pop();
    state.set(id, 'done');
    return null;
  };

  for (const node of nodes) {
    const cycle = visit(node.id);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Kahn's algorithm; among nodes that become available together the input
 * order wins. Callers check for cycles first: nodes on a cycle are omitted.
 */
export function topologicalOrder(nodes: readonly DependencyNode[]): string[] {
  const members = new Set(nodes.map((node) => node.id));
  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const node of nodes) {
    const internal = node.dependencies.filter((dependency) => members.has(dependency));
    remaining.set(node.id, new Set(internal).size);
    for (const dependency of new Set(internal)) {
      dependents.set(dependency, [...(dependents.get(dependency) ?? []), node.id]);
    }
  }

  const position = new Map(nodes.map((node, index) => [node.id, index]));
  const available = nodes.filter((node) => remaining.get(node.id) === 0).map((node) => node.id);
  const order: string[] = [];
  while (available.length > 0) {
    available.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
    const next = available.shift();
    if (next === undefined) break;
    order.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const left = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, left);
      if (left === 0) available.push(dependent);
    }
  }
  return order;
}
