/**
 * Marker dependency graph
 *
 * Orders markers so every marker comes after the markers its activation rule
 * (or composed_of list) refers to, using topological sort with cycle detection.
 */

interface GraphNode {
  /** Markers this one refers to */
  dependencies: string[];
  /** Markers referring to this one */
  dependents: string[];
}

export interface GraphInput {
  id: string;
  dependencies: string[];
}

export interface ResolutionResult {
  /** Marker ids, dependencies first */
  order: string[];
  /** Each cycle starts at its smallest id and lists the path back to it */
  circular: string[][];
}

export class DependencyGraph {
  private nodes: Map<string, GraphNode> = new Map();

  /**
   * Build the graph; references to unknown ids are ignored here, the loader
   * reports them separately.
   */
  build(inputs: GraphInput[]): void {
    this.nodes.clear();

    for (const input of inputs) {
      this.nodes.set(input.id, { dependencies: [], dependents: [] });
    }

    for (const input of inputs) {
      const node = this.nodes.get(input.id);
      if (!node) continue;

      for (const depId of new Set(input.dependencies)) {
        const depNode = this.nodes.get(depId);
        if (!depNode) continue;
        node.dependencies.push(depId);
        depNode.dependents.push(input.id);
      }
    }
  }

  /**
   * Resolve evaluation order using Kahn's algorithm
   */
  resolve(): ResolutionResult {
    const order: string[] = [];
    const inDegree = new Map<string, number>();

    for (const [id, node] of this.nodes) {
      inDegree.set(id, node.dependencies.length);
    }

    const queue: string[] = [];
    for (const [id, degree] of inDegree) {
      if (degree === 0) queue.push(id);
    }

    let head = 0;
    while (head < queue.length) {
      const markerId = queue[head++];
      const node = this.nodes.get(markerId);
      if (!node) continue;

      order.push(markerId);

      for (const dependentId of node.dependents) {
        const degree = (inDegree.get(dependentId) ?? 0) - 1;
        inDegree.set(dependentId, degree);
        if (degree === 0) queue.push(dependentId);
      }
    }

    const unresolved: string[] = [];
    for (const [id, degree] of inDegree) {
      if (degree > 0) unresolved.push(id);
    }

    const circular = unresolved.length > 0 ? this.detectCycles(unresolved) : [];

    return { order, circular };
  }

  /**
   * Find cycles among the nodes Kahn's algorithm could not order.
   * Iterative depth-first search, so long reference chains cannot exhaust the stack.
   */
  private detectCycles(nodeIds: string[]): string[][] {
    const candidates = new Set(nodeIds);
    const visited = new Set<string>();
    const cycles: string[][] = [];
    const seen = new Set<string>();

    for (const root of nodeIds) {
      if (visited.has(root)) continue;

      const path: string[] = [];
      const onPath = new Set<string>();
      const stack: Array<{ id: string; next: number }> = [{ id: root, next: 0 }];
      visited.add(root);
      path.push(root);
      onPath.add(root);

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const deps = (this.nodes.get(frame.id)?.dependencies ?? []).filter((d) =>
          candidates.has(d)
        );

        if (frame.next >= deps.length) {
          stack.pop();
          path.pop();
          onPath.delete(frame.id);
          continue;
        }

        const depId = deps[frame.next++];
        if (onPath.has(depId)) {
          const cycle = this.normalizeCycle(path.slice(path.indexOf(depId)));
          const key = cycle.join(',');
          if (!seen.has(key)) {
            seen.add(key);
            cycles.push(cycle);
          }
        } else if (!visited.has(depId)) {
          visited.add(depId);
          path.push(depId);
          onPath.add(depId);
          stack.push({ id: depId, next: 0 });
        }
      }
    }

    return cycles;
  }

  /**
   * Rotate a cycle to start at its smallest element
   */
  private normalizeCycle(cycle: string[]): string[] {
    let minIndex = 0;
    for (let i = 1; i < cycle.length; i++) {
      if (cycle[i] < cycle[minIndex]) minIndex = i;
    }
    return [...cycle.slice(minIndex), ...cycle.slice(0, minIndex)];
  }
}
