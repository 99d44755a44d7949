/**
 * ExecutionDag - dependency graph over artifact identifiers
 *
 * An edge "A depends on B" exists for every B in A's `inputs`. Node order is
 * the runbook's declaration order and is used to break ties wherever an
 * ordering is produced.
 */

import type { ArtifactStatus } from "../../shared/types/execution.js";
import { CycleDetectedError, MissingArtifactError } from "../utils/errorTypes.js";

export interface DagNodeSource {
  readonly inputs?: readonly string[];
}

export class ExecutionDag {
  private readonly order: string[];
  private readonly index: Map<string, number>;
  private readonly dependencies: Map<string, string[]>;
  private readonly dependents: Map<string, string[]>;

  constructor(artifacts: Readonly<Record<string, DagNodeSource>>) {
    this.order = Object.keys(artifacts);
    this.index = new Map(this.order.map((id, i) => [id, i]));
    this.dependencies = new Map();
    this.dependents = new Map(this.order.map((id) => [id, []]));

    for (const id of this.order) {
      const inputs = artifacts[id]?.inputs ?? [];
      const deps: string[] = [];
      for (const dep of inputs) {
        const reverse = this.dependents.get(dep);
        if (!reverse) {
          throw new MissingArtifactError(id, dep);
        }
        if (!deps.includes(dep)) {
          deps.push(dep);
          reverse.push(id);
        }
      }
      this.dependencies.set(id, deps);
    }
  }

  get nodes(): readonly string[] {
    return this.order;
  }

  get size(): number {
    return this.order.length;
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  getDependencies(id: string): readonly string[] {
    return this.dependencies.get(id) ?? [];
  }

  getDependents(id: string): readonly string[] {
    return this.dependents.get(id) ?? [];
  }

  /**
   * Every node reachable through dependents, in breadth-first order.
   */
  getTransitiveDependents(id: string): string[] {
    const result: string[] = [];
    const seen = new Set<string>([id]);
    const queue = [...this.getDependents(id)];

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      result.push(next);
      queue.push(...this.getDependents(next));
    }

    return result;
  }

  /** Nodes with no dependencies. */
  getRoots(): string[] {
    return this.order.filter((id) => this.getDependencies(id).length === 0);
  }

  /** Nodes nothing depends on. */
  getLeaves(): string[] {
    return this.order.filter((id) => this.getDependents(id).length === 0);
  }

  /**
   * Kahn's algorithm; among nodes that become ready together the earliest
   * declared comes first. Throws CycleDetectedError when the graph has a cycle.
   */
  topologicalOrder(): string[] {
    const inDegree = new Map(this.order.map((id) => [id, this.getDependencies(id).length]));
    const ready = this.order.filter((id) => inDegree.get(id) === 0);
    const result: string[] = [];

    while (ready.length > 0) {
      const id = ready.shift();
      if (id === undefined) break;
      result.push(id);

      for (const dependent of this.getDependents(id)) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) {
          this.insertByDeclaration(ready, dependent);
        }
      }
    }

    if (result.length !== this.order.length) {
      this.validate();
    }

    return result;
  }

  /**
   * Not-started nodes whose dependencies are all completed.
   */
  getReadySet(statusOf: (id: string) => ArtifactStatus): string[] {
    return this.order.filter(
      (id) =>
        statusOf(id) === "not_started" &&
        this.getDependencies(id).every((dep) => statusOf(dep) === "completed")
    );
  }

  /**
   * Three-colour DFS along dependency edges, starting from each node in
   * declaration order. Returns the first cycle found in discovery order,
   * closed by the repeated node, or null.
   */
  detectCycle(): string[] | null {
    const visited = new Set<string>();
    const recursionStack = new Set<string>();
    const path: string[] = [];

    const visit = (nodeId: string): string[] | null => {
      visited.add(nodeId);
      recursionStack.add(nodeId);
      path.push(nodeId);

      for (const neighbor of this.getDependencies(nodeId)) {
        if (!visited.has(neighbor)) {
          const cycle = visit(neighbor);
          if (cycle) return cycle;
        } else if (recursionStack.has(neighbor)) {
          const cycleStart = path.indexOf(neighbor);
          return [...path.slice(cycleStart), neighbor];
        }
      }

      path.pop();
      recursionStack.delete(nodeId);
      return null;
    };

    for (const nodeId of this.order) {
      if (!visited.has(nodeId)) {
        const cycle = visit(nodeId);
        if (cycle) return cycle;
      }
    }

    return null;
  }

  validate(): void {
    const cycle = this.detectCycle();
    if (cycle) {
      throw new CycleDetectedError(cycle);
    }
  }

  /**
   * Number of nodes on the longest dependency chain (0 for an empty graph).
   */
  getDepth(): number {
    const depth = new Map<string, number>();
    let max = 0;
    for (const id of this.topologicalOrder()) {
      const level = Math.max(0, ...this.getDependencies(id).map((dep) => depth.get(dep) ?? 0)) + 1;
      depth.set(id, level);
      max = Math.max(max, level);
    }
    return max;
  }

  private insertByDeclaration(queue: string[], id: string): void {
    const position = this.index.get(id) ?? 0;
    let i = 0;
    while (i < queue.length && (this.index.get(queue[i] ?? "") ?? 0) < position) {
      i++;
    }
    queue.splice(i, 0, id);
  }
}
