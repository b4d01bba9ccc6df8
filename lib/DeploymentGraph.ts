import { Stack } from "aws-cdk-lib";
import { CycleError } from "./errors";

export type StageKind = "keypair" | "network" | "iam" | "cluster" | "params";

export const STAGE_KINDS: readonly StageKind[] = ["keypair", "network", "iam", "cluster", "params"];

/** `[dependent, prerequisite]` pairs of the provisioning stages. */
export const STAGE_DEPENDENCIES: readonly (readonly [StageKind, StageKind])[] = [
  ["cluster", "network"],
  ["cluster", "iam"],
  ["params", "cluster"],
];

/**
 * Happens-before relationships between deployment units. Edges point from a
 * prerequisite to its dependent and the graph stays acyclic.
 */
export class DeploymentGraph<T extends string = StageKind> {
  // insertion order of the map is the declaration order used to break ties
  private readonly prerequisites = new Map<T, Set<T>>();

  get nodes(): T[] {
    return [...this.prerequisites.keys()];
  }

  addNode(node: T): this {
    if (!this.prerequisites.has(node)) this.prerequisites.set(node, new Set());
    return this;
  }

  /**
   * Declares that `dependent` must run after `prerequisite`. Adding an existing
   * edge again is a no-op.
   *
   * @throws CycleError when the edge would close a cycle
   */
  addDependency(dependent: T, prerequisite: T): this {
    if (dependent === prerequisite || this.dependsOn(prerequisite, dependent)) {
      throw new CycleError(dependent, prerequisite);
    }

    this.addNode(dependent).addNode(prerequisite);
    this.prerequisites.get(dependent)?.add(prerequisite);

    return this;
  }

  prerequisitesOf(node: T): T[] {
    return [...(this.prerequisites.get(node) ?? [])];
  }

  /** `[dependent, prerequisite]` pairs, grouped by dependent in declaration order. */
  edges(): [T, T][] {
    return this.nodes.flatMap(node => this.prerequisitesOf(node).map((prerequisite): [T, T] => [node, prerequisite]));
  }

  /** True when `node` transitively depends on `target`. */
  dependsOn(node: T, target: T): boolean {
    const pending = this.prerequisitesOf(node);
    const seen = new Set<T>();

    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || seen.has(current)) continue;
      if (current === target) return true;

      seen.add(current);
      pending.push(...this.prerequisitesOf(current));
    }

    return false;
  }

  /**
   * Kahn's algorithm; among the nodes whose prerequisites are all placed, the
   * earliest declared one comes first.
   */
  topologicalOrder(): T[] {
    const remaining = new Map([...this.prerequisites].map(([node, prerequisites]) => [node, new Set(prerequisites)]));
    const order: T[] = [];

    while (remaining.size > 0) {
      const ready = [...remaining].find(([, prerequisites]) => prerequisites.size === 0)?.[0];

      // addDependency rejects cycles, so some node is always ready
      if (ready === undefined) throw new Error("Deployment graph contains a cycle");

      order.push(ready);
      remaining.delete(ready);
      remaining.forEach(prerequisites => prerequisites.delete(ready));
    }

    return order;
  }
}

export function createStageGraph(): DeploymentGraph<StageKind> {
  const graph = new DeploymentGraph<StageKind>();

  STAGE_KINDS.forEach(kind => graph.addNode(kind));
  STAGE_DEPENDENCIES.forEach(([dependent, prerequisite]) => graph.addDependency(dependent, prerequisite));

  return graph;
}

/**
 * Mirrors every edge of `graph` whose ends both have a construct onto the
 * constructs themselves, leaving scheduling to the CDK.
 */
export function applyStackDependencies<T extends string>(graph: DeploymentGraph<T>, stacks: Partial<Record<T, Stack>>): void {
  for (const [dependent, prerequisite] of graph.edges()) {
    const dependentStack = stacks[dependent];
    const prerequisiteStack = stacks[prerequisite];

    if (dependentStack && prerequisiteStack) {
      dependentStack.addDependency(prerequisiteStack, `${dependent} requires ${prerequisite}`);
    }
  }
}
