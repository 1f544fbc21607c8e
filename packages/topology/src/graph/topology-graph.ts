/**
 * Topology Graph
 *
 * The fixed dependency structure among the resource kinds of a topology.
 * Create must produce every dependency and reference of a kind before the
 * kind itself; teardown must destroy every hard dependent of a kind before
 * the kind itself. References are route targets: a route whose target is
 * gone becomes a blackhole and does not block deletion of its table.
 */

import { TopologyError, TopologyErrorType } from "../errors";

export const RESOURCE_KINDS = [
  "vpc",
  "subnet",
  "internet-gateway",
  "elastic-ip",
  "nat-gateway",
  "route-table",
  "security-group",
  "instance",
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export interface KindEdges {
  /** Must exist before create; blocks deletion of the dependency */
  dependsOn: readonly ResourceKind[];
  /** Must exist before create; does not block teardown */
  references: readonly ResourceKind[];
}

export const TOPOLOGY_GRAPH: Readonly<Record<ResourceKind, KindEdges>> = {
  vpc: { dependsOn: [], references: [] },
  subnet: { dependsOn: ["vpc"], references: [] },
  "internet-gateway": { dependsOn: ["vpc"], references: [] },
  "elastic-ip": { dependsOn: [], references: [] },
  // A public NAT gateway needs an attached internet gateway, and the
  // internet gateway cannot be detached while the gateway maps an address.
  "nat-gateway": { dependsOn: ["subnet", "elastic-ip", "internet-gateway"], references: [] },
  "route-table": { dependsOn: ["vpc", "subnet"], references: ["internet-gateway", "nat-gateway"] },
  "security-group": { dependsOn: ["vpc"], references: [] },
  instance: { dependsOn: ["subnet", "security-group"], references: [] },
};

/** A step of an orchestrator, reduced to the kinds it touches */
export interface KindStep {
  name: string;
  kinds: readonly ResourceKind[];
}

/**
 * Deterministic topological sort: ties are broken by declaration order in
 * `RESOURCE_KINDS`.
 */
export function createOrder(graph: Readonly<Record<ResourceKind, KindEdges>> = TOPOLOGY_GRAPH): ResourceKind[] {
  const order: ResourceKind[] = [];
  const placed = new Set<ResourceKind>();

  while (order.length < RESOURCE_KINDS.length) {
    const next = RESOURCE_KINDS.find(
      (kind) =>
        !placed.has(kind) &&
        [...graph[kind].dependsOn, ...graph[kind].references].every((dep) => placed.has(dep)),
    );
    if (!next) {
      const remaining = RESOURCE_KINDS.filter((kind) => !placed.has(kind));
      throw new TopologyError(
        `Dependency cycle among: ${remaining.join(", ")}`,
        TopologyErrorType.INTERNAL,
      );
    }
    order.push(next);
    placed.add(next);
  }

  return order;
}

export function teardownOrder(graph: Readonly<Record<ResourceKind, KindEdges>> = TOPOLOGY_GRAPH): ResourceKind[] {
  return createOrder(graph).reverse();
}

/** Kinds that hard-depend on `kind` */
export function dependentsOf(
  kind: ResourceKind,
  graph: Readonly<Record<ResourceKind, KindEdges>> = TOPOLOGY_GRAPH,
): ResourceKind[] {
  return RESOURCE_KINDS.filter((other) => graph[other].dependsOn.includes(kind));
}

/**
 * Reject a create sequence that produces a kind before one of its
 * dependencies or references. Within a step, kinds are produced in the
 * order listed.
 */
export function assertCreateSequence(
  steps: readonly KindStep[],
  graph: Readonly<Record<ResourceKind, KindEdges>> = TOPOLOGY_GRAPH,
): void {
  const produced = new Set<ResourceKind>();
  for (const step of steps) {
    for (const kind of step.kinds) {
      const missing = [...graph[kind].dependsOn, ...graph[kind].references].filter(
        (dep) => !produced.has(dep),
      );
      if (missing.length > 0) {
        throw new TopologyError(
          `Create step "${step.name}" produces ${kind} before ${missing.join(", ")}`,
          TopologyErrorType.INTERNAL,
        );
      }
      produced.add(kind);
    }
  }
}

/**
 * Reject a teardown sequence that destroys a kind while one of its hard
 * dependents is still scheduled for a later step.
 */
export function assertTeardownSequence(
  steps: readonly KindStep[],
  graph: Readonly<Record<ResourceKind, KindEdges>> = TOPOLOGY_GRAPH,
): void {
  const destroyed = new Set<ResourceKind>();
  for (const step of steps) {
    for (const kind of step.kinds) {
      const pending = dependentsOf(kind, graph).filter(
        (dependent) => !destroyed.has(dependent) && !step.kinds.includes(dependent),
      );
      if (pending.length > 0) {
        throw new TopologyError(
          `Teardown step "${step.name}" destroys ${kind} before ${pending.join(", ")}`,
          TopologyErrorType.INTERNAL,
        );
      }
    }
    for (const kind of step.kinds) destroyed.add(kind);
  }
}
