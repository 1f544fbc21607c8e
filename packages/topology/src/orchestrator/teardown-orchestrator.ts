/**
 * Teardown Orchestrator
 *
 * Destroys a topology in reverse dependency order. Each step runs to
 * completion before the next starts, because later steps rely on what
 * earlier ones removed (no running instances, no NAT gateway holding the
 * address, no routes through the gateway). Inside a step every action is
 * best-effort: a failure is recorded in the report and the orchestrator
 * moves on to the next resource.
 */

import { DEFAULT_ROUTE_CIDR, DEFAULT_SECURITY_GROUP_NAME, RESOURCE_ROLES, resourceName, vpcName } from "../constants";
import {
  type TeardownOptionsInput,
  TeardownOptionsSchema,
  parseOptions,
} from "../config/topology-config";
import { errorMessage, isNotFoundError } from "../errors";
import { type KindStep, assertTeardownSequence } from "../graph/topology-graph";
import type { INetworkCloudClient } from "../client/network-cloud-client.interface";
import type { ResourceWaiter } from "../waiter/resource-waiter";
import type { TopologyResolver } from "../resolver/topology-resolver";
import type {
  ActionOutcome,
  ActionStatus,
  SecurityGroupSummary,
  TeardownReport,
  TeardownStepReport,
  TopologyHandle,
  TopologyLogCallback,
} from "../types";

export type TeardownStepName =
  | "instances"
  | "nat-gateways"
  | "addresses"
  | "internet-gateways"
  | "route-tables"
  | "subnets"
  | "security-groups"
  | "vpc";

export interface TeardownStepDescriptor extends KindStep {
  name: TeardownStepName;
  description: string;
}

export const TEARDOWN_STEPS: readonly TeardownStepDescriptor[] = [
  { name: "instances", kinds: ["instance"], description: "Terminating instances" },
  { name: "nat-gateways", kinds: ["nat-gateway"], description: "Deleting NAT gateways" },
  { name: "addresses", kinds: ["elastic-ip"], description: "Releasing Elastic IPs" },
  { name: "internet-gateways", kinds: ["internet-gateway"], description: "Detaching and deleting internet gateways" },
  { name: "route-tables", kinds: ["route-table"], description: "Clearing route tables" },
  { name: "subnets", kinds: ["subnet"], description: "Deleting subnets" },
  { name: "security-groups", kinds: ["security-group"], description: "Deleting security groups" },
  { name: "vpc", kinds: ["vpc"], description: "Deleting VPC" },
];

export interface TeardownOrchestratorDeps {
  client: INetworkCloudClient;
  waiter: ResourceWaiter;
  resolver: TopologyResolver;
  log: TopologyLogCallback;
}

interface TeardownContext {
  handle: TopologyHandle;
  actions: ActionOutcome[];
  /** Elastic IPs held by the NAT gateways deleted in step 2 */
  natAllocationIds: string[];
}

type StepRunner = (ctx: TeardownContext) => Promise<void>;

/**
 * Order security groups so that a group referenced by another group's
 * rules is deleted after the group referencing it. Cycles are left in
 * their listed order.
 */
export function orderSecurityGroupsForDeletion(groups: SecurityGroupSummary[]): SecurityGroupSummary[] {
  const ordered: SecurityGroupSummary[] = [];
  let remaining = [...groups];

  while (remaining.length > 0) {
    const unreferenced = remaining.filter(
      (group) => !remaining.some((other) => other.referencedGroupIds.includes(group.groupId)),
    );
    const batch = unreferenced.length > 0 ? unreferenced : remaining;
    ordered.push(...batch);
    remaining = remaining.filter((group) => !batch.includes(group));
  }

  return ordered;
}

export class TeardownOrchestrator {
  private readonly runners: Record<TeardownStepName, StepRunner> = {
    instances: (ctx) => this.terminateInstances(ctx),
    "nat-gateways": (ctx) => this.deleteNatGateways(ctx),
    addresses: (ctx) => this.releaseAddresses(ctx),
    "internet-gateways": (ctx) => this.deleteInternetGateways(ctx),
    "route-tables": (ctx) => this.clearRouteTables(ctx),
    subnets: (ctx) => this.deleteSubnets(ctx),
    "security-groups": (ctx) => this.deleteSecurityGroups(ctx),
    vpc: (ctx) => this.deleteVpc(ctx),
  };

  constructor(
    private readonly deps: TeardownOrchestratorDeps,
    private readonly steps: readonly TeardownStepDescriptor[] = TEARDOWN_STEPS,
  ) {
    assertTeardownSequence(steps);
  }

  /**
   * Resolve the prefix and destroy what it labels. A prefix with no VPC is
   * a successful no-op, so running teardown twice is safe.
   */
  async teardown(input: TeardownOptionsInput): Promise<TeardownReport> {
    const options = parseOptions(TeardownOptionsSchema, input);
    const handle = await this.deps.resolver.resolve(options.prefix, { vpcId: options.vpcId });

    if (!handle) {
      this.deps.log(
        `No VPC found with tag Name=${vpcName(options.prefix)} in ${options.region}. Nothing to do.`,
      );
      return {
        region: options.region,
        prefix: options.prefix,
        status: "nothing-to-do",
        vpcId: null,
        steps: [],
        failures: 0,
      };
    }

    return this.destroy(handle);
  }

  /** Destroy an already-resolved topology. Never throws for a single resource. */
  async destroy(handle: TopologyHandle): Promise<TeardownReport> {
    this.deps.log(`VPC: ${handle.vpcId}`);
    const steps: TeardownStepReport[] = [];
    const natAllocationIds: string[] = [];

    for (const [index, step] of this.steps.entries()) {
      this.deps.log(`[${index + 1}/${this.steps.length}] ${step.description}...`);
      const ctx: TeardownContext = { handle, actions: [], natAllocationIds };
      try {
        await this.runners[step.name](ctx);
      } catch (error: unknown) {
        this.record(ctx, step.name, handle.vpcId, "failed", errorMessage(error));
      }
      steps.push({ step: step.name, actions: ctx.actions });
    }

    const failures = steps.reduce(
      (count, step) => count + step.actions.filter((a) => a.status === "failed").length,
      0,
    );
    this.deps.log(
      failures === 0 ? "Teardown complete." : `Teardown complete with ${failures} failure(s).`,
      failures === 0 ? "stdout" : "stderr",
    );

    return {
      region: handle.region,
      prefix: handle.prefix,
      status: "complete",
      vpcId: handle.vpcId,
      steps,
      failures,
    };
  }

  // ── Steps ────────────────────────────────────────────────────────────

  private async terminateInstances(ctx: TeardownContext): Promise<void> {
    const { client, waiter } = this.deps;
    const instances = await this.enumerate(ctx, "instances", () =>
      client.listInstances(ctx.handle.vpcId),
    );
    const instanceIds = instances
      .filter((instance) => instance.state !== "terminated")
      .map((instance) => instance.instanceId);
    if (instanceIds.length === 0) return;

    const label = instanceIds.join(", ");
    const terminated = await this.attempt(ctx, "terminate instances", label, () =>
      client.terminateInstances(instanceIds),
    );
    if (terminated === "failed") return;

    await this.attempt(ctx, "wait for instance termination", label, () =>
      waiter.instancesTerminated(instanceIds),
    );
  }

  private async deleteNatGateways(ctx: TeardownContext): Promise<void> {
    const { client, waiter } = this.deps;
    const gateways = (
      await this.enumerate(ctx, "NAT gateways", () => client.listNatGateways(ctx.handle.vpcId))
    ).filter((gateway) => gateway.state !== "deleted");

    const ids: string[] = [];
    for (const gateway of gateways) {
      ctx.natAllocationIds.push(...gateway.allocationIds);
      const status = await this.attempt(ctx, "delete NAT gateway", gateway.natGatewayId, () =>
        client.deleteNatGateway(gateway.natGatewayId),
      );
      if (status === "succeeded") ids.push(gateway.natGatewayId);
    }

    if (ids.length === 0) return;
    await this.attempt(ctx, "wait for NAT gateway deletion", ids.join(", "), () =>
      waiter.natGatewaysDeleted(ids),
    );
  }

  private async releaseAddresses(ctx: TeardownContext): Promise<void> {
    const { client } = this.deps;
    const released = new Set<string>();
    const release = async (allocationId: string): Promise<void> => {
      if (released.has(allocationId)) return;
      released.add(allocationId);
      await this.attempt(ctx, "release address", allocationId, () =>
        client.releaseAddress(allocationId),
      );
    };

    const interfaces = await this.enumerate(ctx, "network interfaces", () =>
      client.listNetworkInterfaces({ vpcId: ctx.handle.vpcId }),
    );
    const ownAssociationIds = new Set<string>();
    for (const eni of interfaces) {
      if (eni.association?.associationId) ownAssociationIds.add(eni.association.associationId);
    }
    for (const eni of interfaces) {
      const association = eni.association;
      if (!association?.publicIp) continue;
      if (association.associationId) {
        const associationId = association.associationId;
        await this.attempt(ctx, `disassociate address from ${eni.networkInterfaceId}`, associationId, () =>
          client.disassociateAddress(associationId),
        );
      }
      if (association.allocationId) await release(association.allocationId);
    }

    for (const allocationId of ctx.natAllocationIds) await release(allocationId);

    // Catches an address allocated by a create that failed before its NAT gateway existed
    const labelled = await this.enumerate(ctx, "labelled addresses", () =>
      client.findAddressesByName(resourceName(ctx.handle.prefix, RESOURCE_ROLES.ELASTIC_IP)),
    );
    // The label is shared by every VPC with this prefix; an address mapped
    // outside this VPC belongs to another topology
    for (const address of labelled) {
      if (released.has(address.allocationId)) continue;
      if (address.associationId) {
        const associationId = address.associationId;
        if (!ownAssociationIds.has(associationId)) {
          this.deps.log(
            `  Keeping ${address.allocationId}: associated outside ${ctx.handle.vpcId}`,
            "stderr",
          );
          continue;
        }
        await this.attempt(ctx, "disassociate address", associationId, () =>
          client.disassociateAddress(associationId),
        );
      }
      await release(address.allocationId);
    }
  }

  private async deleteInternetGateways(ctx: TeardownContext): Promise<void> {
    const { client } = this.deps;
    const gateways = await this.enumerate(ctx, "internet gateways", () =>
      client.listInternetGateways(ctx.handle.vpcId),
    );

    for (const gateway of gateways) {
      const igwId = gateway.internetGatewayId;
      for (const vpcId of gateway.attachedVpcIds) {
        await this.attempt(ctx, `detach internet gateway from ${vpcId}`, igwId, () =>
          client.detachInternetGateway(igwId, vpcId),
        );
      }
      await this.attempt(ctx, "delete internet gateway", igwId, () =>
        client.deleteInternetGateway(igwId),
      );
    }
  }

  private async clearRouteTables(ctx: TeardownContext): Promise<void> {
    const { client } = this.deps;
    const tables = await this.enumerate(ctx, "route tables", () =>
      client.listRouteTables(ctx.handle.vpcId),
    );

    for (const table of tables) {
      const rtbId = table.routeTableId;
      for (const association of table.associations) {
        if (association.main) continue;
        await this.attempt(ctx, `disassociate route table ${rtbId}`, association.associationId, () =>
          client.disassociateRouteTable(association.associationId),
        );
      }

      if (table.routes.some((route) => route.destinationCidrBlock === DEFAULT_ROUTE_CIDR)) {
        await this.attempt(ctx, "delete default route", rtbId, () =>
          client.deleteRoute(rtbId, DEFAULT_ROUTE_CIDR),
        );
      }

      // The main table goes away with the VPC and cannot be deleted on its own
      if (!table.main) {
        await this.attempt(ctx, "delete route table", rtbId, () => client.deleteRouteTable(rtbId));
      }
    }
  }

  private async deleteSubnets(ctx: TeardownContext): Promise<void> {
    const { client } = this.deps;
    const subnets = await this.enumerate(ctx, "subnets", () =>
      client.listSubnets(ctx.handle.vpcId),
    );

    for (const subnet of subnets) {
      const subnetId = subnet.subnetId;
      const interfaces = await this.enumerate(ctx, `network interfaces in ${subnetId}`, () =>
        client.listNetworkInterfaces({ subnetId }),
      );
      for (const eni of interfaces) {
        const eniId = eni.networkInterfaceId;
        const attachment = eni.attachment;
        if (attachment && attachment.status === "attached") {
          await this.attempt(ctx, "detach network interface", eniId, () =>
            client.detachNetworkInterface(attachment.attachmentId),
          );
        }
        await this.attempt(ctx, "delete network interface", eniId, () =>
          client.deleteNetworkInterface(eniId),
        );
      }
      await this.attempt(ctx, "delete subnet", subnetId, () => client.deleteSubnet(subnetId));
    }
  }

  private async deleteSecurityGroups(ctx: TeardownContext): Promise<void> {
    const { client } = this.deps;
    const groups = (
      await this.enumerate(ctx, "security groups", () => client.listSecurityGroups(ctx.handle.vpcId))
    ).filter((group) => group.groupName !== DEFAULT_SECURITY_GROUP_NAME);

    for (const group of orderSecurityGroupsForDeletion(groups)) {
      await this.attempt(ctx, "delete security group", group.groupId, () =>
        client.deleteSecurityGroup(group.groupId),
      );
    }
  }

  private async deleteVpc(ctx: TeardownContext): Promise<void> {
    const vpcId = ctx.handle.vpcId;
    await this.attempt(ctx, "delete VPC", vpcId, () => this.deps.client.deleteVpc(vpcId));
  }

  // ── Helpers ──────────────────────────────────────────────────────────

  private async attempt(
    ctx: TeardownContext,
    action: string,
    resourceId: string,
    fn: () => Promise<unknown>,
  ): Promise<ActionStatus> {
    try {
      await fn();
      this.record(ctx, action, resourceId, "succeeded");
      return "succeeded";
    } catch (error: unknown) {
      const status: ActionStatus = isNotFoundError(error) ? "skipped-not-found" : "failed";
      this.record(ctx, action, resourceId, status, errorMessage(error));
      return status;
    }
  }

  /** A failed listing is recorded and treated as an empty result. */
  private async enumerate<T>(
    ctx: TeardownContext,
    what: string,
    fn: () => Promise<T[]>,
  ): Promise<T[]> {
    try {
      return await fn();
    } catch (error: unknown) {
      this.record(ctx, `list ${what}`, ctx.handle.vpcId, "failed", errorMessage(error));
      return [];
    }
  }

  private record(
    ctx: TeardownContext,
    action: string,
    resourceId: string,
    status: ActionStatus,
    reason?: string,
  ): void {
    ctx.actions.push({ action, resourceId, status, reason });
    switch (status) {
      case "succeeded":
        this.deps.log(`  ✓ ${action} ${resourceId}`);
        break;
      case "skipped-not-found":
        this.deps.log(`  - ${action} ${resourceId}: already gone`);
        break;
      case "failed":
        this.deps.log(`  ... ${action} ${resourceId} -> ${reason}`, "stderr");
        break;
    }
  }
}
