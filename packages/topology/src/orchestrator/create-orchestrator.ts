/**
 * Create Orchestrator: builds a topology in one strictly sequential pass.
 *
 * There is no compensation: when step N fails, steps 1..N-1 stay live and
 * the error propagates. Cleanup is an explicit teardown of the same prefix.
 * The NAT gateway wait is the only blocking point, since the private route
 * needs a resolvable target.
 */

import {
  DEFAULT_ROUTE_CIDR,
  RESOURCE_ROLES,
  SSH_PORT,
  resourceName,
  vpcName,
} from "../constants";
import {
  type CreateOptions,
  type CreateOptionsInput,
  CreateOptionsSchema,
  availabilityZone,
  parseOptions,
} from "../config/topology-config";
import { TopologyError, TopologyErrorType, errorCode } from "../errors";
import { type KindStep, assertCreateSequence } from "../graph/topology-graph";
import type { INetworkCloudClient } from "../client/network-cloud-client.interface";
import type { RetryingTagger } from "../tagging/retrying-tagger";
import type { ResourceWaiter } from "../waiter/resource-waiter";
import type { TopologyResolver } from "../resolver/topology-resolver";
import type { CreateResult, RouteTarget, TopologyIds, TopologyLogCallback } from "../types";

export type CreateStepName =
  | "vpc"
  | "subnets"
  | "internet-gateway"
  | "nat-gateway"
  | "route-tables"
  | "security-groups"
  | "instances";

export interface CreateStepDescriptor extends KindStep {
  name: CreateStepName;
  description: string;
}

export const CREATE_STEPS: readonly CreateStepDescriptor[] = [
  { name: "vpc", kinds: ["vpc"], description: "Creating VPC" },
  { name: "subnets", kinds: ["subnet"], description: "Creating public and private subnets" },
  { name: "internet-gateway", kinds: ["internet-gateway"], description: "Creating internet gateway" },
  {
    name: "nat-gateway",
    kinds: ["elastic-ip", "nat-gateway"],
    description: "Allocating Elastic IP and creating NAT gateway",
  },
  { name: "route-tables", kinds: ["route-table"], description: "Configuring route tables" },
  { name: "security-groups", kinds: ["security-group"], description: "Creating security groups" },
  { name: "instances", kinds: ["instance"], description: "Launching instances" },
];

export interface CreateOrchestratorDeps {
  client: INetworkCloudClient;
  tagger: RetryingTagger;
  waiter: ResourceWaiter;
  resolver: TopologyResolver;
  log: TopologyLogCallback;
}

interface CreateContext {
  options: CreateOptions;
  ids: Partial<TopologyIds>;
}

type StepRunner = (ctx: CreateContext) => Promise<void>;

function need(ids: Partial<TopologyIds>, key: keyof TopologyIds): string {
  const value = ids[key];
  if (!value) {
    throw new TopologyError(`${key} has not been created yet`, TopologyErrorType.INTERNAL);
  }
  return value;
}

export class CreateOrchestrator {
  private readonly runners: Record<CreateStepName, StepRunner> = {
    vpc: (ctx) => this.createVpc(ctx),
    subnets: (ctx) => this.createSubnets(ctx),
    "internet-gateway": (ctx) => this.createInternetGateway(ctx),
    "nat-gateway": (ctx) => this.createNatGateway(ctx),
    "route-tables": (ctx) => this.configureRouteTables(ctx),
    "security-groups": (ctx) => this.createSecurityGroups(ctx),
    instances: (ctx) => this.launchInstances(ctx),
  };

  constructor(
    private readonly deps: CreateOrchestratorDeps,
    private readonly steps: readonly CreateStepDescriptor[] = CREATE_STEPS,
  ) {
    assertCreateSequence(steps);
  }

  async create(input: CreateOptionsInput): Promise<CreateResult> {
    const options = parseOptions(CreateOptionsSchema, input);
    const { prefix, region } = options;

    const existing = await this.deps.resolver.resolve(prefix);
    if (existing) {
      throw new TopologyError(
        `A VPC labelled ${vpcName(prefix)} already exists in ${region}: ${existing.vpcId}`,
        TopologyErrorType.ALREADY_EXISTS,
        undefined,
        [`Run teardown for prefix "${prefix}" first, or pick another prefix`],
      );
    }

    this.deps.log(`Creating topology "${prefix}" in ${region}...`);
    const ctx: CreateContext = { options, ids: {} };

    for (const [index, step] of this.steps.entries()) {
      this.deps.log(`[${index + 1}/${this.steps.length}] ${step.description}...`);
      await this.runners[step.name](ctx);
    }

    this.deps.log(`Topology "${prefix}" created`);
    return { region, prefix, resources: this.collectIds(ctx.ids) };
  }

  // ── Steps ────────────────────────────────────────────────────────────

  private async createVpc({ options, ids }: CreateContext): Promise<void> {
    const vpcId = await this.deps.client.createVpc(options.vpcCidr);
    await this.deps.tagger.tagName(vpcId, vpcName(options.prefix));
    ids.vpcId = vpcId;
    this.deps.log(`  VPC: ${vpcId}`);
  }

  private async createSubnets({ options, ids }: CreateContext): Promise<void> {
    const { client, tagger } = this.deps;
    const vpcId = need(ids, "vpcId");

    const publicSubnetId = await client.createSubnet({
      vpcId,
      cidrBlock: options.publicSubnet.cidrBlock,
      availabilityZone: availabilityZone(options.region, options.publicSubnet),
    });
    await tagger.tagName(publicSubnetId, resourceName(options.prefix, RESOURCE_ROLES.PUBLIC_SUBNET));
    ids.publicSubnetId = publicSubnetId;

    const privateSubnetId = await client.createSubnet({
      vpcId,
      cidrBlock: options.privateSubnet.cidrBlock,
      availabilityZone: availabilityZone(options.region, options.privateSubnet),
    });
    await tagger.tagName(privateSubnetId, resourceName(options.prefix, RESOURCE_ROLES.PRIVATE_SUBNET));
    ids.privateSubnetId = privateSubnetId;

    await client.enablePublicIpOnLaunch(publicSubnetId);
    this.deps.log(`  Subnets: ${publicSubnetId} (public), ${privateSubnetId} (private)`);
  }

  private async createInternetGateway({ options, ids }: CreateContext): Promise<void> {
    const { client, tagger } = this.deps;
    const internetGatewayId = await client.createInternetGateway();
    await client.attachInternetGateway(internetGatewayId, need(ids, "vpcId"));
    await tagger.tagName(internetGatewayId, resourceName(options.prefix, RESOURCE_ROLES.INTERNET_GATEWAY));
    ids.internetGatewayId = internetGatewayId;
    this.deps.log(`  IGW: ${internetGatewayId}`);
  }

  private async createNatGateway({ options, ids }: CreateContext): Promise<void> {
    const { client, tagger, waiter } = this.deps;

    const allocationId = await client.allocateAddress();
    await tagger.tagName(allocationId, resourceName(options.prefix, RESOURCE_ROLES.ELASTIC_IP));
    ids.allocationId = allocationId;
    this.deps.log(`  Elastic IP: ${allocationId}`);

    const natGatewayId = await client.createNatGateway(need(ids, "publicSubnetId"), allocationId);
    await tagger.tagName(natGatewayId, resourceName(options.prefix, RESOURCE_ROLES.NAT_GATEWAY));
    ids.natGatewayId = natGatewayId;
    this.deps.log(`  NATGW: ${natGatewayId}`);

    await waiter.natGatewaysAvailable([natGatewayId]);
    this.deps.log(`  NATGW ${natGatewayId} available`);
  }

  private async configureRouteTables({ options, ids }: CreateContext): Promise<void> {
    const { client, tagger } = this.deps;
    const vpcId = need(ids, "vpcId");

    const main = (await client.listRouteTables(vpcId)).find((rtb) => rtb.main);
    if (!main) {
      throw new TopologyError(`VPC ${vpcId} has no main route table`, TopologyErrorType.PROVIDER);
    }
    const publicRouteTableId = main.routeTableId;
    await tagger.tagName(publicRouteTableId, resourceName(options.prefix, RESOURCE_ROLES.MAIN_ROUTE_TABLE));
    await client.associateRouteTable(publicRouteTableId, need(ids, "publicSubnetId"));
    await this.createDefaultRoute(publicRouteTableId, { gatewayId: need(ids, "internetGatewayId") });
    ids.publicRouteTableId = publicRouteTableId;

    const privateRouteTableId = await client.createRouteTable(vpcId);
    await tagger.tagName(privateRouteTableId, resourceName(options.prefix, RESOURCE_ROLES.PRIVATE_ROUTE_TABLE));
    await client.associateRouteTable(privateRouteTableId, need(ids, "privateSubnetId"));
    await this.createDefaultRoute(privateRouteTableId, { natGatewayId: need(ids, "natGatewayId") });
    ids.privateRouteTableId = privateRouteTableId;

    this.deps.log(`  Route tables: ${publicRouteTableId} (main, public), ${privateRouteTableId} (private)`);
  }

  private async createSecurityGroups({ options, ids }: CreateContext): Promise<void> {
    const { client, tagger } = this.deps;
    const vpcId = need(ids, "vpcId");

    const publicName = resourceName(options.prefix, RESOURCE_ROLES.PUBLIC_SECURITY_GROUP);
    const publicGroupId = await client.createSecurityGroup({
      vpcId,
      groupName: publicName,
      description: "Public SG",
    });
    await tagger.tagName(publicGroupId, publicName);
    await client.authorizeIngress(publicGroupId, [
      { port: SSH_PORT, source: { cidr: options.sshCidr }, description: "SSH" },
    ]);
    ids.publicSecurityGroupId = publicGroupId;
    this.deps.log(`  Security group (public): ${publicGroupId}`);

    // The private group only admits SSH from the public group
    const privateName = resourceName(options.prefix, RESOURCE_ROLES.PRIVATE_SECURITY_GROUP);
    const privateGroupId = await client.createSecurityGroup({
      vpcId,
      groupName: privateName,
      description: "Private SG",
    });
    await tagger.tagName(privateGroupId, privateName);
    await client.authorizeIngress(privateGroupId, [
      { port: SSH_PORT, source: { securityGroupId: publicGroupId }, description: "SSH from public SG" },
    ]);
    ids.privateSecurityGroupId = privateGroupId;
    this.deps.log(`  Security group (private): ${privateGroupId}`);
  }

  private async launchInstances({ options, ids }: CreateContext): Promise<void> {
    const { client } = this.deps;
    const common = {
      imageId: options.imageId,
      instanceType: options.instanceType,
      keyName: options.keyName,
      userData: options.userData,
    };

    ids.publicInstanceId = await client.runInstance({
      ...common,
      subnetId: need(ids, "publicSubnetId"),
      securityGroupId: need(ids, "publicSecurityGroupId"),
      name: resourceName(options.prefix, RESOURCE_ROLES.PUBLIC_INSTANCE),
    });
    ids.privateInstanceId = await client.runInstance({
      ...common,
      subnetId: need(ids, "privateSubnetId"),
      securityGroupId: need(ids, "privateSecurityGroupId"),
      name: resourceName(options.prefix, RESOURCE_ROLES.PRIVATE_INSTANCE),
    });
    this.deps.log(`  EC2: ${ids.publicInstanceId} (public), ${ids.privateInstanceId} (private)`);
  }

  // ── Helpers ──────────────────────────────────────────────────────────

  /** A default route may already be present on a rerun; that is not an error. */
  private async createDefaultRoute(routeTableId: string, target: RouteTarget): Promise<void> {
    try {
      await this.deps.client.createRoute(routeTableId, DEFAULT_ROUTE_CIDR, target);
    } catch (error: unknown) {
      if (errorCode(error) !== "RouteAlreadyExists") throw error;
      this.deps.log(`  Default route already present on ${routeTableId}`);
    }
  }

  private collectIds(ids: Partial<TopologyIds>): TopologyIds {
    return {
      vpcId: need(ids, "vpcId"),
      publicSubnetId: need(ids, "publicSubnetId"),
      privateSubnetId: need(ids, "privateSubnetId"),
      internetGatewayId: need(ids, "internetGatewayId"),
      allocationId: need(ids, "allocationId"),
      natGatewayId: need(ids, "natGatewayId"),
      publicRouteTableId: need(ids, "publicRouteTableId"),
      privateRouteTableId: need(ids, "privateRouteTableId"),
      publicSecurityGroupId: need(ids, "publicSecurityGroupId"),
      privateSecurityGroupId: need(ids, "privateSecurityGroupId"),
      publicInstanceId: need(ids, "publicInstanceId"),
      privateInstanceId: need(ids, "privateInstanceId"),
    };
  }
}
