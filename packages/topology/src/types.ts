/**
 * Shared types for the network topology lifecycle.
 */

/** Log callback for streaming provisioning output */
export type TopologyLogCallback = (line: string, stream?: "stdout" | "stderr") => void;

/** IDs of every resource a create pass produces */
export interface TopologyIds {
  vpcId: string;
  publicSubnetId: string;
  privateSubnetId: string;
  internetGatewayId: string;
  allocationId: string;
  natGatewayId: string;
  /** The VPC's main route table, reused for the public subnet */
  publicRouteTableId: string;
  privateRouteTableId: string;
  publicSecurityGroupId: string;
  privateSecurityGroupId: string;
  publicInstanceId: string;
  privateInstanceId: string;
}

/** A live topology, resolved once from its `<prefix>-vpc` label */
export interface TopologyHandle {
  region: string;
  prefix: string;
  vpcId: string;
  vpcName: string;
}

export interface CreateResult {
  region: string;
  prefix: string;
  resources: TopologyIds;
}

// ── Cloud summaries ──────────────────────────────────────────────────

export interface VpcSummary {
  vpcId: string;
  cidrBlock?: string;
  name?: string;
}

export interface SubnetSummary {
  subnetId: string;
  cidrBlock?: string;
  availabilityZone?: string;
}

export interface InternetGatewaySummary {
  internetGatewayId: string;
  attachedVpcIds: string[];
}

/** NAT gateway lifecycle states */
export type NatGatewayState = "pending" | "failed" | "available" | "deleting" | "deleted";

export interface NatGatewaySummary {
  natGatewayId: string;
  state: NatGatewayState;
  subnetId?: string;
  /** Elastic IP allocations consumed by the gateway */
  allocationIds: string[];
}

export interface RouteTableAssociationSummary {
  associationId: string;
  main: boolean;
  subnetId?: string;
}

export interface RouteSummary {
  destinationCidrBlock?: string;
  gatewayId?: string;
  natGatewayId?: string;
}

export interface RouteTableSummary {
  routeTableId: string;
  /** True when any association marks the table as the VPC's main table */
  main: boolean;
  associations: RouteTableAssociationSummary[];
  routes: RouteSummary[];
}

export interface SecurityGroupSummary {
  groupId: string;
  groupName: string;
  /** Groups named as a source in this group's ingress rules */
  referencedGroupIds: string[];
}

/** EC2 instance lifecycle states */
export type Ec2InstanceState =
  | "pending"
  | "running"
  | "shutting-down"
  | "terminated"
  | "stopping"
  | "stopped";

export interface InstanceSummary {
  instanceId: string;
  state: Ec2InstanceState;
  subnetId?: string;
}

export interface NetworkInterfaceSummary {
  networkInterfaceId: string;
  subnetId?: string;
  association?: {
    associationId?: string;
    allocationId?: string;
    publicIp?: string;
  };
  attachment?: {
    attachmentId: string;
    status: string;
  };
}

export interface AddressSummary {
  allocationId: string;
  associationId?: string;
  publicIp?: string;
}

// ── Requests ─────────────────────────────────────────────────────────

export interface CreateSubnetRequest {
  vpcId: string;
  cidrBlock: string;
  availabilityZone: string;
}

export interface CreateSecurityGroupRequest {
  vpcId: string;
  groupName: string;
  description: string;
}

/** Single-port TCP ingress from a CIDR block or another security group */
export interface IngressRule {
  port: number;
  source: { cidr: string } | { securityGroupId: string };
  description?: string;
}

export type RouteTarget = { gatewayId: string } | { natGatewayId: string };

export interface LaunchInstanceRequest {
  imageId: string;
  instanceType: string;
  keyName: string;
  subnetId: string;
  securityGroupId: string;
  /** Applied as the `Name` tag at launch */
  name: string;
  userData: string;
}

export type NetworkInterfaceScope = { vpcId: string } | { subnetId: string };

// ── Teardown report ──────────────────────────────────────────────────

export type ActionStatus = "succeeded" | "skipped-not-found" | "failed";

export interface ActionOutcome {
  action: string;
  resourceId: string;
  status: ActionStatus;
  /** Underlying error message for `failed` and `skipped-not-found` */
  reason?: string;
}

export interface TeardownStepReport {
  step: string;
  actions: ActionOutcome[];
}

export interface TeardownReport {
  region: string;
  prefix: string;
  /** `nothing-to-do` when no VPC carries the prefix label */
  status: "nothing-to-do" | "complete";
  vpcId: string | null;
  steps: TeardownStepReport[];
  /** Number of `failed` actions across all steps */
  failures: number;
}
