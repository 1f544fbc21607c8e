import type {
  AddressSummary,
  CreateSecurityGroupRequest,
  CreateSubnetRequest,
  IngressRule,
  InstanceSummary,
  InternetGatewaySummary,
  LaunchInstanceRequest,
  NatGatewaySummary,
  NetworkInterfaceScope,
  NetworkInterfaceSummary,
  RouteTableSummary,
  RouteTarget,
  SecurityGroupSummary,
  SubnetSummary,
  VpcSummary,
} from "../types";

/**
 * Control-plane operations used by the topology orchestrators.
 *
 * Implementations let provider errors propagate unchanged: the tagger and
 * the teardown policy both branch on the EC2 error code carried in `name`.
 * Create methods return the new resource's ID.
 */
export interface INetworkCloudClient {
  // VPC
  createVpc(cidrBlock: string): Promise<string>;
  /** VPCs whose `Name` tag equals `name` */
  findVpcsByName(name: string): Promise<VpcSummary[]>;
  deleteVpc(vpcId: string): Promise<void>;

  // Subnets
  createSubnet(request: CreateSubnetRequest): Promise<string>;
  enablePublicIpOnLaunch(subnetId: string): Promise<void>;
  listSubnets(vpcId: string): Promise<SubnetSummary[]>;
  deleteSubnet(subnetId: string): Promise<void>;

  // Internet gateways
  createInternetGateway(): Promise<string>;
  attachInternetGateway(internetGatewayId: string, vpcId: string): Promise<void>;
  /** Gateways attached to the VPC */
  listInternetGateways(vpcId: string): Promise<InternetGatewaySummary[]>;
  detachInternetGateway(internetGatewayId: string, vpcId: string): Promise<void>;
  deleteInternetGateway(internetGatewayId: string): Promise<void>;

  // Elastic IPs
  allocateAddress(): Promise<string>;
  /** Addresses whose `Name` tag equals `name` */
  findAddressesByName(name: string): Promise<AddressSummary[]>;
  disassociateAddress(associationId: string): Promise<void>;
  releaseAddress(allocationId: string): Promise<void>;

  // NAT gateways
  createNatGateway(subnetId: string, allocationId: string): Promise<string>;
  describeNatGateways(natGatewayIds: string[]): Promise<NatGatewaySummary[]>;
  listNatGateways(vpcId: string): Promise<NatGatewaySummary[]>;
  deleteNatGateway(natGatewayId: string): Promise<void>;

  // Route tables
  listRouteTables(vpcId: string): Promise<RouteTableSummary[]>;
  createRouteTable(vpcId: string): Promise<string>;
  /** Returns the association ID */
  associateRouteTable(routeTableId: string, subnetId: string): Promise<string>;
  disassociateRouteTable(associationId: string): Promise<void>;
  createRoute(routeTableId: string, destinationCidrBlock: string, target: RouteTarget): Promise<void>;
  deleteRoute(routeTableId: string, destinationCidrBlock: string): Promise<void>;
  deleteRouteTable(routeTableId: string): Promise<void>;

  // Security groups
  createSecurityGroup(request: CreateSecurityGroupRequest): Promise<string>;
  authorizeIngress(groupId: string, rules: IngressRule[]): Promise<void>;
  listSecurityGroups(vpcId: string): Promise<SecurityGroupSummary[]>;
  deleteSecurityGroup(groupId: string): Promise<void>;

  // Instances
  runInstance(request: LaunchInstanceRequest): Promise<string>;
  listInstances(vpcId: string): Promise<InstanceSummary[]>;
  describeInstances(instanceIds: string[]): Promise<InstanceSummary[]>;
  terminateInstances(instanceIds: string[]): Promise<void>;

  // Network interfaces
  listNetworkInterfaces(scope: NetworkInterfaceScope): Promise<NetworkInterfaceSummary[]>;
  detachNetworkInterface(attachmentId: string): Promise<void>;
  deleteNetworkInterface(networkInterfaceId: string): Promise<void>;

  // Tagging
  tagResource(resourceId: string, tags: Record<string, string>): Promise<void>;
}
