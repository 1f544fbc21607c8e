/**
 * EC2 Network Client: `INetworkCloudClient` over `@aws-sdk/client-ec2`.
 *
 * Maps SDK responses into the plain summary types and lets service
 * exceptions propagate untouched (their `name` is the EC2 error code).
 */

import {
  type EC2Client,
  type Filter,
  type Instance,
  type NatGateway,
  type NetworkInterface,
  type RouteTable,
  type SecurityGroup,
  type Tag,
  _InstanceType,
  AllocateAddressCommand,
  AssociateRouteTableCommand,
  AttachInternetGatewayCommand,
  AuthorizeSecurityGroupIngressCommand,
  CreateInternetGatewayCommand,
  CreateNatGatewayCommand,
  CreateRouteCommand,
  CreateRouteTableCommand,
  CreateSecurityGroupCommand,
  CreateSubnetCommand,
  CreateTagsCommand,
  CreateVpcCommand,
  DeleteInternetGatewayCommand,
  DeleteNatGatewayCommand,
  DeleteNetworkInterfaceCommand,
  DeleteRouteCommand,
  DeleteRouteTableCommand,
  DeleteSecurityGroupCommand,
  DeleteSubnetCommand,
  DeleteVpcCommand,
  DescribeAddressesCommand,
  DescribeInstancesCommand,
  DescribeInternetGatewaysCommand,
  DescribeNatGatewaysCommand,
  DescribeNetworkInterfacesCommand,
  DescribeRouteTablesCommand,
  DescribeSecurityGroupsCommand,
  DescribeSubnetsCommand,
  DescribeVpcsCommand,
  DetachInternetGatewayCommand,
  DetachNetworkInterfaceCommand,
  DisassociateAddressCommand,
  DisassociateRouteTableCommand,
  ModifySubnetAttributeCommand,
  ReleaseAddressCommand,
  RunInstancesCommand,
  TerminateInstancesCommand,
} from "@aws-sdk/client-ec2";
import { NAME_TAG_KEY } from "../constants";
import { TopologyError, TopologyErrorType } from "../errors";
import type {
  AddressSummary,
  CreateSecurityGroupRequest,
  CreateSubnetRequest,
  Ec2InstanceState,
  IngressRule,
  InstanceSummary,
  InternetGatewaySummary,
  LaunchInstanceRequest,
  NatGatewayState,
  NatGatewaySummary,
  NetworkInterfaceScope,
  NetworkInterfaceSummary,
  RouteTableSummary,
  RouteTarget,
  SecurityGroupSummary,
  SubnetSummary,
  VpcSummary,
} from "../types";
import type { INetworkCloudClient } from "./network-cloud-client.interface";

const INSTANCE_TYPES: ReadonlySet<string> = new Set(Object.values(_InstanceType));

const INSTANCE_STATES: ReadonlySet<string> = new Set<Ec2InstanceState>([
  "pending",
  "running",
  "shutting-down",
  "terminated",
  "stopping",
  "stopped",
]);

const NAT_GATEWAY_STATES: ReadonlySet<string> = new Set<NatGatewayState>([
  "pending",
  "failed",
  "available",
  "deleting",
  "deleted",
]);

function isInstanceType(value: string): value is _InstanceType {
  return INSTANCE_TYPES.has(value);
}

function isInstanceState(value: string | undefined): value is Ec2InstanceState {
  return value !== undefined && INSTANCE_STATES.has(value);
}

function isNatGatewayState(value: string | undefined): value is NatGatewayState {
  return value !== undefined && NAT_GATEWAY_STATES.has(value);
}

function vpcFilter(vpcId: string): Filter {
  return { Name: "vpc-id", Values: [vpcId] };
}

function nameFilter(name: string): Filter {
  return { Name: `tag:${NAME_TAG_KEY}`, Values: [name] };
}

function nameTag(tags: Tag[] | undefined): string | undefined {
  return tags?.find((t) => t.Key === NAME_TAG_KEY)?.Value;
}

function requireId(value: string | undefined, operation: string, field: string): string {
  if (!value) {
    throw new TopologyError(`${operation} returned no ${field}`, TopologyErrorType.PROVIDER);
  }
  return value;
}

export class Ec2NetworkClient implements INetworkCloudClient {
  constructor(private readonly ec2: EC2Client) {}

  // ── VPC ──────────────────────────────────────────────────────────────

  async createVpc(cidrBlock: string): Promise<string> {
    const result = await this.ec2.send(new CreateVpcCommand({ CidrBlock: cidrBlock }));
    return requireId(result.Vpc?.VpcId, "CreateVpc", "VpcId");
  }

  async findVpcsByName(name: string): Promise<VpcSummary[]> {
    const result = await this.ec2.send(new DescribeVpcsCommand({ Filters: [nameFilter(name)] }));
    const vpcs: VpcSummary[] = [];
    for (const vpc of result.Vpcs ?? []) {
      if (!vpc.VpcId) continue;
      vpcs.push({ vpcId: vpc.VpcId, cidrBlock: vpc.CidrBlock, name: nameTag(vpc.Tags) });
    }
    return vpcs;
  }

  async deleteVpc(vpcId: string): Promise<void> {
    await this.ec2.send(new DeleteVpcCommand({ VpcId: vpcId }));
  }

  // ── Subnets ──────────────────────────────────────────────────────────

  async createSubnet(request: CreateSubnetRequest): Promise<string> {
    const result = await this.ec2.send(
      new CreateSubnetCommand({
        VpcId: request.vpcId,
        CidrBlock: request.cidrBlock,
        AvailabilityZone: request.availabilityZone,
      }),
    );
    return requireId(result.Subnet?.SubnetId, "CreateSubnet", "SubnetId");
  }

  async enablePublicIpOnLaunch(subnetId: string): Promise<void> {
    await this.ec2.send(
      new ModifySubnetAttributeCommand({
        SubnetId: subnetId,
        MapPublicIpOnLaunch: { Value: true },
      }),
    );
  }

  async listSubnets(vpcId: string): Promise<SubnetSummary[]> {
    const result = await this.ec2.send(new DescribeSubnetsCommand({ Filters: [vpcFilter(vpcId)] }));
    const subnets: SubnetSummary[] = [];
    for (const subnet of result.Subnets ?? []) {
      if (!subnet.SubnetId) continue;
      subnets.push({
        subnetId: subnet.SubnetId,
        cidrBlock: subnet.CidrBlock,
        availabilityZone: subnet.AvailabilityZone,
      });
    }
    return subnets;
  }

  async deleteSubnet(subnetId: string): Promise<void> {
    await this.ec2.send(new DeleteSubnetCommand({ SubnetId: subnetId }));
  }

  // ── Internet gateways ────────────────────────────────────────────────

  async createInternetGateway(): Promise<string> {
    const result = await this.ec2.send(new CreateInternetGatewayCommand({}));
    return requireId(
      result.InternetGateway?.InternetGatewayId,
      "CreateInternetGateway",
      "InternetGatewayId",
    );
  }

  async attachInternetGateway(internetGatewayId: string, vpcId: string): Promise<void> {
    await this.ec2.send(
      new AttachInternetGatewayCommand({ InternetGatewayId: internetGatewayId, VpcId: vpcId }),
    );
  }

  async listInternetGateways(vpcId: string): Promise<InternetGatewaySummary[]> {
    const result = await this.ec2.send(
      new DescribeInternetGatewaysCommand({
        Filters: [{ Name: "attachment.vpc-id", Values: [vpcId] }],
      }),
    );
    const gateways: InternetGatewaySummary[] = [];
    for (const igw of result.InternetGateways ?? []) {
      if (!igw.InternetGatewayId) continue;
      const attachedVpcIds: string[] = [];
      for (const attachment of igw.Attachments ?? []) {
        if (attachment.VpcId) attachedVpcIds.push(attachment.VpcId);
      }
      gateways.push({ internetGatewayId: igw.InternetGatewayId, attachedVpcIds });
    }
    return gateways;
  }

  async detachInternetGateway(internetGatewayId: string, vpcId: string): Promise<void> {
    await this.ec2.send(
      new DetachInternetGatewayCommand({ InternetGatewayId: internetGatewayId, VpcId: vpcId }),
    );
  }

  async deleteInternetGateway(internetGatewayId: string): Promise<void> {
    await this.ec2.send(
      new DeleteInternetGatewayCommand({ InternetGatewayId: internetGatewayId }),
    );
  }

  // ── Elastic IPs ──────────────────────────────────────────────────────

  async allocateAddress(): Promise<string> {
    const result = await this.ec2.send(new AllocateAddressCommand({ Domain: "vpc" }));
    return requireId(result.AllocationId, "AllocateAddress", "AllocationId");
  }

  async findAddressesByName(name: string): Promise<AddressSummary[]> {
    const result = await this.ec2.send(
      new DescribeAddressesCommand({ Filters: [nameFilter(name)] }),
    );
    const addresses: AddressSummary[] = [];
    for (const address of result.Addresses ?? []) {
      if (!address.AllocationId) continue;
      addresses.push({
        allocationId: address.AllocationId,
        associationId: address.AssociationId,
        publicIp: address.PublicIp,
      });
    }
    return addresses;
  }

  async disassociateAddress(associationId: string): Promise<void> {
    await this.ec2.send(new DisassociateAddressCommand({ AssociationId: associationId }));
  }

  async releaseAddress(allocationId: string): Promise<void> {
    await this.ec2.send(new ReleaseAddressCommand({ AllocationId: allocationId }));
  }

  // ── NAT gateways ─────────────────────────────────────────────────────

  async createNatGateway(subnetId: string, allocationId: string): Promise<string> {
    const result = await this.ec2.send(
      new CreateNatGatewayCommand({ SubnetId: subnetId, AllocationId: allocationId }),
    );
    return requireId(result.NatGateway?.NatGatewayId, "CreateNatGateway", "NatGatewayId");
  }

  async describeNatGateways(natGatewayIds: string[]): Promise<NatGatewaySummary[]> {
    const result = await this.ec2.send(
      new DescribeNatGatewaysCommand({ NatGatewayIds: natGatewayIds }),
    );
    return this.mapNatGateways(result.NatGateways);
  }

  async listNatGateways(vpcId: string): Promise<NatGatewaySummary[]> {
    // DescribeNatGateways names its filter list `Filter`, not `Filters`
    const result = await this.ec2.send(
      new DescribeNatGatewaysCommand({ Filter: [vpcFilter(vpcId)] }),
    );
    return this.mapNatGateways(result.NatGateways);
  }

  async deleteNatGateway(natGatewayId: string): Promise<void> {
    await this.ec2.send(new DeleteNatGatewayCommand({ NatGatewayId: natGatewayId }));
  }

  // ── Route tables ─────────────────────────────────────────────────────

  async listRouteTables(vpcId: string): Promise<RouteTableSummary[]> {
    const result = await this.ec2.send(
      new DescribeRouteTablesCommand({ Filters: [vpcFilter(vpcId)] }),
    );
    const tables: RouteTableSummary[] = [];
    for (const rtb of result.RouteTables ?? []) {
      const summary = this.mapRouteTable(rtb);
      if (summary) tables.push(summary);
    }
    return tables;
  }

  async createRouteTable(vpcId: string): Promise<string> {
    const result = await this.ec2.send(new CreateRouteTableCommand({ VpcId: vpcId }));
    return requireId(result.RouteTable?.RouteTableId, "CreateRouteTable", "RouteTableId");
  }

  async associateRouteTable(routeTableId: string, subnetId: string): Promise<string> {
    const result = await this.ec2.send(
      new AssociateRouteTableCommand({ RouteTableId: routeTableId, SubnetId: subnetId }),
    );
    return requireId(result.AssociationId, "AssociateRouteTable", "AssociationId");
  }

  async disassociateRouteTable(associationId: string): Promise<void> {
    await this.ec2.send(new DisassociateRouteTableCommand({ AssociationId: associationId }));
  }

  async createRoute(
    routeTableId: string,
    destinationCidrBlock: string,
    target: RouteTarget,
  ): Promise<void> {
    await this.ec2.send(
      new CreateRouteCommand({
        RouteTableId: routeTableId,
        DestinationCidrBlock: destinationCidrBlock,
        ...("gatewayId" in target
          ? { GatewayId: target.gatewayId }
          : { NatGatewayId: target.natGatewayId }),
      }),
    );
  }

  async deleteRoute(routeTableId: string, destinationCidrBlock: string): Promise<void> {
    await this.ec2.send(
      new DeleteRouteCommand({
        RouteTableId: routeTableId,
        DestinationCidrBlock: destinationCidrBlock,
      }),
    );
  }

  async deleteRouteTable(routeTableId: string): Promise<void> {
    await this.ec2.send(new DeleteRouteTableCommand({ RouteTableId: routeTableId }));
  }

  // ── Security groups ──────────────────────────────────────────────────

  async createSecurityGroup(request: CreateSecurityGroupRequest): Promise<string> {
    const result = await this.ec2.send(
      new CreateSecurityGroupCommand({
        GroupName: request.groupName,
        Description: request.description,
        VpcId: request.vpcId,
      }),
    );
    return requireId(result.GroupId, "CreateSecurityGroup", "GroupId");
  }

  async authorizeIngress(groupId: string, rules: IngressRule[]): Promise<void> {
    if (rules.length === 0) return;
    await this.ec2.send(
      new AuthorizeSecurityGroupIngressCommand({
        GroupId: groupId,
        IpPermissions: rules.map((rule) => ({
          IpProtocol: "tcp",
          FromPort: rule.port,
          ToPort: rule.port,
          ...("cidr" in rule.source
            ? { IpRanges: [{ CidrIp: rule.source.cidr, Description: rule.description }] }
            : {
                UserIdGroupPairs: [
                  { GroupId: rule.source.securityGroupId, Description: rule.description },
                ],
              }),
        })),
      }),
    );
  }

  async listSecurityGroups(vpcId: string): Promise<SecurityGroupSummary[]> {
    const result = await this.ec2.send(
      new DescribeSecurityGroupsCommand({ Filters: [vpcFilter(vpcId)] }),
    );
    const groups: SecurityGroupSummary[] = [];
    for (const sg of result.SecurityGroups ?? []) {
      if (!sg.GroupId) continue;
      groups.push({
        groupId: sg.GroupId,
        groupName: sg.GroupName ?? "",
        referencedGroupIds: this.referencedGroups(sg),
      });
    }
    return groups;
  }

  async deleteSecurityGroup(groupId: string): Promise<void> {
    await this.ec2.send(new DeleteSecurityGroupCommand({ GroupId: groupId }));
  }

  // ── Instances ────────────────────────────────────────────────────────

  async runInstance(request: LaunchInstanceRequest): Promise<string> {
    if (!isInstanceType(request.instanceType)) {
      throw new TopologyError(
        `Unknown instance type "${request.instanceType}"`,
        TopologyErrorType.VALIDATION,
      );
    }
    const result = await this.ec2.send(
      new RunInstancesCommand({
        ImageId: request.imageId,
        InstanceType: request.instanceType,
        MinCount: 1,
        MaxCount: 1,
        KeyName: request.keyName,
        SubnetId: request.subnetId,
        SecurityGroupIds: [request.securityGroupId],
        TagSpecifications: [
          { ResourceType: "instance", Tags: [{ Key: NAME_TAG_KEY, Value: request.name }] },
        ],
        UserData: Buffer.from(request.userData, "utf-8").toString("base64"),
      }),
    );
    return requireId(result.Instances?.[0]?.InstanceId, "RunInstances", "InstanceId");
  }

  async listInstances(vpcId: string): Promise<InstanceSummary[]> {
    return this.describeInstancePages({ Filters: [vpcFilter(vpcId)] });
  }

  async describeInstances(instanceIds: string[]): Promise<InstanceSummary[]> {
    return this.describeInstancePages({ InstanceIds: instanceIds });
  }

  async terminateInstances(instanceIds: string[]): Promise<void> {
    await this.ec2.send(new TerminateInstancesCommand({ InstanceIds: instanceIds }));
  }

  // ── Network interfaces ───────────────────────────────────────────────

  async listNetworkInterfaces(scope: NetworkInterfaceScope): Promise<NetworkInterfaceSummary[]> {
    const filter: Filter =
      "vpcId" in scope ? vpcFilter(scope.vpcId) : { Name: "subnet-id", Values: [scope.subnetId] };
    const interfaces: NetworkInterfaceSummary[] = [];
    let nextToken: string | undefined;

    do {
      const result = await this.ec2.send(
        new DescribeNetworkInterfacesCommand({ Filters: [filter], NextToken: nextToken }),
      );
      for (const eni of result.NetworkInterfaces ?? []) {
        const summary = this.mapNetworkInterface(eni);
        if (summary) interfaces.push(summary);
      }
      nextToken = result.NextToken;
    } while (nextToken);

    return interfaces;
  }

  async detachNetworkInterface(attachmentId: string): Promise<void> {
    await this.ec2.send(
      new DetachNetworkInterfaceCommand({ AttachmentId: attachmentId, Force: true }),
    );
  }

  async deleteNetworkInterface(networkInterfaceId: string): Promise<void> {
    await this.ec2.send(
      new DeleteNetworkInterfaceCommand({ NetworkInterfaceId: networkInterfaceId }),
    );
  }

  // ── Tagging ──────────────────────────────────────────────────────────

  async tagResource(resourceId: string, tags: Record<string, string>): Promise<void> {
    await this.ec2.send(
      new CreateTagsCommand({
        Resources: [resourceId],
        Tags: Object.entries(tags).map(([Key, Value]) => ({ Key, Value })),
      }),
    );
  }

  // ── Mapping Helpers ──────────────────────────────────────────────────

  private async describeInstancePages(input: {
    Filters?: Filter[];
    InstanceIds?: string[];
  }): Promise<InstanceSummary[]> {
    const instances: InstanceSummary[] = [];
    let nextToken: string | undefined;

    do {
      const result = await this.ec2.send(
        new DescribeInstancesCommand({ ...input, NextToken: nextToken }),
      );
      for (const reservation of result.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          const summary = this.mapInstance(instance);
          if (summary) instances.push(summary);
        }
      }
      nextToken = result.NextToken;
    } while (nextToken);

    return instances;
  }

  private mapInstance(instance: Instance): InstanceSummary | undefined {
    if (!instance.InstanceId) return undefined;
    const state = instance.State?.Name;
    return {
      instanceId: instance.InstanceId,
      state: isInstanceState(state) ? state : "pending",
      subnetId: instance.SubnetId,
    };
  }

  private mapNatGateways(gateways: NatGateway[] | undefined): NatGatewaySummary[] {
    const summaries: NatGatewaySummary[] = [];
    for (const ngw of gateways ?? []) {
      if (!ngw.NatGatewayId) continue;
      const allocationIds: string[] = [];
      for (const address of ngw.NatGatewayAddresses ?? []) {
        if (address.AllocationId) allocationIds.push(address.AllocationId);
      }
      summaries.push({
        natGatewayId: ngw.NatGatewayId,
        state: isNatGatewayState(ngw.State) ? ngw.State : "pending",
        subnetId: ngw.SubnetId,
        allocationIds,
      });
    }
    return summaries;
  }

  private mapRouteTable(rtb: RouteTable): RouteTableSummary | undefined {
    if (!rtb.RouteTableId) return undefined;
    const associations: RouteTableSummary["associations"] = [];
    for (const assoc of rtb.Associations ?? []) {
      if (!assoc.RouteTableAssociationId) continue;
      associations.push({
        associationId: assoc.RouteTableAssociationId,
        main: assoc.Main === true,
        subnetId: assoc.SubnetId,
      });
    }
    return {
      routeTableId: rtb.RouteTableId,
      main: (rtb.Associations ?? []).some((a) => a.Main === true),
      associations,
      routes: (rtb.Routes ?? []).map((route) => ({
        destinationCidrBlock: route.DestinationCidrBlock,
        gatewayId: route.GatewayId,
        natGatewayId: route.NatGatewayId,
      })),
    };
  }

  private referencedGroups(sg: SecurityGroup): string[] {
    const ids = new Set<string>();
    for (const permission of sg.IpPermissions ?? []) {
      for (const pair of permission.UserIdGroupPairs ?? []) {
        if (pair.GroupId && pair.GroupId !== sg.GroupId) ids.add(pair.GroupId);
      }
    }
    return [...ids];
  }

  private mapNetworkInterface(eni: NetworkInterface): NetworkInterfaceSummary | undefined {
    if (!eni.NetworkInterfaceId) return undefined;
    const summary: NetworkInterfaceSummary = {
      networkInterfaceId: eni.NetworkInterfaceId,
      subnetId: eni.SubnetId,
    };
    if (eni.Association) {
      summary.association = {
        associationId: eni.Association.AssociationId,
        allocationId: eni.Association.AllocationId,
        publicIp: eni.Association.PublicIp,
      };
    }
    if (eni.Attachment?.AttachmentId) {
      summary.attachment = {
        attachmentId: eni.Attachment.AttachmentId,
        status: eni.Attachment.Status ?? "attached",
      };
    }
    return summary;
  }
}
