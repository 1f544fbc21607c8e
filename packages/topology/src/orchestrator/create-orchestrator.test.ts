import { CREATE_STEPS, CreateOrchestrator } from "./create-orchestrator";
import { TopologyErrorType } from "../errors";
import { RetryingTagger } from "../tagging/retrying-tagger";
import { ResourceWaiter } from "../waiter/resource-waiter";
import { InMemoryCloud } from "../__tests__/fakes/in-memory-cloud";
import { type TestHarness, buildTestServices, loggedLines } from "../__tests__/fakes/test-services";

const OPTIONS = { region: "us-west-1", prefix: "fang", keyName: "test-key" };

describe("CreateOrchestrator", () => {
  let cloud: InMemoryCloud;
  let harness: TestHarness;

  beforeEach(() => {
    cloud = new InMemoryCloud();
    harness = buildTestServices(cloud);
  });

  it("builds every resource and returns their IDs", async () => {
    const { resources } = await harness.creator.create(OPTIONS);

    expect(cloud.vpcs.get(resources.vpcId)).toMatchObject({
      cidrBlock: "10.0.0.0/16",
      tags: { Name: "fang-vpc" },
    });
    expect(cloud.subnets.get(resources.publicSubnetId)).toMatchObject({
      cidrBlock: "10.0.1.0/24",
      availabilityZone: "us-west-1a",
      mapPublicIp: true,
      tags: { Name: "fang-public-subnet" },
    });
    expect(cloud.subnets.get(resources.privateSubnetId)).toMatchObject({
      cidrBlock: "10.0.2.0/24",
      availabilityZone: "us-west-1c",
      mapPublicIp: false,
      tags: { Name: "fang-private-subnet" },
    });
    expect(cloud.internetGateways.get(resources.internetGatewayId)).toMatchObject({
      attachedVpcIds: [resources.vpcId],
      tags: { Name: "fang-igw" },
    });
    expect(cloud.addresses.get(resources.allocationId)?.tags).toEqual({ Name: "fang-eip" });
    expect(cloud.natGateways.get(resources.natGatewayId)).toMatchObject({
      subnetId: resources.publicSubnetId,
      allocationId: resources.allocationId,
      state: "available",
      tags: { Name: "fang-natgw" },
    });
    expect(cloud.instances.get(resources.publicInstanceId)?.tags).toEqual({ Name: "fang-ec2-public" });
    expect(cloud.instances.get(resources.privateInstanceId)?.tags).toEqual({ Name: "fang-ec2-private" });
  });

  it("reuses the main route table for the public subnet and routes the private subnet through NAT", async () => {
    const { resources } = await harness.creator.create(OPTIONS);

    const main = cloud.routeTables.get(resources.publicRouteTableId);
    expect(main?.main).toBe(true);
    expect(main?.tags).toEqual({ Name: "fang-main-RTB" });
    expect(main?.associations.map((a) => a.subnetId)).toContain(resources.publicSubnetId);
    expect(main?.routes).toContainEqual({
      destinationCidrBlock: "0.0.0.0/0",
      gatewayId: resources.internetGatewayId,
    });

    const privateTable = cloud.routeTables.get(resources.privateRouteTableId);
    expect(privateTable?.main).toBe(false);
    expect(privateTable?.tags).toEqual({ Name: "fang-rtb-private" });
    expect(privateTable?.associations.map((a) => a.subnetId)).toEqual([resources.privateSubnetId]);
    expect(privateTable?.routes).toContainEqual({
      destinationCidrBlock: "0.0.0.0/0",
      natGatewayId: resources.natGatewayId,
    });
  });

  it("admits SSH to the private group only from the public group", async () => {
    const { resources } = await harness.creator.create({ ...OPTIONS, sshCidr: "203.0.113.0/24" });

    expect(cloud.securityGroups.get(resources.publicSecurityGroupId)).toMatchObject({
      groupName: "fang-sg-public",
      description: "Public SG",
      ingress: [{ port: 22, source: { cidr: "203.0.113.0/24" }, description: "SSH" }],
      tags: { Name: "fang-sg-public" },
    });
    expect(cloud.securityGroups.get(resources.privateSecurityGroupId)).toMatchObject({
      groupName: "fang-sg-private",
      description: "Private SG",
      ingress: [
        {
          port: 22,
          source: { securityGroupId: resources.publicSecurityGroupId },
          description: "SSH from public SG",
        },
      ],
    });
  });

  it("launches both instances with the requested image, type and key", async () => {
    const { resources } = await harness.creator.create({ ...OPTIONS, instanceType: "t3.small" });

    expect(cloud.instances.get(resources.publicInstanceId)?.request).toEqual({
      imageId: "ami-0b09bf4b909f29738",
      instanceType: "t3.small",
      keyName: "test-key",
      userData: "#!/bin/bash\nyum update -y\n",
      subnetId: resources.publicSubnetId,
      securityGroupId: resources.publicSecurityGroupId,
      name: "fang-ec2-public",
    });
    expect(cloud.instances.get(resources.privateInstanceId)?.request).toMatchObject({
      subnetId: resources.privateSubnetId,
      securityGroupId: resources.privateSecurityGroupId,
    });
  });

  it("creates resources in dependency order", async () => {
    await harness.creator.create(OPTIONS);

    const creates = cloud
      .callNames()
      .filter((name) => name.startsWith("create") || name === "allocateAddress" || name === "runInstance");
    expect(creates).toEqual([
      "createVpc",
      "createSubnet",
      "createSubnet",
      "createInternetGateway",
      "allocateAddress",
      "createNatGateway",
      "createRoute",
      "createRouteTable",
      "createRoute",
      "createSecurityGroup",
      "createSecurityGroup",
      "runInstance",
      "runInstance",
    ]);
  });

  it("waits for the NAT gateway before routing through it", async () => {
    await harness.creator.create(OPTIONS);

    const names = cloud.callNames();
    expect(names.indexOf("describeNatGateways")).toBeGreaterThan(names.indexOf("createNatGateway"));
    expect(names.indexOf("describeNatGateways")).toBeLessThan(names.indexOf("createRouteTable"));
  });

  it("logs step progress", async () => {
    await harness.creator.create(OPTIONS);

    const lines = loggedLines(harness.log);
    expect(lines[0]).toBe('Creating topology "fang" in us-west-1...');
    expect(lines).toContain("[1/7] Creating VPC...");
    expect(lines).toContain("[7/7] Launching instances...");
    expect(lines[lines.length - 1]).toBe('Topology "fang" created');
  });

  it("retries tags on IDs that are not visible yet", async () => {
    cloud = new InMemoryCloud({ tagVisibilityDelay: 1 });
    harness = buildTestServices(cloud);

    const { resources } = await harness.creator.create(OPTIONS);

    expect(cloud.vpcs.get(resources.vpcId)?.tags).toEqual({ Name: "fang-vpc" });
    // vpc, two subnets, igw, eip, natgw, two route tables, two security groups
    expect(harness.taggerSleep).toHaveBeenCalledTimes(10);
  });

  it("refuses a prefix that already labels a VPC", async () => {
    const first = await harness.creator.create(OPTIONS);

    await expect(harness.creator.create(OPTIONS)).rejects.toMatchObject({
      type: TopologyErrorType.ALREADY_EXISTS,
      message: `A VPC labelled fang-vpc already exists in us-west-1: ${first.resources.vpcId}`,
    });
    expect(cloud.callsTo("createVpc")).toHaveLength(1);
  });

  it("validates options before touching the cloud", async () => {
    await expect(harness.creator.create({ ...OPTIONS, keyName: "" })).rejects.toMatchObject({
      type: TopologyErrorType.VALIDATION,
    });
    expect(cloud.calls).toHaveLength(0);
  });

  it("leaves earlier resources in place when a step fails", async () => {
    cloud.failOn("createNatGateway", "InsufficientAddressCapacity");

    await expect(harness.creator.create(OPTIONS)).rejects.toMatchObject({
      name: "InsufficientAddressCapacity",
    });

    expect(cloud.vpcs.size).toBe(1);
    expect(cloud.subnets.size).toBe(2);
    expect(cloud.internetGateways.size).toBe(1);
    expect(cloud.addresses.size).toBe(1);
    expect(cloud.callNames().some((name) => name.startsWith("delete") || name === "releaseAddress")).toBe(false);
  });

  it("tolerates a default route that already exists", async () => {
    cloud.failOn("createRoute", "RouteAlreadyExists", { times: 1 });

    const { resources } = await harness.creator.create(OPTIONS);

    expect(loggedLines(harness.log)).toContain(
      `  Default route already present on ${resources.publicRouteTableId}`,
    );
    expect(cloud.callsTo("runInstance")).toHaveLength(2);
  });

  it("propagates any other route error", async () => {
    cloud.failOn("createRoute", "InvalidGatewayID.NotFound");

    await expect(harness.creator.create(OPTIONS)).rejects.toMatchObject({
      name: "InvalidGatewayID.NotFound",
    });
    expect(cloud.callsTo("createSecurityGroup")).toHaveLength(0);
  });

  it("rejects a step sequence that violates the dependency graph", () => {
    const reordered = [CREATE_STEPS[1], CREATE_STEPS[0], ...CREATE_STEPS.slice(2)];

    expect(
      () =>
        new CreateOrchestrator(
          {
            client: cloud,
            tagger: new RetryingTagger(cloud, harness.log),
            waiter: new ResourceWaiter(cloud, harness.log),
            resolver: harness.resolver,
            log: harness.log,
          },
          reordered,
        ),
    ).toThrow('Create step "subnets" produces subnet before vpc');
  });
});
