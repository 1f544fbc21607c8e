import {
  type EC2Client,
  type DescribeInstancesCommandOutput,
  type DescribeRouteTablesCommandOutput,
  type DescribeSubnetsCommandOutput,
  DescribeInstancesCommand,
  DescribeRouteTablesCommand,
  DescribeSubnetsCommand,
} from "@aws-sdk/client-ec2";
import {
  type STSClient,
  type GetCallerIdentityCommandOutput,
  GetCallerIdentityCommand,
} from "@aws-sdk/client-sts";

/**
 * Raw describe calls exported by `collect`. Responses are returned exactly
 * as the SDK produced them.
 */
export interface ISnapshotSource {
  callerIdentity(): Promise<GetCallerIdentityCommandOutput>;
  instances(vpcId: string): Promise<DescribeInstancesCommandOutput>;
  subnets(vpcId: string): Promise<DescribeSubnetsCommandOutput>;
  routeTables(vpcId: string): Promise<DescribeRouteTablesCommandOutput>;
}

export class AwsSnapshotSource implements ISnapshotSource {
  constructor(
    private readonly ec2: EC2Client,
    private readonly sts: STSClient,
  ) {}

  callerIdentity(): Promise<GetCallerIdentityCommandOutput> {
    return this.sts.send(new GetCallerIdentityCommand({}));
  }

  instances(vpcId: string): Promise<DescribeInstancesCommandOutput> {
    return this.ec2.send(
      new DescribeInstancesCommand({ Filters: [{ Name: "vpc-id", Values: [vpcId] }] }),
    );
  }

  subnets(vpcId: string): Promise<DescribeSubnetsCommandOutput> {
    return this.ec2.send(
      new DescribeSubnetsCommand({ Filters: [{ Name: "vpc-id", Values: [vpcId] }] }),
    );
  }

  routeTables(vpcId: string): Promise<DescribeRouteTablesCommandOutput> {
    return this.ec2.send(
      new DescribeRouteTablesCommand({ Filters: [{ Name: "vpc-id", Values: [vpcId] }] }),
    );
  }
}
