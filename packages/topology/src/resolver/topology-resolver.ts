import { vpcName } from "../constants";
import { TopologyError, TopologyErrorType } from "../errors";
import type { INetworkCloudClient } from "../client/network-cloud-client.interface";
import type { TopologyHandle } from "../types";

export interface ResolveOptions {
  /** Select one VPC when several carry the prefix label */
  vpcId?: string;
}

/**
 * Resolves a prefix to its live topology with a single label lookup.
 *
 * Several VPCs carrying the same `<prefix>-vpc` label (stragglers from an
 * interrupted teardown, or operator error) is an error unless the caller
 * names the one it means.
 */
export class TopologyResolver {
  constructor(
    private readonly client: INetworkCloudClient,
    private readonly region: string,
  ) {}

  async resolve(prefix: string, options: ResolveOptions = {}): Promise<TopologyHandle | null> {
    const name = vpcName(prefix);
    const matches = await this.client.findVpcsByName(name);

    if (options.vpcId) {
      // A selected VPC that no longer carries the label resolves to nothing
      const selected = matches.find((vpc) => vpc.vpcId === options.vpcId);
      return selected ? this.handle(prefix, name, selected.vpcId) : null;
    }

    if (matches.length === 0) return null;
    if (matches.length > 1) {
      const ids = matches.map((v) => v.vpcId);
      throw new TopologyError(
        `${matches.length} VPCs carry the label Name=${name} in ${this.region}: ${ids.join(", ")}`,
        TopologyErrorType.AMBIGUOUS,
        undefined,
        [`Pass --vpc-id with one of: ${ids.join(", ")}`],
      );
    }
    return this.handle(prefix, name, matches[0].vpcId);
  }

  /** Like `resolve`, but a missing topology is an error */
  async require(prefix: string, options: ResolveOptions = {}): Promise<TopologyHandle> {
    const handle = await this.resolve(prefix, options);
    if (!handle) {
      throw new TopologyError(
        `No VPC with Name tag '${vpcName(prefix)}' found in region ${this.region}.`,
        TopologyErrorType.NOT_FOUND,
      );
    }
    return handle;
  }

  private handle(prefix: string, name: string, vpcId: string): TopologyHandle {
    return { region: this.region, prefix, vpcId, vpcName: name };
  }
}
