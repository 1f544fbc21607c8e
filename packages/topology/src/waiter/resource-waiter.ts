/**
 * Resource Waiter: blocks until NAT gateways or instances reach a
 * terminal state. Every wait is a predicate over described state run
 * through `waitFor`.
 */

import {
  INSTANCE_TERMINATED_TIMEOUT_MS,
  NAT_GATEWAY_AVAILABLE_TIMEOUT_MS,
  NAT_GATEWAY_DELETED_TIMEOUT_MS,
  WAITER_POLL_INTERVAL_MS,
} from "../constants";
import { TopologyError, TopologyErrorType, isNotFoundError } from "../errors";
import type { INetworkCloudClient } from "../client/network-cloud-client.interface";
import type { TopologyLogCallback } from "../types";
import { waitFor } from "./wait-for";

export interface ResourceWaiterOptions {
  pollIntervalMs?: number;
  natGatewayAvailableTimeoutMs?: number;
  natGatewayDeletedTimeoutMs?: number;
  instanceTerminatedTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class ResourceWaiter {
  private readonly pollIntervalMs: number;
  private readonly natGatewayAvailableTimeoutMs: number;
  private readonly natGatewayDeletedTimeoutMs: number;
  private readonly instanceTerminatedTimeoutMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly client: INetworkCloudClient,
    private readonly log: TopologyLogCallback,
    options: ResourceWaiterOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? WAITER_POLL_INTERVAL_MS;
    this.natGatewayAvailableTimeoutMs =
      options.natGatewayAvailableTimeoutMs ?? NAT_GATEWAY_AVAILABLE_TIMEOUT_MS;
    this.natGatewayDeletedTimeoutMs =
      options.natGatewayDeletedTimeoutMs ?? NAT_GATEWAY_DELETED_TIMEOUT_MS;
    this.instanceTerminatedTimeoutMs =
      options.instanceTerminatedTimeoutMs ?? INSTANCE_TERMINATED_TIMEOUT_MS;
    this.sleep = options.sleep;
  }

  /**
   * Wait until every gateway is `available`. A gateway that lands in
   * `failed` or `deleted` can never become available, so it fails the wait
   * at once.
   */
  async natGatewaysAvailable(natGatewayIds: string[]): Promise<void> {
    if (natGatewayIds.length === 0) return;
    await waitFor(
      async () => {
        const gateways = await this.client.describeNatGateways(natGatewayIds);
        const dead = gateways.find((g) => g.state === "failed" || g.state === "deleted");
        if (dead) {
          throw new TopologyError(
            `NAT gateway ${dead.natGatewayId} entered state "${dead.state}"`,
            TopologyErrorType.PROVIDER,
          );
        }
        return (
          gateways.length === natGatewayIds.length &&
          gateways.every((g) => g.state === "available")
        );
      },
      this.waitOptions(`NAT gateway(s) ${natGatewayIds.join(", ")} available`, this.natGatewayAvailableTimeoutMs),
    );
  }

  /** Wait until every gateway is `deleted` or no longer described. */
  async natGatewaysDeleted(natGatewayIds: string[]): Promise<void> {
    if (natGatewayIds.length === 0) return;
    await waitFor(
      async () => {
        try {
          const gateways = await this.client.describeNatGateways(natGatewayIds);
          return gateways.every((g) => g.state === "deleted");
        } catch (error) {
          if (isNotFoundError(error)) return true;
          throw error;
        }
      },
      this.waitOptions(`NAT gateway(s) ${natGatewayIds.join(", ")} deleted`, this.natGatewayDeletedTimeoutMs),
    );
  }

  /** Wait until every instance is `terminated` or no longer described. */
  async instancesTerminated(instanceIds: string[]): Promise<void> {
    if (instanceIds.length === 0) return;
    await waitFor(
      async () => {
        try {
          const instances = await this.client.describeInstances(instanceIds);
          return instances.every((i) => i.state === "terminated");
        } catch (error) {
          if (isNotFoundError(error)) return true;
          throw error;
        }
      },
      this.waitOptions(`instance(s) ${instanceIds.join(", ")} terminated`, this.instanceTerminatedTimeoutMs),
    );
  }

  private waitOptions(description: string, timeoutMs: number) {
    return {
      description,
      timeoutMs,
      pollIntervalMs: this.pollIntervalMs,
      log: this.log,
      sleep: this.sleep,
    };
  }
}
