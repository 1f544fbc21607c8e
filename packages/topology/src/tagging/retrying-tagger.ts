/**
 * Retrying Tagger
 *
 * Applies the `Name` label right after a resource is created. A freshly
 * created ID is not always visible to CreateTags yet, so the not-found
 * family is retried with a linear backoff; anything else is fatal and stops
 * the create.
 */

import { NAME_TAG_KEY, TAG_BACKOFF_UNIT_MS, TAG_MAX_ATTEMPTS } from "../constants";
import { errorCode, errorMessage } from "../errors";
import type { INetworkCloudClient } from "../client/network-cloud-client.interface";
import type { TopologyLogCallback } from "../types";

/** Codes EC2 returns while a new ID has not propagated yet */
export const EVENTUAL_CONSISTENCY_CODES: ReadonlySet<string> = new Set([
  "InvalidVpcID.NotFound",
  "InvalidSubnetID.NotFound",
  "InvalidRouteTableID.NotFound",
  "InvalidInternetGatewayID.NotFound",
  "InvalidGroup.NotFound",
  "InvalidNatGatewayID.NotFound",
  "InvalidAllocationID.NotFound",
]);

export interface RetryingTaggerOptions {
  maxAttempts?: number;
  /** Attempt N (zero-based) is followed by a sleep of (1 + N) units */
  backoffUnitMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class RetryingTagger {
  private readonly maxAttempts: number;
  private readonly backoffUnitMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly client: INetworkCloudClient,
    private readonly log: TopologyLogCallback,
    options: RetryingTaggerOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? TAG_MAX_ATTEMPTS;
    this.backoffUnitMs = options.backoffUnitMs ?? TAG_BACKOFF_UNIT_MS;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async tagName(resourceId: string, name: string): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        await this.client.tagResource(resourceId, { [NAME_TAG_KEY]: name });
        return;
      } catch (error) {
        const retryable = EVENTUAL_CONSISTENCY_CODES.has(errorCode(error));
        if (!retryable || attempt >= this.maxAttempts - 1) throw error;

        const delayMs = (1 + attempt) * this.backoffUnitMs;
        this.log(
          `  Tag ${resourceId} not visible yet (attempt ${attempt + 1}/${this.maxAttempts}): ${errorMessage(error)}. Retrying in ${delayMs}ms...`,
          "stderr",
        );
        await this.sleep(delayMs);
      }
    }
  }
}
