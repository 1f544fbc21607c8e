/**
 * Factory that wires AWS SDK clients and injects them into the topology
 * services.
 *
 * `create()` builds the SDK clients for a region; `fromClients()` takes
 * already-built ones, which is how tests swap in an in-process cloud.
 */

import { EC2Client } from "@aws-sdk/client-ec2";
import { STSClient } from "@aws-sdk/client-sts";
import { Ec2NetworkClient } from "./client/ec2-network-client";
import { AwsSnapshotSource, type ISnapshotSource } from "./client/aws-snapshot-source";
import type { INetworkCloudClient } from "./client/network-cloud-client.interface";
import { SnapshotCollector } from "./collect/snapshot-collector";
import { CreateOrchestrator } from "./orchestrator/create-orchestrator";
import { TeardownOrchestrator } from "./orchestrator/teardown-orchestrator";
import { TopologyResolver } from "./resolver/topology-resolver";
import { RetryingTagger, type RetryingTaggerOptions } from "./tagging/retrying-tagger";
import { ResourceWaiter, type ResourceWaiterOptions } from "./waiter/resource-waiter";
import type { TopologyLogCallback } from "./types";

export interface TopologyServices {
  client: INetworkCloudClient;
  resolver: TopologyResolver;
  creator: CreateOrchestrator;
  destroyer: TeardownOrchestrator;
  collector: SnapshotCollector;
}

export interface TopologyServiceConfig {
  region: string;
  log: TopologyLogCallback;
  /** Falls back to the SDK's default credential provider chain */
  credentials?: { accessKeyId: string; secretAccessKey: string; sessionToken?: string };
  tagger?: RetryingTaggerOptions;
  waiter?: ResourceWaiterOptions;
}

export class TopologyServiceFactory {
  static create(config: TopologyServiceConfig): TopologyServices {
    const clientConfig = { region: config.region, credentials: config.credentials };
    const ec2 = new EC2Client(clientConfig);
    const sts = new STSClient(clientConfig);

    return TopologyServiceFactory.fromClients(
      new Ec2NetworkClient(ec2),
      new AwsSnapshotSource(ec2, sts),
      config,
    );
  }

  static fromClients(
    client: INetworkCloudClient,
    snapshotSource: ISnapshotSource,
    config: TopologyServiceConfig,
  ): TopologyServices {
    const { region, log } = config;
    const tagger = new RetryingTagger(client, log, config.tagger);
    const waiter = new ResourceWaiter(client, log, config.waiter);
    const resolver = new TopologyResolver(client, region);

    return {
      client,
      resolver,
      creator: new CreateOrchestrator({ client, tagger, waiter, resolver, log }),
      destroyer: new TeardownOrchestrator({ client, waiter, resolver, log }),
      collector: new SnapshotCollector(snapshotSource, log),
    };
  }
}
