// Types & errors
export * from "./types";
export * from "./errors";
export * from "./constants";

// Configuration
export * from "./config/topology-config";

// Cloud client
export type { INetworkCloudClient } from "./client/network-cloud-client.interface";
export { Ec2NetworkClient } from "./client/ec2-network-client";
export { AwsSnapshotSource } from "./client/aws-snapshot-source";
export type { ISnapshotSource } from "./client/aws-snapshot-source";

// Building blocks
export { RetryingTagger, EVENTUAL_CONSISTENCY_CODES } from "./tagging/retrying-tagger";
export type { RetryingTaggerOptions } from "./tagging/retrying-tagger";
export { waitFor } from "./waiter/wait-for";
export type { WaitOptions } from "./waiter/wait-for";
export { ResourceWaiter } from "./waiter/resource-waiter";
export type { ResourceWaiterOptions } from "./waiter/resource-waiter";
export * from "./graph/topology-graph";
export { TopologyResolver } from "./resolver/topology-resolver";
export type { ResolveOptions } from "./resolver/topology-resolver";

// Orchestrators
export { CreateOrchestrator, CREATE_STEPS } from "./orchestrator/create-orchestrator";
export type {
  CreateOrchestratorDeps,
  CreateStepDescriptor,
  CreateStepName,
} from "./orchestrator/create-orchestrator";
export {
  TeardownOrchestrator,
  TEARDOWN_STEPS,
  orderSecurityGroupsForDeletion,
} from "./orchestrator/teardown-orchestrator";
export type {
  TeardownOrchestratorDeps,
  TeardownStepDescriptor,
  TeardownStepName,
} from "./orchestrator/teardown-orchestrator";

// Collect
export { SnapshotCollector, snapshotFileName } from "./collect/snapshot-collector";
export type { SnapshotKind } from "./collect/snapshot-collector";

// Factory & operations
export { TopologyServiceFactory } from "./topology-service-factory";
export type { TopologyServices, TopologyServiceConfig } from "./topology-service-factory";
export { createTopology, teardownTopology, collectTopology } from "./operations";
export type { ServicesBuilder } from "./operations";
