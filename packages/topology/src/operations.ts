/**
 * Entry points for callers (the CLI): validate options, build services for
 * the requested region, run one operation.
 */

import {
  type CollectOptionsInput,
  type CreateOptionsInput,
  type TeardownOptionsInput,
  CollectOptionsSchema,
  CreateOptionsSchema,
  TeardownOptionsSchema,
  parseOptions,
} from "./config/topology-config";
import { TopologyServiceFactory, type TopologyServices } from "./topology-service-factory";
import type { CreateResult, TeardownReport, TopologyLogCallback } from "./types";

export type ServicesBuilder = (region: string, log: TopologyLogCallback) => TopologyServices;

const defaultBuilder: ServicesBuilder = (region, log) =>
  TopologyServiceFactory.create({ region, log });

/** Build the topology; the first unrecoverable error propagates. */
export async function createTopology(
  input: CreateOptionsInput,
  log: TopologyLogCallback,
  build: ServicesBuilder = defaultBuilder,
): Promise<CreateResult> {
  const options = parseOptions(CreateOptionsSchema, input);
  return build(options.region, log).creator.create(options);
}

/** Best-effort teardown; only option validation and resolution can throw. */
export async function teardownTopology(
  input: TeardownOptionsInput,
  log: TopologyLogCallback,
  build: ServicesBuilder = defaultBuilder,
): Promise<TeardownReport> {
  const options = parseOptions(TeardownOptionsSchema, input);
  return build(options.region, log).destroyer.teardown(options);
}

/** Export snapshots; fails with NOT_FOUND when the prefix labels no VPC. */
export async function collectTopology(
  input: CollectOptionsInput,
  log: TopologyLogCallback,
  build: ServicesBuilder = defaultBuilder,
): Promise<string[]> {
  const options = parseOptions(CollectOptionsSchema, input);
  const services = build(options.region, log);
  const handle = await services.resolver.require(options.prefix);
  return services.collector.collect(handle, options.outputDir);
}
