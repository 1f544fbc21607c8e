import fs from "fs-extra";
import path from "path";
import type { ISnapshotSource } from "../client/aws-snapshot-source";
import type { TopologyHandle, TopologyLogCallback } from "../types";

export type SnapshotKind = "caller-identity" | "instances" | "subnets" | "route-tables";

export function snapshotFileName(prefix: string, kind: SnapshotKind): string {
  return `${prefix}-${kind}.json`;
}

/**
 * Writes one JSON file per describe call for a resolved topology, in the
 * order caller identity, instances, subnets, route tables.
 */
export class SnapshotCollector {
  constructor(
    private readonly source: ISnapshotSource,
    private readonly log: TopologyLogCallback,
  ) {}

  async collect(handle: TopologyHandle, outputDir: string): Promise<string[]> {
    await fs.ensureDir(outputDir);

    const queries: Array<[SnapshotKind, () => Promise<unknown>]> = [
      ["caller-identity", () => this.source.callerIdentity()],
      ["instances", () => this.source.instances(handle.vpcId)],
      ["subnets", () => this.source.subnets(handle.vpcId)],
      ["route-tables", () => this.source.routeTables(handle.vpcId)],
    ];

    const written: string[] = [];
    for (const [kind, query] of queries) {
      const response = await query();
      const file = path.join(outputDir, snapshotFileName(handle.prefix, kind));
      await fs.writeJson(file, response, { spaces: 2 });
      this.log(`Saved: ${file}`);
      written.push(file);
    }

    this.log("All outputs collected.");
    return written;
  }
}
