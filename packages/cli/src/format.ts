import chalk from "chalk";
import {
  CREATE_STEPS,
  TEARDOWN_STEPS,
  TOPOLOGY_GRAPH,
  createOrder,
  errorMessage,
  isTopologyError,
  vpcName,
  type CreateResult,
  type TeardownReport,
  type TopologyIds,
} from "@netstack/topology";

const RESOURCE_LABELS: ReadonlyArray<[keyof TopologyIds, string]> = [
  ["vpcId", "VPC"],
  ["publicSubnetId", "Public subnet"],
  ["privateSubnetId", "Private subnet"],
  ["internetGatewayId", "Internet gateway"],
  ["allocationId", "Elastic IP"],
  ["natGatewayId", "NAT gateway"],
  ["publicRouteTableId", "Main route table"],
  ["privateRouteTableId", "Private route table"],
  ["publicSecurityGroupId", "Public security group"],
  ["privateSecurityGroupId", "Private security group"],
  ["publicInstanceId", "Public instance"],
  ["privateInstanceId", "Private instance"],
];

export function formatCreateResult(result: CreateResult): string[] {
  return [
    chalk.bold(`Resources for "${result.prefix}" in ${result.region}:`),
    ...RESOURCE_LABELS.map(
      ([key, label]) => `  ${label.padEnd(24)}${chalk.cyan(result.resources[key])}`,
    ),
  ];
}

export function formatTeardownReport(report: TeardownReport): string[] {
  if (report.status === "nothing-to-do") {
    return [
      chalk.gray(
        `No VPC labelled ${vpcName(report.prefix)} in ${report.region}; nothing to tear down.`,
      ),
    ];
  }

  const lines = [chalk.bold(`Teardown of "${report.prefix}" (${report.vpcId}) in ${report.region}:`)];
  for (const step of report.steps) {
    const count = (status: string) => step.actions.filter((a) => a.status === status).length;
    const failed = count("failed");
    const summary = `${count("succeeded")} done, ${count("skipped-not-found")} already gone, ${failed} failed`;
    lines.push(`  ${step.step.padEnd(18)}${failed > 0 ? chalk.red(summary) : chalk.green(summary)}`);
  }

  lines.push("");
  if (report.failures === 0) {
    lines.push(chalk.green("All resources removed."));
    return lines;
  }

  lines.push(chalk.red(`${report.failures} action(s) failed:`));
  for (const step of report.steps) {
    for (const action of step.actions) {
      if (action.status !== "failed") continue;
      lines.push(chalk.red(`  ✗ ${action.action} ${action.resourceId}: ${action.reason ?? "unknown error"}`));
    }
  }
  lines.push(chalk.yellow("Re-run teardown for the same prefix to retry the remaining resources."));
  return lines;
}

export function formatPlan(): string[] {
  const lines = [chalk.bold("Create order:")];
  CREATE_STEPS.forEach((step, index) => {
    lines.push(`  ${index + 1}. ${step.description} ${chalk.gray(`[${step.kinds.join(", ")}]`)}`);
  });

  lines.push("", chalk.bold("Teardown order:"));
  TEARDOWN_STEPS.forEach((step, index) => {
    lines.push(`  ${index + 1}. ${step.description} ${chalk.gray(`[${step.kinds.join(", ")}]`)}`);
  });

  lines.push("", chalk.bold("Dependencies:"));
  for (const kind of createOrder()) {
    const { dependsOn, references } = TOPOLOGY_GRAPH[kind];
    const parts: string[] = [];
    if (dependsOn.length > 0) parts.push(`depends on ${dependsOn.join(", ")}`);
    if (references.length > 0) parts.push(`routes to ${references.join(", ")}`);
    lines.push(`  ${kind.padEnd(18)}${parts.length > 0 ? parts.join("; ") : chalk.gray("none")}`);
  }
  return lines;
}

export function formatError(error: unknown): string[] {
  const lines = [`${chalk.red("Error:")} ${errorMessage(error)}`];
  if (isTopologyError(error)) {
    for (const suggestion of error.suggestions ?? []) {
      lines.push(chalk.yellow(`  ${suggestion}`));
    }
  }
  return lines;
}
