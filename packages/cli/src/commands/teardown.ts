import chalk from "chalk";
import ora from "ora";
import { teardownTopology } from "@netstack/topology";
import { formatTeardownReport } from "../format";
import { createConsoleLogger } from "../logger";

export interface TeardownCommandOptions {
  region: string;
  prefix: string;
  vpcId?: string;
  json?: boolean;
}

/**
 * Failures of individual resources are part of the report, not of the exit
 * status; only resolution errors make the command fail.
 */
export async function teardown(options: TeardownCommandOptions): Promise<void> {
  const input = { region: options.region, prefix: options.prefix, vpcId: options.vpcId };

  if (options.json) {
    const report = await teardownTopology(input, createConsoleLogger({ stderrOnly: true }));
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log(chalk.blue.bold(`Tearing down network topology "${options.prefix}"\n`));
  const spinner = ora("Resolving topology...").start();
  try {
    const report = await teardownTopology(input, createConsoleLogger({ spinner }));
    if (report.failures > 0) spinner.warn("Teardown finished with failures");
    else spinner.succeed("Teardown finished");

    console.log();
    for (const line of formatTeardownReport(report)) console.log(line);
  } catch (error) {
    spinner.fail("Teardown could not start");
    throw error;
  }
}
