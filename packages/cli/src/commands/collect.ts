import chalk from "chalk";
import ora from "ora";
import { collectTopology } from "@netstack/topology";
import { createConsoleLogger } from "../logger";

export interface CollectCommandOptions {
  region: string;
  prefix: string;
  outDir?: string;
}

export async function collect(options: CollectCommandOptions): Promise<void> {
  const spinner = ora(`Collecting snapshots for "${options.prefix}"...`).start();
  try {
    const files = await collectTopology(
      { region: options.region, prefix: options.prefix, outputDir: options.outDir },
      createConsoleLogger({ spinner }),
    );
    spinner.succeed(`Wrote ${files.length} snapshot file(s)`);
    for (const file of files) console.log(chalk.gray(`  ${file}`));
  } catch (error) {
    spinner.fail(chalk.red("Collect failed"));
    throw error;
  }
}
