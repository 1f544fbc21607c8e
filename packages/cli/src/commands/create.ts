import chalk from "chalk";
import ora from "ora";
import { createTopology } from "@netstack/topology";
import { formatCreateResult } from "../format";
import { createConsoleLogger } from "../logger";

export interface CreateCommandOptions {
  region: string;
  prefix: string;
  keyName: string;
  sshCidr?: string;
  imageId?: string;
  instanceType?: string;
}

export async function create(options: CreateCommandOptions): Promise<void> {
  console.log(chalk.blue.bold(`Creating network topology "${options.prefix}"\n`));

  const spinner = ora("Provisioning...").start();
  try {
    const result = await createTopology(
      {
        region: options.region,
        prefix: options.prefix,
        keyName: options.keyName,
        sshCidr: options.sshCidr,
        imageId: options.imageId,
        instanceType: options.instanceType,
      },
      createConsoleLogger({ spinner }),
    );
    spinner.succeed(`Topology "${result.prefix}" is up`);

    console.log();
    for (const line of formatCreateResult(result)) console.log(line);
  } catch (error) {
    spinner.fail("Create stopped; resources created so far are left in place");
    console.log(chalk.gray(`  Run 'netstack teardown --region ${options.region} --prefix ${options.prefix}' to clean up.`));
    throw error;
  }
}
