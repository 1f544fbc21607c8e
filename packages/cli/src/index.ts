#!/usr/bin/env node

import { Command, CommanderError } from "commander";
import { NETSTACK_VERSION } from "@netstack/topology";
import { create } from "./commands/create";
import { collect } from "./commands/collect";
import { teardown } from "./commands/teardown";
import { plan } from "./commands/plan";
import { formatError } from "./format";

const program = new Command();

program
  .name("netstack")
  .description("Build, inspect and tear down a two-tier VPC topology on AWS")
  .version(NETSTACK_VERSION);

program
  .command("create")
  .description("Create the VPC, subnets, gateways, route tables, security groups and instances")
  .requiredOption("-r, --region <region>", "AWS region", process.env.AWS_REGION)
  .requiredOption("-p, --prefix <prefix>", "Name prefix applied to every resource")
  .requiredOption("-k, --key-name <name>", "Existing EC2 key pair for both instances")
  .option("--ssh-cidr <cidr>", "Source CIDR allowed to SSH into the public instance")
  .option("--image-id <ami>", "AMI for both instances")
  .option("--instance-type <type>", "Instance type for both instances")
  .action(create);

program
  .command("collect")
  .description("Write JSON snapshots of a topology's instances, subnets and route tables")
  .requiredOption("-r, --region <region>", "AWS region", process.env.AWS_REGION)
  .requiredOption("-p, --prefix <prefix>", "Name prefix of the topology")
  .option("-o, --out-dir <dir>", "Directory for the snapshot files")
  .action(collect);

program
  .command("teardown")
  .description("Delete every resource of a topology, continuing past individual failures")
  .requiredOption("-r, --region <region>", "AWS region", process.env.AWS_REGION)
  .requiredOption("-p, --prefix <prefix>", "Name prefix of the topology")
  .option("--vpc-id <id>", "Pick one VPC when several carry the prefix label")
  .option("--json", "Print the teardown report as JSON")
  .action(teardown);

program
  .command("plan")
  .description("Show create and teardown order without calling AWS")
  .action(plan);

program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // commander has already printed its own message
      if (error.code !== "commander.help" && error.code !== "commander.version" && error.code !== "commander.helpDisplayed") {
        process.exit(error.exitCode || 1);
      }
      return;
    }
    for (const line of formatError(error)) console.error(line);
    process.exit(1);
  }
}

void main();
