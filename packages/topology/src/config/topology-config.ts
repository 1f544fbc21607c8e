import { z } from "zod";
import {
  DEFAULT_IMAGE_ID,
  DEFAULT_INSTANCE_TYPE,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PRIVATE_SUBNET_CIDR,
  DEFAULT_PRIVATE_ZONE_SUFFIX,
  DEFAULT_PUBLIC_SUBNET_CIDR,
  DEFAULT_PUBLIC_ZONE_SUFFIX,
  DEFAULT_SSH_CIDR,
  DEFAULT_USER_DATA,
  DEFAULT_VPC_CIDR,
} from "../constants";
import { TopologyError, TopologyErrorType } from "../errors";

const cidrSchema = z
  .string()
  .regex(/^(\d{1,3}\.){3}\d{1,3}\/\d{1,2}$/, "Must be an IPv4 CIDR block (e.g. 10.0.0.0/16)");

export const RegionSchema = z
  .string()
  .regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, "Must be an AWS region (e.g. us-west-1)");

// Security group names are built from the prefix, which bounds its length
export const PrefixSchema = z
  .string()
  .min(1)
  .max(32)
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9-]*$/,
    "Prefix must be alphanumeric with hyphens and start with a letter or digit",
  );

export const SubnetPlanSchema = z.object({
  cidrBlock: cidrSchema,
  zoneSuffix: z.string().regex(/^[a-z]$/, "Zone suffix must be a single letter"),
});

export type SubnetPlan = z.infer<typeof SubnetPlanSchema>;

export const CreateOptionsSchema = z.object({
  region: RegionSchema,
  prefix: PrefixSchema,
  keyName: z.string().min(1, "An existing EC2 key pair name is required"),
  vpcCidr: cidrSchema.default(DEFAULT_VPC_CIDR),
  publicSubnet: SubnetPlanSchema.default({
    cidrBlock: DEFAULT_PUBLIC_SUBNET_CIDR,
    zoneSuffix: DEFAULT_PUBLIC_ZONE_SUFFIX,
  }),
  privateSubnet: SubnetPlanSchema.default({
    cidrBlock: DEFAULT_PRIVATE_SUBNET_CIDR,
    zoneSuffix: DEFAULT_PRIVATE_ZONE_SUFFIX,
  }),
  sshCidr: cidrSchema.default(DEFAULT_SSH_CIDR),
  imageId: z.string().regex(/^ami-[0-9a-f]+$/, "Must be an AMI ID").default(DEFAULT_IMAGE_ID),
  instanceType: z.string().min(1).default(DEFAULT_INSTANCE_TYPE),
  userData: z.string().default(DEFAULT_USER_DATA),
});

export type CreateOptionsInput = z.input<typeof CreateOptionsSchema>;
export type CreateOptions = z.infer<typeof CreateOptionsSchema>;

export const TeardownOptionsSchema = z.object({
  region: RegionSchema,
  prefix: PrefixSchema,
  /** Picks one VPC when several carry the prefix label */
  vpcId: z.string().regex(/^vpc-[0-9a-f]+$/, "Must be a VPC ID").optional(),
});

export type TeardownOptionsInput = z.input<typeof TeardownOptionsSchema>;
export type TeardownOptions = z.infer<typeof TeardownOptionsSchema>;

export const CollectOptionsSchema = z.object({
  region: RegionSchema,
  prefix: PrefixSchema,
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
});

export type CollectOptionsInput = z.input<typeof CollectOptionsSchema>;
export type CollectOptions = z.infer<typeof CollectOptionsSchema>;

/**
 * Parse options against a schema, turning validation issues into a
 * `TopologyError(VALIDATION)` that lists every offending field.
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new TopologyError(
      `Invalid options: ${issues.join("; ")}`,
      TopologyErrorType.VALIDATION,
      result.error,
      issues,
    );
  }
  return result.data;
}

export function availabilityZone(region: string, subnet: SubnetPlan): string {
  return `${region}${subnet.zoneSuffix}`;
}
