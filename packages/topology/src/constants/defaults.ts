/**
 * Default values for the provisioned topology.
 */

// Address plan
export const DEFAULT_VPC_CIDR = "10.0.0.0/16";
export const DEFAULT_PUBLIC_SUBNET_CIDR = "10.0.1.0/24";
export const DEFAULT_PRIVATE_SUBNET_CIDR = "10.0.2.0/24";

// Placement: suffix appended to the region to form the availability zone
export const DEFAULT_PUBLIC_ZONE_SUFFIX = "a";
export const DEFAULT_PRIVATE_ZONE_SUFFIX = "c";

// Access
export const DEFAULT_SSH_CIDR = "0.0.0.0/0";
export const SSH_PORT = 22;
export const DEFAULT_ROUTE_CIDR = "0.0.0.0/0";

// Compute
export const DEFAULT_IMAGE_ID = "ami-0b09bf4b909f29738";
export const DEFAULT_INSTANCE_TYPE = "t3.micro";
export const DEFAULT_USER_DATA = "#!/bin/bash\nyum update -y\n";

// Collect
export const DEFAULT_OUTPUT_DIR = ".";

// The VPC's implicit security group; cannot be deleted
export const DEFAULT_SECURITY_GROUP_NAME = "default";
