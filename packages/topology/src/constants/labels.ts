/**
 * Resource naming. Every resource carries `Name=<prefix>-<role>`; teardown
 * and collect find a topology only through the `<prefix>-vpc` label.
 */

export const NAME_TAG_KEY = "Name";

export const RESOURCE_ROLES = {
  VPC: "vpc",
  PUBLIC_SUBNET: "public-subnet",
  PRIVATE_SUBNET: "private-subnet",
  INTERNET_GATEWAY: "igw",
  ELASTIC_IP: "eip",
  NAT_GATEWAY: "natgw",
  MAIN_ROUTE_TABLE: "main-RTB",
  PRIVATE_ROUTE_TABLE: "rtb-private",
  PUBLIC_SECURITY_GROUP: "sg-public",
  PRIVATE_SECURITY_GROUP: "sg-private",
  PUBLIC_INSTANCE: "ec2-public",
  PRIVATE_INSTANCE: "ec2-private",
} as const;

export type ResourceRole = (typeof RESOURCE_ROLES)[keyof typeof RESOURCE_ROLES];

export function resourceName(prefix: string, role: ResourceRole): string {
  return `${prefix}-${role}`;
}

export function vpcName(prefix: string): string {
  return resourceName(prefix, RESOURCE_ROLES.VPC);
}
