/**
 * Error types shared by the topology orchestrators.
 *
 * AWS SDK v3 service exceptions carry the EC2 error code in `name`
 * (e.g. "InvalidVpcID.NotFound"), so `errorCode()` reads it from there.
 */

export enum TopologyErrorType {
  VALIDATION = "VALIDATION",
  NOT_FOUND = "NOT_FOUND",
  ALREADY_EXISTS = "ALREADY_EXISTS",
  AMBIGUOUS = "AMBIGUOUS",
  TIMEOUT = "TIMEOUT",
  PROVIDER = "PROVIDER",
  INTERNAL = "INTERNAL",
}

export class TopologyError extends Error {
  constructor(
    message: string,
    public readonly type: TopologyErrorType,
    public readonly originalError?: unknown,
    public readonly suggestions?: string[],
  ) {
    super(message);
    this.name = "TopologyError";
  }
}

/**
 * EC2 error code of an SDK exception, or "" when there is none.
 */
export function errorCode(err: unknown): string {
  if (err instanceof TopologyError) return "";
  if (err instanceof Error) return err.name;
  return "";
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

/** True for the `*.NotFound` family and the NAT gateway's `NatGatewayNotFound`. */
export function isNotFoundError(err: unknown): boolean {
  return errorCode(err).includes("NotFound");
}

export function isTopologyError(err: unknown, type?: TopologyErrorType): err is TopologyError {
  return err instanceof TopologyError && (type === undefined || err.type === type);
}
