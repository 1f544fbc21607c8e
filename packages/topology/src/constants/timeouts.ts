/**
 * Timeout constants for topology waits.
 *
 * Values match the EC2 service waiters: 15s polls, 40 attempts.
 */

/** Polling interval for NAT gateway and instance state */
export const WAITER_POLL_INTERVAL_MS = 15_000;

/** Maximum time to wait for a NAT gateway to become available (10 minutes) */
export const NAT_GATEWAY_AVAILABLE_TIMEOUT_MS = 600_000;

/** Maximum time to wait for NAT gateways to be deleted (10 minutes) */
export const NAT_GATEWAY_DELETED_TIMEOUT_MS = 600_000;

/** Maximum time to wait for instances to terminate (10 minutes) */
export const INSTANCE_TERMINATED_TIMEOUT_MS = 600_000;

/** Tagging retry: attempts before an eventual-consistency miss becomes fatal */
export const TAG_MAX_ATTEMPTS = 5;

/** Tagging retry: attempt N sleeps (1 + N) units */
export const TAG_BACKOFF_UNIT_MS = 1_000;
