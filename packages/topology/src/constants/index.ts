/**
 * Constants Module
 *
 * Re-exports timeouts, topology defaults and resource naming.
 */

export * from "./timeouts";
export * from "./defaults";
export * from "./labels";
export * from "./version";
