export const NETSTACK_VERSION = "0.1.0";
