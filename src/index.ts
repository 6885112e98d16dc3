/**
 * Virtual-reserve bonding curve math.
 *
 * Exact bigint pricing and fills for a constant-product curve with a virtual
 * token reserve.
 */

export * from "./constants";
export * from "./errors";
export * from "./wide";
export * from "./curve";
export * from "./fill";
export * from "./analytics";
