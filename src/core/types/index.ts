/**
 * Type exports
 */

export type * from "./menu";
export type * from "./config";
