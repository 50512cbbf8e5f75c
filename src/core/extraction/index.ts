export * from "./menu";
export * from "./prices";
