export * from "./menu-diff";
export * from "./price-diff";
