export * from "./store";
export * from "./menu-history";
export * from "./price-history";
