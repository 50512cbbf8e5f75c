export * from "./console";
export * from "./export";
export * from "./format";
export * from "./html";
