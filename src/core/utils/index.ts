export * from "./array";
export * from "./date";
export * from "./html";
export * from "./logger";
export * from "./retry";
