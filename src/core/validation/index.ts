export * from "./snapshot-validator";
