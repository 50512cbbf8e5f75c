/**
 * Core module index - exports all core functionality
 */

// Constants
export * from "./constants/index";

// Errors
export * from "./errors";

// Validation
export * from "./validation/index";

// History
export * from "./history/index";

// Comparison
export * from "./compare/index";

// Extraction
export * from "./extraction/index";

// Browser
export * from "./browser/index";

// Report
export * from "./report/index";

// Services
export * from "./services/scrape-service";
export * from "./services/demo-seed";

// Utils
export * from "./utils/index";

// Config
export * from "./config/index";
