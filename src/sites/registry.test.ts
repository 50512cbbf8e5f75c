import { describe, expect, it } from "vitest";
import { BROWSER_CONSTANTS } from "../core/constants/index";
import { getSourceKeys, registry } from "./registry";

describe("registry", () => {
  it("should list the registered sources", () => {
    expect(getSourceKeys()).toEqual(["matochmat"]);
  });

  it("should wait for the menu with the shared ready timeout", () => {
    expect(registry.get("matochmat")?.readyTimeoutMs).toBe(BROWSER_CONSTANTS.READY_TIMEOUT_MS);
  });
});
