import { describe, expect, it } from "vitest";
import {
  DEFAULT_LIMITS,
  ExecutionError,
  PRODUCTION_LIMITS,
  SecurityError,
  ValidationError,
  createLimits,
  isSealboxError,
} from "../src/index.js";

const metrics = { fuel_used: 0, memory_mb: 0, duration_ms: 0, host_calls: 0 };

describe("createLimits", () => {
  it("fills unset fields from the base and freezes the result", () => {
    const limits = createLimits({ fuelLimit: 42 });
    expect(limits).toEqual({ ...DEFAULT_LIMITS, fuelLimit: 42 });
    expect(Object.isFrozen(limits)).toBe(true);
    expect(Object.isFrozen(limits.capabilities)).toBe(true);
  });

  it("deduplicates capabilities", () => {
    expect(createLimits({ capabilities: ["Hash", "Hash", "Json"] }).capabilities).toEqual(["Hash", "Json"]);
  });

  it("builds on a preset", () => {
    expect(createLimits({ executionTimeMs: 100 }, PRODUCTION_LIMITS)).toEqual({
      memoryLimitMb: 16,
      executionTimeMs: 100,
      fuelLimit: 500_000,
      capabilities: ["Hash"],
    });
  });
});

describe("errors", () => {
  it("labels resource errors with their resource", () => {
    expect(new ExecutionError("ResourceExceeded", "out of fuel", metrics, "Fuel").label).toBe("ResourceExceeded(Fuel)");
    expect(new ExecutionError("Trap", "unreachable", metrics).label).toBe("Trap");
  });

  it("names errors after their class", () => {
    const error = new SecurityError("env", "time_now_ms");
    expect(error.name).toBe("SecurityError");
    expect(error.code).toBe("CapabilityDenied");
    expect(error.message).toBe("Import env::time_now_ms is not granted by the capability set");
  });

  it("recognises its own errors", () => {
    expect(isSealboxError(new ValidationError("TooLarge", "big"))).toBe(true);
    expect(isSealboxError(new Error("plain"))).toBe(false);
  });
});
