/**
 * Shared option parsing for commands that take limit flags
 */

import { ConfigError } from "@sealbox/shared";
import { parseCapabilityList, parsePreset, type ConfigOverrides } from "../../config/load.js";

export interface LimitFlags {
  maxSize?: string;
  memory?: string;
  timeout?: string;
  fuel?: string;
  capabilities?: string;
  preset?: string;
}

function numberFlag(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ConfigError(`--${flag} must be a number, got "${raw}"`);
  }
  return value;
}

export function flagOverrides(flags: LimitFlags): ConfigOverrides {
  return {
    max_module_size_kb: numberFlag("max-size", flags.maxSize),
    memory_limit_mb: numberFlag("memory", flags.memory),
    execution_time_ms: numberFlag("timeout", flags.timeout),
    fuel_limit: numberFlag("fuel", flags.fuel),
    capabilities: flags.capabilities === undefined ? undefined : parseCapabilityList(flags.capabilities),
    preset: flags.preset === undefined ? undefined : parsePreset("--preset", flags.preset),
  };
}
