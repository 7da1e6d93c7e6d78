/**
 * Capability sandbox - decides which imports a capsule may bind and records
 * every host call the capsule makes
 */

import type { Logger } from "pino";
import {
  SecurityError,
  type AccessLogEntry,
  type Capability,
  type HostEnvironment,
  type HostFunctionName,
  type ModuleImport,
} from "@sealbox/shared";
import { allowList, allowsImport, grantedFunctions, HOST_FUNCTION_CAPABILITY, isHostFunctionName } from "./capabilities.js";
import { createHostFunctions, type HostCall, type HostCallResult, type HostFunctionImpl } from "./host-functions.js";
import { silentLogger } from "../logger.js";

export class CapabilitySandbox {
  readonly capabilities: readonly Capability[];
  private logger: Logger;

  constructor(capabilities: readonly Capability[], options: { logger?: Logger } = {}) {
    this.capabilities = [...new Set(capabilities)];
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Allow-list in `namespace::name` form
   */
  allowList(): string[] {
    return allowList(this.capabilities);
  }

  allowsImport(namespace: string, name: string): boolean {
    return allowsImport(this.capabilities, namespace, name);
  }

  /**
   * Resolve a module's imports to host functions for a single execution.
   *
   * @throws SecurityError when any import falls outside the capability set
   */
  bind(imports: readonly ModuleImport[], env: HostEnvironment): BoundImports {
    const names: HostFunctionName[] = [];
    for (const entry of imports) {
      if (!this.allowsImport(entry.namespace, entry.name) || !isHostFunctionName(entry.name)) {
        this.logger.warn({ import: `${entry.namespace}::${entry.name}` }, "Import denied by capability set");
        throw new SecurityError(entry.namespace, entry.name);
      }
      if (!names.includes(entry.name)) names.push(entry.name);
    }
    return new BoundImports(names, createHostFunctions(env), this.logger);
  }

  /**
   * Every host function the capability set grants
   */
  grantedFunctions(): HostFunctionName[] {
    return grantedFunctions(this.capabilities);
  }
}

/**
 * Host functions bound for one execution, with the access log the calls produce
 */
export class BoundImports {
  private entries: AccessLogEntry[] = [];

  constructor(
    readonly names: readonly HostFunctionName[],
    private implementations: Record<HostFunctionName, HostFunctionImpl>,
    private logger: Logger
  ) {}

  get accessLog(): readonly AccessLogEntry[] {
    return this.entries;
  }

  get callCount(): number {
    return this.entries.length;
  }

  /**
   * Run a bound host function; the call is logged even when it fails
   */
  invoke(name: HostFunctionName, call: HostCall): HostCallResult {
    const capability = HOST_FUNCTION_CAPABILITY.get(name);
    if (!this.names.includes(name) || capability === undefined) {
      throw new SecurityError("env", name);
    }
    const entry: AccessLogEntry = { seq: this.entries.length + 1, capability, function: name };
    this.entries.push(entry);
    this.logger.debug(entry, "Host function call");
    return this.implementations[name](call);
  }
}
