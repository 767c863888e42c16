import { RegistrationClosedError, RegistrationError, RegistryNotReadyError } from "../errors.js";
import type { CapabilityDescriptor, CapabilitySummary } from "../types/intent.js";
import type { CapabilityModule } from "../types/modules.js";

interface Entry {
  descriptor: CapabilityDescriptor;
  module: CapabilityModule;
}

/**
 * Startup-time registry of capability modules, keyed by module name.
 *
 * Two phases: `register` is allowed until `close()`, lookups only after.
 * Once closed nothing mutates, so concurrent commands read it freely.
 */
export class CapabilityRegistry {
  private readonly entries = new Map<string, Entry>();
  private closed = false;

  register(module: CapabilityModule): CapabilityDescriptor {
    const d = module.descriptor;
    if (this.closed) throw new RegistrationClosedError(d.name);
    if (!d.name.trim()) throw new RegistrationError("module name must not be empty");
    if (this.entries.has(d.name)) throw new RegistrationError(`module '${d.name}' is already registered`);
    if (Object.keys(d.actions).length === 0) throw new RegistrationError(`module '${d.name}' declares no actions`);

    for (const name of [...d.destructiveActions, ...d.idempotentActions]) {
      if (!Object.hasOwn(d.actions, name)) {
        throw new RegistrationError(`module '${d.name}' flags undeclared action '${name}'`);
      }
    }
    const both = d.destructiveActions.filter(a => d.idempotentActions.includes(a));
    if (both.length) {
      throw new RegistrationError(`module '${d.name}' marks '${both.join("', '")}' both destructive and idempotent`);
    }

    const descriptor = deepFreeze(structuredClone(d));
    this.entries.set(d.name, { descriptor, module });
    return descriptor;
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  lookup(name: string): CapabilityDescriptor | undefined {
    return this.entry(name)?.descriptor;
  }

  moduleFor(name: string): CapabilityModule | undefined {
    return this.entry(name)?.module;
  }

  isDestructive(module: string, action: string): boolean {
    return this.lookup(module)?.destructiveActions.includes(action) ?? false;
  }

  isIdempotent(module: string, action: string): boolean {
    return this.lookup(module)?.idempotentActions.includes(action) ?? false;
  }

  summaries(): CapabilitySummary[] {
    this.assertReady();
    return [...this.entries.values()].map(({ descriptor: d }) => ({
      module: d.name,
      description: d.description,
      actions: Object.entries(d.actions).map(([name, a]) => ({
        name,
        description: a.description,
        parameters: a.parameters,
        destructive: d.destructiveActions.includes(name),
      })),
    }));
  }

  private entry(name: string): Entry | undefined {
    this.assertReady();
    return this.entries.get(name);
  }

  private assertReady() {
    if (!this.closed) throw new RegistryNotReadyError();
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}
