import type { AppConfig } from "../config.js";
import { CapabilityRegistry } from "../registry/capabilities.js";
import type { CapabilityModule } from "../types/modules.js";
import { HttpCanvasClient } from "./canvas/client.js";
import { CanvasModule } from "./canvas/index.js";
import { FsModule } from "./fs/index.js";

export function buildModules(config: AppConfig): CapabilityModule[] {
  const modules: CapabilityModule[] = [new FsModule({ root: config.fs.root })];
  if (config.canvas) {
    modules.push(new CanvasModule(new HttpCanvasClient(config.canvas.baseUrl, config.canvas.token)));
  }
  return modules;
}

/** Registers the modules and closes the registry; nothing can be added afterwards. */
export function buildRegistry(modules: CapabilityModule[]): CapabilityRegistry {
  const registry = new CapabilityRegistry();
  for (const m of modules) registry.register(m);
  registry.close();
  return registry;
}
