import { ToolRegistry } from "./registry.js";
import { registerBuildTools } from "./build/index.js";
import { registerTestingTools } from "./testing/index.js";
import { registerDependencyTools } from "./dependencies/index.js";

/** Registry holding all eleven cargo tools, frozen. */
export function createToolRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registerBuildTools(registry);
  registerTestingTools(registry);
  registerDependencyTools(registry);
  return registry.freeze();
}
