import type { Capability, ProviderConfig } from "../config/pipelineConfig";
import { createAdapter, type ProviderAdapter } from "./provider";

/**
 * Holds the configured adapters and answers "who can do this, in what order".
 * Ordering is ascending priority; equal priorities keep registration order.
 */
export class ProviderRegistry {
  private readonly adapters: ProviderAdapter[] = [];

  constructor(adapters: ProviderAdapter[] = []) {
    for (const adapter of adapters) this.register(adapter);
  }

  register(adapter: ProviderAdapter): void {
    if (this.adapters.some((a) => a.id === adapter.id)) {
      throw new Error(`Provider already registered: ${adapter.id}`);
    }
    this.adapters.push(adapter);
  }

  get(id: string): ProviderAdapter | undefined {
    return this.adapters.find((a) => a.id === id);
  }

  list(): ProviderAdapter[] {
    return [...this.adapters];
  }

  candidates(capability: Capability): ProviderAdapter[] {
    return this.adapters
      .map((adapter, order) => ({ adapter, order }))
      .filter(({ adapter }) => adapter.capabilities.includes(capability))
      .sort((a, b) => a.adapter.priority - b.adapter.priority || a.order - b.order)
      .map(({ adapter }) => adapter);
  }
}

export function createRegistryFromConfig(providers: ProviderConfig[]): ProviderRegistry {
  return new ProviderRegistry(providers.map((p) => createAdapter(p)));
}
