import { UnsupportedError } from "./errors.js";
import { PlatformAdapter, Provider } from "./types.js";

export class AdapterRegistry {
  private adapters = new Map<Provider, PlatformAdapter>();

  register(adapter: PlatformAdapter): void {
    this.adapters.set(adapter.provider, adapter);
  }

  get(provider: Provider): PlatformAdapter {
    const adapter = this.adapters.get(provider);
    if (!adapter) throw new UnsupportedError(`no adapter for provider: ${provider}`);
    return adapter;
  }
}
