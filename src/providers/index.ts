/**
 * Provider registry.
 */
import { filerProvider } from './filer.js';
import { filesProvider } from './files.js';
import { grepProvider } from './grep.js';
import type { Provider } from './types.js';

export * from './types.js';
export { engineFilterCommand, type EngineInput } from './engine.js';
export { filesProvider } from './files.js';
export { grepProvider } from './grep.js';
export { filerProvider } from './filer.js';
export { createListProvider, createLazyProvider, type ListProviderOptions } from './list.js';

export const BUILTIN_PROVIDERS: readonly Provider[] = [filesProvider, grepProvider, filerProvider];

export class ProviderRegistry {
  private readonly providers = new Map<string, Provider>();

  constructor(initial: readonly Provider[] = BUILTIN_PROVIDERS) {
    for (const provider of initial) this.register(provider);
  }

  register(provider: Provider): void {
    if (this.providers.has(provider.id)) {
      throw new Error(`Provider already registered: ${provider.id}`);
    }
    this.providers.set(provider.id, provider);
  }

  get(id: string): Provider | undefined {
    return this.providers.get(id);
  }

  list(): Provider[] {
    return [...this.providers.values()];
  }
}
