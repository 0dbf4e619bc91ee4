// gateway/registry.ts — Static routing table: model name -> the one adapter serving it.
// Filled at startup from the model catalogue; admin catalogue edits update single routes.

import { logger } from "../config/logger.js";
import type { ModelDescriptor } from "../core/types.js";
import type { ProviderAdapter } from "./adapter.js";

export interface ResolvedRoute {
  adapter: ProviderAdapter;
  /** Id sent upstream. */
  upstreamModel: string;
}

interface RouteEntry {
  provider: string;
  upstreamModel: string;
}

export class ProviderRegistry {
  private readonly adapters = new Map<string, ProviderAdapter>();
  private readonly routes = new Map<string, RouteEntry>();

  constructor(adapters: readonly ProviderAdapter[] = []) {
    for (const adapter of adapters) this.registerAdapter(adapter);
  }

  registerAdapter(adapter: ProviderAdapter): void {
    if (this.adapters.has(adapter.key)) {
      throw new Error(`Adapter '${adapter.key}' is already registered`);
    }
    this.adapters.set(adapter.key, adapter);
  }

  get adapterKeys(): string[] {
    return [...this.adapters.keys()];
  }

  /** Returns false (and leaves the model unroutable) when its provider has no adapter. */
  route(model: ModelDescriptor): boolean {
    if (!this.adapters.has(model.provider)) {
      this.routes.delete(model.name);
      logger.warn(
        { model: model.name, provider: model.provider },
        "No adapter configured for model provider; model is unroutable",
      );
      return false;
    }
    this.routes.set(model.name, {
      provider: model.provider,
      upstreamModel: model.upstreamModel ?? model.name,
    });
    return true;
  }

  unroute(modelName: string): void {
    this.routes.delete(modelName);
  }

  load(models: readonly ModelDescriptor[]): number {
    this.routes.clear();
    return models.filter((model) => this.route(model)).length;
  }

  resolve(modelName: string): ResolvedRoute | null {
    const entry = this.routes.get(modelName);
    if (!entry) return null;
    const adapter = this.adapters.get(entry.provider);
    return adapter ? { adapter, upstreamModel: entry.upstreamModel } : null;
  }

  get routedModels(): string[] {
    return [...this.routes.keys()];
  }
}
