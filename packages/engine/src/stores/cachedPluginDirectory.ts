import { LRUCache } from "lru-cache";
import type { Plugin, PluginDirectory } from "../types.js";

export interface CachedPluginDirectoryOptions {
  /** Maximum cached plugins (default: 1000) */
  maxSize?: number;
  /** Cache TTL in ms (default: 60000) */
  ttlMs?: number;
}

/**
 * Caches plugin lookups in front of another directory. Plugins are edited
 * elsewhere, so entries expire after `ttlMs`; misses are not cached so a newly
 * created plugin is visible immediately.
 */
export class CachedPluginDirectory implements PluginDirectory {
  private inner: PluginDirectory;
  private bySlug: LRUCache<string, Plugin>;
  private byId: LRUCache<string, Plugin>;

  constructor(inner: PluginDirectory, options: CachedPluginDirectoryOptions = {}) {
    this.inner = inner;
    const cacheOptions = { max: options.maxSize ?? 1000, ttl: options.ttlMs ?? 60000 };
    this.bySlug = new LRUCache<string, Plugin>(cacheOptions);
    this.byId = new LRUCache<string, Plugin>(cacheOptions);
  }

  async findBySlug(slug: string): Promise<Plugin | null> {
    const cached = this.bySlug.get(slug);
    if (cached) return cached;

    const plugin = await this.inner.findBySlug(slug);
    if (plugin) this.remember(plugin);
    return plugin;
  }

  async findById(id: string): Promise<Plugin | null> {
    const cached = this.byId.get(id);
    if (cached) return cached;

    const plugin = await this.inner.findById(id);
    if (plugin) this.remember(plugin);
    return plugin;
  }

  clear(): void {
    this.bySlug.clear();
    this.byId.clear();
  }

  private remember(plugin: Plugin): void {
    this.bySlug.set(plugin.slug, plugin);
    this.byId.set(plugin.id, plugin);
  }
}
