import type { Plugin, PluginDirectory } from "../types.js";

export class MemoryPluginDirectory implements PluginDirectory {
  private plugins = new Map<string, Plugin>();

  constructor(plugins: Plugin[] = []) {
    for (const plugin of plugins) this.plugins.set(plugin.id, plugin);
  }

  async findById(id: string): Promise<Plugin | null> {
    return this.plugins.get(id) ?? null;
  }

  async findBySlug(slug: string): Promise<Plugin | null> {
    for (const plugin of this.plugins.values()) {
      if (plugin.slug === slug) return plugin;
    }
    return null;
  }
}
