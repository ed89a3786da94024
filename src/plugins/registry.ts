import type { Plugin } from '../io/plugin';

type PluginFactory = () => Plugin;

const plugins: Record<string, PluginFactory> = {};

/**
 * Register a plugin under a catalog name.
 * Call this in each plugin implementation to register itself.
 */
export const registerPlugin = (name: string, factory: PluginFactory): void => {
  plugins[name] = factory;
};

/**
 * Create a fresh descriptor for a catalog name
 */
export const createPlugin = (name: string): Plugin => {
  const factory = plugins[name];
  if (!factory) {
    const available = Object.keys(plugins).join(', ');
    throw new Error(`Unknown plugin "${name}". Available: ${available}`);
  }
  return factory();
};

/**
 * List all registered plugin names
 */
export const listPlugins = (): string[] => Object.keys(plugins);
