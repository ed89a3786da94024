import type { ConfigSchema } from './config';

/**
 * Opaque plugin configuration. Each plugin class declares its concrete shape with a schema.
 */
export type PluginConfig = object;

/**
 * Anything that identifies a plugin implementation.
 */
export type PluginClass = {
  readonly pluginName: string;
};

/**
 * Registered by a batch connector while preparing a run.
 * Names the format class to use and the entries that configure it.
 */
export interface FormatProvider {
  getFormatClassName(): string;
  getFormatConfiguration(): Record<string, string>;
}

export type FormatProviderClass = abstract new (...args: never[]) => FormatProvider;

export interface BatchContext {
  readonly pluginName: string;
  setInput(provider: FormatProvider): void;
  setOutput(provider: FormatProvider): void;
}

/**
 * Batch source or sink connector.
 * `prepareRun` must only register a format provider; it must not touch the data source.
 */
export interface BatchConnector {
  prepareRun(context: BatchContext): void;
}

export type BatchConnectorClass<C extends PluginConfig> = PluginClass & {
  new (config: C): BatchConnector;
  readonly configSchema: ConfigSchema<C>;
};

/**
 * Streaming source plugin. The receiver doing the actual work is registered in the mapping registry.
 */
export type StreamingSourceClass<C extends PluginConfig> = PluginClass & {
  readonly configSchema: ConfigSchema<C>;
};
