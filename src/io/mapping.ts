import type { InputFormatClass, OutputFormatClass } from '../backends/format/format';
import { ReceiverBuilder, type Receiver, type ReceiverClass } from '../backends/receiver/receiver';
import { resolveConfig } from './config';
import type {
  BatchConnectorClass,
  FormatProviderClass,
  PluginClass,
  PluginConfig,
  StreamingSourceClass,
} from './contracts';
import { UnsupportedOperationError } from './errors';
import { Plugin } from './plugin';
import type { TypeWitness } from './types';

type StreamingRegistration = {
  receiverName: string;
  createPlugin: () => Plugin;
  /** Validates the configuration now and returns a factory for fresh receivers */
  prepareReceiver: (config: PluginConfig) => () => Receiver;
  prepareOffsetFn: (config: PluginConfig) => (value: unknown) => number;
};

export type StreamingPluginOptions<C extends PluginConfig> = {
  receiverClass: ReceiverClass<C>;
  /** Returns the function that reads an offset out of a received value */
  offsetFn: (config: C) => (value: unknown) => number;
};

const batchPlugins = new Map<PluginClass, () => Plugin>();
const streamingPlugins = new Map<PluginClass, StreamingRegistration>();

/**
 * Register a batch connector together with its format and format provider classes.
 * Call this next to each connector implementation.
 */
export const registerBatchPlugin = <C extends PluginConfig>(
  connectorClass: BatchConnectorClass<C>,
  formatClass: InputFormatClass | OutputFormatClass,
  formatProviderClass: FormatProviderClass
): void => {
  batchPlugins.set(connectorClass, () => Plugin.createBatch(connectorClass, formatClass, formatProviderClass));
};

/**
 * Register a streaming source together with the receiver that implements it.
 */
export const registerStreamingPlugin = <C extends PluginConfig>(
  sourceClass: StreamingSourceClass<C>,
  options: StreamingPluginOptions<C>
): void => {
  streamingPlugins.set(sourceClass, {
    receiverName: options.receiverClass.name,
    createPlugin: () => Plugin.createStreaming(sourceClass),
    prepareReceiver: (config) => {
      const resolved = resolveConfig(sourceClass.configSchema, config);
      return () => new options.receiverClass(resolved);
    },
    prepareOffsetFn: (config) => options.offsetFn(resolveConfig(sourceClass.configSchema, config)),
  });
};

/**
 * Build a fresh descriptor for a registered plugin class.
 */
export const getPluginByClass = (pluginClass: PluginClass): Plugin => {
  const createBatch = batchPlugins.get(pluginClass);
  if (createBatch) {
    return createBatch();
  }

  const streaming = streamingPlugins.get(pluginClass);
  if (streaming) {
    return streaming.createPlugin();
  }

  throw new UnsupportedOperationError(`Plugin class "${pluginClass.pluginName}" is not supported`);
};

const requireStreaming = (pluginClass: PluginClass): StreamingRegistration => {
  const registration = streamingPlugins.get(pluginClass);
  if (!registration) {
    throw new UnsupportedOperationError(`Plugin class "${pluginClass.pluginName}" has no registered receiver`);
  }
  return registration;
};

export const getOffsetFnForPluginClass = <V>(
  pluginClass: PluginClass,
  config: PluginConfig,
  valueType: TypeWitness<V>
): ((value: V) => number) => {
  const offsetOf = requireStreaming(pluginClass).prepareOffsetFn(config);

  return (value: V): number => {
    const offset = offsetOf(value);
    if (!Number.isFinite(offset)) {
      throw new TypeError(`Plugin "${pluginClass.pluginName}" returned a non-numeric offset for a ${valueType.name} value`);
    }
    return offset;
  };
};

export const getReceiverBuilderByPluginClass = <V>(
  pluginClass: PluginClass,
  config: PluginConfig,
  valueType: TypeWitness<V>
): ReceiverBuilder<V> => {
  const registration = requireStreaming(pluginClass);
  return new ReceiverBuilder(registration.receiverName, registration.prepareReceiver(config), valueType);
};
