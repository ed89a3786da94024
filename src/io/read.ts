import { mapStage } from '../engine/stages';
import { kv, type KV, type SourceStage } from '../engine/types';
import { defaultBackends, type IOBackends } from './backends';
import { ConfigMappingError, ConfigurationMismatchError, requireArg } from './errors';
import type { PluginParams } from './config';
import type { PluginClass, PluginConfig } from './contracts';
import { getOffsetFnForPluginClass, getPluginByClass, getReceiverBuilderByPluginClass } from './mapping';
import type { Plugin } from './plugin';
import type { TypeWitness } from './types';

type ReadState<K, V> = {
  readonly plugin?: Plugin;
  readonly pluginConfig?: PluginConfig;
  readonly keyType?: TypeWitness<K>;
  readonly valueType?: TypeWitness<V>;
  readonly startOffset?: number;
};

const assertNever = (value: never): never => {
  throw new Error(`Unexpected plugin classification: ${String(value)}`);
};

/**
 * Immutable description of a read through a plugin. Every `with*` call returns a new request.
 *
 * Bounded plugins read through the format backend. Unbounded plugins read through the
 * receiver backend, which only carries values: their records always have a `null` key.
 */
export class Read<K, V> {
  private constructor(
    private readonly backends: IOBackends,
    private readonly state: ReadState<K, V>
  ) {
    Object.freeze(this);
  }

  static create<K, V>(backends: IOBackends = defaultBackends): Read<K, V> {
    return new Read<K, V>(backends, {});
  }

  get plugin(): Plugin | undefined {
    return this.state.plugin;
  }

  get pluginConfig(): PluginConfig | undefined {
    return this.state.pluginConfig;
  }

  get keyType(): TypeWitness<K> | undefined {
    return this.state.keyType;
  }

  get valueType(): TypeWitness<V> | undefined {
    return this.state.valueType;
  }

  get startOffset(): number | undefined {
    return this.state.startOffset;
  }

  withPlugin(plugin: Plugin): Read<K, V> {
    return this.with({ plugin: requireArg(plugin, 'plugin') });
  }

  withPluginClass(pluginClass: PluginClass): Read<K, V> {
    return this.with({ plugin: getPluginByClass(requireArg(pluginClass, 'pluginClass')) });
  }

  withPluginConfig(pluginConfig: PluginConfig): Read<K, V> {
    return this.with({ pluginConfig: requireArg(pluginConfig, 'pluginConfig') });
  }

  /**
   * Resolve the configuration from flat parameters with the plugin's declared schema.
   */
  withPluginParams(params: PluginParams): Read<K, V> {
    const plugin = requireArg(this.state.plugin, 'plugin');
    return this.with({ pluginConfig: plugin.resolveParams(requireArg(params, 'pluginParams')) });
  }

  withKeyType(keyType: TypeWitness<K>): Read<K, V> {
    return this.with({ keyType: requireArg(keyType, 'keyType') });
  }

  withValueType(valueType: TypeWitness<V>): Read<K, V> {
    return this.with({ valueType: requireArg(valueType, 'valueType') });
  }

  /** Unbounded reads only: drop values below this offset */
  withStartOffset(startOffset: number): Read<K, V> {
    if (!Number.isInteger(startOffset) || startOffset < 0) {
      throw new ConfigMappingError('startOffset', 'expected a non-negative integer');
    }
    return this.with({ startOffset });
  }

  build(): SourceStage<KV<K | null, V>> {
    const plugin = requireArg(this.state.plugin, 'plugin');
    const pluginConfig = requireArg(this.state.pluginConfig, 'pluginConfig');
    const keyType = requireArg(this.state.keyType, 'keyType');
    const valueType = requireArg(this.state.valueType, 'valueType');

    plugin.withConfig(pluginConfig);

    const classification = plugin.classification;
    switch (classification) {
      case 'unbounded': {
        const pluginClass = plugin.getPluginClass();
        const values = this.backends.receiver.read({
          getOffsetFn: getOffsetFnForPluginClass(pluginClass, pluginConfig, valueType),
          receiverBuilder: getReceiverBuilderByPluginClass(pluginClass, pluginConfig, valueType),
          startOffset: this.state.startOffset,
        });
        return mapStage(values, `${plugin.pluginName}:read`, (value): KV<K | null, V> => kv(null, value));
      }

      case 'bounded': {
        const configuration = plugin.deriveFormatConfiguration(keyType, valueType);
        if (configuration.format.direction !== 'input') {
          throw new ConfigurationMismatchError(`Plugin "${plugin.pluginName}" is a sink and cannot be read`);
        }
        return this.backends.format.read(configuration);
      }

      default:
        return assertNever(classification);
    }
  }

  private with(changes: Partial<ReadState<K, V>>): Read<K, V> {
    return new Read<K, V>(this.backends, { ...this.state, ...changes });
  }
}

export const read = <K, V>(backends: IOBackends = defaultBackends): Read<K, V> => Read.create<K, V>(backends);

/**
 * Validate a read request and build its stage. Nothing is read until the stage is iterated.
 */
export const buildRead = <K, V>(request: Read<K, V>): SourceStage<KV<K | null, V>> => request.build();
