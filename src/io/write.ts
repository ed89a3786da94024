import path from 'node:path';
import { FormatKeys } from '../backends/format/format';
import { directorySynchronization, type SynchronizationFactory } from '../backends/format/synchronization';
import type { KV, SinkStage } from '../engine/types';
import { defaultBackends, type IOBackends } from './backends';
import type { PluginParams } from './config';
import type { PluginClass, PluginConfig } from './contracts';
import { ConfigurationMismatchError, UnsupportedOperationError, requireArg } from './errors';
import { getPluginByClass } from './mapping';
import type { Plugin } from './plugin';
import type { TypeWitness } from './types';

type WriteState<K, V> = {
  readonly plugin?: Plugin;
  readonly pluginConfig?: PluginConfig;
  readonly keyType?: TypeWitness<K>;
  readonly valueType?: TypeWitness<V>;
  readonly locksDirPath?: string;
  readonly synchronization: SynchronizationFactory;
};

const assertNever = (value: never): never => {
  throw new Error(`Unexpected plugin classification: ${String(value)}`);
};

const isSameOrInside = (candidate: string, directory: string): boolean => {
  const relative = path.relative(path.resolve(directory), path.resolve(candidate));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
};

/**
 * Immutable description of a write through a plugin. Every `with*` call returns a new request.
 *
 * Only bounded plugins can be written. Write tasks serialize their commits through a
 * synchronization gate bound to `locksDirPath`, which must not be a data output directory.
 */
export class Write<K, V> {
  private constructor(
    private readonly backends: IOBackends,
    private readonly state: WriteState<K, V>
  ) {
    Object.freeze(this);
  }

  static create<K, V>(backends: IOBackends = defaultBackends): Write<K, V> {
    return new Write<K, V>(backends, { synchronization: directorySynchronization });
  }

  get plugin(): Plugin | undefined {
    return this.state.plugin;
  }

  get pluginConfig(): PluginConfig | undefined {
    return this.state.pluginConfig;
  }

  get locksDirPath(): string | undefined {
    return this.state.locksDirPath;
  }

  withPlugin(plugin: Plugin): Write<K, V> {
    return this.with({ plugin: requireArg(plugin, 'plugin') });
  }

  withPluginClass(pluginClass: PluginClass): Write<K, V> {
    return this.with({ plugin: getPluginByClass(requireArg(pluginClass, 'pluginClass')) });
  }

  withPluginConfig(pluginConfig: PluginConfig): Write<K, V> {
    return this.with({ pluginConfig: requireArg(pluginConfig, 'pluginConfig') });
  }

  withPluginParams(params: PluginParams): Write<K, V> {
    const plugin = requireArg(this.state.plugin, 'plugin');
    return this.with({ pluginConfig: plugin.resolveParams(requireArg(params, 'pluginParams')) });
  }

  withKeyType(keyType: TypeWitness<K>): Write<K, V> {
    return this.with({ keyType: requireArg(keyType, 'keyType') });
  }

  withValueType(valueType: TypeWitness<V>): Write<K, V> {
    return this.with({ valueType: requireArg(valueType, 'valueType') });
  }

  withLocksDirPath(locksDirPath: string): Write<K, V> {
    return this.with({ locksDirPath: requireArg(locksDirPath, 'locksDirPath') });
  }

  /** Replace the lock-file gate, e.g. with an in-memory one */
  withSynchronization(synchronization: SynchronizationFactory): Write<K, V> {
    return this.with({ synchronization: requireArg(synchronization, 'synchronization') });
  }

  build(): SinkStage<KV<K, V>> {
    const plugin = requireArg(this.state.plugin, 'plugin');
    const pluginConfig = requireArg(this.state.pluginConfig, 'pluginConfig');
    const keyType = requireArg(this.state.keyType, 'keyType');
    const valueType = requireArg(this.state.valueType, 'valueType');
    const locksDirPath = requireArg(this.state.locksDirPath, 'locksDirPath');

    plugin.withConfig(pluginConfig);

    const classification = plugin.classification;
    switch (classification) {
      case 'unbounded':
        throw new UnsupportedOperationError('streaming write not supported');
      case 'bounded':
        return this.buildBounded(plugin, keyType, valueType, locksDirPath);
      default:
        return assertNever(classification);
    }
  }

  private buildBounded(
    plugin: Plugin,
    keyType: TypeWitness<K>,
    valueType: TypeWitness<V>,
    locksDirPath: string
  ): SinkStage<KV<K, V>> {
    const configuration = plugin.deriveFormatConfiguration(keyType, valueType);
    if (configuration.format.direction !== 'output') {
      throw new ConfigurationMismatchError(`Plugin "${plugin.pluginName}" is a source and cannot be written`);
    }

    const outputDir = configuration.get(FormatKeys.OUTPUT_DIR);
    if (outputDir !== undefined && isSameOrInside(locksDirPath, outputDir)) {
      throw new ConfigurationMismatchError(
        `Locks directory "${locksDirPath}" must not be the output directory "${outputDir}" or inside it`
      );
    }

    return this.backends.format.write(configuration, {
      partitioning: true,
      synchronization: this.state.synchronization(locksDirPath),
    });
  }

  private with(changes: Partial<WriteState<K, V>>): Write<K, V> {
    return new Write<K, V>(this.backends, { ...this.state, ...changes });
  }
}

export const write = <K, V>(backends: IOBackends = defaultBackends): Write<K, V> => Write.create<K, V>(backends);

/**
 * Validate a write request and build its stage. Nothing is written until the stage consumes records.
 */
export const buildWrite = <K, V>(request: Write<K, V>): SinkStage<KV<K, V>> => request.build();
