import {
  bindFormat,
  FormatConfiguration,
  type InputFormatClass,
  type OutputFormatClass,
} from '../backends/format/format';
import { resolveConfig, type PluginParams } from './config';
import type {
  BatchConnector,
  BatchConnectorClass,
  BatchContext,
  FormatProvider,
  FormatProviderClass,
  PluginClass,
  PluginConfig,
  StreamingSourceClass,
} from './contracts';
import { ConfigurationMismatchError, MissingConfigurationError, UnsupportedOperationError } from './errors';
import type { TypeWitness } from './types';

export type PluginClassification = 'bounded' | 'unbounded';

type BoundedClasses = {
  readonly kind: 'bounded';
  readonly connectorClass: PluginClass;
  readonly formatClass: InputFormatClass | OutputFormatClass;
  readonly formatProviderClass: FormatProviderClass;
  readonly instantiate: (config: PluginConfig) => BatchConnector;
};

type UnboundedClasses = {
  readonly kind: 'unbounded';
  readonly sourceClass: PluginClass;
};

type PluginClasses = BoundedClasses | UnboundedClasses;

type RegisteredProvider = {
  direction: 'input' | 'output';
  provider: FormatProvider;
};

class PluginBatchContext implements BatchContext {
  registered?: RegisteredProvider;

  constructor(readonly pluginName: string) {}

  setInput(provider: FormatProvider): void {
    this.register({ direction: 'input', provider });
  }

  setOutput(provider: FormatProvider): void {
    this.register({ direction: 'output', provider });
  }

  private register(registered: RegisteredProvider): void {
    if (this.registered) {
      throw new ConfigurationMismatchError(`Plugin "${this.pluginName}" registered more than one input or output`);
    }
    this.registered = registered;
  }
}

/**
 * Which plugin implementation to run and how it is configured.
 *
 * Classification is fixed by the factory that built the descriptor. Attaching a
 * configuration replaces the previous one; the format configuration is derived again
 * on every call.
 */
export class Plugin {
  private config?: PluginConfig;
  private formatConfiguration?: FormatConfiguration<unknown, unknown>;

  private constructor(
    private readonly classes: PluginClasses,
    private readonly resolve: (params: PluginParams) => PluginConfig
  ) {}

  static createBatch<C extends PluginConfig>(
    connectorClass: BatchConnectorClass<C>,
    formatClass: InputFormatClass | OutputFormatClass,
    formatProviderClass: FormatProviderClass
  ): Plugin {
    const resolve = (params: object): C => resolveConfig(connectorClass.configSchema, params);
    return new Plugin(
      {
        kind: 'bounded',
        connectorClass,
        formatClass,
        formatProviderClass,
        instantiate: (config) => new connectorClass(resolve(config)),
      },
      resolve
    );
  }

  static createStreaming<C extends PluginConfig>(sourceClass: StreamingSourceClass<C>): Plugin {
    return new Plugin({ kind: 'unbounded', sourceClass }, (params) =>
      resolveConfig(sourceClass.configSchema, params)
    );
  }

  get classification(): PluginClassification {
    return this.classes.kind;
  }

  get pluginName(): string {
    return this.getPluginClass().pluginName;
  }

  isUnbounded(): boolean {
    return this.classes.kind === 'unbounded';
  }

  getPluginClass(): PluginClass {
    return this.classes.kind === 'bounded' ? this.classes.connectorClass : this.classes.sourceClass;
  }

  getFormatClass(): InputFormatClass | OutputFormatClass | undefined {
    return this.classes.kind === 'bounded' ? this.classes.formatClass : undefined;
  }

  getConfig(): PluginConfig | undefined {
    return this.config;
  }

  /**
   * Decode a flat parameter map with the plugin's declared configuration schema.
   */
  resolveParams(params: PluginParams): PluginConfig {
    return this.resolve(params);
  }

  withConfig(config: PluginConfig): this {
    this.config = config;
    return this;
  }

  /**
   * Run the connector's `prepareRun` and turn the format provider it registers into a
   * format configuration typed by the given witnesses.
   */
  deriveFormatConfiguration<K, V>(keyType: TypeWitness<K>, valueType: TypeWitness<V>): FormatConfiguration<K, V> {
    const classes = this.classes;
    if (classes.kind !== 'bounded') {
      throw new UnsupportedOperationError(`Plugin "${this.pluginName}" is unbounded and has no format configuration`);
    }

    const config = this.config;
    if (config === undefined) {
      throw new MissingConfigurationError('pluginConfig');
    }

    const { formatClass, formatProviderClass } = classes;
    if (formatClass.keyType !== keyType.name || formatClass.valueType !== valueType.name) {
      throw new ConfigurationMismatchError(
        `Format "${formatClass.formatName}" works with <${formatClass.keyType}, ${formatClass.valueType}> ` +
          `but <${keyType.name}, ${valueType.name}> was declared`
      );
    }

    const context = new PluginBatchContext(this.pluginName);
    classes.instantiate(config).prepareRun(context);

    const registered = context.registered;
    if (!registered) {
      throw new ConfigurationMismatchError(`Plugin "${this.pluginName}" did not register an input or output`);
    }
    if (registered.direction !== formatClass.direction) {
      throw new ConfigurationMismatchError(
        `Plugin "${this.pluginName}" registered an ${registered.direction} but declares the ${formatClass.direction} format "${formatClass.formatName}"`
      );
    }
    if (!(registered.provider instanceof formatProviderClass)) {
      throw new ConfigurationMismatchError(
        `Plugin "${this.pluginName}" registered a provider that is not a ${formatProviderClass.name}`
      );
    }
    const providedFormat = registered.provider.getFormatClassName();
    if (providedFormat !== formatClass.formatName) {
      throw new ConfigurationMismatchError(
        `Plugin "${this.pluginName}" provides format "${providedFormat}" but declares "${formatClass.formatName}"`
      );
    }

    const derived = new FormatConfiguration(
      bindFormat(formatClass),
      keyType,
      valueType,
      registered.provider.getFormatConfiguration()
    );
    this.formatConfiguration = derived;
    return derived;
  }

  /** Last derived format configuration, if any */
  getFormatConfiguration(): FormatConfiguration<unknown, unknown> | undefined {
    return this.formatConfiguration;
  }
}
