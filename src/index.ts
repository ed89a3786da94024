export { read, buildRead, Read } from './io/read';
export { write, buildWrite, Write } from './io/write';
export { Plugin, type PluginClassification } from './io/plugin';
export {
  registerBatchPlugin,
  registerStreamingPlugin,
  getPluginByClass,
  getOffsetFnForPluginClass,
  getReceiverBuilderByPluginClass,
  type StreamingPluginOptions,
} from './io/mapping';
export { fields, resolveConfig, type ConfigSchema, type PluginParams } from './io/config';
export type {
  BatchConnector,
  BatchConnectorClass,
  BatchContext,
  FormatProvider,
  FormatProviderClass,
  PluginClass,
  PluginConfig,
  StreamingSourceClass,
} from './io/contracts';
export {
  PluginIOError,
  MissingConfigurationError,
  ConfigMappingError,
  ConfigurationMismatchError,
  UnsupportedOperationError,
} from './io/errors';
export { Types, witness, type TypeWitness } from './io/types';
export { defaultBackends, type IOBackends } from './io/backends';

export {
  FormatConfiguration,
  FormatKeys,
  type InputFormat,
  type InputFormatClass,
  type OutputFormat,
  type OutputFormatClass,
  type RecordReader,
  type RecordWriter,
} from './backends/format/format';
export { formatIO, partitionFor, type FormatBackend } from './backends/format/format-io';
export {
  DirectorySynchronization,
  InMemorySynchronization,
  directorySynchronization,
  type SynchronizationGate,
  type SynchronizationFactory,
} from './backends/format/synchronization';
export { Receiver, ReceiverBuilder, type ReceiverClass } from './backends/receiver/receiver';
export { receiverIO, type ReceiverBackend } from './backends/receiver/receiver-io';

export { runPipeline } from './engine/runner';
export { kv, type KV, type SourceStage, type SinkStage, type RunnerConfig, type RunResult } from './engine/types';
export { buildPipeline, parseParams, type PipelineOptions } from './pipeline';
export { createPlugin, listPlugins, registerPlugin } from './plugins';
