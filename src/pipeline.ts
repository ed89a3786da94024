import type { KV, RunnerConfig } from './engine/types';
import { defaultBackends, type IOBackends } from './io/backends';
import type { PluginParams } from './io/config';
import { ConfigMappingError } from './io/errors';
import { buildRead, read } from './io/read';
import { isBuiltinTypeName, Types, type TypeWitness } from './io/types';
import { buildWrite, write } from './io/write';
import { createPlugin } from './plugins/registry';

export type PipelineOptions = {
  source: string;
  sink: string;
  sourceParams: PluginParams;
  sinkParams: PluginParams;
  locksDir?: string;
  keyType: string;
  valueType: string;
  startOffset?: number;
  progressEvery?: number;
};

/**
 * Turn repeated `key=value` arguments into a parameter map. Later entries win.
 */
export const parseParams = (entries: readonly string[]): Record<string, string> => {
  const params: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new ConfigMappingError(entry, 'expected key=value');
    }
    params[entry.slice(0, separator).trim()] = entry.slice(separator + 1);
  }
  return params;
};

export const typeWitness = (name: string, field: string): TypeWitness<unknown> => {
  if (!isBuiltinTypeName(name)) {
    throw new ConfigMappingError(field, `unknown type "${name}", expected one of ${Object.keys(Types).join(', ')}`);
  }
  return Types[name];
};

/**
 * Build the read and write stages for two catalog plugins.
 * Unbounded sources produce null keys, which every sink accepts.
 */
export const buildPipeline = (
  options: PipelineOptions,
  backends: IOBackends = defaultBackends
): RunnerConfig<KV<unknown, unknown>> => {
  const keyType = typeWitness(options.keyType, 'keyType');
  const valueType = typeWitness(options.valueType, 'valueType');

  let readRequest = read<unknown, unknown>(backends)
    .withPlugin(createPlugin(options.source))
    .withPluginParams(options.sourceParams)
    .withKeyType(keyType)
    .withValueType(valueType);
  if (options.startOffset !== undefined) {
    readRequest = readRequest.withStartOffset(options.startOffset);
  }

  let writeRequest = write<unknown, unknown>(backends)
    .withPlugin(createPlugin(options.sink))
    .withPluginParams(options.sinkParams)
    .withKeyType(keyType)
    .withValueType(valueType);
  if (options.locksDir !== undefined) {
    writeRequest = writeRequest.withLocksDirPath(options.locksDir);
  }

  return {
    name: `${options.source}-to-${options.sink}`,
    source: buildRead(readRequest),
    sink: buildWrite(writeRequest),
    progressEvery: options.progressEvery,
  };
};
