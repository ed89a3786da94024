import { parseArgs } from 'node:util';
import { log, formatError } from './engine/logger';
import { runPipeline } from './engine/runner';
import { PluginIOError } from './io/errors';
import { buildPipeline, parseParams } from './pipeline';
import { createPlugin, listPlugins } from './plugins';

import 'dotenv/config';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    source: { type: 'string', short: 's' },
    sink: { type: 'string', short: 't' },
    'source-param': { type: 'string', multiple: true },
    'sink-param': { type: 'string', multiple: true },
    'locks-dir': { type: 'string', short: 'l' },
    'key-type': { type: 'string' },
    'value-type': { type: 'string' },
    'start-offset': { type: 'string' },
    'progress-every': { type: 'string' },
  },
});

const command = positionals[0] ?? 'run';

const parseOptionalInt = (raw: string | undefined, flag: string): number | undefined => {
  if (raw === undefined) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    console.error(`Error: --${flag} must be an integer, got "${raw}"`);
    process.exit(1);
  }
  return parsed;
};

const requireFlag = (value: string | undefined, flag: string): string => {
  if (!value) {
    console.error(`Error: --${flag} is required. Available plugins: ${listPlugins().join(', ')}`);
    process.exit(1);
  }
  return value;
};

const runCommand = async (): Promise<void> => {
  const config = buildPipeline({
    source: requireFlag(values.source, 'source'),
    sink: requireFlag(values.sink, 'sink'),
    sourceParams: parseParams(values['source-param'] ?? []),
    sinkParams: parseParams(values['sink-param'] ?? []),
    locksDir: values['locks-dir'] ?? process.env.PLUGIN_IO_LOCKS_DIR,
    keyType: values['key-type'] ?? 'string',
    valueType: values['value-type'] ?? 'record',
    startOffset: parseOptionalInt(values['start-offset'], 'start-offset'),
    progressEvery: parseOptionalInt(values['progress-every'], 'progress-every'),
  });

  const abortController = new AbortController();

  const onSignal = () => {
    if (abortController.signal.aborted) return;
    abortController.abort();
    console.info('\nGraceful shutdown requested, committing what was read so far...');
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await runPipeline({ ...config, signal: abortController.signal });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
};

const pluginsCommand = (): void => {
  for (const name of listPlugins()) {
    console.info(`  ${name.padEnd(20)} ${createPlugin(name).classification}`);
  }
};

const printUsage = (): void => {
  console.info(`
Usage: npm start -- <command> [options]

Available plugins: ${listPlugins().join(', ')}

Commands:
  run        Read from a source plugin and write into a sink plugin (default)
  plugins    List registered plugins and whether they are bounded

Options:
  -s, --source <name>          Source plugin (required)
  -t, --sink <name>            Sink plugin (required)
  --source-param <key=value>   Source plugin parameter, repeatable
  --sink-param <key=value>     Sink plugin parameter, repeatable
  -l, --locks-dir <path>       Directory for write lock files (or env PLUGIN_IO_LOCKS_DIR)
  --key-type <name>            Key type: string, number, boolean, record, json (default: string)
  --value-type <name>          Value type (default: record)
  --start-offset <n>           Unbounded sources only: skip values below this offset
  --progress-every <n>         Log progress every n records (default: 1000)

Environment:
  PLUGIN_IO_LOCKS_DIR  Default for --locks-dir
  AWS_REGION           Used by the AWS SDK when a plugin does not set a region
`);
};

const main = async (): Promise<void> => {
  switch (command) {
    case 'run':
      await runCommand();
      break;
    case 'plugins':
      pluginsCommand();
      break;
    default:
      printUsage();
      process.exit(1);
  }
};

main().catch((err) => {
  if (err instanceof PluginIOError) {
    log.error(`${err.name}: ${formatError(err)}`);
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(1);
});
