type AnsiColor = {
  reset: string;
  dim: string;
  bold: string;
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
  magenta: string;
};

const COLORS: Readonly<AnsiColor> = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const STAGE_COLORS = [COLORS.blue, COLORS.cyan, COLORS.magenta, COLORS.green, COLORS.yellow];

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const timestamp = (): string => {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

export const formatNumber = (n: number): string => n.toLocaleString('en-US');

export const formatElapsed = (elapsedMs: number): string => {
  if (elapsedMs < 60_000) {
    return `${(elapsedMs / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(elapsedMs / 60_000);
  const seconds = Math.round((elapsedMs % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

// Same stage name, same color across a run
const stageColor = (stage: string): string => {
  let sum = 0;
  for (const char of stage) sum += char.charCodeAt(0);
  return STAGE_COLORS[sum % STAGE_COLORS.length];
};

export const log = {
  info: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${message}`);
  },

  success: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.green}${message}${COLORS.reset}`);
  },

  warn: (message: string) => {
    console.warn(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.yellow}WARN${COLORS.reset}  ${message}`);
  },

  error: (message: string) => {
    console.error(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.red}ERR${COLORS.reset}   ${message}`);
  },

  stage: (stage: string, message: string) => {
    const tag = `${stageColor(stage)}${stage}${COLORS.reset}`;
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}  ${message}`);
  },

  progress: (stats: { records: number; elapsedMs: number }) => {
    console.info(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  read ${COLORS.bold}${formatNumber(stats.records)}${COLORS.reset} records  ${COLORS.dim}(${formatElapsed(stats.elapsedMs)})${COLORS.reset}`
    );
  },

  pipeline: {
    start: (config: { name: string; source: string; sink: string }) => {
      const lines = [
        '',
        `${COLORS.bold}Pipeline ${config.name} started${COLORS.reset}`,
        `  source: ${config.source}`,
        `  sink:   ${config.sink}`,
        '',
      ];
      console.info(lines.join('\n'));
    },

    summary: (stats: { records: number; written: number; partitions: number; completed: boolean; elapsedMs: number }) => {
      const status = stats.completed
        ? `${COLORS.green}${COLORS.bold}COMPLETED${COLORS.reset}`
        : `${COLORS.yellow}${COLORS.bold}INCOMPLETE${COLORS.reset}`;

      const lines = [
        '',
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        `  ${status}  ${COLORS.dim}(${formatElapsed(stats.elapsedMs)})${COLORS.reset}`,
        '',
        `  read:       ${COLORS.bold}${formatNumber(stats.records)}${COLORS.reset}`,
        `  written:    ${COLORS.green}${formatNumber(stats.written)}${COLORS.reset}`,
        `  partitions: ${formatNumber(stats.partitions)}`,
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        '',
      ];
      console.info(lines.join('\n'));
    },
  },

  db: (action: string, count: number, elapsed: number) => {
    const tag = `${COLORS.dim}db${COLORS.reset}`;
    const time = elapsed > 1000 ? `${COLORS.yellow}${elapsed}ms${COLORS.reset}` : `${COLORS.dim}${elapsed}ms${COLORS.reset}`;
    console.info(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}     ${action} ${COLORS.bold}${formatNumber(count)}${
        COLORS.reset
      } rows  ${time}`
    );
  },

  knex: {
    warn: (message: string) => {
      log.warn(`[knex] ${message}`);
    },
    error: (message: string) => {
      log.error(`[knex] ${message}`);
    },
    deprecate: (message: string) => {
      log.warn(`[knex deprecate] ${message}`);
    },
  },
};

interface PgError {
  severity?: string;
  code?: string;
  detail?: string;
  constraint?: string;
  table?: string;
  hint?: string;
  message?: string;
}

const isPgError = (err: unknown): err is PgError =>
  err !== null && typeof err === 'object' && 'severity' in err && 'code' in err;

/**
 * One-line summary for generic errors; the interesting fields for PostgreSQL errors.
 */
export const formatError = (err: unknown): string => {
  if (!isPgError(err)) {
    const msg = err instanceof Error ? err.message : String(err);
    return msg.split('\n')[0].slice(0, 200);
  }

  const fields: Array<[string, string | undefined]> = [
    ['code', err.code],
    ['severity', err.severity],
    ['detail', err.detail],
    ['constraint', err.constraint],
    ['table', err.table],
    ['hint', err.hint],
  ];

  const padding = '                      ';
  return fields
    .filter(([, v]) => v)
    .map(([k, v]) => `${padding}${COLORS.dim}${k.padEnd(12)}${COLORS.reset}${v}`)
    .join('\n');
};
