import Knex, { type Knex as KnexType } from 'knex';
import { z } from 'zod';
import type { FormatConfiguration } from '../../backends/format/format';
import { log } from '../../engine/logger';
import { fields, resolveConfig } from '../../io/config';

export const PgConnectionSchema = z.object({
  host: fields.string(),
  port: fields.int().default(5432),
  user: fields.string(),
  password: fields.string(),
  database: fields.string(),
  ssl: fields.boolean().default(true),
});

export type PgConnection = z.infer<typeof PgConnectionSchema>;

const ENTRY_PREFIX = 'pg.';

export const connectionEntries = (connection: PgConnection): Record<string, string> => ({
  [`${ENTRY_PREFIX}host`]: connection.host,
  [`${ENTRY_PREFIX}port`]: String(connection.port),
  [`${ENTRY_PREFIX}user`]: connection.user,
  [`${ENTRY_PREFIX}password`]: connection.password,
  [`${ENTRY_PREFIX}database`]: connection.database,
  [`${ENTRY_PREFIX}ssl`]: String(connection.ssl),
});

export const connectionFromConfiguration = (conf: FormatConfiguration<unknown, unknown>): PgConnection =>
  resolveConfig(PgConnectionSchema, {
    host: conf.get(`${ENTRY_PREFIX}host`),
    port: conf.get(`${ENTRY_PREFIX}port`),
    user: conf.get(`${ENTRY_PREFIX}user`),
    password: conf.get(`${ENTRY_PREFIX}password`),
    database: conf.get(`${ENTRY_PREFIX}database`),
    ssl: conf.get(`${ENTRY_PREFIX}ssl`),
  });

export const createKnexClient = (connection: PgConnection, pool = { min: 0, max: 2 }): KnexType => {
  const sslConfig = connection.ssl ? { rejectUnauthorized: false } : false;

  return Knex({
    client: 'pg',
    connection: {
      host: connection.host,
      port: connection.port,
      user: connection.user,
      password: connection.password,
      database: connection.database,
      application_name: 'plugin-io',
      ssl: sslConfig,
    },
    pool,
    log: {
      warn: log.knex.warn,
      error: log.knex.error,
      deprecate: log.knex.deprecate,
      debug() {},
    },
  });
};
