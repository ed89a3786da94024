import { z } from 'zod';

/**
 * Runtime stand-in for a generic key or value type.
 * The name is matched against what a format declares; the schema decodes elements.
 */
export type TypeWitness<T> = {
  readonly name: string;
  readonly schema: z.ZodType<T>;
};

export const witness = <T>(name: string, schema: z.ZodType<T>): TypeWitness<T> =>
  Object.freeze({ name, schema });

export const Types = {
  string: witness('string', z.string()),
  number: witness('number', z.number()),
  boolean: witness('boolean', z.boolean()),
  record: witness('record', z.record(z.unknown())),
  json: witness('json', z.unknown()),
} as const;

export type BuiltinTypeName = keyof typeof Types;

export const isBuiltinTypeName = (name: string): name is BuiltinTypeName => Object.hasOwn(Types, name);
