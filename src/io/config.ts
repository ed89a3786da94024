import { z } from 'zod';
import { ConfigMappingError } from './errors';

/**
 * Flat parameter map as supplied by a user, a CLI or a pipeline definition.
 */
export type PluginParams = Readonly<Record<string, unknown>>;

/**
 * Declared shape of a plugin configuration.
 * Input is left open so string parameters can be coerced into the declared types.
 */
export type ConfigSchema<C> = z.ZodType<C, z.ZodTypeDef, unknown>;

// Numbers arrive either typed or as strings; "thirty" becomes NaN and fails the number check
const numeric = () => z.union([z.number(), z.string().trim().min(1).transform(Number)]);

/**
 * Field decoders for configuration schemas.
 * Every decoder also accepts its decoded form, so an already-typed configuration re-validates unchanged.
 */
export const fields = {
  string: () => z.string().min(1, 'expected a non-empty string'),

  int: () => numeric().pipe(z.number().int()),

  number: () => numeric().pipe(z.number()),

  boolean: () =>
    z.union([
      z.boolean(),
      z
        .string()
        .trim()
        .toLowerCase()
        .pipe(z.enum(['true', 'false']))
        .transform((value) => value === 'true'),
    ]),

  enumOf: <T extends [string, ...string[]]>(values: T) => z.enum(values),

  list: () =>
    z.union([
      z.array(z.string()),
      z.string().transform((value) =>
        value
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item !== '')
      ),
    ]),
};

const paramValue = (params: object, field: string): unknown =>
  Object.entries(params).find(([name]) => name === field)?.[1];

const describeIssue = (issue: z.ZodIssue, params: object, field: string): string => {
  if (issue.path.length > 0 && paramValue(params, field) === undefined) {
    return 'no parameter provided';
  }
  return issue.message;
};

/**
 * Populate a configuration object from a flat parameter map.
 * Unknown parameters are ignored. The first failing field is reported.
 */
export const resolveConfig = <C>(schema: ConfigSchema<C>, params: object): C => {
  const result = schema.safeParse(params);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
  throw new ConfigMappingError(field, describeIssue(issue, params, String(issue.path[0] ?? '')));
};
