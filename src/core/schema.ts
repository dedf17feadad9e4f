import * as z from 'zod';
import type { CommandDescription } from '@/types';
import { NAME_PATTERN } from './grammar';

export const CONFIG_FILE_NAME = '.flagtree.json';

const AritySchema = z.enum(['optional', 'required', 'repeated']);

const SwitchDescriptionSchema = z.strictObject({
  long: z.string().min(1),
  short: z.string().length(1).optional(),
  arity: AritySchema,
  value: z.strictObject({ name: z.string().min(1), type: z.string().min(1) }).optional(),
  doc: z.string().optional(),
});

const PositionalDescriptionSchema = z.strictObject({
  name: z.string().min(1),
  arity: AritySchema,
  type: z.string().min(1),
  doc: z.string().optional(),
});

/**
 * JSON form of a grammar. Structural rules (duplicates, ordering) are left to defineGrammar.
 */
export const CommandDescriptionSchema: z.ZodType<CommandDescription> = z.lazy(() =>
  z.strictObject({
    name: z.string().min(1),
    aliases: z.array(z.string().min(1)).optional(),
    doc: z.string().optional(),
    default: z.boolean().optional(),
    positionals: z.array(PositionalDescriptionSchema).optional(),
    switches: z.array(SwitchDescriptionSchema).optional(),
    commands: z.array(CommandDescriptionSchema).optional(),
  }),
);

export const ConfigSchema = z.strictObject({
  $schema: z.string().optional().describe('JSON Schema reference for IDE support'),
  version: z.literal(1).describe('Schema version (must be 1)'),
  grammar: z
    .string()
    .min(1)
    .optional()
    .describe('Grammar file (.flags or .json), relative to the config file'),
  out: z
    .string()
    .min(1)
    .optional()
    .describe('TypeScript file whose generated block `flagtree codegen` rewrites'),
  typeNames: z
    .record(z.string().regex(NAME_PATTERN), z.string().min(1))
    .optional()
    .describe('TypeScript type emitted for each custom value type tag'),
  importFrom: z
    .string()
    .min(1)
    .optional()
    .describe('Module that generated code imports RawArg from'),
});

/**
 * JSON Schema for .flagtree.json, for editor completion.
 */
export function buildConfigJsonSchema(): Record<string, unknown> {
  const jsonSchema = z.toJSONSchema(ConfigSchema, {
    io: 'input',
    target: 'draft-7',
  });

  return {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'flagtree configuration',
    description: `Project configuration read from ${CONFIG_FILE_NAME}`,
    ...jsonSchema,
  };
}

/** Format zod issues as "path: message" lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
