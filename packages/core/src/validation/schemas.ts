/**
 * Zod schemas for validating caster inputs and type-definition documents
 */

import { z } from 'zod';

/** Cast policy enum */
export const castPolicySchema = z.enum(['throw', 'ignore', 'dynamicAssign']);

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const logFormatSchema = z.enum(['text', 'json']);

/**
 * Registered type name. Must be usable as the type tag of the relabeler's
 * byte format, so quotes and whitespace are excluded.
 */
export const typeNameSchema = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[A-Za-z_$][\w$.\\]*$/, 'Type names must start with a letter, _ or $ and contain only word characters, ".", "\\" or "$"');

/** Declared field name */
export const fieldNameSchema = z.string().min(1);

/** Field type in a type-definition document */
export const fieldSpecDocumentSchema = z.union([
  z.enum(['scalar', 'opaque']),
  z.object({ nested: typeNameSchema }).strict(),
  z.object({ list: typeNameSchema }).strict(),
]);

export const typeDefinitionDocumentEntrySchema = z
  .object({
    name: typeNameSchema,
    sealed: z.boolean().optional(),
    fields: z.record(fieldNameSchema, fieldSpecDocumentSchema),
  })
  .strict();

/** Complete type-definition document */
export const typeDefinitionDocumentSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    types: z.array(typeDefinitionDocumentEntrySchema).min(1),
  })
  .strict()
  .superRefine((value, ctx) => {
    const names = new Set<string>();
    for (let i = 0; i < value.types.length; i++) {
      const entry = value.types[i];
      if (!entry) continue;
      if (names.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate type name: ${entry.name}`,
          path: ['types', i, 'name'],
        });
      }
      names.add(entry.name);
    }
  });

/** Export types from schemas */
export type CastPolicyInput = z.infer<typeof castPolicySchema>;
export type FieldSpecDocument = z.infer<typeof fieldSpecDocumentSchema>;
export type TypeDefinitionDocumentEntry = z.infer<typeof typeDefinitionDocumentEntrySchema>;
export type TypeDefinitionDocument = z.infer<typeof typeDefinitionDocumentSchema>;
