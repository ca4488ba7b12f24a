import { z } from 'zod';

// Common validators
// Ids arrive as JSON integers or decimal strings; arrays, booleans and padded strings are rejected.
const integerOrDigits = z.union([
  z.number().int('ID must be an integer'),
  z.string().regex(/^\d+$/, 'ID must be a decimal integer'),
]);

// Unbounded; the records layer treats ids outside its key range as unknown.
export const idSchema = integerOrDigits.pipe(z.coerce.number().nonnegative('ID must not be negative'));
export const positiveIdSchema = integerOrDigits.pipe(z.coerce.number().positive('ID must be positive'));

export const jsonObjectSchema = z.record(z.string(), z.unknown());

// Schemas and forms are arbitrary JSON documents; a missing one is stored as null.
export const jsonDocumentSchema = z.unknown().transform((value) => (value === undefined ? null : value));

// A JSON object sent as an encoded string, e.g. "{\"title\":\"dc:title\"}"
export const encodedJsonObjectSchema = z
  .string()
  .transform((value, ctx): unknown => {
    try {
      return JSON.parse(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : 'Invalid JSON',
      });
      return z.NEVER;
    }
  })
  .pipe(jsonObjectSchema);

export type JsonObject = z.infer<typeof jsonObjectSchema>;
