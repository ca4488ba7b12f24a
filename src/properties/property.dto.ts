import { z } from 'zod';
import { idSchema, jsonDocumentSchema, jsonObjectSchema } from '../utils/validators';

export const propertyIdParamSchema = z.object({
  propertyId: idSchema.default(0),
});

export const savePropertySchema = z.object({
  name: z.string().trim().min(1, 'Property name is required').max(255),
  schema: jsonObjectSchema,
  form1: jsonDocumentSchema,
  form2: jsonDocumentSchema,
});

export type SavePropertyDto = z.infer<typeof savePropertySchema>;

/** Public shape of a property; `form` is the single-value form, `forms` the array form. */
export interface PropertyView {
  name: string;
  schema: Record<string, unknown>;
  form: unknown;
  forms: unknown;
}

export interface PropertyDetail extends PropertyView {
  id: number;
}
