import { z } from 'zod';
import { idSchema, jsonDocumentSchema, jsonObjectSchema } from '../utils/validators';

export const itemTypeIdParamSchema = z.object({
  itemTypeId: idSchema.default(0),
});

// The whole body is stored as the render document, so unknown keys are kept.
export const registerItemTypeSchema = z
  .object({
    table_row_map: z
      .object({
        name: z.string().trim().min(1, 'Item type name is required').max(255),
        schema: jsonObjectSchema,
        form: jsonDocumentSchema,
        mapping: jsonObjectSchema,
      })
      .passthrough(),
  })
  .passthrough();

export type RegisterItemTypeDto = z.infer<typeof registerItemTypeSchema>;
