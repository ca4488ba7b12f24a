import { z } from 'zod';
import { encodedJsonObjectSchema, idSchema, positiveIdSchema } from '../utils/validators';

export const mappingItemTypeParamSchema = z.object({
  itemTypeId: idSchema.default(0),
});

export const registerMappingSchema = z.object({
  item_type_id: positiveIdSchema,
  mapping: encodedJsonObjectSchema,
});

export type RegisterMappingDto = z.infer<typeof registerMappingSchema>;
