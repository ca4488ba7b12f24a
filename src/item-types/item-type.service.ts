import { withTransaction } from '../records/records.store';
import type { ItemTypeSummary, JsonObject, RecordsStore } from '../records/records.types';
import { logger } from '../utils/logger';
import { RegisterItemTypeDto, registerItemTypeSchema } from './item-type.dto';

/** Served for id 0 and for ids that do not resolve. */
export const emptyRenderDocument = (): JsonObject => ({
  table_row: [],
  table_row_map: {},
  meta_list: {},
  schemaeditor: {
    schema: {},
  },
});

export class ItemTypeService {
  constructor(private readonly records: RecordsStore) {}

  async listLatest(): Promise<ItemTypeSummary[]> {
    return this.records.itemTypes.getLatest();
  }

  async getRender(itemTypeId: number): Promise<JsonObject> {
    const itemType = itemTypeId > 0 ? await this.records.itemTypes.getById(itemTypeId) : null;
    return itemType ? itemType.render : emptyRenderDocument();
  }

  /**
   * Saves the item type and its mapping in one transaction. Returns false on
   * any failure; the cause is logged, never returned.
   */
  async register(itemTypeId: number, body: unknown): Promise<boolean> {
    try {
      const data: RegisterItemTypeDto = registerItemTypeSchema.parse(body);
      const { name, schema, form, mapping } = data.table_row_map;

      const savedId = await withTransaction(this.records, async (records) => {
        const record = await records.itemTypes.update({ id: itemTypeId, name, schema, form, render: data });
        const targetId = itemTypeId === 0 ? record.id : itemTypeId;
        await records.mappings.create(targetId, mapping);
        return targetId;
      });

      logger.debug({ itemTypeId: savedId }, 'Item type registered');
      return true;
    } catch (error) {
      logger.error({ err: error, itemTypeId }, 'Item type register failed');
      return false;
    }
  }
}
