import { withTransaction } from '../records/records.store';
import type { ItemType, RecordsStore } from '../records/records.types';
import { logger } from '../utils/logger';
import { RegisterMappingDto, registerMappingSchema } from './mapping.dto';

export type MappingPage =
  | { kind: 'empty' }
  | { kind: 'redirect'; itemTypeId: number }
  | { kind: 'page'; lists: ItemType[]; itemTypeId: number; mapping: string };

export class MappingService {
  constructor(private readonly records: RecordsStore) {}

  /**
   * Resolves what the mapping page shows: nothing registered, a redirect to
   * the first item type when `itemTypeId` is unknown, or the mapping itself.
   */
  async getMappingPage(itemTypeId: number): Promise<MappingPage> {
    const lists = await this.records.itemTypes.getAll();
    if (lists.length === 0) {
      return { kind: 'empty' };
    }

    const itemType = await this.records.itemTypes.getById(itemTypeId);
    if (!itemType) {
      return { kind: 'redirect', itemTypeId: lists[0].id };
    }

    const record = await this.records.mappings.getRecord(itemTypeId);
    const mapping = JSON.stringify(record, null, 4);
    logger.debug({ itemTypeId, mapping }, 'Loaded item type mapping');

    return { kind: 'page', lists, itemTypeId, mapping };
  }

  async register(body: unknown): Promise<boolean> {
    try {
      const data: RegisterMappingDto = registerMappingSchema.parse(body);

      await withTransaction(this.records, (records) => records.mappings.create(data.item_type_id, data.mapping));

      logger.debug({ itemTypeId: data.item_type_id }, 'Item type mapping registered');
      return true;
    } catch (error) {
      logger.error({ err: error }, 'Item type mapping register failed');
      return false;
    }
  }
}
