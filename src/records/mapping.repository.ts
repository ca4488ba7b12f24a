import type { QueryResultRow } from 'pg';
import { NotFoundError } from '../utils/errors';
import { isRecordId, Queryable, toJson } from './queryable';
import type { ItemTypeMapping, JsonObject, MappingApi } from './records.types';

const toMapping = (row: QueryResultRow): ItemTypeMapping => ({
  id: Number(row.id),
  itemTypeId: Number(row.item_type_id),
  mapping: row.mapping ?? {},
  versionId: Number(row.version_id),
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

export class PgMapping implements MappingApi {
  constructor(private readonly db: Queryable) {}

  // One mapping per item type; registering again replaces it and bumps the version.
  async create(itemTypeId: number, mapping: JsonObject): Promise<ItemTypeMapping> {
    if (!isRecordId(itemTypeId)) {
      throw new NotFoundError(`Item type ${itemTypeId} not found`);
    }
    const { rows } = await this.db.query(
      `INSERT INTO item_type_mapping (item_type_id, mapping)
       VALUES ($1, $2::jsonb)
       ON CONFLICT (item_type_id) DO UPDATE
       SET mapping = EXCLUDED.mapping,
           version_id = item_type_mapping.version_id + 1,
           updated_at = now()
       RETURNING id, item_type_id, mapping, version_id, created_at, updated_at`,
      [itemTypeId, toJson(mapping)]
    );
    return toMapping(rows[0]);
  }

  async getRecord(itemTypeId: number): Promise<JsonObject | null> {
    if (!isRecordId(itemTypeId)) return null;
    const { rows } = await this.db.query('SELECT mapping FROM item_type_mapping WHERE item_type_id = $1', [
      itemTypeId,
    ]);
    return rows.length > 0 ? rows[0].mapping : null;
  }
}
