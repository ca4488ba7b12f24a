import type { QueryResultRow } from 'pg';
import { isRecordId, Queryable, toJson } from './queryable';
import type { CreatePropertyInput, ItemTypePropsApi, ItemTypeProperty } from './records.types';

const COLUMNS = 'id, name, schema, form, forms, version_id, created_at, updated_at';

const toProperty = (row: QueryResultRow): ItemTypeProperty => ({
  id: Number(row.id),
  name: String(row.name),
  schema: row.schema ?? {},
  form: row.form,
  forms: row.forms,
  versionId: Number(row.version_id),
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

export class PgItemTypeProps implements ItemTypePropsApi {
  constructor(private readonly db: Queryable) {}

  async getRecords(ids: number[]): Promise<ItemTypeProperty[]> {
    if (ids.length === 0) {
      const { rows } = await this.db.query(`SELECT ${COLUMNS} FROM item_type_property ORDER BY id`);
      return rows.map(toProperty);
    }

    const known = ids.filter(isRecordId);
    if (known.length === 0) return [];

    const { rows } = await this.db.query(
      `SELECT ${COLUMNS} FROM item_type_property WHERE id = ANY($1::int[]) ORDER BY id`,
      [known]
    );
    return rows.map(toProperty);
  }

  async getRecord(id: number): Promise<ItemTypeProperty | null> {
    if (!isRecordId(id)) return null;
    const { rows } = await this.db.query(`SELECT ${COLUMNS} FROM item_type_property WHERE id = $1`, [id]);
    return rows.length > 0 ? toProperty(rows[0]) : null;
  }

  async create(input: CreatePropertyInput): Promise<ItemTypeProperty> {
    const values = [input.name, toJson(input.schema), toJson(input.formSingle), toJson(input.formArray)];

    if (isRecordId(input.propertyId)) {
      const updated = await this.db.query(
        `UPDATE item_type_property
         SET name = $1, schema = $2::jsonb, form = $3::jsonb, forms = $4::jsonb,
             version_id = version_id + 1, updated_at = now()
         WHERE id = $5
         RETURNING ${COLUMNS}`,
        [...values, input.propertyId]
      );
      if (updated.rows.length > 0) {
        return toProperty(updated.rows[0]);
      }
    }

    const created = await this.db.query(
      `INSERT INTO item_type_property (name, schema, form, forms)
       VALUES ($1, $2::jsonb, $3::jsonb, $4::jsonb)
       RETURNING ${COLUMNS}`,
      values
    );
    return toProperty(created.rows[0]);
  }
}
