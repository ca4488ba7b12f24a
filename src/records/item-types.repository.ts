import type { QueryResultRow } from 'pg';
import { ConflictError, NotFoundError } from '../utils/errors';
import { isRecordId, Queryable, toJson } from './queryable';
import type { ItemType, ItemTypesApi, ItemTypeSummary, UpdateItemTypeInput } from './records.types';

const SELECT_ITEM_TYPE = `
  SELECT t.id, t.name_id, n.name, t.schema, t.form, t.render, t.tag, t.version_id, t.created_at, t.updated_at
  FROM item_type t
  JOIN item_type_name n ON n.id = t.name_id`;

export const toItemType = (row: QueryResultRow): ItemType => ({
  id: Number(row.id),
  nameId: Number(row.name_id),
  name: String(row.name),
  schema: row.schema ?? {},
  form: row.form,
  render: row.render ?? {},
  tag: Number(row.tag),
  versionId: Number(row.version_id),
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

export class PgItemTypes implements ItemTypesApi {
  constructor(private readonly db: Queryable) {}

  async getLatest(): Promise<ItemTypeSummary[]> {
    const { rows } = await this.db.query(`
      SELECT id, name, tag, updated_at FROM (
        SELECT DISTINCT ON (t.name_id) t.id, n.name, t.tag, t.updated_at
        FROM item_type t
        JOIN item_type_name n ON n.id = t.name_id
        ORDER BY t.name_id, t.tag DESC
      ) latest
      ORDER BY updated_at DESC, id DESC`);

    return rows.map((row) => ({
      id: Number(row.id),
      name: String(row.name),
      tag: Number(row.tag),
      updatedAt: new Date(row.updated_at),
    }));
  }

  async getById(id: number): Promise<ItemType | null> {
    if (!isRecordId(id)) return null;
    const { rows } = await this.db.query(`${SELECT_ITEM_TYPE} WHERE t.id = $1`, [id]);
    return rows.length > 0 ? toItemType(rows[0]) : null;
  }

  async getAll(): Promise<ItemType[]> {
    const { rows } = await this.db.query(`${SELECT_ITEM_TYPE} ORDER BY t.id`);
    return rows.map(toItemType);
  }

  async update(input: UpdateItemTypeInput): Promise<ItemType> {
    const id = input.id > 0 ? await this.updateExisting(input) : await this.insert(input);

    const itemType = await this.getById(id);
    if (!itemType) {
      throw new NotFoundError(`Item type ${id} not found`);
    }
    return itemType;
  }

  // A name that already exists gets a new version (tag) instead of a new name row.
  private async insert(input: UpdateItemTypeInput): Promise<number> {
    const name = await this.db.query(
      `INSERT INTO item_type_name (name) VALUES ($1)
       ON CONFLICT (name) DO UPDATE SET updated_at = now()
       RETURNING id`,
      [input.name]
    );
    const nameId = Number(name.rows[0].id);

    const created = await this.db.query(
      `INSERT INTO item_type (name_id, schema, form, render, tag)
       VALUES ($1, $2::jsonb, $3::jsonb, $4::jsonb,
         (SELECT COALESCE(MAX(tag), 0) + 1 FROM item_type WHERE name_id = $1))
       RETURNING id`,
      [nameId, toJson(input.schema), toJson(input.form), toJson(input.render)]
    );
    return Number(created.rows[0].id);
  }

  private async updateExisting(input: UpdateItemTypeInput): Promise<number> {
    const current = await this.getById(input.id);
    if (!current) {
      throw new NotFoundError(`Item type ${input.id} not found`);
    }

    if (current.name !== input.name) {
      const taken = await this.db.query('SELECT id FROM item_type_name WHERE name = $1 AND id <> $2', [
        input.name,
        current.nameId,
      ]);
      if (taken.rows.length > 0) {
        throw new ConflictError(`Item type name "${input.name}" is already in use`);
      }

      await this.db.query('UPDATE item_type_name SET name = $1, updated_at = now() WHERE id = $2', [
        input.name,
        current.nameId,
      ]);
    }

    await this.db.query(
      `UPDATE item_type
       SET schema = $1::jsonb, form = $2::jsonb, render = $3::jsonb,
           version_id = version_id + 1, updated_at = now()
       WHERE id = $4`,
      [toJson(input.schema), toJson(input.form), toJson(input.render), input.id]
    );
    return input.id;
  }
}
