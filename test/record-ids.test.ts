import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { PgRecordsStore } from '../src/records/records.store';
import { bearer, buildTestApp, registerBody, TestApp } from './helpers/app';
import { int4Pool } from './helpers/pg-pool';

const EMPTY_RENDER = {
  table_row: [],
  table_row_map: {},
  meta_list: {},
  schemaeditor: { schema: {} },
};

const bookRow = {
  id: 3,
  name_id: 1,
  name: 'Book',
  schema: {},
  form: [],
  render: {},
  tag: 1,
  version_id: 1,
  created_at: '2024-01-01T00:00:00.000Z',
  updated_at: '2024-01-01T00:00:00.000Z',
};

// Beyond int4, and beyond Number.MAX_SAFE_INTEGER.
const TOO_LARGE = ['3000000000', '99999999999999999999'];

describe('Ids outside the record key range', () => {
  let ctx: TestApp;
  let pg: ReturnType<typeof int4Pool>;

  beforeEach(async () => {
    // getAll is the only statement ordered by t.id; it lists one item type.
    pg = int4Pool((text) => (text.includes('ORDER BY t.id') ? [bookRow] : []));
    ctx = await buildTestApp({ store: new PgRecordsStore(pg.pool) });
  });

  it.each(TOO_LARGE)('serves the empty render document for %s', async (id) => {
    const res = await request(ctx.app).get(`/itemtypes/${id}/render`).set('Authorization', bearer());

    expect(res.status).toBe(200);
    expect(res.body).toEqual(EMPTY_RENDER);
  });

  it.each(TOO_LARGE)('redirects the mapping page for %s to the first item type', async (id) => {
    const res = await request(ctx.app).get(`/itemtypes/mapping/${id}`);

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('/itemtypes/mapping/3');
  });

  it.each(TOO_LARGE)('answers 404 for property %s', async (id) => {
    const res = await request(ctx.app).get(`/itemtypes/property/${id}`).set('Authorization', bearer());

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, message: 'Property not found' });
  });

  it('renders the register page for an id no item type can have', async () => {
    const res = await request(ctx.app).get('/itemtypes/3000000000').set('Authorization', bearer());

    expect(res.status).toBe(200);
    expect(ctx.renderer.last.template).toBe('itemtypes/register.ejs');
    expect(ctx.renderer.last.context.id).toBe(3000000000);
  });

  it('never sends an out-of-range id to the database', async () => {
    await request(ctx.app).get('/itemtypes/3000000000/render').set('Authorization', bearer());
    await request(ctx.app).get('/itemtypes/mapping/3000000000');
    await request(ctx.app).get('/itemtypes/property/3000000000').set('Authorization', bearer());

    const sentValues = pg.query.mock.calls.flatMap(([, values]) => values ?? []);
    expect(sentValues).not.toContain(3000000000);
  });

  it('answers Fail when registering under an out-of-range id', async () => {
    const res = await request(ctx.app)
      .post('/itemtypes/3000000000/register')
      .set('Content-Type', 'application/json')
      .send(registerBody('Book'));

    expect(res.body).toEqual({ msg: 'Fail' });
    expect(pg.client.release).toHaveBeenCalledTimes(1);
  });

  it('answers Fail when mapping an out-of-range item type', async () => {
    const res = await request(ctx.app)
      .post('/itemtypes/mapping')
      .set('Content-Type', 'application/json')
      .send({ item_type_id: 3000000000, mapping: '{"a":1}' });

    expect(res.body).toEqual({ msg: 'Fail' });
  });
});
