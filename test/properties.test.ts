import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { bearer, buildTestApp, TestApp } from './helpers/app';

const seedProperty = (ctx: TestApp, name: string) =>
  ctx.records.itemTypeProps.create({
    propertyId: 0,
    name,
    schema: { type: 'string', format: 'text' },
    formSingle: { key: 'parentkey', type: 'text' },
    formArray: [{ key: 'parentkey[]', type: 'text' }],
  });

describe('Property routes', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  describe('GET /itemtypes/property', () => {
    it('renders every property definition', async () => {
      await seedProperty(ctx, 'Text');
      await seedProperty(ctx, 'Date');

      const res = await request(ctx.app).get('/itemtypes/property').set('Authorization', bearer());

      expect(res.status).toBe(200);
      expect(ctx.renderer.last.template).toBe('itemtypes/property.ejs');
      expect(ctx.renderer.last.context.lists).toMatchObject([{ id: 1, name: 'Text' }, { id: 2, name: 'Date' }]);
    });

    it('is hidden without permission', async () => {
      const res = await request(ctx.app).get('/itemtypes/property');

      expect(res.status).toBe(404);
    });
  });

  describe('GET /itemtypes/property/list', () => {
    it('keys properties by id and exposes name, schema, form and forms', async () => {
      await seedProperty(ctx, 'Text');
      await seedProperty(ctx, 'Date');

      const res = await request(ctx.app).get('/itemtypes/property/list').set('Authorization', bearer());

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        '1': {
          name: 'Text',
          schema: { type: 'string', format: 'text' },
          form: { key: 'parentkey', type: 'text' },
          forms: [{ key: 'parentkey[]', type: 'text' }],
        },
        '2': {
          name: 'Date',
          schema: { type: 'string', format: 'text' },
          form: { key: 'parentkey', type: 'text' },
          forms: [{ key: 'parentkey[]', type: 'text' }],
        },
      });
    });

    it('returns an empty object when nothing is registered', async () => {
      const res = await request(ctx.app).get('/itemtypes/property/list').set('Authorization', bearer());

      expect(res.body).toEqual({});
    });
  });

  describe('GET /itemtypes/property/:id', () => {
    it('returns one property with its id', async () => {
      const property = await seedProperty(ctx, 'Text');

      const res = await request(ctx.app).get(`/itemtypes/property/${property.id}`).set('Authorization', bearer());

      expect(res.body).toEqual({
        id: property.id,
        name: 'Text',
        schema: { type: 'string', format: 'text' },
        form: { key: 'parentkey', type: 'text' },
        forms: [{ key: 'parentkey[]', type: 'text' }],
      });
    });

    it('answers 404 for an unknown property', async () => {
      const res = await request(ctx.app).get('/itemtypes/property/42').set('Authorization', bearer());

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ success: false, message: 'Property not found' });
    });
  });

  describe('POST /itemtypes/property', () => {
    it('creates a property from form1 and form2', async () => {
      const res = await request(ctx.app)
        .post('/itemtypes/property')
        .set('Content-Type', 'application/json')
        .send({
          name: 'Checkbox',
          schema: { type: 'array', items: { type: 'string' } },
          form1: { key: 'parentkey', type: 'checkboxes' },
          form2: [{ key: 'parentkey[]', type: 'checkboxes' }],
        });

      expect(res.body).toEqual({ msg: 'Success' });
      expect(ctx.records.commits).toBe(1);

      const [created] = await ctx.records.itemTypeProps.getRecords([]);
      expect(created).toMatchObject({
        name: 'Checkbox',
        schema: { type: 'array', items: { type: 'string' } },
        form: { key: 'parentkey', type: 'checkboxes' },
        forms: [{ key: 'parentkey[]', type: 'checkboxes' }],
        versionId: 1,
      });
    });

    it('stores missing forms as null', async () => {
      await request(ctx.app)
        .post('/itemtypes/property')
        .set('Content-Type', 'application/json')
        .send({ name: 'Plain', schema: { type: 'string' } });

      const [created] = await ctx.records.itemTypeProps.getRecords([]);
      expect(created.form).toBeNull();
      expect(created.forms).toBeNull();
    });

    it('updates an existing property through /property/:id', async () => {
      const property = await seedProperty(ctx, 'Text');

      const res = await request(ctx.app)
        .post(`/itemtypes/property/${property.id}`)
        .set('Content-Type', 'application/json')
        .send({ name: 'Text (long)', schema: { type: 'string', format: 'textarea' }, form1: null, form2: null });

      expect(res.body).toEqual({ msg: 'Success' });

      const updated = await ctx.records.itemTypeProps.getRecord(property.id);
      expect(updated?.name).toBe('Text (long)');
      expect(updated?.versionId).toBe(2);
      expect(await ctx.records.itemTypeProps.getRecords([])).toHaveLength(1);
    });

    it('answers Header Error for a non-JSON content type', async () => {
      const res = await request(ctx.app)
        .post('/itemtypes/property')
        .type('form')
        .send('name=Text');

      expect(res.body).toEqual({ msg: 'Header Error' });
      expect(ctx.records.begins).toBe(0);
    });

    it('answers Header Error on /property/:id for a non-JSON content type', async () => {
      const property = await seedProperty(ctx, 'Text');

      const res = await request(ctx.app)
        .post(`/itemtypes/property/${property.id}`)
        .set('Content-Type', 'text/plain')
        .send(JSON.stringify({ name: 'Text (long)', schema: {} }));

      expect(res.body).toEqual({ msg: 'Header Error' });
      expect(ctx.records.begins).toBe(0);
      expect((await ctx.records.itemTypeProps.getRecord(property.id))?.name).toBe('Text');
    });

    it('rolls back and answers Fail when the records layer throws', async () => {
      ctx.records.failAt('itemTypeProps.create');

      const res = await request(ctx.app)
        .post('/itemtypes/property')
        .set('Content-Type', 'application/json')
        .send({ name: 'Text', schema: {} });

      expect(res.body).toEqual({ msg: 'Fail' });
      expect(ctx.records.rollbacks).toBe(1);
      expect(await ctx.records.itemTypeProps.getRecords([])).toEqual([]);
    });

    it('answers Fail for a body without a name', async () => {
      const res = await request(ctx.app)
        .post('/itemtypes/property')
        .set('Content-Type', 'application/json')
        .send({ schema: {} });

      expect(res.body).toEqual({ msg: 'Fail' });
      expect(ctx.records.begins).toBe(0);
    });
  });
});
