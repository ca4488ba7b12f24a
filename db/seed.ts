import 'dotenv/config';
import { applySchema, createPool } from '../src/config/database';
import { PgRecordsStore, withTransaction } from '../src/records/records.store';
import type { CreatePropertyInput } from '../src/records/records.types';

// Base field definitions offered when building a new item type.
const BASE_PROPERTIES: Omit<CreatePropertyInput, 'propertyId'>[] = [
  {
    name: 'Text',
    schema: { type: 'string', format: 'text' },
    formSingle: { key: 'parentkey', type: 'text', title: 'Text' },
    formArray: { key: 'parentkey', add: 'New', style: { add: 'btn-success' }, items: [{ key: 'parentkey[]', type: 'text' }] },
  },
  {
    name: 'Textarea',
    schema: { type: 'string', format: 'textarea' },
    formSingle: { key: 'parentkey', type: 'textarea', title: 'Textarea' },
    formArray: { key: 'parentkey', add: 'New', style: { add: 'btn-success' }, items: [{ key: 'parentkey[]', type: 'textarea' }] },
  },
  {
    name: 'Date',
    schema: { type: 'string', format: 'datetime' },
    formSingle: { key: 'parentkey', type: 'template', title: 'Date', format: 'yyyy-MM-dd' },
    formArray: { key: 'parentkey', add: 'New', style: { add: 'btn-success' }, items: [{ key: 'parentkey[]', type: 'template', format: 'yyyy-MM-dd' }] },
  },
];

async function main() {
  console.log('Seeding database...');

  const pool = createPool();
  await applySchema(pool);
  const records = new PgRecordsStore(pool);

  const existing = new Set((await records.itemTypeProps.getRecords([])).map((property) => property.name));
  const missing = BASE_PROPERTIES.filter((property) => !existing.has(property.name));

  await withTransaction(records, async (session) => {
    for (const property of missing) {
      await session.itemTypeProps.create({ propertyId: 0, ...property });
      console.log(`  created property: ${property.name}`);
    }
  });

  console.log(`Seeding complete (${missing.length} properties created)`);
  await records.close();
}

main().catch((error: unknown) => {
  console.error('Seeding failed:', error);
  process.exit(1);
});
