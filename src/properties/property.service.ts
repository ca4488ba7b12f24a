import { withTransaction } from '../records/records.store';
import type { ItemTypeProperty, RecordsStore } from '../records/records.types';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { PropertyDetail, PropertyView, SavePropertyDto, savePropertySchema } from './property.dto';

const toView = (property: ItemTypeProperty): PropertyView => ({
  name: property.name,
  schema: property.schema,
  form: property.form,
  forms: property.forms,
});

export class PropertyService {
  constructor(private readonly records: RecordsStore) {}

  async listProperties(): Promise<ItemTypeProperty[]> {
    return this.records.itemTypeProps.getRecords([]);
  }

  /** Every property keyed by id. */
  async getPropertyMap(): Promise<Record<number, PropertyView>> {
    const properties = await this.records.itemTypeProps.getRecords([]);
    const lists: Record<number, PropertyView> = {};

    for (const property of properties) {
      lists[property.id] = toView(property);
    }
    return lists;
  }

  async getProperty(propertyId: number): Promise<PropertyDetail> {
    const property = await this.records.itemTypeProps.getRecord(propertyId);

    if (!property) {
      throw new NotFoundError('Property not found');
    }
    return { id: property.id, ...toView(property) };
  }

  async save(propertyId: number, body: unknown): Promise<boolean> {
    try {
      const data: SavePropertyDto = savePropertySchema.parse(body);

      const saved = await withTransaction(this.records, (records) =>
        records.itemTypeProps.create({
          propertyId,
          name: data.name,
          schema: data.schema,
          formSingle: data.form1,
          formArray: data.form2,
        })
      );

      logger.debug({ propertyId: saved.id }, 'Property saved');
      return true;
    } catch (error) {
      logger.error({ err: error, propertyId }, 'Property save failed');
      return false;
    }
  }
}
