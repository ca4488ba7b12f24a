import type { JsonObject } from '../utils/validators';

export type { JsonObject };

export interface ItemType {
  id: number;
  nameId: number;
  name: string;
  schema: JsonObject;
  form: unknown;
  render: JsonObject;
  tag: number;
  versionId: number;
  createdAt: Date;
  updatedAt: Date;
}

/** The newest item type registered under one name. */
export interface ItemTypeSummary {
  id: number;
  name: string;
  tag: number;
  updatedAt: Date;
}

export interface ItemTypeProperty {
  id: number;
  name: string;
  schema: JsonObject;
  /** Form used when the property holds a single value. */
  form: unknown;
  /** Form used when the property holds an array of values. */
  forms: unknown;
  versionId: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ItemTypeMapping {
  id: number;
  itemTypeId: number;
  mapping: JsonObject;
  versionId: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface UpdateItemTypeInput {
  /** 0 registers a new item type. */
  id: number;
  name: string;
  schema: JsonObject;
  form: unknown;
  render: JsonObject;
}

export interface CreatePropertyInput {
  /** 0, or an id that does not exist, inserts a new property. */
  propertyId: number;
  name: string;
  schema: JsonObject;
  formSingle: unknown;
  formArray: unknown;
}

export interface ItemTypesApi {
  getLatest(): Promise<ItemTypeSummary[]>;
  getById(id: number): Promise<ItemType | null>;
  getAll(): Promise<ItemType[]>;
  update(input: UpdateItemTypeInput): Promise<ItemType>;
}

export interface ItemTypePropsApi {
  /** An empty id list returns every property. */
  getRecords(ids: number[]): Promise<ItemTypeProperty[]>;
  getRecord(id: number): Promise<ItemTypeProperty | null>;
  create(input: CreatePropertyInput): Promise<ItemTypeProperty>;
}

export interface MappingApi {
  create(itemTypeId: number, mapping: JsonObject): Promise<ItemTypeMapping>;
  getRecord(itemTypeId: number): Promise<JsonObject | null>;
}

export interface Records {
  readonly itemTypes: ItemTypesApi;
  readonly itemTypeProps: ItemTypePropsApi;
  readonly mappings: MappingApi;
}

export interface RecordsSession extends Records {
  commit(): Promise<void>;
  /** No-op once the session has been committed or rolled back. */
  rollback(): Promise<void>;
}

export interface RecordsStore extends Records {
  begin(): Promise<RecordsSession>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
