// src/services/catalog/mongo-catalog-store.ts
// MongoDB-backed CatalogStore. Translates the neutral SearchFilter/SortSpec into
// Mongo filter and sort documents.
import type { Collection, Db, Filter, ObjectId, WithId } from 'mongodb';
import type { CustomOrder, Product, SearchFilter, SortSpec } from '@/types/catalog';
import type { CatalogStore, DistinctField } from './catalog-store';
import { CatalogStoreError } from './errors';

export interface ProductDocument {
  _id: ObjectId | string;
  name: string;
  description?: string;
  category: string;
  price: number;
  available?: boolean;
  createdAt?: Date;
}

export interface OrderDocument extends CustomOrder {
  status: 'received';
  createdAt: Date;
}

export interface MongoCatalogStoreOptions {
  productsCollection: string;
  ordersCollection: string;
}

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/g;

/** Search text is matched literally, never as a user-supplied pattern. */
export function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&');
}

export function toMongoFilter(filter: SearchFilter): Filter<ProductDocument> {
  const conditions: Filter<ProductDocument>[] = [];

  if (filter.text) {
    const pattern = escapeRegex(filter.text);
    conditions.push({
      $or: [
        { name: { $regex: pattern, $options: 'i' } },
        { description: { $regex: pattern, $options: 'i' } },
      ],
    });
  }

  if (filter.category) {
    conditions.push({ category: { $regex: `^${escapeRegex(filter.category)}$`, $options: 'i' } });
  }

  if (filter.minPrice !== undefined || filter.maxPrice !== undefined) {
    const price: { $gte?: number; $lte?: number } = {};
    if (filter.minPrice !== undefined) price.$gte = filter.minPrice;
    if (filter.maxPrice !== undefined) price.$lte = filter.maxPrice;
    conditions.push({ price });
  }

  if (filter.availableOnly) {
    conditions.push({ available: true });
  }

  if (conditions.length === 0) return {};
  if (conditions.length === 1) return conditions[0];
  return { $and: conditions };
}

export function toMongoSort(sort: SortSpec): Record<string, 1 | -1> {
  const mongoSort: Record<string, 1 | -1> = {};
  for (const key of sort) {
    mongoSort[key.field === 'id' ? '_id' : key.field] = key.direction === 'asc' ? 1 : -1;
  }
  return mongoSort;
}

export function toProduct(doc: WithId<ProductDocument>): Product {
  return {
    id: typeof doc._id === 'string' ? doc._id : doc._id.toHexString(),
    name: doc.name,
    description: doc.description ?? '',
    category: doc.category,
    price: doc.price,
    available: doc.available ?? true,
    createdAt: doc.createdAt ?? new Date(0),
  };
}

export class MongoCatalogStore implements CatalogStore {
  readonly name = 'mongo-catalog';
  private readonly products: Collection<ProductDocument>;
  private readonly orders: Collection<OrderDocument>;

  constructor(
    private readonly db: Db,
    options: MongoCatalogStoreOptions,
  ) {
    this.products = db.collection<ProductDocument>(options.productsCollection);
    this.orders = db.collection<OrderDocument>(options.ordersCollection);
  }

  async find(filter: SearchFilter, sort: SortSpec, skip: number, limit: number): Promise<Product[]> {
    try {
      const docs = await this.products
        .find(toMongoFilter(filter))
        .sort(toMongoSort(sort))
        .skip(skip)
        .limit(limit)
        .toArray();
      return docs.map(toProduct);
    } catch (error) {
      throw new CatalogStoreError('find', error);
    }
  }

  async count(filter: SearchFilter): Promise<number> {
    try {
      return await this.products.countDocuments(toMongoFilter(filter));
    } catch (error) {
      throw new CatalogStoreError('count', error);
    }
  }

  async distinct(field: DistinctField): Promise<string[]> {
    try {
      const values = await this.products.distinct(field);
      return values
        .filter((v): v is string => typeof v === 'string' && v.trim().length > 0)
        .sort((a, b) => a.localeCompare(b));
    } catch (error) {
      throw new CatalogStoreError('distinct', error);
    }
  }

  async insertOrder(order: CustomOrder): Promise<string> {
    try {
      const result = await this.orders.insertOne({
        ...order,
        status: 'received',
        createdAt: new Date(),
      });
      return result.insertedId.toHexString();
    } catch (error) {
      throw new CatalogStoreError('insertOrder', error);
    }
  }

  async ping(): Promise<void> {
    try {
      await this.db.command({ ping: 1 });
    } catch (error) {
      throw new CatalogStoreError('ping', error);
    }
  }
}
