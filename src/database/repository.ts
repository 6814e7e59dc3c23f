import { PoolClient } from 'pg';
import { transaction, query } from './connection';
import {
  Brand,
  CatalogStore,
  Category,
  CleanupReport,
  DetailedProduct,
  RowFilter,
  TableName,
  TableRows,
} from '../types';
import { MAX_SANE_PRICE } from '../crawler/patterns';
import { dbLogger as logger } from '../utils/logger';

const TABLES: readonly TableName[] = ['categories', 'products', 'brands', 'product_images'];
const COLUMN_NAME = /^[a-z_]+$/;

const orNull = <T>(value: T | undefined): T | null => (value === undefined ? null : value);

export const UPSERT_PRODUCT_SQL = `INSERT INTO products (
    name, url, slug, sku, price_current, price_original, discount_percentage,
    description, ingredients, dosage, form, manufacturer, brand, brand_id,
    category_id, image_url, in_stock, prescription_required, stock_quantity,
    delivery_info, rating, reviews_count, related_products, metadata, scraped_at
  )
  VALUES (
    $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14,
    (SELECT id FROM categories WHERE url = $15),
    $16, $17, $18, $19, $20, $21, $22, $23, $24, CURRENT_TIMESTAMP
  )
  ON CONFLICT (url)
  DO UPDATE SET
    name = EXCLUDED.name,
    slug = COALESCE(EXCLUDED.slug, products.slug),
    sku = COALESCE(EXCLUDED.sku, products.sku),
    price_current = COALESCE(EXCLUDED.price_current, products.price_current),
    price_original = CASE WHEN EXCLUDED.price_current IS NOT NULL
      THEN EXCLUDED.price_original ELSE products.price_original END,
    discount_percentage = CASE WHEN EXCLUDED.price_current IS NOT NULL
      THEN EXCLUDED.discount_percentage ELSE products.discount_percentage END,
    description = COALESCE(EXCLUDED.description, products.description),
    ingredients = COALESCE(EXCLUDED.ingredients, products.ingredients),
    dosage = COALESCE(EXCLUDED.dosage, products.dosage),
    form = COALESCE(EXCLUDED.form, products.form),
    manufacturer = COALESCE(EXCLUDED.manufacturer, products.manufacturer),
    brand = COALESCE(EXCLUDED.brand, products.brand),
    brand_id = COALESCE(EXCLUDED.brand_id, products.brand_id),
    category_id = COALESCE(EXCLUDED.category_id, products.category_id),
    image_url = COALESCE(EXCLUDED.image_url, products.image_url),
    in_stock = EXCLUDED.in_stock,
    prescription_required = EXCLUDED.prescription_required,
    stock_quantity = COALESCE(EXCLUDED.stock_quantity, products.stock_quantity),
    delivery_info = COALESCE(EXCLUDED.delivery_info, products.delivery_info),
    rating = COALESCE(EXCLUDED.rating, products.rating),
    reviews_count = COALESCE(EXCLUDED.reviews_count, products.reviews_count),
    related_products = COALESCE(EXCLUDED.related_products, products.related_products),
    metadata = COALESCE(EXCLUDED.metadata, products.metadata),
    scraped_at = EXCLUDED.scraped_at,
    updated_at = CURRENT_TIMESTAMP
  RETURNING id`;

export class CatalogRepository implements CatalogStore {

  async upsertCategory(category: Category): Promise<number | null> {
    try {
      const result = await query<{ id: number }>(
        `INSERT INTO categories (name, url, slug, image_url, parent_id, source, scraped_at)
         VALUES ($1, $2, $3, $4, (SELECT id FROM categories WHERE url = $5), $6, CURRENT_TIMESTAMP)
         ON CONFLICT (url)
         DO UPDATE SET
           name = EXCLUDED.name,
           slug = COALESCE(EXCLUDED.slug, categories.slug),
           image_url = COALESCE(EXCLUDED.image_url, categories.image_url),
           parent_id = COALESCE(EXCLUDED.parent_id, categories.parent_id),
           scraped_at = EXCLUDED.scraped_at,
           updated_at = CURRENT_TIMESTAMP
         RETURNING id`,
        [
          category.name, category.url, orNull(category.slug), orNull(category.imageUrl),
          orNull(category.parentUrl), category.source,
        ]
      );
      return result.rows[0].id;
    } catch (error) {
      logger.error(`Failed to save category ${category.url}: ${error}`);
      return null;
    }
  }

  async upsertBrand(brand: Brand): Promise<number | null> {
    try {
      return await transaction(client => this.upsertBrandWith(client, brand));
    } catch (error) {
      logger.error(`Failed to save brand ${brand.name}: ${error}`);
      return null;
    }
  }

  private async upsertBrandWith(client: PoolClient, brand: Brand): Promise<number> {
    const result = await client.query<{ id: number }>(
      `INSERT INTO brands (name, url, logo_url, description)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (name)
       DO UPDATE SET
         url = COALESCE(EXCLUDED.url, brands.url),
         logo_url = COALESCE(EXCLUDED.logo_url, brands.logo_url),
         description = COALESCE(EXCLUDED.description, brands.description),
         updated_at = CURRENT_TIMESTAMP
       RETURNING id`,
      [brand.name, orNull(brand.url), orNull(brand.logoUrl), orNull(brand.description)]
    );
    return result.rows[0].id;
  }

  async upsertProduct(product: DetailedProduct): Promise<number | null> {
    try {
      return await transaction(async (client) => {
        const brandId = product.brand ? await this.upsertBrandWith(client, { name: product.brand }) : null;

        const result = await client.query<{ id: number }>(
          UPSERT_PRODUCT_SQL,
          [
            product.name, product.url, orNull(product.slug), orNull(product.sku),
            orNull(product.priceCurrent), orNull(product.priceOriginal), orNull(product.discountPercentage),
            orNull(product.description), orNull(product.ingredients), orNull(product.dosage),
            orNull(product.form), orNull(product.manufacturer), orNull(product.brand), brandId,
            orNull(product.categoryUrl), orNull(product.imageUrl ?? product.images?.[0]),
            product.inStock, product.prescriptionRequired, orNull(product.stockQuantity),
            orNull(product.deliveryInfo), orNull(product.rating), orNull(product.reviewCount),
            product.relatedProducts ? JSON.stringify(product.relatedProducts) : null,
            product.metadata ? JSON.stringify(product.metadata) : null,
          ]
        );
        const productId = result.rows[0].id;

        if (product.images) {
          await this.replaceImages(client, productId, product.images);
        }

        logger.debug(`Saved product: ${product.name} (ID: ${productId})`);
        return productId;
      });
    } catch (error) {
      logger.error(`Failed to save product ${product.url}: ${error}`);
      return null;
    }
  }

  private async replaceImages(client: PoolClient, productId: number, images: string[]): Promise<void> {
    await client.query('DELETE FROM product_images WHERE product_id = $1', [productId]);

    for (const [index, imageUrl] of images.entries()) {
      await client.query(
        `INSERT INTO product_images (product_id, image_url, image_type)
         VALUES ($1, $2, $3)
         ON CONFLICT (product_id, image_url) DO NOTHING`,
        [productId, imageUrl, index === 0 ? 'primary' : 'gallery']
      );
    }
  }

  async cleanDuplicates(): Promise<CleanupReport> {
    return transaction(async (client) => {
      const products = await client.query(
        'DELETE FROM products WHERE id NOT IN (SELECT MIN(id) FROM products GROUP BY url)'
      );
      const categories = await client.query(
        'DELETE FROM categories WHERE id NOT IN (SELECT MIN(id) FROM categories GROUP BY url)'
      );

      const current = await client.query(
        'UPDATE products SET price_current = NULL WHERE price_current <= 0 OR price_current > $1',
        [MAX_SANE_PRICE]
      );
      const original = await client.query(
        'UPDATE products SET price_original = NULL WHERE price_original <= 0 OR price_original > $1',
        [MAX_SANE_PRICE]
      );

      await client.query(
        `UPDATE products SET discount_percentage = CASE
           WHEN price_current IS NOT NULL AND price_original > price_current
             THEN ROUND(((price_original - price_current) / price_original * 100)::numeric, 2)::double precision
           ELSE NULL
         END`
      );

      const report: CleanupReport = {
        duplicateProductsRemoved: products.rowCount ?? 0,
        duplicateCategoriesRemoved: categories.rowCount ?? 0,
        invalidPricesCleared: (current.rowCount ?? 0) + (original.rowCount ?? 0),
      };
      logger.info(
        `Cleanup removed ${report.duplicateProductsRemoved} duplicate products, ` +
        `${report.duplicateCategoriesRemoved} duplicate categories, cleared ${report.invalidPricesCleared} prices`
      );
      return report;
    });
  }

  async query<T extends TableName>(table: T, filter: RowFilter<T> = {}): Promise<Array<TableRows[T]>> {
    if (!TABLES.includes(table)) {
      throw new Error(`Unknown table: ${table}`);
    }

    const entries: Array<[string, unknown]> = Object.entries(filter).filter(([, value]) => value !== undefined);
    const params: unknown[] = [];
    const conditions = entries.map(([column, value]) => {
      if (!COLUMN_NAME.test(column)) {
        throw new Error(`Invalid column name: ${column}`);
      }
      if (value === null) return `${column} IS NULL`;
      params.push(value);
      return `${column} = $${params.length}`;
    });

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    const result = await query<TableRows[T]>(`SELECT * FROM ${table}${where} ORDER BY id`, params);
    return result.rows;
  }
}
