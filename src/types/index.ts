export type CategorySource = 'homepage' | 'sitemap' | 'az-enumeration' | 'navigation';

export type FetchMode = 'plain' | 'rendered';

export type MedicineForm = 'tablet' | 'capsule' | 'syrup' | 'injection' | 'cream' | 'drops';

export interface Category {
  name: string;
  url: string;
  slug?: string;
  imageUrl?: string;
  parentUrl?: string;
  source: CategorySource;
}

export interface Brand {
  name: string;
  url?: string;
  logoUrl?: string;
  description?: string;
}

export interface PriceResolution {
  current?: number;
  original?: number;
  discountPercentage?: number;
}

export interface ProductSummary {
  name: string;
  url: string;
  slug?: string;
  priceCurrent?: number;
  priceOriginal?: number;
  discountPercentage?: number;
  imageUrl?: string;
  brand?: string;
  inStock: boolean;
  prescriptionRequired: boolean;
  categoryUrl?: string;
}

export interface RelatedProduct {
  name: string;
  url: string;
}

export interface ProductMetadata {
  metaDescription?: string;
  metaKeywords?: string;
  metaTitle?: string;
  pageTitle?: string;
  structuredData?: unknown;
}

export interface ProductDetail {
  url: string;
  name?: string;
  sku?: string;
  description?: string;
  priceCurrent?: number;
  priceOriginal?: number;
  discountPercentage?: number;
  currency: 'PKR';
  manufacturer?: string;
  brand?: string;
  ingredients?: string;
  dosage?: string;
  form?: MedicineForm;
  prescriptionRequired: boolean;
  images: string[];
  inStock: boolean;
  stockQuantity?: number;
  deliveryInfo?: string;
  rating?: number;
  reviewCount: number;
  relatedProducts: RelatedProduct[];
  metadata: ProductMetadata;
  scrapedAt: Date;
}

export type DetailedProduct = ProductSummary & Partial<Omit<ProductDetail, 'url' | 'name'>>;

export type TableName = 'categories' | 'products' | 'brands' | 'product_images';

export type CategoryRow = {
  id: number;
  name: string;
  url: string;
  slug: string | null;
  image_url: string | null;
  parent_id: number | null;
  source: CategorySource;
  scraped_at: Date;
};

export type BrandRow = {
  id: number;
  name: string;
  url: string | null;
  logo_url: string | null;
  description: string | null;
};

export type ProductRow = {
  id: number;
  name: string;
  url: string;
  slug: string | null;
  sku: string | null;
  price_current: number | null;
  price_original: number | null;
  discount_percentage: number | null;
  description: string | null;
  ingredients: string | null;
  dosage: string | null;
  form: MedicineForm | null;
  manufacturer: string | null;
  brand: string | null;
  brand_id: number | null;
  category_id: number | null;
  image_url: string | null;
  in_stock: boolean;
  prescription_required: boolean;
  stock_quantity: number | null;
  delivery_info: string | null;
  rating: number | null;
  reviews_count: number | null;
  related_products: RelatedProduct[] | null;
  metadata: ProductMetadata | null;
  scraped_at: Date;
};

export type ProductImageRow = {
  id: number;
  product_id: number;
  image_url: string;
  image_type: string;
};

export interface TableRows {
  categories: CategoryRow;
  products: ProductRow;
  brands: BrandRow;
  product_images: ProductImageRow;
}

export type RowFilter<T extends TableName> = Partial<{
  [K in keyof TableRows[T]]: string | number | boolean | null;
}>;

export interface CleanupReport {
  duplicateProductsRemoved: number;
  duplicateCategoriesRemoved: number;
  invalidPricesCleared: number;
}

export interface CatalogStore {
  upsertCategory(category: Category): Promise<number | null>;
  upsertProduct(product: DetailedProduct): Promise<number | null>;
  upsertBrand(brand: Brand): Promise<number | null>;
  cleanDuplicates(): Promise<CleanupReport>;
  query<T extends TableName>(table: T, filter?: RowFilter<T>): Promise<Array<TableRows[T]>>;
}

export interface CrawlerOptions {
  outputDir?: string;
  delayMs?: number;
  maxProductsPerCategory?: number;
  maxPages?: number;
  skipDetails?: boolean;
  resume?: boolean;
}

export type ScrapeStage =
  | 'initializing'
  | 'category-discovery'
  | 'product-extraction'
  | 'detail-extraction'
  | 'export'
  | 'completed'
  | 'interrupted'
  | 'error';

export interface ScrapeProgress {
  stage: ScrapeStage;
  categoriesDiscovered: number;
  productsFound: number;
  productsDetailed: number;
  persistFailures: number;
  completedCategoryUrls: string[];
  options: CrawlerOptions;
  startTime: string;
  timestamp: string;
  error?: string;
}

export interface ExportResults {
  csv: string[];
  json: string[];
  xml: string[];
  spreadsheet?: string;
  report?: string;
}
