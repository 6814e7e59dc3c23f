import type { MedicineForm } from '../types';

export const CATEGORY_PATH = '/cat/';
export const AZ_PATH = '/atozmedicine/';
export const PRODUCT_PATH = '/p/';

export const PRICE_TOKEN = /Rs\.\s*([\d,]+)/gi;
export const MAX_SANE_PRICE = 1_000_000;

export const CATEGORY_LINK_SELECTORS = [
  'a[href*="/cat/"]',
  'a[href*="/atozmedicine/"]',
  '.category-item a',
  '.category-card a',
  '[class*="category"] a',
] as const;

export const NAVIGATION_REGIONS = ['nav', 'header', 'footer'] as const;
export const NAVIGATION_LINK = /\/cat\/|\/atozmedicine\//;

export const SUBCATEGORY_LINK_SELECTORS = [
  'a[href*="/cat/"]',
  '.subcategory a',
  '.filter a',
  '.category-filter a',
] as const;

export const SITEMAP_PATHS = ['/sitemap.xml', '/sitemap', '/categories'] as const;

export const PRODUCT_LINK_SELECTORS = [
  'a[href*="/p/"]',
  '.product-item a',
  '.product-card a',
  '[class*="product"] a[href*="/p/"]',
] as const;

export const NEXT_PAGE_SELECTORS = [
  '.pagination a[href*="page="]',
  '.next-page',
  '[class*="next"]',
] as const;

export const PRODUCT_COUNT_SELECTORS = [
  '.product-count',
  '.results-count',
  '[class*="count"]',
  '.total-products',
] as const;

export const IMAGE_ATTRIBUTES = ['src', 'data-src', 'data-lazy-src', 'data-original'] as const;
export const CATEGORY_IMAGE_ATTRIBUTES = ['src', 'data-src'] as const;
export const IMAGE_PATH_MARKERS = ['product', 'medicine'] as const;

export const NAME_CLASS_SELECTOR = '[class*="name"], [class*="title"]';
export const MIN_NAME_LENGTH = 3;

export const LISTING_OUT_OF_STOCK = ['out of stock', 'not available', 'unavailable'] as const;
export const DETAIL_OUT_OF_STOCK = [...LISTING_OUT_OF_STOCK, 'sold out', 'stock finished'] as const;

export const LISTING_PRESCRIPTION = ['prescription', 'rx required', 'doctor'] as const;
export const DETAIL_PRESCRIPTION = [
  'prescription required',
  'prescription needed',
  'rx required',
  "doctor's prescription",
  'prescribed medicine',
] as const;

export const LISTING_BRAND_PATTERNS = [
  /\bby\s+([A-Za-z][A-Za-z ]*)/i,
  /\bbrand:\s*([A-Za-z][A-Za-z ]*)/i,
  /\bmanufacturer:\s*([A-Za-z][A-Za-z ]*)/i,
] as const;

export const DETAIL_NAME_SELECTORS = [
  'h1',
  '.product-title',
  '.product-name',
  '[class*="title"]',
  '[class*="name"]',
] as const;

export const DETAIL_DESCRIPTION_SELECTORS = [
  '.product-description',
  '.description',
  '.product-details',
  '[class*="description"]',
  '.product-info',
] as const;

export const CURRENT_PRICE_SELECTORS = [
  '.current-price',
  '.sale-price',
  '.discounted-price',
  '.price-current',
] as const;

export const SKU_PATTERNS = [
  /SKU[:\s]*([A-Za-z0-9-]+)/i,
  /Product Code[:\s]*([A-Za-z0-9-]+)/i,
  /Item Code[:\s]*([A-Za-z0-9-]+)/i,
] as const;

export const MANUFACTURER_PATTERNS = [
  /Manufacturer[:\s]*([^\n]+)/i,
  /Brand[:\s]*([^\n]+)/i,
  /Company[:\s]*([^\n]+)/i,
  /Made by[:\s]*([^\n]+)/i,
] as const;

export const BRAND_PATTERNS = [
  /Brand:\s*([^\n]+)/i,
  /Manufacturer:\s*([^\n]+)/i,
  /Company:\s*([^\n]+)/i,
] as const;

export const INGREDIENT_PATTERNS = [
  /Ingredients[:\s]*([^\n]+)/i,
  /Composition[:\s]*([^\n]+)/i,
  /Active Ingredients[:\s]*([^\n]+)/i,
  /Contains[:\s]*([^\n]+)/i,
] as const;

export const DOSAGE_PATTERNS = [
  /Dosage[:\s]*([^\n]+)/i,
  /Dose[:\s]*([^\n]+)/i,
  /How to use[:\s]*([^\n]+)/i,
  /Administration[:\s]*([^\n]+)/i,
] as const;

export const FORM_LABEL_PATTERNS = [
  /\bForm:\s*([^\n]+)/i,
  /\bFormulation:\s*([^\n]+)/i,
] as const;

export const FORM_KEYWORDS: ReadonlyArray<readonly [MedicineForm, readonly string[]]> = [
  ['tablet', ['tablet', 'tab', 'pills']],
  ['capsule', ['capsule', 'cap']],
  ['syrup', ['syrup', 'liquid', 'suspension']],
  ['injection', ['injection', 'inj', 'vial']],
  ['cream', ['cream', 'ointment', 'gel']],
  ['drops', ['drops', 'eye drops', 'ear drops']],
];

export const STOCK_QUANTITY_PATTERNS = [
  /(\d+)\s*in stock/i,
  /stock:\s*(\d+)/i,
  /available:\s*(\d+)/i,
  /quantity:\s*(\d+)/i,
] as const;

export const DELIVERY_PATTERNS = [
  /delivery[:\s]*([^\n]+)/i,
  /shipping[:\s]*([^\n]+)/i,
  /arrives[:\s]*([^\n]+)/i,
] as const;

export const RATING_SELECTORS = ['.rating', '.stars', '[class*="rating"]', '[class*="star"]'] as const;
export const RATING_VALUE = /(\d+(?:\.\d+)?)/;

export const REVIEW_COUNT_PATTERNS = [
  /(\d+)\s*reviews?/i,
  /(\d+)\s*ratings?/i,
  /reviewed by\s*(\d+)/i,
] as const;

export const RELATED_SECTION_CLASS = /related|recommended|similar/i;

export const MEDICINE_NAME_KEYWORDS = [
  'tablet',
  'capsule',
  'syrup',
  'injection',
  'medicine',
  'cream',
  'drops',
  'suspension',
  'powder',
  'gel',
] as const;

export const MEDICINE_CATEGORY_KEYWORDS = ['medicine', 'health', 'pharmaceutical'] as const;
