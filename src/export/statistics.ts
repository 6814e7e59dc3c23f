import { BrandRow, CategoryRow, ProductRow } from '../types';

export interface CategoryCount {
  name: string;
  productCount: number;
}

export interface PriceRangeCount {
  range: string;
  count: number;
}

export interface CatalogStatistics {
  totalCategories: number;
  totalProducts: number;
  totalBrands: number;
  productsWithPrice: number;
  averagePrice: number;
  minPrice?: number;
  maxPrice?: number;
  completeness: number;
  priceCoverage: number;
  topCategories: CategoryCount[];
  priceRanges: PriceRangeCount[];
}

const PRICE_RANGES: ReadonlyArray<{ label: string; below: number }> = [
  { label: 'Under Rs. 100', below: 100 },
  { label: 'Rs. 100-500', below: 500 },
  { label: 'Rs. 500-1000', below: 1000 },
  { label: 'Rs. 1000-5000', below: 5000 },
  { label: 'Over Rs. 5000', below: Infinity },
];

const TOP_CATEGORY_LIMIT = 10;

export function priceRangeLabel(price: number): string {
  const range = PRICE_RANGES.find(r => price < r.below);
  return range ? range.label : PRICE_RANGES[PRICE_RANGES.length - 1].label;
}

const share = (part: number, total: number): number => (total > 0 ? (part / total) * 100 : 0);

export function computeStatistics(
  categories: CategoryRow[],
  products: ProductRow[],
  brands: BrandRow[]
): CatalogStatistics {
  const prices = products
    .map(p => p.price_current)
    .filter((price): price is number => price !== null && price > 0);

  const complete = products.filter(
    p => p.name.trim() !== '' && (p.price_current !== null || p.price_original !== null)
  ).length;

  const perCategory = new Map<number, number>();
  for (const product of products) {
    if (product.category_id !== null) {
      perCategory.set(product.category_id, (perCategory.get(product.category_id) ?? 0) + 1);
    }
  }

  const topCategories = categories
    .map(c => ({ name: c.name, productCount: perCategory.get(c.id) ?? 0 }))
    .sort((a, b) => b.productCount - a.productCount)
    .slice(0, TOP_CATEGORY_LIMIT);

  const priceRanges = PRICE_RANGES.map(r => ({
    range: r.label,
    count: prices.filter(price => priceRangeLabel(price) === r.label).length,
  })).filter(r => r.count > 0);

  return {
    totalCategories: categories.length,
    totalProducts: products.length,
    totalBrands: brands.length,
    productsWithPrice: prices.length,
    averagePrice: prices.length > 0 ? prices.reduce((sum, p) => sum + p, 0) / prices.length : 0,
    minPrice: prices.length > 0 ? Math.min(...prices) : undefined,
    maxPrice: prices.length > 0 ? Math.max(...prices) : undefined,
    completeness: share(complete, products.length),
    priceCoverage: share(prices.length, products.length),
    topCategories,
    priceRanges,
  };
}
