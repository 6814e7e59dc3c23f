import { describe, it, expect, vi } from 'vitest';
import { DetailExtractor, inferForm, mergeDetail } from '../crawler/detail-extractor';
import { ProductDetail, ProductSummary } from '../types';
import { InterruptedError } from '../utils/errors';
import { FakePageSource, InMemoryCatalogStore } from './fakes';
import { BASE_URL, mockMedicineDetailHTML, mockPrescriptionDetailHTML } from './mock-data';

const PANADOL_URL = `${BASE_URL}/p/panadol-500mg-tablets`;
const AUGMENTIN_URL = `${BASE_URL}/p/augmentin-625mg`;

const source = () =>
  new FakePageSource({
    [PANADOL_URL]: mockMedicineDetailHTML,
    [AUGMENTIN_URL]: mockPrescriptionDetailHTML,
  });

describe('DetailExtractor', () => {
  describe('extractDetail', () => {
    it('extracts labelled fields from the page text', async () => {
      const extractor = new DetailExtractor(source(), { delayMs: 0, assetMarker: 'catalog-assets' });
      const detail = await extractor.extractDetail(PANADOL_URL);

      expect(detail).not.toBeNull();
      expect(detail).toMatchObject({
        url: PANADOL_URL,
        name: 'Panadol 500mg Tablets',
        sku: 'PAN-500',
        description: 'Fast relief from headache and fever.',
        currency: 'PKR',
        manufacturer: 'Acme Labs',
        brand: 'Panadol',
        ingredients: 'Paracetamol 500mg',
        dosage: '1-2 tablets every 6 hours',
        form: 'tablet',
        prescriptionRequired: false,
        inStock: true,
        stockQuantity: 25,
        deliveryInfo: '2-3 working days',
        rating: 4.5,
        reviewCount: 12,
      });
    });

    it('prefers an explicitly marked current price over the lowest token', async () => {
      const detail = await new DetailExtractor(source(), { delayMs: 0 }).extractDetail(PANADOL_URL);

      expect(detail?.priceCurrent).toBe(45);
      expect(detail?.priceOriginal).toBe(60);
      expect(detail?.discountPercentage).toBe(25);
    });

    it('keeps only product images and de-duplicates related products', async () => {
      const extractor = new DetailExtractor(source(), { delayMs: 0, assetMarker: 'catalog-assets' });
      const detail = await extractor.extractDetail(PANADOL_URL);

      expect(detail?.images).toEqual([
        'https://cdn.test/product/panadol-front.jpg',
        'https://cdn.test/catalog-assets/panadol-back.jpg',
      ]);
      expect(detail?.relatedProducts).toEqual([
        { name: 'Brufen 400mg Tablets', url: `${BASE_URL}/p/brufen-400mg-tablets` },
      ]);
    });

    it('collects page metadata keeping the first value per key', async () => {
      const detail = await new DetailExtractor(source(), { delayMs: 0 }).extractDetail(PANADOL_URL);

      expect(detail?.metadata).toEqual({
        metaDescription: 'Pain relief tablets',
        metaKeywords: 'panadol, paracetamol',
        metaTitle: 'Panadol 500mg',
        pageTitle: 'Panadol 500mg Tablets | Pharmacy',
        structuredData: { '@type': 'Product', name: 'Panadol' },
      });
    });

    it('flags prescription and stock status and infers the form from the description', async () => {
      const detail = await new DetailExtractor(source(), { delayMs: 0 }).extractDetail(AUGMENTIN_URL);

      expect(detail).toMatchObject({
        name: 'Augmentin 625mg',
        form: 'capsule',
        prescriptionRequired: true,
        inStock: false,
        reviewCount: 0,
        images: [],
        relatedProducts: [],
        metadata: { pageTitle: 'Augmentin 625mg' },
      });
      expect(detail?.priceCurrent).toBeUndefined();
      expect(detail?.manufacturer).toBeUndefined();
      expect(detail?.rating).toBeUndefined();
    });

    it('returns null for an unavailable page', async () => {
      expect(await new DetailExtractor(new FakePageSource()).extractDetail(`${BASE_URL}/p/missing`)).toBeNull();
    });
  });

  describe('extractBatch', () => {
    it('extracts pages in batches and skips failures', async () => {
      const pages = source();
      const onDetail = vi.fn(async (_detail: ProductDetail) => undefined);
      const details = await new DetailExtractor(pages, { delayMs: 0 }).extractBatch(
        [PANADOL_URL, `${BASE_URL}/p/missing`, AUGMENTIN_URL],
        { batchSize: 2, onDetail }
      );

      expect(details.map(d => d.url)).toEqual([PANADOL_URL, AUGMENTIN_URL]);
      expect(onDetail).toHaveBeenCalledTimes(2);
      expect(pages.calls.every(c => c.mode === 'rendered')).toBe(true);
    });

    it('stops when interrupted', async () => {
      const controller = new AbortController();
      controller.abort('SIGINT');
      const pages = source();

      await expect(
        new DetailExtractor(pages, { delayMs: 0 }).extractBatch([PANADOL_URL], { signal: controller.signal })
      ).rejects.toBeInstanceOf(InterruptedError);
      expect(pages.calls).toHaveLength(0);
    });
  });

  describe('inferForm', () => {
    it('matches whole words and plurals', () => {
      expect(inferForm('Amoxil 250mg Capsules')).toBe('capsule');
      expect(inferForm('Eye Drops 10ml')).toBe('drops');
      expect(inferForm('Measuring tablespoon')).toBeUndefined();
    });
  });

  describe('mergeDetail', () => {
    const summary: ProductSummary = {
      name: 'Panadol',
      url: PANADOL_URL,
      priceCurrent: 40,
      priceOriginal: 50,
      discountPercentage: 20,
      brand: 'GSK Pharma',
      inStock: true,
      prescriptionRequired: false,
      categoryUrl: `${BASE_URL}/cat/pain-relief`,
    };

    const detail: ProductDetail = {
      url: PANADOL_URL,
      name: 'Panadol 500mg Tablets',
      currency: 'PKR',
      manufacturer: 'Acme Labs',
      prescriptionRequired: false,
      images: ['https://cdn.test/product/panadol-front.jpg'],
      inStock: false,
      reviewCount: 3,
      relatedProducts: [],
      metadata: {},
      scrapedAt: new Date(0),
    };

    it('keeps listing prices when the detail page has none', () => {
      const merged = mergeDetail(summary, detail);
      expect(merged).toMatchObject({
        name: 'Panadol 500mg Tablets',
        priceCurrent: 40,
        priceOriginal: 50,
        discountPercentage: 20,
        brand: 'GSK Pharma',
        manufacturer: 'Acme Labs',
        inStock: false,
        imageUrl: 'https://cdn.test/product/panadol-front.jpg',
        categoryUrl: `${BASE_URL}/cat/pain-relief`,
      });
    });

    it('takes detail prices as a pair when present', () => {
      const merged = mergeDetail(summary, { ...detail, priceCurrent: 45 });
      expect(merged.priceCurrent).toBe(45);
      expect(merged.priceOriginal).toBeUndefined();
      expect(merged.discountPercentage).toBeUndefined();
    });

    it('replaces the stored price group with a single detail price', async () => {
      const store = new InMemoryCatalogStore();
      await store.upsertProduct(summary);

      await store.upsertProduct(mergeDetail(summary, { ...detail, priceCurrent: 60 }));

      const [row] = await store.query('products', { url: PANADOL_URL });
      expect(row).toMatchObject({ price_current: 60, price_original: null, discount_percentage: null });
    });

    it('keeps the stored price group when neither page priced the product', async () => {
      const store = new InMemoryCatalogStore();
      await store.upsertProduct(summary);

      const unpriced = { ...summary, priceCurrent: undefined, priceOriginal: undefined, discountPercentage: undefined };
      await store.upsertProduct(mergeDetail(unpriced, detail));

      const [row] = await store.query('products', { url: PANADOL_URL });
      expect(row).toMatchObject({ price_current: 40, price_original: 50, discount_percentage: 20 });
    });
  });
});
