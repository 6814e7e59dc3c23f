import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { Workbook, Worksheet } from 'exceljs';
import { XMLBuilder } from 'fast-xml-parser';
import { CatalogStore, ExportResults, TableName } from '../types';
import { errorMessage } from '../utils/errors';
import { exportLogger as logger } from '../utils/logger';
import { fileTimestamp } from '../utils/time';
import { renderHtmlReport } from './report';
import { CatalogStatistics, computeStatistics } from './statistics';

export const EXPORT_TABLES: readonly TableName[] = ['categories', 'products', 'brands', 'product_images'];

export const EXPORT_DIRECTORIES = {
  csv: 'csv_exports',
  json: 'json_exports',
  spreadsheet: 'excel_exports',
  xml: 'xml_exports',
  reports: 'reports',
} as const;

const ITEM_ELEMENT: Record<TableName, string> = {
  categories: 'category',
  products: 'product',
  brands: 'brand',
  product_images: 'product_image',
};

const SHEET_TITLE: Record<TableName, string> = {
  categories: 'Categories',
  products: 'Products',
  brands: 'Brands',
  product_images: 'Product Images',
};

const MAX_COLUMN_WIDTH = 50;
const HEADER_FILL = 'FF366092';

type ExportRow = Record<string, unknown>;
type Cell = string | number | boolean | null;

export function cellValue(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return value.replace(/\s+/g, ' ').trim();
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  return JSON.stringify(value);
}

/** Drops null fields; dates become ISO strings, nested values stay structured. */
export function jsonRecord(row: ExportRow): ExportRow {
  const record: ExportRow = {};
  for (const [key, value] of Object.entries(row)) {
    if (value === null || value === undefined) continue;
    record[key] = value instanceof Date ? value.toISOString() : value;
  }
  return record;
}

export interface DataExporterOptions {
  reportTitle?: string;
  now?: () => Date;
}

export class DataExporter {
  private reportTitle: string;
  private now: () => Date;

  constructor(
    private store: CatalogStore,
    private outputDir: string,
    options: DataExporterOptions = {}
  ) {
    this.reportTitle = options.reportTitle ?? 'Pharmacy Catalog Scraping Report';
    this.now = options.now ?? (() => new Date());
  }

  private dir(kind: keyof typeof EXPORT_DIRECTORIES): string {
    const dir = path.join(this.outputDir, EXPORT_DIRECTORIES[kind]);
    fs.mkdirSync(dir, { recursive: true });
    return dir;
  }

  private async rows(table: TableName): Promise<ExportRow[]> {
    const rows = await this.store.query(table);
    return rows.map((row): ExportRow => ({ ...row }));
  }

  private async eachTable(
    format: string,
    tables: readonly TableName[],
    write: (table: TableName, rows: ExportRow[]) => string
  ): Promise<string[]> {
    const written: string[] = [];
    for (const table of tables) {
      try {
        const file = write(table, await this.rows(table));
        written.push(file);
        logger.info(`Exported ${table} to ${format}: ${file}`);
      } catch (error) {
        logger.error(`Error exporting ${table} to ${format}: ${errorMessage(error)}`);
      }
    }
    return written;
  }

  async exportCsv(tables: readonly TableName[] = EXPORT_TABLES): Promise<string[]> {
    const dir = this.dir('csv');
    const stamp = fileTimestamp(this.now());

    return this.eachTable('CSV', tables, (table, rows) => {
      const columns = rows.length > 0 ? Object.keys(rows[0]) : [];
      const records = rows.map(row => Object.fromEntries(columns.map(column => [column, cellValue(row[column])])));
      const csv = stringify(records, {
        header: true,
        columns,
        cast: { boolean: value => String(value) },
      });
      const file = path.join(dir, `${table}_${stamp}.csv`);
      fs.writeFileSync(file, csv, 'utf-8');
      return file;
    });
  }

  async exportJson(tables: readonly TableName[] = EXPORT_TABLES): Promise<string[]> {
    const dir = this.dir('json');
    const stamp = fileTimestamp(this.now());

    return this.eachTable('JSON', tables, (table, rows) => {
      const file = path.join(dir, `${table}_${stamp}.json`);
      fs.writeFileSync(file, JSON.stringify(rows.map(jsonRecord), null, 2), 'utf-8');
      return file;
    });
  }

  async exportXml(tables: readonly TableName[] = EXPORT_TABLES): Promise<string[]> {
    const dir = this.dir('xml');
    const exportedAt = this.now();
    const stamp = fileTimestamp(exportedAt);
    const builder = new XMLBuilder({
      ignoreAttributes: false,
      attributeNamePrefix: '@_',
      format: true,
      suppressEmptyNode: true,
    });

    return this.eachTable('XML', tables, (table, rows) => {
      const items = rows.map(row => {
        const item: Record<string, Cell> = {};
        for (const [key, value] of Object.entries(row)) {
          const cell = cellValue(value);
          if (cell !== null) item[key] = cell;
        }
        return item;
      });

      const xml = builder.build({
        '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
        [`${table}_data`]: {
          '@_exported_at': exportedAt.toISOString(),
          [ITEM_ELEMENT[table]]: items,
        },
      });

      const file = path.join(dir, `${table}_${stamp}.xml`);
      fs.writeFileSync(file, xml, 'utf-8');
      return file;
    });
  }

  async statistics(): Promise<CatalogStatistics> {
    const [categories, products, brands] = await Promise.all([
      this.store.query('categories'),
      this.store.query('products'),
      this.store.query('brands'),
    ]);
    return computeStatistics(categories, products, brands);
  }

  async exportSpreadsheet(tables: readonly TableName[] = EXPORT_TABLES): Promise<string> {
    const workbook = new Workbook();
    workbook.created = this.now();

    for (const table of tables) {
      const rows = await this.rows(table);
      const columns = rows.length > 0 ? Object.keys(rows[0]) : [];
      addSheet(workbook, SHEET_TITLE[table], columns, rows.map(row => columns.map(c => cellValue(row[c]))));
    }

    const stats = await this.statistics();
    const money = (value: number | undefined): string => (value === undefined ? 'N/A' : value.toFixed(2));

    addSheet(workbook, 'Summary', ['Table', 'Record Count'], [
      ['Categories', stats.totalCategories],
      ['Products', stats.totalProducts],
      ['Brands', stats.totalBrands],
      ['Product Statistics', ''],
      ['Products with Price', stats.productsWithPrice],
      ['Average Price (Rs.)', stats.productsWithPrice > 0 ? money(stats.averagePrice) : 'N/A'],
      ['Min Price (Rs.)', money(stats.minPrice)],
      ['Max Price (Rs.)', money(stats.maxPrice)],
    ]);

    addSheet(workbook, 'Analytics', ['Metric', 'Value'], [
      ['Top Categories by Product Count', ''],
      ...stats.topCategories.map((c): Cell[] => [c.name, c.productCount]),
      ['', ''],
      ['Price Range Distribution', ''],
      ...stats.priceRanges.map((r): Cell[] => [r.range, r.count]),
    ]);

    const file = path.join(this.dir('spreadsheet'), `catalog_complete_${fileTimestamp(this.now())}.xlsx`);
    await workbook.xlsx.writeFile(file);
    logger.info(`Exported spreadsheet: ${file}`);
    return file;
  }

  async generateReport(): Promise<string> {
    const stats = await this.statistics();
    const file = path.join(this.dir('reports'), `data_report_${fileTimestamp(this.now())}.html`);
    fs.writeFileSync(file, renderHtmlReport(stats, this.reportTitle, this.now()), 'utf-8');
    logger.info(`Data report generated: ${file}`);
    return file;
  }

  async exportAll(): Promise<ExportResults> {
    logger.info('Starting data export in all formats...');
    try {
      await this.store.cleanDuplicates();
    } catch (error) {
      logger.warn(`Cleanup before export failed, exporting as stored: ${errorMessage(error)}`);
    }

    const results: ExportResults = {
      csv: await this.exportCsv(),
      json: await this.exportJson(),
      xml: await this.exportXml(),
      spreadsheet: await this.exportSpreadsheet(),
      report: await this.generateReport(),
    };

    logger.info('All exports completed');
    return results;
  }
}

function addSheet(workbook: Workbook, title: string, headers: string[], rows: Cell[][]): Worksheet {
  const sheet = workbook.addWorksheet(title);
  const header = sheet.addRow(headers);
  header.eachCell(cell => {
    cell.font = { bold: true, color: { argb: 'FFFFFFFF' } };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL } };
  });

  for (const values of rows) {
    sheet.addRow(values);
  }

  headers.forEach((name, index) => {
    const longest = rows.reduce((max, values) => Math.max(max, String(values[index] ?? '').length), name.length);
    sheet.getColumn(index + 1).width = Math.min(longest + 2, MAX_COLUMN_WIDTH);
  });

  return sheet;
}
