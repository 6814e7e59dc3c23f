import { CatalogStatistics } from './statistics';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string | number): string =>
  String(value).replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);

const row = (label: string, value: string | number): string =>
  `<tr><td>${escapeHtml(label)}</td><td>${escapeHtml(value)}</td></tr>`;

export function renderHtmlReport(stats: CatalogStatistics, title: string, generatedAt: Date = new Date()): string {
  const categories = stats.topCategories.map(c => row(c.name, c.productCount)).join('\n');
  const ranges = stats.priceRanges.map(r => row(r.range, r.count)).join('\n');

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(title)}</title>
  <style>
    body { font-family: Arial, sans-serif; margin: 20px; }
    .header { background-color: #366092; color: white; padding: 20px; text-align: center; }
    .section { margin: 20px 0; padding: 15px; border: 1px solid #ddd; }
    .stats-table { width: 100%; border-collapse: collapse; }
    .stats-table th, .stats-table td { border: 1px solid #ddd; padding: 8px; text-align: left; }
    .stats-table th { background-color: #f2f2f2; }
    .highlight { background-color: #e7f3ff; padding: 10px; border-left: 4px solid #366092; }
  </style>
</head>
<body>
  <div class="header">
    <h1>${escapeHtml(title)}</h1>
    <p>Generated on: ${escapeHtml(generatedAt.toISOString())}</p>
  </div>

  <div class="section">
    <h2>Database Overview</h2>
    <table class="stats-table">
      <tr><th>Metric</th><th>Value</th></tr>
${row('Total Categories', stats.totalCategories)}
${row('Total Products', stats.totalProducts)}
${row('Total Brands', stats.totalBrands)}
${row('Products with Prices', stats.productsWithPrice)}
${row('Average Product Price', `Rs. ${stats.averagePrice.toFixed(2)}`)}
    </table>
  </div>

  <div class="section">
    <h2>Data Quality</h2>
    <div class="highlight">
      <p><strong>Completeness:</strong> ${stats.completeness.toFixed(1)}% of products have complete information</p>
      <p><strong>Price Coverage:</strong> ${stats.priceCoverage.toFixed(1)}% of products have pricing information</p>
    </div>
  </div>

  <div class="section">
    <h2>Top Categories</h2>
    <table class="stats-table">
      <tr><th>Category</th><th>Products</th></tr>
${categories}
    </table>
  </div>

  <div class="section">
    <h2>Price Ranges</h2>
    <table class="stats-table">
      <tr><th>Range</th><th>Products</th></tr>
${ranges}
    </table>
  </div>

  <div class="section">
    <h2>Export Files Generated</h2>
    <ul>
      <li>CSV exports in: csv_exports/</li>
      <li>JSON exports in: json_exports/</li>
      <li>Spreadsheet exports in: excel_exports/</li>
      <li>XML exports in: xml_exports/</li>
    </ul>
  </div>
</body>
</html>
`;
}
