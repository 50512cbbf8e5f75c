/**
 * Static HTML report: menu tab with week-over-week tags, price tab with chart
 */

import { promises as fs } from "fs";
import path from "node:path";
import {
  buildPriceSeries,
  movedPrices,
  type MenuDiff,
  type PriceDiff,
} from "../compare/index";
import { REPORT_CONSTANTS } from "../constants/index";
import type { PriceSnapshot, WeekInfo } from "../types/index";
import { formatReportTimestamp } from "../utils/date";
import { escapeHtml, jsonForScript } from "../utils/html";
import { arrow, describeChange, signed } from "./format";

export interface ReportInput {
  week: WeekInfo;
  /** Dishes per day, days in display order */
  days: ReadonlyMap<string, readonly string[]>;
  menuDiff: MenuDiff;
  /** Latest capture against the one before it */
  priceDiff?: PriceDiff;
  /** Latest capture against the oldest retained */
  trend?: PriceDiff;
  history: readonly PriceSnapshot[];
  generatedAt: Date;
  timeZone?: string;
}

const STYLE = `
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; background: #f7fafc; color: #2d3748; padding: 24px; }
    .container { max-width: 860px; margin: 0 auto; background: #fff; border-radius: 12px; box-shadow: 0 4px 16px rgba(0,0,0,.08); overflow: hidden; }
    header { background: linear-gradient(135deg, #2b6cb0, #2c5282); color: #fff; padding: 28px 24px; }
    header h1 { font-size: 26px; }
    .week-badge { display: inline-block; margin-top: 8px; padding: 4px 12px; border-radius: 999px; background: rgba(255,255,255,.2); font-weight: 600; }
    .tabs { display: flex; border-bottom: 1px solid #e2e8f0; }
    .tab { flex: 1; padding: 14px; border: 0; background: none; font-size: 15px; cursor: pointer; color: #718096; }
    .tab.active { color: #2b6cb0; border-bottom: 3px solid #2b6cb0; font-weight: 600; }
    .tab-content { display: none; padding: 24px; }
    .tab-content.active { display: block; }
    .alert { padding: 12px 16px; border-radius: 8px; margin-bottom: 16px; line-height: 1.6; }
    .alert-warning { background: #fffaf0; border-left: 4px solid #dd6b20; }
    .alert-info { background: #ebf8ff; border-left: 4px solid #3182ce; }
    .stats { display: flex; gap: 12px; margin-bottom: 20px; }
    .stat { flex: 1; background: #f7fafc; border-radius: 8px; padding: 12px; text-align: center; }
    .stat-value { font-size: 22px; font-weight: 700; color: #2b6cb0; }
    .stat-label { font-size: 12px; color: #718096; }
    .day-section { margin-bottom: 20px; }
    .day-section h2 { font-size: 16px; color: #2c5282; margin-bottom: 8px; }
    .menu-item { padding: 8px 12px; border-radius: 6px; background: #f7fafc; margin-bottom: 6px; }
    .menu-item.new { background: #f0fff4; border-left: 4px solid #38a169; }
    .menu-item.new::after { content: "NY"; float: right; font-size: 11px; font-weight: 700; color: #38a169; }
    .chart-container { margin-bottom: 24px; }
    .chart-title { font-weight: 600; margin-bottom: 8px; }
    .price-table { width: 100%; border-collapse: collapse; font-size: 14px; }
    .price-table th, .price-table td { padding: 8px; border-bottom: 1px solid #e2e8f0; text-align: left; }
    .price-change.up { color: #e53e3e; }
    .price-change.down { color: #38a169; }
    .empty { padding: 24px; color: #718096; }
    footer { padding: 16px 24px; font-size: 12px; color: #a0aec0; text-align: center; }
    @media (max-width: 600px) { body { padding: 12px; } .stats { flex-direction: column; } }`;

const SCRIPT = `
    function showTab(name, button) {
      document.querySelectorAll('.tab-content').forEach((c) => c.classList.remove('active'));
      document.querySelectorAll('.tab').forEach((t) => t.classList.remove('active'));
      document.getElementById(name + '-tab').classList.add('active');
      button.classList.add('active');
    }`;

function priceAlerts(priceDiff?: PriceDiff, trend?: PriceDiff): string {
  let out = "";

  const recent = priceDiff ? movedPrices(priceDiff) : [];
  if (recent.length > 0) {
    out += '      <div class="alert alert-warning">\n';
    out += "        <strong>Prisändringar</strong><br>\n";
    for (const c of recent) {
      out += `        ${arrow(c.delta ?? 0)} ${escapeHtml(c.category)}: ${c.previous} → ${c.current} kr<br>\n`;
    }
    out += "      </div>\n";
  }

  const since = trend ? movedPrices(trend) : [];
  if (trend?.previousDate && since.length > 0) {
    out += '      <div class="alert alert-info">\n';
    out += `        <strong>Prisutveckling sedan ${escapeHtml(trend.previousDate)}</strong><br>\n`;
    for (const c of since) {
      out += `        ${escapeHtml(c.category)}: ${describeChange(c)}<br>\n`;
    }
    out += "      </div>\n";
  }

  return out;
}

function menuSections(input: ReportInput): string {
  const fresh = new Set(input.menuDiff.newDishes);
  let out = "";
  for (const [day, dishes] of input.days) {
    out += '      <div class="day-section">\n';
    out += `        <h2>${escapeHtml(day)}</h2>\n`;
    for (const dish of dishes) {
      const cls = fresh.has(dish.trim()) ? "menu-item new" : "menu-item";
      out += `        <div class="${cls}">${escapeHtml(dish)}</div>\n`;
    }
    out += "      </div>\n";
  }
  return out;
}

function priceTable(history: readonly PriceSnapshot[]): string {
  const recent = history.slice(-REPORT_CONSTANTS.TABLE_CAPTURES);
  const { labels, datasets } = buildPriceSeries(recent);

  let out = '      <table class="price-table">\n';
  out += "        <thead><tr><th>Typ</th>";
  for (const date of labels) out += `<th>${escapeHtml(date)}</th>`;
  out += "<th>Förändring</th></tr></thead>\n";
  out += "        <tbody>\n";

  for (const { category, data } of datasets) {
    out += `          <tr><td>${escapeHtml(category)}</td>`;
    for (const v of data) out += `<td>${v === null ? "–" : `${v} kr`}</td>`;

    const first = data[0];
    const last = data[data.length - 1];
    if (first != null && last != null && data.length >= 2) {
      const diff = last - first;
      const pct = first > 0 ? Math.round((diff / first) * 1000) / 10 : 0;
      const cls = diff > 0 ? "price-change up" : diff < 0 ? "price-change down" : "price-change";
      out += `<td class="${cls}">${arrow(diff)} ${signed(diff)} kr (${signed(pct, 1)}%)</td>`;
    } else {
      out += "<td>–</td>";
    }
    out += "</tr>\n";
  }

  out += "        </tbody>\n";
  out += "      </table>\n";
  return out;
}

function chartScript(history: readonly PriceSnapshot[]): string {
  const { labels, datasets } = buildPriceSeries(history);
  const colors = REPORT_CONSTANTS.CHART_COLORS;
  const data = {
    labels,
    datasets: datasets.map((d, i) => ({
      label: d.category,
      data: d.data,
      borderColor: colors[i % colors.length],
      backgroundColor: `${colors[i % colors.length]}33`,
      spanGaps: true,
      tension: 0.2,
    })),
  };
  return `
    new Chart(document.getElementById('priceChart'), {
      type: 'line',
      data: ${jsonForScript(data)},
      options: {
        responsive: true,
        maintainAspectRatio: true,
        plugins: { legend: { position: 'bottom' } },
        scales: { y: { beginAtZero: false, ticks: { callback: (value) => value + ' kr' } } }
      }
    });`;
}

/**
 * Renders the whole report as one self-contained HTML document
 */
export function renderReport(input: ReportInput): string {
  const label = escapeHtml(input.week.weekLabel);
  const totalDishes = [...input.days.values()].reduce((n, d) => n + d.length, 0);
  const hasChart = input.history.length >= 2;

  let html = `<!DOCTYPE html>
<html lang="sv">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Lunchmeny – ${label}</title>
${hasChart ? `  <script src="${REPORT_CONSTANTS.CHART_JS_URL}"></script>\n` : ""}  <style>${STYLE}
  </style>
</head>
<body>
  <div class="container">
    <header>
      <h1>Lunchmeny</h1>
      <div class="week-badge">${label}</div>
    </header>
    <nav class="tabs">
      <button class="tab active" onclick="showTab('menu', this)">Meny</button>
      <button class="tab" onclick="showTab('prices', this)">Priser</button>
    </nav>
    <div id="menu-tab" class="tab-content active">
`;

  html += priceAlerts(input.priceDiff, input.trend);

  html += `      <div class="stats">
        <div class="stat"><div class="stat-value">${totalDishes}</div><div class="stat-label">Rätter</div></div>
        <div class="stat"><div class="stat-value">${input.menuDiff.newDishes.length}</div><div class="stat-label">Nya rätter</div></div>
        <div class="stat"><div class="stat-value">${input.days.size}</div><div class="stat-label">Dagar</div></div>
      </div>
`;

  html += menuSections(input);
  html += "    </div>\n";

  html += '    <div id="prices-tab" class="tab-content">\n';
  if (hasChart) {
    html += '      <div class="chart-container">\n';
    html += '        <div class="chart-title">Prisutveckling över tid</div>\n';
    html += '        <canvas id="priceChart"></canvas>\n';
    html += "      </div>\n";
    html += priceTable(input.history);
  } else {
    html += '      <p class="empty">Ingen prishistorik tillgänglig än.</p>\n';
  }
  html += "    </div>\n";

  html += `    <footer>Uppdaterad ${formatReportTimestamp(input.generatedAt, input.timeZone)}</footer>
  </div>
  <script>${SCRIPT}${hasChart ? chartScript(input.history) : ""}
  </script>
</body>
</html>
`;

  return html;
}

/**
 * Writes the report, creating its directory
 */
export async function writeReport(filePath: string, html: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, html, "utf8");
}
