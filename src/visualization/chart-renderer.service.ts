import { Injectable, Logger } from '@nestjs/common';
import { writeFile } from 'fs/promises';
import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { ChartSeries, PortfolioChart } from './portfolio-chart';
import { ValuePoint } from './price-history.service';

export const CHART_TITLE = 'Portfolio Value Over Time';

const PALETTE = ['#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd', '#8c564b', '#e377c2', '#7f7f7f', '#bcbd22', '#17becf'];

const WIDTH = 1000;
const PLOT_HEIGHT = 600;
const TITLE_HEIGHT = 40;
const LEGEND_ROW = 20;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function toChartSeries(series: Map<string, ValuePoint[]>): ChartSeries[] {
  return Array.from(series.entries()).map(([symbol, points], index) => ({
    symbol,
    color: PALETTE[index % PALETTE.length],
    points: points.map((point) => ({ time: point.date.getTime(), value: point.value })),
  }));
}

// Renders position-value series to a standalone SVG file. recharts draws the
// plot; the title and legend are plain SVG around it.
@Injectable()
export class ChartRendererService {
  private readonly logger = new Logger(ChartRendererService.name);

  toSvg(series: Map<string, ValuePoint[]>): string {
    const chartSeries = toChartSeries(series);
    const markup = renderToStaticMarkup(
      createElement(PortfolioChart, { series: chartSeries, width: WIDTH, height: PLOT_HEIGHT }),
    );

    // recharts wraps its <svg> in an HTML <div>
    const start = markup.indexOf('<svg');
    const end = markup.lastIndexOf('</svg>');
    if (start < 0 || end < 0) {
      throw new Error('Chart rendering produced no SVG');
    }
    const plot = markup.slice(start, end + '</svg>'.length);

    const legend = chartSeries.map((s, index) => {
      const y = TITLE_HEIGHT + PLOT_HEIGHT + index * LEGEND_ROW;
      return (
        `<rect x="40" y="${y + 4}" width="14" height="4" fill="${s.color}"/>` +
        `<text x="62" y="${y + 10}" font-family="sans-serif" font-size="12">${escapeXml(s.symbol)}</text>`
      );
    });
    const height = TITLE_HEIGHT + PLOT_HEIGHT + chartSeries.length * LEGEND_ROW + 10;

    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${height}" viewBox="0 0 ${WIDTH} ${height}">`,
      `<rect width="100%" height="100%" fill="#ffffff"/>`,
      `<text x="${WIDTH / 2}" y="26" text-anchor="middle" font-family="sans-serif" font-size="18">${CHART_TITLE}</text>`,
      `<g transform="translate(0,${TITLE_HEIGHT})">${plot}</g>`,
      ...legend,
      '</svg>',
      '',
    ].join('\n');
  }

  /** @throws when rendering or writing fails; the caller decides whether that is fatal */
  async render(series: Map<string, ValuePoint[]>, path: string): Promise<void> {
    await writeFile(path, this.toSvg(series), 'utf-8');
    this.logger.log(`Saved ${path}`);
  }
}
