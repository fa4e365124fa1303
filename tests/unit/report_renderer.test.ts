import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { RenderError } from '@/core/errors';
import type { Narrative } from '@/llm/adapter';
import { generateTemplateNarrative } from '@/llm/templates';
import { formatTimestamp } from '@/lib/format';
import {
  PdfReportRenderer,
  buildAnalystPanel,
  buildChartData,
  buildHealthPanel,
  buildOverviewPanel,
  buildStockPageData,
  parseNarrativeBlocks,
  renderReportToFile,
  writeReportFile,
} from '@/lib/reportGenerator';
import type { PriceHistory, SupplementaryFigures } from '@/providers/types';
import { buildReport } from '@/run/builder';
import type { Verdict } from '@/scoring/comparator';

let tempDir: string;

const verdicts: Verdict[] = [
  { stockId: 'ABC', metricName: 'P/E TTM', stockValue: 18.4, peerMean: 20.5, peerCount: 3, favorable: true },
  { stockId: 'ABC', metricName: 'Dividend Yield', stockValue: 1.2, peerMean: 2.4, peerCount: 3, favorable: false },
  { stockId: 'ABC', metricName: 'P/NAV', stockValue: 1.9, peerMean: null, peerCount: 0, favorable: 'undetermined' },
];

const narrative: Narrative = {
  text: generateTemplateNarrative('ABC', verdicts),
  source: 'template',
  model: null,
};

const market: SupplementaryFigures = {
  source: 'yahoo-finance-page',
  url: 'https://finance.yahoo.com/quote/ABC/key-statistics/',
  fetchedAt: '2024-03-05T10:00:00.000Z',
  companyName: 'ABC Holdings',
  price: 42.5,
  currency: 'USD',
  figures: [{ label: 'Market Cap', value: '1.2B' }],
  health: [
    { label: 'Total Cash (mrq)', value: '4.5B' },
    { label: 'Current Ratio (mrq)', value: '1.35' },
  ],
};

const history: PriceHistory = {
  source: 'yahoo-finance-chart',
  currency: 'USD',
  points: [
    { t: 1, close: 10 },
    { t: 2, close: 20 },
    { t: 3, close: 15 },
  ],
};

const generatedAt = new Date(2024, 2, 5, 9, 30);

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'report-renderer-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('buildStockPageData', () => {
  it('labels each metric row with its verdict', () => {
    const report = buildReport('ABC', verdicts, narrative, { unavailable: true, reason: 'timeout' }, { generatedAt });
    const data = buildStockPageData(report);

    expect(data.rows).toEqual([
      { metricName: 'P/E TTM', value: '18.40', peerMean: '20.50', peers: '3', verdictLabel: 'Favourable', tone: 'favorable' },
      {
        metricName: 'Dividend Yield',
        value: '1.20%',
        peerMean: '2.40%',
        peers: '3',
        verdictLabel: 'Unfavourable',
        tone: 'unfavorable',
      },
      { metricName: 'P/NAV', value: '1.90', peerMean: '—', peers: '0', verdictLabel: 'No peer data', tone: 'undetermined' },
    ]);
    expect(data.summaryLine).toBe('1 of 2 compared metrics favourable against the peer average.');
    expect(data.generatedAt).toBe('2024-03-05 09:30');
    expect(data.narrativeSourceLabel).toBe('Generated from the metric comparison.');
  });

  it('notes unavailable market data instead of figures', () => {
    const report = buildReport('ABC', verdicts, narrative, { unavailable: true, reason: 'timeout' }, { generatedAt });
    const data = buildStockPageData(report);

    expect(data.companyName).toBeNull();
    expect(data.priceLabel).toBe('Unavailable');
    expect(data.marketAvailable).toBe(false);
    expect(data.marketNote).toBe('Market data unavailable: timeout');
    expect(data.figures).toEqual([]);
  });

  it('shows the live price and figures when available', () => {
    const data = buildStockPageData(buildReport('ABC', verdicts, narrative, market, { generatedAt }));

    expect(data.companyName).toBe('ABC Holdings');
    expect(data.priceLabel).toBe('$42.50');
    expect(data.marketNote).toBe(
      `Source: yahoo-finance-page, fetched ${formatTimestamp(new Date('2024-03-05T10:00:00.000Z'))}`
    );
    expect(data.figures).toEqual([{ label: 'Market Cap', value: '1.2B' }]);
  });

  it('prints a bare price when the currency is unknown', () => {
    const data = buildStockPageData(
      buildReport('ABC', verdicts, narrative, { ...market, currency: null }, { generatedAt })
    );
    expect(data.priceLabel).toBe('42.50');
  });
});

describe('company panels', () => {
  it('shows sector, industry and the summary', () => {
    expect(
      buildOverviewPanel({ source: 'test', sector: 'Technology', industry: null, summary: 'Makes chips.' })
    ).toEqual({
      available: true,
      note: null,
      entries: [
        { label: 'Sector', value: 'Technology' },
        { label: 'Industry', value: '—' },
      ],
      text: 'Makes chips.',
    });
  });

  it('explains an unavailable profile', () => {
    expect(buildOverviewPanel({ unavailable: true, reason: 'timeout' })).toEqual({
      available: false,
      note: 'Company profile unavailable: timeout',
      entries: [],
      text: null,
    });
  });

  it('lists the balance-sheet figures of the quote page', () => {
    expect(buildHealthPanel(market).entries).toEqual(market.health);
    expect(buildHealthPanel({ ...market, health: [] }).note).toBe(
      'Financial health unavailable: no balance-sheet figures on the page'
    );
    expect(buildHealthPanel({ unavailable: true, reason: 'blocked' }).note).toBe(
      'Financial health unavailable: blocked'
    );
  });

  it('derives the implied upside from the mean target', () => {
    const panel = buildAnalystPanel(
      {
        source: 'test',
        recommendation: 'strong buy',
        recommendationMean: 1.8,
        analystCount: 12,
        targetMeanPrice: 50,
        currentPrice: 40,
      },
      'USD'
    );

    expect(panel.entries).toEqual([
      { label: 'Recommendation', value: 'STRONG BUY' },
      { label: 'Rating (1 buy - 5 sell)', value: '1.8' },
      { label: 'Analysts', value: '12' },
      { label: 'Mean target', value: '$50.00' },
      { label: 'Implied upside', value: '+25.0%' },
    ]);
  });

  it('leaves the upside empty without a current price', () => {
    const panel = buildAnalystPanel(
      {
        source: 'test',
        recommendation: null,
        recommendationMean: null,
        analystCount: null,
        targetMeanPrice: 50,
        currentPrice: null,
      },
      null
    );

    expect(panel.entries.find((entry) => entry.label === 'Implied upside')?.value).toBe('—');
    expect(panel.entries.find((entry) => entry.label === 'Mean target')?.value).toBe('50.00');
  });
});

describe('buildChartData', () => {
  it('scales the closes into the chart box', () => {
    const chart = buildChartData(history);
    if (!chart.available) throw new Error(chart.note);

    expect(chart.close).toBe('0.0,120.0 250.0,0.0 500.0,60.0');
    expect(chart.shortAverage).toBe('');
    expect(chart.longAverage).toBe('');
    expect(chart.shortLabel).toBe('50-day MA');
    expect(chart.longLabel).toBe('200-day MA');
    expect(chart.caption).toBe('$10.00 to $15.00 (+50.0%) range $10.00 - $20.00');
  });

  it('draws a moving average once its window is full', () => {
    const points = Array.from({ length: 60 }, (_, index) => ({ t: index, close: 100 }));
    const chart = buildChartData({ source: 'test', currency: null, points });
    if (!chart.available) throw new Error(chart.note);

    expect(chart.shortAverage.split(' ')).toHaveLength(11);
    expect(chart.longAverage).toBe('');
  });

  it('explains a missing history', () => {
    expect(buildChartData({ unavailable: true, reason: 'Price history returned 404 Not Found' })).toEqual({
      available: false,
      note: 'Price chart unavailable: Price history returned 404 Not Found',
    });
    expect(buildChartData({ ...history, points: [{ t: 1, close: 10 }] })).toEqual({
      available: false,
      note: 'Price chart unavailable: not enough closing prices',
    });
  });
});

describe('parseNarrativeBlocks', () => {
  it('splits commentary into headings, bullets and text', () => {
    const text = [
      'ABC beats its peer average on 1 of 3 metrics.',
      '',
      'Key strengths:',
      '- Low P/E',
      '• High yield',
      'This sentence is long enough to be body text without ending',
    ].join('\n');

    expect(parseNarrativeBlocks(text)).toEqual([
      { kind: 'text', text: 'ABC beats its peer average on 1 of 3 metrics.' },
      { kind: 'heading', text: 'Key strengths' },
      { kind: 'bullet', text: 'Low P/E' },
      { kind: 'bullet', text: 'High yield' },
      { kind: 'text', text: 'This sentence is long enough to be body text without ending' },
    ]);
  });
});

describe('PDF output', () => {
  it('writes a PDF document', async () => {
    const outputPath = join(tempDir, 'nested', 'ABC_Analysis_20240305.pdf');
    await renderReportToFile(buildReport('ABC', verdicts, narrative, market, { generatedAt }), outputPath);

    expect(readFileSync(outputPath).subarray(0, 4).toString()).toBe('%PDF');
  });

  it('renders every block through the renderer interface', async () => {
    const outputPath = join(tempDir, 'ABC.pdf');
    const report = buildReport('ABC', verdicts, narrative, market, {
      generatedAt,
      profile: { source: 'test', sector: 'Technology', industry: 'Software', summary: 'Writes software.' },
      analyst: {
        source: 'test',
        recommendation: 'buy',
        recommendationMean: 2.1,
        analystCount: 9,
        targetMeanPrice: 48,
        currentPrice: 42.5,
      },
      priceHistory: history,
    });

    await new PdfReportRenderer().render(report, outputPath);

    expect(readFileSync(outputPath).subarray(0, 4).toString()).toBe('%PDF');
  });

  it('raises RenderError when the file cannot be written', async () => {
    writeFileSync(join(tempDir, 'blocker'), 'not a directory');
    const outputPath = join(tempDir, 'blocker', 'ABC.pdf');

    const pending = writeReportFile(outputPath, Buffer.from('%PDF-1.3'));
    await expect(pending).rejects.toBeInstanceOf(RenderError);
    await expect(pending).rejects.toMatchObject({ outputPath, fatal: true });
  });

  it('raises RenderError from the renderer', async () => {
    writeFileSync(join(tempDir, 'blocker'), 'not a directory');

    await expect(
      new PdfReportRenderer().render(
        buildReport('ABC', verdicts, narrative, market, { generatedAt }),
        join(tempDir, 'blocker', 'ABC.pdf')
      )
    ).rejects.toBeInstanceOf(RenderError);
  });
});
