import { afterEach, describe, expect, it, vi } from 'vitest';
import { FetchUnavailable } from '@/core/errors';
import { YahooPriceHistoryFetcher, parseChartResponse } from '@/providers/yahoo_price_history';

function chartBody(timestamp: Array<number | null>, close: Array<number | null>) {
  return {
    chart: {
      result: [{ meta: { currency: 'USD' }, timestamp, indicators: { quote: [{ close }] } }],
      error: null,
    },
  };
}

function stubJson(body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status: 200 }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('parseChartResponse', () => {
  it('pairs timestamps with closes, skipping empty days', () => {
    expect(parseChartResponse(chartBody([3, 1, 2], [30, null, 20]))).toEqual({
      currency: 'USD',
      points: [
        { t: 2, close: 20 },
        { t: 3, close: 30 },
      ],
    });
  });

  it('returns null for an unknown shape', () => {
    expect(parseChartResponse({ chart: { result: null } })).toBeNull();
    expect(parseChartResponse('nope')).toBeNull();
  });
});

describe('YahooPriceHistoryFetcher', () => {
  const fetcher = new YahooPriceHistoryFetcher({ timeoutMs: 1000 });

  it('requests a year of daily closes', async () => {
    const fetchMock = stubJson(chartBody([1, 2, 3], [10, 11, 12]));

    const history = await fetcher.fetch('DEMO');

    expect(history).toEqual({
      source: 'yahoo-finance-chart',
      currency: 'USD',
      points: [
        { t: 1, close: 10 },
        { t: 2, close: 11 },
        { t: 3, close: 12 },
      ],
    });
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://query1.finance.yahoo.com/v8/finance/chart/DEMO?range=1y&interval=1d'
    );
  });

  it('needs at least two closes', async () => {
    stubJson(chartBody([1, 2], [10, null]));

    const pending = fetcher.fetch('DEMO');
    await expect(pending).rejects.toBeInstanceOf(FetchUnavailable);
    await expect(pending).rejects.toThrow('Price history has 1 closing prices');
  });

  it('reports a body that is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>blocked</html>', { status: 200 })));

    await expect(fetcher.fetch('DEMO')).rejects.toThrow('Price history response is not valid JSON');
  });

  it('reports an unknown response shape', async () => {
    stubJson({ chart: { result: [], error: null } });

    await expect(fetcher.fetch('DEMO')).rejects.toThrow('Price history structure not recognised');
  });
});
