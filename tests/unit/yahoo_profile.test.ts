import { afterEach, describe, expect, it, vi } from 'vitest';
import { FetchUnavailable } from '@/core/errors';
import { YahooProfileFetcher, firstSentences, parseProfilePage } from '@/providers/yahoo_profile';

const embeddedPage = `<html><body><script type="application/json">{"assetProfile":{"sector":"Technology","industry":"Consumer Electronics","longBusinessSummary":"Demo Corp designs phones. It sells services. It runs stores. It also licenses patents."}}</script></body></html>`;

const markupPage = `<html><body>
<dl><dt>Sector:</dt><dd><a href="/sectors/technology">Technology</a></dd><dt>Industry:</dt><dd>Software &amp; Services</dd></dl>
<section data-testid="description"><h3>Description</h3><p>Writes software. Sells it.</p></section>
</body></html>`;

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('firstSentences', () => {
  it('keeps the opening sentences', () => {
    expect(firstSentences('One. Two! Three? Four.', 3)).toBe('One. Two! Three?');
    expect(firstSentences('  Only one sentence  ')).toBe('Only one sentence');
  });
});

describe('parseProfilePage', () => {
  it('reads the embedded profile and trims the summary to three sentences', () => {
    expect(parseProfilePage(embeddedPage)).toEqual({
      sector: 'Technology',
      industry: 'Consumer Electronics',
      summary: 'Demo Corp designs phones. It sells services. It runs stores.',
    });
  });

  it('falls back to the rendered profile markup', () => {
    expect(parseProfilePage(markupPage)).toEqual({
      sector: 'Technology',
      industry: 'Software & Services',
      summary: 'Writes software. Sells it.',
    });
  });
});

describe('YahooProfileFetcher', () => {
  const fetcher = new YahooProfileFetcher({ timeoutMs: 1000 });

  it('requests the profile page of the stock', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(embeddedPage, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const profile = await fetcher.fetch('DEMO');

    expect(profile.source).toBe('yahoo-finance-profile');
    expect(profile.sector).toBe('Technology');
    expect(fetchMock.mock.calls[0]).toEqual([
      'https://finance.yahoo.com/quote/DEMO/profile/',
      expect.objectContaining({ headers: expect.objectContaining({ accept: 'text/html' }) }),
    ]);
  });

  it('reports a page without profile data', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html></html>', { status: 200 })));

    const pending = fetcher.fetch('DEMO');
    await expect(pending).rejects.toBeInstanceOf(FetchUnavailable);
    await expect(pending).rejects.toThrow(
      'Profile page structure not recognised: no sector, industry or description'
    );
  });
});
