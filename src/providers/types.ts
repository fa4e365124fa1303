/**
 * Shared types for market data fetchers.
 *
 * Each fetcher supplies one block of live data for the report (header
 * figures, company profile, analyst view, price history) while hiding
 * where it comes from. The rest of the pipeline only sees these contracts,
 * and every block can independently be unavailable.
 */

export interface FigureEntry {
  label: string;
  value: string;
}

export interface SupplementaryFigures {
  source: string;
  url: string | null;
  fetchedAt: string;
  companyName: string | null;
  price: number | null;
  currency: string | null;
  figures: FigureEntry[];
  /** Balance-sheet figures: cash, debt, debt/equity, current ratio */
  health: FigureEntry[];
}

export interface CompanyProfile {
  source: string;
  sector: string | null;
  industry: string | null;
  /** First sentences of the business description */
  summary: string | null;
}

export interface AnalystInsights {
  source: string;
  recommendation: string | null;
  /** 1 (strong buy) to 5 (sell) */
  recommendationMean: number | null;
  analystCount: number | null;
  targetMeanPrice: number | null;
  currentPrice: number | null;
}

export interface PricePoint {
  /** Unix seconds */
  t: number;
  close: number;
}

export interface PriceHistory {
  source: string;
  currency: string | null;
  points: PricePoint[];
}

export interface UnavailableSection {
  unavailable: true;
  reason: string;
}

export type Section<T> = T | UnavailableSection;

export type MarketFigures = Section<SupplementaryFigures>;

export interface SectionFetcher<T> {
  readonly name: string;
  /** Rejects with FetchUnavailable on network failure or an unrecognised response. */
  fetch(stockId: string): Promise<T>;
}

export type MarketDataFetcher = SectionFetcher<SupplementaryFigures>;
export type ProfileFetcher = SectionFetcher<CompanyProfile>;
export type AnalystFetcher = SectionFetcher<AnalystInsights>;
export type PriceHistoryFetcher = SectionFetcher<PriceHistory>;

export function isUnavailable<T extends object>(section: Section<T>): section is UnavailableSection {
  return 'unavailable' in section;
}

export function unavailable(reason: string): UnavailableSection {
  return { unavailable: true, reason };
}
