/**
 * LLM Prompt Templates and Fallback Text Generation
 * Used when LLM is disabled or unavailable
 */

import { verdictTone, type Verdict } from '@/scoring/comparator';
import { formatNumber } from '@/lib/format';

export const SECTION_TITLES = ['Key strengths', 'Growth catalysts', 'Risks and mitigations'] as const;

function describeVerdict(verdict: Verdict): string {
  const value = formatNumber(verdict.stockValue);
  if (verdict.peerMean === null) {
    return `${verdict.metricName}: ${value} (no peer data)`;
  }
  const tone = verdictTone(verdict) === 'favorable' ? 'favourable' : 'unfavourable';
  return `${verdict.metricName}: ${value} (peer average ${formatNumber(verdict.peerMean)}, ${tone})`;
}

export function buildNarrativePrompt(stockId: string, snapshot: readonly Verdict[]): string {
  const metricLines =
    snapshot.length > 0
      ? snapshot.map((verdict) => `- ${describeVerdict(verdict)}`).join('\n')
      : '- No metrics available';

  return [
    `Write a short commentary on $${stockId} stock for a one-page investment summary.`,
    'Key metrics compared with the peer-group average:',
    metricLines,
    '',
    'Use exactly these section titles, each on its own line:',
    ...SECTION_TITLES,
    'Under each title give up to 3 points, one line each, starting with "- ".',
    'For risks, pair each risk with its mitigation. Do not use bold or any other markdown.',
  ].join('\n');
}

/** Deterministic commentary built from the verdicts alone. */
export function generateTemplateNarrative(stockId: string, snapshot: readonly Verdict[]): string {
  const favorable = snapshot.filter((v) => v.favorable === true);
  const unfavorable = snapshot.filter((v) => v.favorable === false);
  const undetermined = snapshot.filter((v) => v.favorable === 'undetermined');

  const strengths = favorable.map(
    (v) => `- ${v.metricName} of ${formatNumber(v.stockValue)} compares well with the peer average of ${formatNumber(v.peerMean)}`
  );
  const watchPoints = unfavorable.map(
    (v) => `- ${v.metricName} of ${formatNumber(v.stockValue)} trails the peer average of ${formatNumber(v.peerMean)}`
  );
  const gaps = undetermined.map((v) => `- ${v.metricName} has no peer data to compare against`);

  const lines = [
    `${stockId} beats its peer average on ${favorable.length} of ${snapshot.length} metrics.`,
    '',
    'Key strengths',
    ...(strengths.length > 0 ? strengths : ['- No metric beats the peer average']),
    '',
    'Watch points',
    ...(watchPoints.length > 0 ? watchPoints : ['- No metric trails the peer average']),
  ];
  if (gaps.length > 0) {
    lines.push('', 'Not compared', ...gaps);
  }
  return lines.join('\n');
}

export function placeholderNarrative(reason: string): string {
  return `Commentary unavailable (${reason}). The metric comparison above is unaffected.`;
}
