import { describe, expect, it } from 'vitest';
import { checkNarrative, sanitizeNarrative } from '@/llm/guardrails';
import {
  buildNarrativePrompt,
  generateTemplateNarrative,
  placeholderNarrative,
  SECTION_TITLES,
} from '@/llm/templates';
import type { Verdict } from '@/scoring/comparator';

const snapshot: Verdict[] = [
  { stockId: 'ABC', metricName: 'P/E TTM', stockValue: 18.4, peerMean: 20.233333, peerCount: 3, favorable: true },
  { stockId: 'ABC', metricName: 'EV/EBITDA', stockValue: 12, peerMean: 11, peerCount: 2, favorable: false },
  { stockId: 'ABC', metricName: 'P/NAV', stockValue: 1.9, peerMean: null, peerCount: 0, favorable: 'undetermined' },
];

describe('generateTemplateNarrative', () => {
  it('summarises strengths, watch points and gaps', () => {
    expect(generateTemplateNarrative('ABC', snapshot)).toBe(
      [
        'ABC beats its peer average on 1 of 3 metrics.',
        '',
        'Key strengths',
        '- P/E TTM of 18.40 compares well with the peer average of 20.23',
        '',
        'Watch points',
        '- EV/EBITDA of 12.00 trails the peer average of 11.00',
        '',
        'Not compared',
        '- P/NAV has no peer data to compare against',
      ].join('\n')
    );
  });

  it('handles an empty comparison', () => {
    expect(generateTemplateNarrative('ABC', [])).toBe(
      [
        'ABC beats its peer average on 0 of 0 metrics.',
        '',
        'Key strengths',
        '- No metric beats the peer average',
        '',
        'Watch points',
        '- No metric trails the peer average',
      ].join('\n')
    );
  });
});

describe('buildNarrativePrompt', () => {
  it('lists every metric and the required sections', () => {
    const prompt = buildNarrativePrompt('ABC', snapshot);
    const lines = prompt.split('\n');

    expect(lines[0]).toBe('Write a short commentary on $ABC stock for a one-page investment summary.');
    expect(lines).toContain('- P/E TTM: 18.40 (peer average 20.23, favourable)');
    expect(lines).toContain('- EV/EBITDA: 12.00 (peer average 11.00, unfavourable)');
    expect(lines).toContain('- P/NAV: 1.90 (no peer data)');
    for (const title of SECTION_TITLES) {
      expect(lines).toContain(title);
    }
  });
});

describe('placeholderNarrative', () => {
  it('states why commentary is missing', () => {
    expect(placeholderNarrative('timeout')).toBe(
      'Commentary unavailable (timeout). The metric comparison above is unaffected.'
    );
  });
});

describe('guardrails', () => {
  it('flags markdown and excess length', () => {
    expect(checkNarrative('**Bold**')).toEqual({ passed: false, violations: ['bold markup present'] });
    expect(checkNarrative('# Title\nbody').violations).toEqual(['markdown headings present']);
    expect(checkNarrative('Key strengths\n- Low P/E')).toEqual({ passed: true, violations: [] });
  });

  it('strips markdown into plain lines and bullets', () => {
    expect(sanitizeNarrative('## Key strengths\r\n• **Low** P/E  \r\n\n\n\n- ok')).toBe(
      'Key strengths\n- Low P/E\n\n- ok'
    );
  });

  it('truncates at a line break', () => {
    expect(sanitizeNarrative('line one\nline two\nline three', 15)).toBe('line one');
  });
});
