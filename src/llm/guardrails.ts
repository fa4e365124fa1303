/**
 * LLM Guardrails
 * Normalises model output into the plain-text form the report renders
 */

import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('llm_guardrails');

export const MAX_NARRATIVE_CHARS = 2400;

export interface GuardrailCheck {
  passed: boolean;
  violations: string[];
}

export function checkNarrative(text: string): GuardrailCheck {
  const violations: string[] = [];

  if (/\*\*|__/.test(text)) {
    violations.push('bold markup present');
  }
  if (/^#{1,6}\s/m.test(text)) {
    violations.push('markdown headings present');
  }
  if (text.length > MAX_NARRATIVE_CHARS) {
    violations.push(`too long: ${text.length} chars (max ${MAX_NARRATIVE_CHARS})`);
  }

  return { passed: violations.length === 0, violations };
}

function truncateAtLine(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const cut = text.slice(0, maxChars);
  const lastBreak = cut.lastIndexOf('\n');
  return (lastBreak > 0 ? cut.slice(0, lastBreak) : cut).trimEnd();
}

export function sanitizeNarrative(text: string, maxChars: number = MAX_NARRATIVE_CHARS): string {
  const check = checkNarrative(text);
  if (!check.passed) {
    logger.debug({ violations: check.violations }, 'Sanitizing narrative');
  }

  const cleaned = text
    .replace(/\r\n?/g, '\n')
    .replace(/\*\*|__/g, '')
    .replace(/^#{1,6}\s+/gm, '')
    .replace(/^\s*[*•]\s+/gm, '- ')
    .replace(/[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  return truncateAtLine(cleaned, maxChars);
}
