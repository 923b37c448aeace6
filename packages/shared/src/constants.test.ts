/**
 * Shared Constants Tests
 *
 * Validates the placeholder grammar and output defaults.
 */

import { describe, it, expect } from 'vitest';
import {
  APP_NAME,
  APP_VERSION,
  PLACEHOLDER_KEY_PATTERN,
  createPlaceholderPattern,
  DEFAULT_OUTPUT_NAMING_PATTERN,
  CONVERSION_TIMEOUT_MS,
  CONVERSION_MAX_ATTEMPTS,
} from './constants';

function keysIn(text: string): string[] {
  return [...text.matchAll(createPlaceholderPattern())].map((m) => m[1] ?? '');
}

describe('Constants', () => {
  it('APP_NAME is Report Merge', () => {
    expect(APP_NAME).toBe('Report Merge');
  });

  it('APP_VERSION follows semver', () => {
    expect(APP_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('default naming pattern carries a timestamp and the docx extension', () => {
    expect(DEFAULT_OUTPUT_NAMING_PATTERN).toContain('{timestamp}');
    expect(DEFAULT_OUTPUT_NAMING_PATTERN.endsWith('.docx')).toBe(true);
  });

  it('conversion is bounded and retried once', () => {
    expect(CONVERSION_TIMEOUT_MS).toBe(60_000);
    expect(CONVERSION_MAX_ATTEMPTS).toBe(2);
  });
});

describe('Placeholder pattern', () => {
  it('matches ascii and CJK keys', () => {
    expect(keysIn('部门: {{dept}}, 日期: {{日期}}')).toEqual(['dept', '日期']);
  });

  it('tolerates spaces inside the braces', () => {
    expect(keysIn('{{ report_date }}')).toEqual(['report_date']);
  });

  it('accepts dotted and dashed keys', () => {
    expect(keysIn('{{net.total}} {{row1_col-a}}')).toEqual(['net.total', 'row1_col-a']);
  });

  it('ignores unclosed and empty delimiters', () => {
    expect(keysIn('{{open and {{}} and {single}')).toEqual([]);
  });

  it('returns an independent matcher on every call', () => {
    const first = createPlaceholderPattern();
    first.exec('{{a}}');
    expect(first.lastIndex).toBe(5);
    expect(createPlaceholderPattern().lastIndex).toBe(0);
  });

  it('PLACEHOLDER_KEY_PATTERN rejects braces and whitespace', () => {
    expect(PLACEHOLDER_KEY_PATTERN.test('total_2024')).toBe(true);
    expect(PLACEHOLDER_KEY_PATTERN.test('a b')).toBe(false);
    expect(PLACEHOLDER_KEY_PATTERN.test('a}')).toBe(false);
    expect(PLACEHOLDER_KEY_PATTERN.test('')).toBe(false);
  });
});
