import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SourceReadError } from '@report-merge/shared';
import type { PdfRule, PdfSourceSpec } from '../config/settings';
import { applyRule, groupLines, readPdfSource } from '../sources/pdf-reader';
import type { PdfPage, PositionedText } from '../sources/pdf-reader';
import { silentLogger } from './fixtures/test-support';

const getDocument = vi.fn();

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
  getDocument: (...args: unknown[]) => getDocument(...args),
}));

/** A pdfjs document stand-in serving one list of text items per page. */
function fakePdf(pages: PositionedText[][]) {
  const destroy = vi.fn().mockResolvedValue(undefined);
  const proxy = {
    numPages: pages.length,
    getPage: async (number: number) => ({
      getTextContent: async () => ({
        items: (pages[number - 1] ?? []).map((item) => ({
          str: item.str,
          transform: [1, 0, 0, 1, item.x, item.y],
          width: item.width,
        })),
      }),
      cleanup: () => true,
    }),
    destroy,
  };
  getDocument.mockReturnValue({ promise: Promise.resolve(proxy) });
  return { destroy };
}

const ctx = { origin: 'alarms.pdf', policy: 'error' as const, logger: silentLogger };

function pdfSpec(rules: PdfRule[]): PdfSourceSpec {
  return { type: 'pdf', path: 'alarms.pdf', name: undefined, rules };
}

// ── groupLines ──────────────────────────────────────────────────────

describe('groupLines', () => {
  it('orders lines top to bottom and joins words on a line', () => {
    const lines = groupLines([
      { str: 'second', x: 10, y: 680, width: 30 },
      { str: 'Total:', x: 10, y: 700, width: 30 },
      { str: '42', x: 45, y: 701, width: 10 },
    ]);

    expect(lines).toEqual(['Total: 42', 'second']);
  });

  it('does not insert a space between touching fragments', () => {
    const lines = groupLines([
      { str: 'Net', x: 30, y: 500, width: 15 },
      { str: 'Core', x: 10, y: 500, width: 20 },
    ]);

    expect(lines).toEqual(['CoreNet']);
  });

  it('drops blank lines', () => {
    expect(groupLines([{ str: '   ', x: 0, y: 10, width: 5 }])).toEqual([]);
  });
});

// ── applyRule ───────────────────────────────────────────────────────

describe('applyRule', () => {
  const pages: PdfPage[] = [
    { number: 1, lines: ['Monthly Alarm Report', 'Total alarms: 1520', 'Owner:', 'Core Network'] },
    { number: 2, lines: ['Availability 99.95%'] },
  ];

  it('reads a value after a label on the same line', () => {
    expect(applyRule({ kind: 'label', key: 'total', label: 'Total alarms', optional: false }, pages)).toBe('1520');
  });

  it('reads a value from the line after a bare label', () => {
    expect(applyRule({ kind: 'label', key: 'owner', label: 'Owner', optional: false }, pages)).toBe('Core Network');
  });

  it('reads a line by page and number', () => {
    expect(applyRule({ kind: 'line', key: 'title', page: 1, line: 1, optional: false }, pages)).toBe(
      'Monthly Alarm Report',
    );
    expect(applyRule({ kind: 'line', key: 'none', page: 3, line: 1, optional: false }, pages)).toBeUndefined();
  });

  it('returns the first capture group of a pattern', () => {
    const rule: PdfRule = { kind: 'pattern', key: 'availability', pattern: 'Availability ([\\d.]+)%', flags: '', optional: false };
    expect(applyRule(rule, pages)).toBe('99.95');
  });

  it('returns page text joined by newlines', () => {
    expect(applyRule({ kind: 'text', key: 'page2', page: 2, optional: false }, pages)).toBe('Availability 99.95%');
    expect(applyRule({ kind: 'text', key: 'all', optional: false }, pages)).toBe(
      'Monthly Alarm Report\nTotal alarms: 1520\nOwner:\nCore Network\n\nAvailability 99.95%',
    );
  });
});

// ── readPdfSource ───────────────────────────────────────────────────

describe('readPdfSource', () => {
  beforeEach(() => {
    getDocument.mockReset();
  });

  it('extracts values and releases the document', async () => {
    const { destroy } = fakePdf([
      [
        { str: 'Site:', x: 10, y: 700, width: 20 },
        { str: 'Beijing', x: 40, y: 700, width: 30 },
      ],
    ]);

    const values = await readPdfSource(
      Buffer.from('%PDF-1.7'),
      pdfSpec([
        { kind: 'label', key: 'site', label: 'Site', optional: false },
        { kind: 'label', key: 'region', label: 'Region', optional: true },
      ]),
      ctx,
    );

    expect(Object.fromEntries(values)).toEqual({ site: 'Beijing' });
    expect(destroy).toHaveBeenCalledOnce();
  });

  it('fails when a required rule finds nothing', async () => {
    fakePdf([[{ str: 'nothing here', x: 10, y: 700, width: 50 }]]);

    await expect(
      readPdfSource(Buffer.from('%PDF-1.7'), pdfSpec([{ kind: 'label', key: 'site', label: 'Site', optional: false }]), ctx),
    ).rejects.toThrow('alarms.pdf: no value found for "site" (label rule)');
  });

  it('wraps documents pdfjs cannot open', async () => {
    getDocument.mockImplementation(() => ({ promise: Promise.reject(new Error('Invalid PDF structure.')) }));

    await expect(
      readPdfSource(Buffer.from('garbage'), pdfSpec([{ kind: 'text', key: 'all', optional: false }]), ctx),
    ).rejects.toBeInstanceOf(SourceReadError);
  });
});
