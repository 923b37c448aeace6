import { describe, it, expect } from 'vitest';
import { DuplicateKeyError, SourceReadError } from '@report-merge/shared';
import type { WordSourceSpec } from '../config/settings';
import { readWordSource } from '../sources/word-reader';
import { buildDocx } from './fixtures/docx-builder';
import { silentLogger } from './fixtures/test-support';

const ctx = { origin: 'failures.docx', policy: 'error' as const, logger: silentLogger };

function spec(overrides: Partial<WordSourceSpec> = {}): WordSourceSpec {
  return {
    type: 'word',
    path: 'failures.docx',
    name: undefined,
    layout: 'table',
    key: undefined,
    table: 1,
    headerRow: 1,
    keyColumn: 1,
    valueColumn: 2,
    prefix: undefined,
    ...overrides,
  };
}

const REPORT = buildDocx({
  body: [
    [{ text: '' }],
    [{ text: 'Network failure statistics' }],
    {
      rows: [
        [[{ text: 'Region' }], [{ text: 'Failures' }]],
        [[{ text: 'North' }], [{ text: '3' }]],
        [[{ text: '' }], [{ text: '' }]],
        [[{ text: 'South' }], [{ text: '1' }, { text: '2', bold: true }]],
      ],
    },
    [{ text: 'Owner: ' }, { text: 'Ops' }],
    {
      rows: [
        [[{ text: 'Total alarms' }], [{ text: '1520' }]],
        [[{ text: 'Owner' }], [{ text: 'Ops' }]],
        [[{ text: '' }], [{ text: 'ignored' }]],
      ],
    },
  ],
});

async function read(overrides: Partial<WordSourceSpec> = {}) {
  return Object.fromEntries(await readWordSource(REPORT, spec(overrides), ctx));
}

describe('readWordSource', () => {
  it('flattens the first table with row and column keys', async () => {
    expect(await read({ prefix: 'failures' })).toEqual({
      failures_row1_colRegion: 'North',
      failures_row1_colFailures: '3',
      failures_row2_colRegion: 'South',
      failures_row2_colFailures: '12',
    });
  });

  it('reads key and value cells from a selected table', async () => {
    expect(await read({ layout: 'key_value', table: 2 })).toEqual({
      Total_alarms: '1520',
      Owner: 'Ops',
    });
  });

  it('collects the paragraphs outside tables under one key', async () => {
    expect(await read({ layout: 'text', key: 'summary' })).toEqual({
      summary: 'Network failure statistics\nOwner: Ops',
    });
  });

  it('fails when the selected table does not exist', async () => {
    await expect(read({ table: 3 })).rejects.toThrow('failures.docx: table 3 not found');
  });

  it('fails on bytes that are not a .docx package', async () => {
    await expect(readWordSource(Buffer.from('plain text'), spec(), ctx)).rejects.toBeInstanceOf(SourceReadError);
  });

  it('applies the duplicate key policy within a table', async () => {
    const docx = buildDocx({
      body: [{ rows: [[[{ text: 'dept' }], [{ text: 'Core' }]], [[{ text: 'dept' }], [{ text: 'Transport' }]]] }],
    });

    await expect(readWordSource(docx, spec({ layout: 'key_value' }), ctx)).rejects.toBeInstanceOf(
      DuplicateKeyError,
    );
    const values = await readWordSource(docx, spec({ layout: 'key_value' }), { ...ctx, policy: 'override' });
    expect(values.get('dept')).toBe('Transport');
  });
});
