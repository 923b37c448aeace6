import { describe, it, expect } from 'vitest';
import type { Element } from '@xmldom/xmldom';
import { TemplateDocument, WORDML_NS } from '../template/docx-document';
import { isRunEmpty, runText, spliceRunText } from '../template/run-text';
import { scanTemplate } from '../template/token-scanner';
import { substituteTokens } from '../template/substitution';
import { buildDocx, buildDocxWithBodyXml, paragraphTexts } from './fixtures/docx-builder';
import type { DocxFixture } from './fixtures/docx-builder';

function mergeFixture(fixture: DocxFixture, values: Record<string, string>) {
  const doc = TemplateDocument.load(buildDocx(fixture));
  const outcome = substituteTokens(doc, scanTemplate(doc), new Map(Object.entries(values)));
  return { doc, outcome, output: doc.toBuffer() };
}

function isBold(run: Element | undefined): boolean {
  return (run?.getElementsByTagNameNS(WORDML_NS, 'b').length ?? 0) > 0;
}

const REPORT_LINE = [{ text: '部门: {{dept}}, 日期: {{da' }, { text: 'te}}' }];

describe('substituteTokens', () => {
  it('replaces every token including one split across runs', () => {
    const { outcome, output, doc } = mergeFixture({ body: [REPORT_LINE] }, {
      dept: '核心网络部',
      date: '2024-01-01',
    });

    expect(paragraphTexts(output)).toEqual(['部门: 核心网络部, 日期: 2024-01-01']);
    expect(outcome).toEqual({ matched: ['dept', 'date'], unmatched: [], replaced: 2 });
    expect(doc.part('word/document.xml')?.paragraphs[0]?.runs).toHaveLength(1);
  });

  it('leaves an unmapped placeholder in place and reports it', () => {
    const { outcome, output } = mergeFixture({ body: [REPORT_LINE] }, { date: '2024-01-01' });

    expect(paragraphTexts(output)).toEqual(['部门: {{dept}}, 日期: 2024-01-01']);
    expect(outcome.unmatched).toEqual(['dept']);
    expect(outcome.matched).toEqual(['date']);
  });

  it('gives the replacement the formatting of the first run', () => {
    const { doc, output } = mergeFixture(
      { body: [[{ text: 'Name: ' }, { text: '{{na', bold: true }, { text: 'me}}' }, { text: ' end' }]] },
      { name: 'Alice' },
    );

    const runs = doc.part('word/document.xml')?.paragraphs[0]?.runs ?? [];
    expect(runs.map(runText)).toEqual(['Name: ', 'Alice', ' end']);
    expect(runs.map(isBold)).toEqual([false, true, false]);
    expect(paragraphTexts(output)).toEqual(['Name: Alice end']);
  });

  it('removes the middle run of a token spanning three runs', () => {
    const { doc, output } = mergeFixture(
      { body: [[{ text: 'x{{', bold: true }, { text: 'k' }, { text: '}}z' }]] },
      { k: 'V' },
    );

    const runs = doc.part('word/document.xml')?.paragraphs[0]?.runs ?? [];
    expect(runs.map(runText)).toEqual(['xV', 'z']);
    expect(runs.map(isBold)).toEqual([true, false]);
    expect(paragraphTexts(output)).toEqual(['xVz']);
  });

  it('replaces a token that continues into a hyperlink', () => {
    const doc = TemplateDocument.load(
      buildDocxWithBodyXml(
        '<w:p><w:r><w:t xml:space="preserve">{{a}} and {{</w:t></w:r>' +
          '<w:hyperlink r:id="rId9"><w:r><w:rPr><w:rStyle w:val="Hyperlink"/></w:rPr><w:t>b}}</w:t></w:r></w:hyperlink></w:p>',
      ),
    );
    const outcome = substituteTokens(doc, scanTemplate(doc), new Map([['a', 'L'], ['b', 'B']]));

    expect(outcome).toEqual({ matched: ['a', 'b'], unmatched: [], replaced: 2 });
    expect(paragraphTexts(doc.toBuffer())).toEqual(['L and B']);
    const hyperlink = doc.part('word/document.xml')?.document.getElementsByTagNameNS(WORDML_NS, 'hyperlink').item(0);
    expect(hyperlink?.getElementsByTagNameNS(WORDML_NS, 'r').length).toBe(0);
  });

  it('replaces a token whose tail sits in a tracked insertion', () => {
    const doc = TemplateDocument.load(
      buildDocxWithBodyXml(
        '<w:p><w:r><w:t xml:space="preserve">Total: {{to</w:t></w:r>' +
          '<w:ins w:id="1" w:author="Reviewer"><w:r><w:t xml:space="preserve">tal}} units</w:t></w:r></w:ins></w:p>',
      ),
    );
    substituteTokens(doc, scanTemplate(doc), new Map([['total', '42']]));

    expect(paragraphTexts(doc.toBuffer())).toEqual(['Total: 42 units']);
    const ins = doc.part('word/document.xml')?.document.getElementsByTagNameNS(WORDML_NS, 'ins').item(0);
    const kept = ins?.getElementsByTagNameNS(WORDML_NS, 'r').item(0);
    expect(kept ? runText(kept) : '').toBe(' units');
  });

  it('keeps runs outside any token identical', () => {
    const fixture: DocxFixture = {
      body: [
        [{ text: 'Lead ', color: 'FF0000' }, { text: '{{a}}', italic: true }, { text: ' tail', bold: true }],
        [{ text: 'untouched', bold: true }],
      ],
    };
    const template = TemplateDocument.load(buildDocx(fixture));
    const { doc } = mergeFixture(fixture, { a: 'value' });

    const before = template.part('word/document.xml')?.paragraphs ?? [];
    const after = doc.part('word/document.xml')?.paragraphs ?? [];
    const serialize = (d: TemplateDocument, run: Element | undefined) => (run ? d.serializeNode(run) : '');

    expect(serialize(doc, after[0]?.runs[0])).toBe(serialize(template, before[0]?.runs[0]));
    expect(serialize(doc, after[0]?.runs[2])).toBe(serialize(template, before[0]?.runs[2]));
    expect(serialize(doc, after[1]?.runs[0])).toBe(serialize(template, before[1]?.runs[0]));
  });

  it('removes a run emptied by an empty value', () => {
    const { doc, output } = mergeFixture(
      { body: [[{ text: 'A' }, { text: '{{gone}}', bold: true }, { text: 'B' }]] },
      { gone: '' },
    );

    expect(doc.part('word/document.xml')?.paragraphs[0]?.runs).toHaveLength(2);
    expect(paragraphTexts(output)).toEqual(['AB']);
  });

  it('applies several tokens of one run right to left', () => {
    const { output } = mergeFixture({ body: [[{ text: '{{a}}-{{b}}-{{a}}' }]] }, { a: 'long value', b: 'x' });

    expect(paragraphTexts(output)).toEqual(['long value-x-long value']);
  });

  it('handles adjacent tokens that share a run boundary', () => {
    const { output } = mergeFixture({ body: [[{ text: '{{a}}{{' }, { text: 'b}}' }]] }, { a: '1', b: '2' });

    expect(paragraphTexts(output)).toEqual(['12']);
  });

  it('substitutes in table cells, headers and footers', () => {
    const { output, outcome } = mergeFixture(
      {
        body: [{ rows: [[[{ text: '{{kpi}}' }], [{ text: '{{target}}' }]]] }],
        header: [[{ text: 'Report {{month}}' }]],
        footer: [[{ text: 'Page footer {{year}}' }]],
      },
      { kpi: '99.9%', target: '99.5%', month: '03', year: '2024' },
    );

    expect(paragraphTexts(output)).toEqual(['99.9%', '99.5%']);
    expect(paragraphTexts(output, 'word/header1.xml')).toEqual(['Report 03']);
    expect(paragraphTexts(output, 'word/footer1.xml')).toEqual(['Page footer 2024']);
    expect(outcome.replaced).toBe(4);
  });

  it('turns line breaks in a value into w:br', () => {
    const { doc } = mergeFixture({ body: [[{ text: 'x{{v}}y' }]] }, { v: 'first\nsecond' });

    const run = doc.part('word/document.xml')?.paragraphs[0]?.runs[0];
    expect(run ? runText(run) : '').toBe('xfirst\nsecondy');
    expect(run?.getElementsByTagNameNS(WORDML_NS, 'br').length).toBe(1);
  });

  it('is idempotent on its own output', () => {
    const values = new Map([['dept', '核心网络部'], ['date', '2024-01-01']]);
    const first = TemplateDocument.load(buildDocx({ body: [REPORT_LINE] }));
    substituteTokens(first, scanTemplate(first), values);
    const once = first.toBuffer();

    const second = TemplateDocument.load(once);
    const outcome = substituteTokens(second, scanTemplate(second), values);

    expect(outcome).toEqual({ matched: [], unmatched: [], replaced: 0 });
    expect(second.partXml('word/document.xml')).toBe(first.partXml('word/document.xml'));
  });

  it('reports keys once in document order', () => {
    const { outcome } = mergeFixture(
      { body: [[{ text: '{{z}} {{a}}' }], [{ text: '{{z}} {{m}}' }]] },
      { a: '1' },
    );

    expect(outcome.unmatched).toEqual(['z', 'm']);
    expect(outcome.matched).toEqual(['a']);
  });
});

describe('spliceRunText', () => {
  it('sets xml:space when the text gains outer whitespace', () => {
    const doc = TemplateDocument.load(buildDocx({ body: [[{ text: '{{v}}' }]] }));
    const part = doc.part('word/document.xml');
    const run = part?.paragraphs[0]?.runs[0];
    if (!part || !run) throw new Error('fixture run missing');

    spliceRunText(part.document, run, 0, 5, ' padded ');

    const t = run.getElementsByTagNameNS(WORDML_NS, 't').item(0);
    expect(runText(run)).toBe(' padded ');
    expect(t?.getAttribute('xml:space')).toBe('preserve');
    expect(isRunEmpty(run)).toBe(false);
  });

  it('leaves an empty run when everything is cut', () => {
    const doc = TemplateDocument.load(buildDocx({ body: [[{ text: 'abc', bold: true }]] }));
    const part = doc.part('word/document.xml');
    const run = part?.paragraphs[0]?.runs[0];
    if (!part || !run) throw new Error('fixture run missing');

    spliceRunText(part.document, run, 0, 3, '');

    expect(runText(run)).toBe('');
    expect(isRunEmpty(run)).toBe(true);
  });
});
