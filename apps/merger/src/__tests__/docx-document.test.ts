import { describe, it, expect } from 'vitest';
import PizZip from 'pizzip';
import { TemplateError } from '@report-merge/shared';
import { TemplateDocument, ensureXmlDeclaration } from '../template/docx-document';
import { buildDocx, zipEntry } from './fixtures/docx-builder';

describe('TemplateDocument.load', () => {
  it('rejects bytes that are not a zip package', () => {
    expect(() => TemplateDocument.load(Buffer.from('plain text'), 'notes.txt')).toThrow(TemplateError);
  });

  it('rejects a package without word/document.xml', () => {
    const zip = new PizZip();
    zip.file('word/styles.xml', '<w:styles/>');
    const bytes = zip.generate({ type: 'nodebuffer' });

    expect(() => TemplateDocument.load(bytes, 'empty.docx')).toThrow('empty.docx: missing word/document.xml');
  });

  it('rejects a part that is not well-formed', () => {
    const zip = new PizZip();
    zip.file('word/document.xml', '<w:document xmlns:w="urn:w"><w:body></w:document>');
    const bytes = zip.generate({ type: 'nodebuffer' });

    expect(() => TemplateDocument.load(bytes)).toThrow(TemplateError);
  });

  it('orders parts as body, headers, footers', () => {
    const docx = buildDocx({
      body: [[{ text: 'body' }]],
      header: [[{ text: 'head' }]],
      footer: [[{ text: 'foot' }]],
    });

    const doc = TemplateDocument.load(docx);
    expect(doc.parts.map((p) => p.name)).toEqual(['word/document.xml', 'word/header1.xml', 'word/footer1.xml']);
  });

  it('collects runs per paragraph and locates table cells', () => {
    const docx = buildDocx({
      body: [
        [{ text: 'intro' }, { text: ' more', bold: true }],
        {
          rows: [
            [[{ text: 'r0c0' }], [{ text: 'r0c1' }]],
            [[{ text: 'r1c0' }], [{ text: 'r1c1' }]],
          ],
        },
      ],
    });

    const body = TemplateDocument.load(docx).part('word/document.xml');
    expect(body?.paragraphs).toHaveLength(5);
    expect(body?.paragraphs[0]?.runs).toHaveLength(2);
    expect(body?.paragraphs[0]?.cell).toBeUndefined();
    expect(body?.paragraphs[4]?.cell).toEqual({ table: 0, row: 1, col: 1 });
  });

  it('returns untouched parts byte for byte', () => {
    const docx = buildDocx({ body: [[{ text: 'unchanged' }]] });
    const doc = TemplateDocument.load(docx);

    expect(doc.partXml('word/document.xml')).toBe(zipEntry(docx, 'word/document.xml'));
    expect(zipEntry(doc.toBuffer(), 'word/document.xml')).toBe(zipEntry(docx, 'word/document.xml'));
  });
});

describe('ensureXmlDeclaration', () => {
  it('prepends a declaration only when missing', () => {
    expect(ensureXmlDeclaration('<a/>')).toBe('<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<a/>');
    expect(ensureXmlDeclaration('<?xml version="1.0"?><a/>')).toBe('<?xml version="1.0"?><a/>');
  });
});
