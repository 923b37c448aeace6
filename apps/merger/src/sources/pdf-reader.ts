/**
 * PDF source reader.
 *
 * Extracts positioned text with pdfjs-dist, rebuilds visual lines per page
 * and applies the configured extraction rules. pdfjs is loaded on first use.
 */

import type { PDFDocumentProxy } from 'pdfjs-dist';
import { SourceReadError } from '@report-merge/shared';
import type { PdfRule, PdfSourceSpec } from '../config/settings';
import type { ReadContext } from './excel-reader';
import { normalizeValue } from './value-normalizer';
import { setMappingValue } from './value-mapping';

/** Items whose baselines differ by at most this much share a line. */
const LINE_TOLERANCE = 2;
/** A horizontal gap wider than this between items becomes a space. */
const WORD_GAP = 1;

export interface PositionedText {
  str: string;
  x: number;
  y: number;
  width: number;
}

export interface PdfPage {
  /** 1-based */
  number: number;
  lines: string[];
}

/** Group positioned items into lines, top to bottom, left to right. */
export function groupLines(items: readonly PositionedText[]): string[] {
  const sorted = [...items].sort((a, b) => b.y - a.y || a.x - b.x);
  const lines: PositionedText[][] = [];

  for (const item of sorted) {
    const current = lines[lines.length - 1];
    const anchor = current?.[0];
    if (current && anchor && Math.abs(anchor.y - item.y) <= LINE_TOLERANCE) {
      current.push(item);
    } else {
      lines.push([item]);
    }
  }

  return lines
    .map((line) => {
      const ordered = line.sort((a, b) => a.x - b.x);
      let text = '';
      let previous: PositionedText | undefined;
      for (const item of ordered) {
        if (previous && item.x - (previous.x + previous.width) > WORD_GAP) {
          text += ' ';
        }
        text += item.str;
        previous = item;
      }
      return text.replace(/\s+/g, ' ').trim();
    })
    .filter((line) => line.length > 0);
}

export async function extractPdfPages(bytes: Buffer, origin: string): Promise<PdfPage[]> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  let pdf: PDFDocumentProxy;
  try {
    pdf = await pdfjs.getDocument({ data: new Uint8Array(bytes), useSystemFonts: true }).promise;
  } catch (err) {
    throw new SourceReadError(origin, 'not a readable PDF', { cause: err });
  }

  try {
    const pages: PdfPage[] = [];
    for (let number = 1; number <= pdf.numPages; number++) {
      const page = await pdf.getPage(number);
      const content = await page.getTextContent();
      const items: PositionedText[] = [];
      for (const item of content.items) {
        if (!('str' in item) || item.str === '') continue;
        items.push({ str: item.str, x: item.transform[4] ?? 0, y: item.transform[5] ?? 0, width: item.width });
      }
      pages.push({ number, lines: groupLines(items) });
      page.cleanup();
    }
    return pages;
  } catch (err) {
    throw new SourceReadError(origin, 'failed to extract text', { cause: err });
  } finally {
    await pdf.destroy();
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function findLabel(lines: readonly string[], label: string): string | undefined {
  const pattern = new RegExp(`${escapeRegExp(label)}\\s*[:：]\\s*(.*)$`);
  for (let i = 0; i < lines.length; i++) {
    const match = pattern.exec(lines[i] ?? '');
    if (!match) continue;
    const inline = (match[1] ?? '').trim();
    // A label standing alone takes its value from the next line.
    return inline !== '' ? inline : lines[i + 1]?.trim();
  }
  return undefined;
}

/** Apply one rule; undefined when it finds nothing. */
export function applyRule(rule: PdfRule, pages: readonly PdfPage[]): string | undefined {
  const allLines = pages.flatMap((page) => page.lines);

  switch (rule.kind) {
    case 'label':
      return findLabel(allLines, rule.label);
    case 'line':
      return pages.find((page) => page.number === rule.page)?.lines[rule.line - 1];
    case 'pattern': {
      const match = new RegExp(rule.pattern, rule.flags).exec(allLines.join('\n'));
      if (!match) return undefined;
      return (match[1] ?? match[0]).trim();
    }
    case 'text': {
      if (rule.page === undefined) {
        const text = pages
          .map((page) => page.lines.join('\n'))
          .filter((pageText) => pageText !== '')
          .join('\n\n');
        return text === '' ? undefined : text;
      }
      const page = pages.find((candidate) => candidate.number === rule.page);
      return page && page.lines.length > 0 ? page.lines.join('\n') : undefined;
    }
  }
}

export async function readPdfSource(
  bytes: Buffer,
  spec: PdfSourceSpec,
  ctx: ReadContext,
): Promise<Map<string, string>> {
  const pages = await extractPdfPages(bytes, ctx.origin);
  const values = new Map<string, string>();
  const origins = new Map<string, string>();

  for (const rule of spec.rules) {
    const found = applyRule(rule, pages);
    if (found === undefined) {
      if (rule.optional) {
        ctx.logger.debug({ origin: ctx.origin, key: rule.key, kind: rule.kind }, 'Optional PDF rule found nothing');
        continue;
      }
      throw new SourceReadError(ctx.origin, `no value found for "${rule.key}" (${rule.kind} rule)`);
    }
    setMappingValue(values, origins, rule.key, normalizeValue(found), `${ctx.origin} ${rule.kind} rule`, ctx.policy);
  }

  ctx.logger.debug({ origin: ctx.origin, pages: pages.length, keys: values.size }, 'PDF source read');
  return values;
}
