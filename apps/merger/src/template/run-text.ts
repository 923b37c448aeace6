/**
 * Run text access.
 *
 * A run's visible text is the concatenation of its direct `w:t` children plus
 * `w:tab` ('\t') and `w:br`/`w:cr` ('\n'). Editing touches `w:t` only; the
 * run properties (`w:rPr`) are never modified.
 */

import { Element } from '@xmldom/xmldom';
import type { Document } from '@xmldom/xmldom';
import { isWordElement, WORDML_NS, XML_NS } from './docx-document';

interface RunSegment {
  element: Element;
  text: string;
  /** `w:t` segments are editable; tabs and breaks are fixed one-character marks. */
  editable: boolean;
}

const FIXED_MARKS = new Map<string, string>([
  ['tab', '\t'],
  ['br', '\n'],
  ['cr', '\n'],
]);

function runSegments(run: Element): RunSegment[] {
  const segments: RunSegment[] = [];
  for (let i = 0; i < run.childNodes.length; i++) {
    const child = run.childNodes.item(i);
    if (isWordElement(child, 't')) {
      segments.push({ element: child, text: child.textContent ?? '', editable: true });
    } else if (child instanceof Element && child.namespaceURI === WORDML_NS) {
      const mark = FIXED_MARKS.get(child.localName ?? '');
      if (mark !== undefined) {
        segments.push({ element: child, text: mark, editable: false });
      }
    }
  }
  return segments;
}

export function runText(run: Element): string {
  return runSegments(run)
    .map((segment) => segment.text)
    .join('');
}

function setText(document: Document, t: Element, text: string): void {
  while (t.firstChild) {
    t.removeChild(t.firstChild);
  }
  if (text.length > 0) {
    t.appendChild(document.createTextNode(text));
  }
  if (/^\s|\s$/.test(text)) {
    t.setAttributeNS(XML_NS, 'xml:space', 'preserve');
  }
}

function createText(document: Document, text: string): Element {
  const t = document.createElementNS(WORDML_NS, 'w:t');
  setText(document, t, text);
  return t;
}

/**
 * Write `text` into `t`, turning each '\n' into a `w:br` followed by a new
 * `w:t` placed right after `t`.
 */
function writeLines(document: Document, run: Element, t: Element, text: string): void {
  const lines = text.split('\n');
  setText(document, t, lines[0] ?? '');
  let anchor: Element = t;
  for (const line of lines.slice(1)) {
    const br = document.createElementNS(WORDML_NS, 'w:br');
    const next = createText(document, line);
    run.insertBefore(br, anchor.nextSibling);
    run.insertBefore(next, br.nextSibling);
    anchor = next;
  }
}

/**
 * Replace the characters `[from, to)` of the run's text with `insert`.
 * The insertion lands in the `w:t` holding position `from`; fixed marks
 * inside the range are removed.
 */
export function spliceRunText(document: Document, run: Element, from: number, to: number, insert: string): void {
  let position = 0;
  let inserted = insert.length === 0;

  for (const segment of runSegments(run)) {
    const start = position;
    const end = start + segment.text.length;
    position = end;

    const overlaps = start < to && end > from;
    const holdsInsertion = !inserted && segment.editable && from >= start && from <= end;
    if (!overlaps && !holdsInsertion) {
      continue;
    }

    if (!segment.editable) {
      run.removeChild(segment.element);
      continue;
    }

    const keepHead = segment.text.slice(0, Math.max(0, from - start));
    const keepTail = segment.text.slice(Math.min(segment.text.length, Math.max(0, to - start)));
    if (holdsInsertion) {
      writeLines(document, run, segment.element, keepHead + insert + keepTail);
      inserted = true;
    } else {
      setText(document, segment.element, keepHead + keepTail);
    }
  }

  if (!inserted) {
    const t = createText(document, '');
    run.appendChild(t);
    writeLines(document, run, t, insert);
  }
}

/** A run is empty when nothing but its properties and blank `w:t` remain. */
export function isRunEmpty(run: Element): boolean {
  for (let i = 0; i < run.childNodes.length; i++) {
    const child = run.childNodes.item(i);
    if (!(child instanceof Element)) {
      continue;
    }
    if (isWordElement(child, 'rPr')) {
      continue;
    }
    if (isWordElement(child, 't') && (child.textContent ?? '') === '') {
      continue;
    }
    return false;
  }
  return true;
}
