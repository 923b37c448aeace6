/**
 * Template Document
 *
 * In-memory view of a .docx package: the zip is opened with PizZip and every
 * WordprocessingML part that can hold placeholders is parsed with xmldom.
 * Parts are exposed in document order (body, headers, footers, footnotes,
 * endnotes) as lists of paragraphs and their runs. Only parts marked dirty
 * are serialized back; every other zip entry keeps its original content.
 */

import PizZip from 'pizzip';
import { DOMParser, XMLSerializer, Element } from '@xmldom/xmldom';
import type { Document, Node } from '@xmldom/xmldom';
import { TemplateError } from '@report-merge/shared';
import type { CellLocation } from '@report-merge/shared';

export const WORDML_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
export const XML_NS = 'http://www.w3.org/XML/1998/namespace';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';
const MAIN_PART = 'word/document.xml';

const PART_ORDER: ReadonlyArray<RegExp> = [
  /^word\/document\.xml$/,
  /^word\/header(\d*)\.xml$/,
  /^word\/footer(\d*)\.xml$/,
  /^word\/footnotes\.xml$/,
  /^word\/endnotes\.xml$/,
];

export interface TemplateParagraph {
  element: Element;
  /** Runs owned by this paragraph, in order. Nested text-box paragraphs own their own runs. */
  runs: Element[];
  cell?: CellLocation;
}

export interface TemplatePart {
  name: string;
  document: Document;
  paragraphs: TemplateParagraph[];
  dirty: boolean;
}

/** True when `node` is a WordprocessingML element named `localName`. */
export function isWordElement(node: Node | null, localName: string): node is Element {
  return node instanceof Element && node.namespaceURI === WORDML_NS && node.localName === localName;
}

/** Nearest ancestor of `node` (excluding itself) that is a `w:<localName>` element. */
export function closestWordAncestor(node: Node, localName: string): Element | null {
  let current = node.parentNode;
  while (current) {
    if (isWordElement(current, localName)) {
      return current;
    }
    current = current.parentNode;
  }
  return null;
}

/** Direct element children of `parent` that are `w:<localName>`. */
export function wordChildren(parent: Element, localName: string): Element[] {
  const children: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const child = parent.childNodes.item(i);
    if (isWordElement(child, localName)) {
      children.push(child);
    }
  }
  return children;
}

function elementsByName(root: Document | Element, localName: string): Element[] {
  const list = root.getElementsByTagNameNS(WORDML_NS, localName);
  const elements: Element[] = [];
  for (let i = 0; i < list.length; i++) {
    const element = list.item(i);
    if (element) elements.push(element);
  }
  return elements;
}

export function ensureXmlDeclaration(xml: string): string {
  return xml.startsWith('<?xml') ? xml : `${XML_DECLARATION}\n${xml}`;
}

function partRank(name: string): [number, number] | null {
  for (let i = 0; i < PART_ORDER.length; i++) {
    const match = PART_ORDER[i]?.exec(name);
    if (match) {
      return [i, Number(match[1] ?? 0) || 0];
    }
  }
  return null;
}

function locateCell(paragraph: Element, tableIndex: Map<Element, number>): CellLocation | undefined {
  const cell = closestWordAncestor(paragraph, 'tc');
  const row = cell ? closestWordAncestor(cell, 'tr') : null;
  const table = row ? closestWordAncestor(row, 'tbl') : null;
  if (!cell || !row || !table) {
    return undefined;
  }
  return {
    table: tableIndex.get(table) ?? 0,
    row: wordChildren(table, 'tr').indexOf(row),
    col: wordChildren(row, 'tc').indexOf(cell),
  };
}

function parsePart(name: string, xml: string, source: string): TemplatePart {
  const problems: string[] = [];
  let document: Document;
  try {
    document = new DOMParser({
      onError: (level, message) => {
        if (level !== 'warning') problems.push(message);
      },
    }).parseFromString(xml, 'text/xml');
  } catch (err) {
    throw new TemplateError(source, `${name} is not well-formed XML`, { cause: err });
  }
  if (problems.length > 0) {
    throw new TemplateError(source, `${name} is not well-formed XML: ${problems[0]}`);
  }

  const tableIndex = new Map<Element, number>();
  elementsByName(document, 'tbl').forEach((table, index) => tableIndex.set(table, index));

  const paragraphs = elementsByName(document, 'p').map((element): TemplateParagraph => {
    const runs = elementsByName(element, 'r').filter(
      (run) => closestWordAncestor(run, 'p') === element,
    );
    const cell = locateCell(element, tableIndex);
    return cell ? { element, runs, cell } : { element, runs };
  });

  return { name, document, paragraphs, dirty: false };
}

export class TemplateDocument {
  private readonly serializer = new XMLSerializer();

  private constructor(
    private readonly zip: PizZip,
    /** Where the template came from; used in error messages. */
    readonly source: string,
    readonly parts: readonly TemplatePart[],
  ) {}

  /**
   * Open a .docx package.
   * @throws TemplateError when the bytes are not a zip, the main document part
   *   is missing, or a part is not well-formed XML.
   */
  static load(bytes: Buffer, source = 'template'): TemplateDocument {
    let zip: PizZip;
    try {
      zip = new PizZip(bytes);
    } catch (err) {
      throw new TemplateError(source, 'not a valid .docx package', { cause: err });
    }

    if (!zip.file(MAIN_PART)) {
      throw new TemplateError(source, `missing ${MAIN_PART}`);
    }

    const names = Object.keys(zip.files)
      .map((name) => ({ name, rank: partRank(name) }))
      .filter((entry): entry is { name: string; rank: [number, number] } => entry.rank !== null)
      .sort((a, b) => a.rank[0] - b.rank[0] || a.rank[1] - b.rank[1])
      .map((entry) => entry.name);

    const parts = names.map((name) => {
      const file = zip.file(name);
      return parsePart(name, file ? file.asText() : '', source);
    });

    return new TemplateDocument(zip, source, parts);
  }

  part(name: string): TemplatePart | undefined {
    return this.parts.find((part) => part.name === name);
  }

  /** Current XML of a part, reserialized when it was modified. */
  partXml(name: string): string {
    const part = this.part(name);
    if (!part) {
      throw new TemplateError(this.source, `no part named ${name}`);
    }
    if (!part.dirty) {
      return this.zip.file(name)?.asText() ?? '';
    }
    return ensureXmlDeclaration(this.serializer.serializeToString(part.document));
  }

  /** Serialize one node of a part, e.g. a run, for comparison. */
  serializeNode(node: Node): string {
    return this.serializer.serializeToString(node);
  }

  /** Repackage the document; untouched entries keep their original content. */
  toBuffer(): Buffer {
    for (const part of this.parts) {
      if (part.dirty) {
        this.zip.file(part.name, this.partXml(part.name));
      }
    }
    return this.zip.generate({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  }
}
