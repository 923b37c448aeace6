import { createPlaceholderPattern } from '@report-merge/shared';
import type { PlaceholderToken, RunPosition } from '@report-merge/shared';
import type { TemplateDocument, TemplateParagraph } from './docx-document';
import { runText } from './run-text';

/**
 * Map a character index of the paragraph text to the run holding it.
 * `starts[i]` is the paragraph offset where run `i` begins.
 */
function positionOf(index: number, starts: number[], lengths: number[]): RunPosition {
  for (let run = 0; run < starts.length; run++) {
    const start = starts[run] ?? 0;
    const length = lengths[run] ?? 0;
    if (index >= start && index < start + length) {
      return { run, offset: index - start };
    }
  }
  throw new RangeError(`Offset ${index} is outside the paragraph text`);
}

function scanParagraph(partName: string, paragraphIndex: number, paragraph: TemplateParagraph): PlaceholderToken[] {
  const lengths: number[] = [];
  const starts: number[] = [];
  let text = '';
  for (const run of paragraph.runs) {
    const value = runText(run);
    starts.push(text.length);
    lengths.push(value.length);
    text += value;
  }

  const tokens: PlaceholderToken[] = [];
  for (const match of text.matchAll(createPlaceholderPattern())) {
    const key = match[1];
    if (key === undefined || match.index === undefined) continue;
    const first = match.index;
    const last = first + match[0].length - 1;
    const start = positionOf(first, starts, lengths);
    const end = positionOf(last, starts, lengths);

    tokens.push({
      key,
      raw: match[0],
      location: {
        part: partName,
        paragraph: paragraphIndex,
        start,
        end: { run: end.run, offset: end.offset + 1 },
        ...(paragraph.cell ? { cell: paragraph.cell } : {}),
      },
    });
  }
  return tokens;
}

/**
 * Find every `{{ key }}` token of the template in document order: body
 * first, then headers, footers, footnotes and endnotes. A token may span
 * any number of runs; `end` is exclusive within its last run.
 */
export function scanTemplate(doc: TemplateDocument): PlaceholderToken[] {
  const tokens: PlaceholderToken[] = [];
  for (const part of doc.parts) {
    part.paragraphs.forEach((paragraph, index) => {
      tokens.push(...scanParagraph(part.name, index, paragraph));
    });
  }
  return tokens;
}

/** Unique placeholder keys in order of first appearance. */
export function placeholderKeys(tokens: readonly PlaceholderToken[]): string[] {
  return [...new Set(tokens.map((token) => token.key))];
}
