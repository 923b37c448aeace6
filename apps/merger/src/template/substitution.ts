/**
 * Substitution Engine
 *
 * Replaces scanned tokens with mapped values directly in the document tree.
 * The value is written into the first run of the token so it keeps that run's
 * formatting; the token's remainder is cut from the following runs and any
 * run left empty is removed. Tokens are applied right-to-left inside each
 * paragraph, so the offsets of the tokens still to come stay valid.
 */

import type { Element } from '@xmldom/xmldom';
import type { PlaceholderToken, SubstitutionOutcome, ValueMapping } from '@report-merge/shared';
import type { TemplateDocument, TemplatePart } from './docx-document';
import { isRunEmpty, runText, spliceRunText } from './run-text';

function removeRunIfEmpty(runs: Element[], index: number): void {
  const run = runs[index];
  if (run && isRunEmpty(run)) {
    run.parentNode?.removeChild(run);
    runs.splice(index, 1);
  }
}

function replaceToken(part: TemplatePart, token: PlaceholderToken, value: string): void {
  const { paragraph, start, end } = token.location;
  const runs = part.paragraphs[paragraph]?.runs;
  const first = runs?.[start.run];
  if (!runs || !first) {
    throw new RangeError(`Token ${token.raw} points outside ${part.name}`);
  }

  if (start.run === end.run) {
    spliceRunText(part.document, first, start.offset, end.offset, value);
    removeRunIfEmpty(runs, start.run);
    return;
  }

  for (let index = end.run; index > start.run; index--) {
    const run = runs[index];
    if (!run) continue;
    const to = index === end.run ? end.offset : runText(run).length;
    spliceRunText(part.document, run, 0, to, '');
    removeRunIfEmpty(runs, index);
  }
  spliceRunText(part.document, first, start.offset, runText(first).length, value);
  removeRunIfEmpty(runs, start.run);
}

function groupByParagraph(tokens: readonly PlaceholderToken[]): PlaceholderToken[][] {
  const groups = new Map<string, PlaceholderToken[]>();
  for (const token of tokens) {
    const id = `${token.location.part}#${token.location.paragraph}`;
    const group = groups.get(id);
    if (group) {
      group.push(token);
    } else {
      groups.set(id, [token]);
    }
  }
  return [...groups.values()];
}

/**
 * Apply `values` to `tokens` (as returned by `scanTemplate` for this document)
 * and mark the touched parts dirty. Keys without a value are left as
 * literal text and reported in `unmatched`.
 */
export function substituteTokens(
  doc: TemplateDocument,
  tokens: readonly PlaceholderToken[],
  values: ValueMapping,
): SubstitutionOutcome {
  const matched = new Set<string>();
  const unmatched = new Set<string>();
  let replaced = 0;

  for (const token of tokens) {
    (values.has(token.key) ? matched : unmatched).add(token.key);
  }

  for (const group of groupByParagraph(tokens)) {
    const ordered = [...group].sort(
      (a, b) => b.location.start.run - a.location.start.run || b.location.start.offset - a.location.start.offset,
    );
    for (const token of ordered) {
      const value = values.get(token.key);
      if (value === undefined) continue;
      const part = doc.part(token.location.part);
      if (!part) {
        throw new RangeError(`Unknown part ${token.location.part}`);
      }
      replaceToken(part, token, value);
      part.dirty = true;
      replaced++;
    }
  }

  return { matched: [...matched], unmatched: [...unmatched], replaced };
}
