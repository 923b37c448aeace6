// === Template Types ===

/** Position inside a paragraph: run index plus character offset in that run's text. */
export interface RunPosition {
  run: number;
  offset: number;
}

/** Table cell coordinates, 0-based; tables are counted per part in document order. */
export interface CellLocation {
  table: number;
  row: number;
  col: number;
}

export interface TokenLocation {
  /** Zip entry name of the XML part, e.g. `word/document.xml`. */
  part: string;
  paragraph: number;
  start: RunPosition;
  /** Exclusive. */
  end: RunPosition;
  cell?: CellLocation;
}

export interface PlaceholderToken {
  key: string;
  /** The matched text including delimiters, e.g. `{{ dept }}`. */
  raw: string;
  location: TokenLocation;
}

// === Mapping Types ===

export type DuplicateKeyPolicy = 'error' | 'override';

export type ValueMapping = ReadonlyMap<string, string>;

export type SourceKind = 'excel' | 'pdf';

// === Result Types ===

export interface SubstitutionOutcome {
  /** Keys replaced at least once, unique, in document order. */
  matched: readonly string[];
  /** Keys left in place for lack of a value, unique, in document order. */
  unmatched: readonly string[];
  /** Number of token occurrences replaced. */
  replaced: number;
}

export interface MergeResult {
  readonly outputFile: string;
  readonly pdfFile?: string;
  /** Size of the written .docx in bytes. */
  readonly size: number;
  readonly matched: readonly string[];
  readonly unmatched: readonly string[];
  /** Mapped keys no placeholder asked for. */
  readonly unused?: readonly string[];
  readonly uploadUrl?: string;
  readonly pdfUploadUrl?: string;
  readonly createdAt: string;
}
