import { parse, stringify } from 'yaml';
import { IndexError, ParseError, ValidationError } from '../errors.js';
import { type Alignment, renderTable } from './table.js';

export interface CollectionDefinition<T> {
  /** what the collection holds, for error messages */
  kind: string;
  isEntry: (value: unknown) => value is T;
  fieldNames: readonly string[];
  alignLeft?: readonly string[];
  row: (entry: T) => readonly string[];
  /** projection for `toText`; defaults to `row`. Use it where `row` shortens values for display. */
  textRow?: (entry: T) => readonly string[];
  totals?: (entries: readonly T[]) => readonly string[];
  sortKey?: (entry: T) => string | number;
}

export type TextRow = Record<string, unknown>;

/**
 * An ordered, numbered view over remote resources. Display number N (from 1) always
 * names the same entry; anything that changes the entries needs a new collection.
 *
 * @throws ValidationError when the entries or the definition are inconsistent
 */
export class ResourceCollection<T> {
  readonly entries: readonly T[];

  constructor(
    entries: readonly unknown[],
    private readonly definition: CollectionDefinition<T>,
  ) {
    const { kind, fieldNames, alignLeft = [] } = definition;

    const typed: T[] = [];
    for (const [index, entry] of entries.entries()) {
      if (!definition.isEntry(entry)) {
        throw new ValidationError(`Entry ${index + 1} is not a ${kind}`, 'entries', entry);
      }
      typed.push(entry);
    }

    if (new Set(fieldNames).size !== fieldNames.length) {
      throw new ValidationError(`Duplicate field names in ${kind} collection: ${fieldNames.join(', ')}`, 'fieldNames');
    }
    const unknownAlign = alignLeft.find((field) => !fieldNames.includes(field));
    if (unknownAlign !== undefined) {
      throw new ValidationError(`Cannot align unknown field '${unknownAlign}'`, 'alignLeft', unknownAlign);
    }

    const sample = typed[0];
    if (sample !== undefined) {
      this.checkWidth(definition.row(sample), 'row');
      if (definition.textRow) this.checkWidth(definition.textRow(sample), 'text row');
    }
    if (definition.totals) {
      this.checkWidth(definition.totals(typed), 'totals row');
    }

    const sortKey = definition.sortKey;
    if (sortKey) {
      typed.sort((a, b) => {
        const ka = sortKey(a);
        const kb = sortKey(b);
        return ka < kb ? -1 : ka > kb ? 1 : 0;
      });
    }
    this.entries = typed;
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * The entry shown as number `displayNumber`.
   */
  select(displayNumber: number): T {
    const entry = Number.isInteger(displayNumber) && displayNumber >= 1 ? this.entries[displayNumber - 1] : undefined;
    if (entry === undefined) {
      throw new IndexError(displayNumber, this.entries.length);
    }
    return entry;
  }

  render(withTotals = true): string {
    const { fieldNames, alignLeft = [], totals } = this.definition;
    const rows = this.entries.map((entry, index) => [String(index + 1), ...this.definition.row(entry)]);
    const align: Alignment[] = ['center', ...fieldNames.map((field): Alignment => (alignLeft.includes(field) ? 'left' : 'center'))];
    const footer = withTotals && totals ? ['total', ...totals(this.entries)] : undefined;
    return renderTable(['no.', ...fieldNames], rows, { align, footer });
  }

  /**
   * The row view of one entry (or all) as an editable YAML list of field/value mappings.
   */
  toText(entry?: T): string {
    const selected = entry === undefined ? this.entries : [entry];
    return stringify(selected.map((item) => this.toRow(item)));
  }

  /**
   * Read back text in the `toText` shape. Rows are not checked against the field names.
   */
  static fromText(text: string): TextRow[] {
    let data: unknown;
    try {
      data = parse(text);
    } catch (error) {
      throw new ParseError(`Edited text is not valid YAML: ${error}`, error);
    }
    if (data === null || data === undefined) return [];
    if (!Array.isArray(data)) {
      throw new ParseError('Edited text must be a list of entries');
    }
    return data.map((item: unknown, index): TextRow => {
      if (typeof item !== 'object' || item === null || Array.isArray(item)) {
        throw new ParseError(`Entry ${index + 1} must be a mapping of field: value`);
      }
      return Object.fromEntries(Object.entries(item));
    });
  }

  private toRow(entry: T): Record<string, string> {
    const values = (this.definition.textRow ?? this.definition.row)(entry);
    return Object.fromEntries(this.definition.fieldNames.map((field, index) => [field, values[index] ?? '']));
  }

  private checkWidth(row: readonly string[], what: string): void {
    if (row.length !== this.definition.fieldNames.length) {
      throw new ValidationError(
        `${this.definition.kind} ${what} has ${row.length} values for ${this.definition.fieldNames.length} fields`,
        'row',
      );
    }
  }
}
