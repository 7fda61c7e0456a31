/**
 * Tabular Input
 *
 * The client accepts any table that can hand out a column by name, its row
 * count and its rows. `DataTable` is the column-oriented implementation used
 * for results and for record arrays passed in by callers.
 */

export type CellValue = string | number | boolean | Date | null | undefined;

export type Row = Record<string, CellValue>;

/**
 * Capability interface for table-like inputs
 */
export interface TabularInput {
  readonly columns: readonly string[];
  readonly rowCount: number;
  hasColumn(name: string): boolean;
  column(name: string): readonly CellValue[];
  rows(): Iterable<Row>;
}

export class DataTable implements TabularInput {
  private readonly data: Map<string, CellValue[]>;
  readonly columns: readonly string[];
  readonly rowCount: number;

  private constructor(data: Map<string, CellValue[]>, rowCount: number) {
    this.data = data;
    this.columns = [...data.keys()];
    this.rowCount = rowCount;
  }

  /**
   * Build a table from row records. Columns are taken in first-seen order;
   * a key missing from a row reads as `undefined`.
   */
  static fromRecords(records: readonly Row[]): DataTable {
    const names: string[] = [];
    const seen = new Set<string>();
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key)) {
          seen.add(key);
          names.push(key);
        }
      }
    }

    const data = new Map<string, CellValue[]>();
    for (const name of names) {
      data.set(name, records.map((r) => r[name]));
    }
    return new DataTable(data, records.length);
  }

  /**
   * Build a table from named columns of equal length
   */
  static fromColumns(columns: Record<string, readonly CellValue[]>): DataTable {
    const entries = Object.entries(columns);
    const rowCount = entries.length > 0 ? entries[0][1].length : 0;
    const data = new Map<string, CellValue[]>();
    for (const [name, values] of entries) {
      if (values.length !== rowCount) {
        throw new RangeError(
          `Column "${name}" has ${values.length} values, expected ${rowCount}`
        );
      }
      data.set(name, [...values]);
    }
    return new DataTable(data, rowCount);
  }

  /**
   * Copy any tabular input into a DataTable
   */
  static from(input: TabularInput): DataTable {
    if (input instanceof DataTable) return input;
    const columns: Record<string, readonly CellValue[]> = {};
    for (const name of input.columns) {
      columns[name] = input.column(name);
    }
    return DataTable.fromColumns(columns);
  }

  hasColumn(name: string): boolean {
    return this.data.has(name);
  }

  column(name: string): readonly CellValue[] {
    const values = this.data.get(name);
    if (!values) {
      throw new RangeError(`Unknown column "${name}"`);
    }
    return values;
  }

  *rows(): Iterable<Row> {
    for (let i = 0; i < this.rowCount; i++) {
      yield this.row(i);
    }
  }

  row(index: number): Row {
    const row: Row = {};
    for (const [name, values] of this.data) {
      row[name] = values[index];
    }
    return row;
  }

  toRecords(): Row[] {
    return [...this.rows()];
  }

  select(names: readonly string[]): DataTable {
    const columns: Record<string, readonly CellValue[]> = {};
    for (const name of names) {
      columns[name] = this.column(name);
    }
    return DataTable.fromColumns(columns);
  }

  withoutColumns(names: readonly string[]): DataTable {
    return this.select(this.columns.filter((c) => !names.includes(c)));
  }

  /**
   * Stack tables with identical column lists
   */
  static concat(tables: readonly DataTable[]): DataTable {
    if (tables.length === 0) return DataTable.fromColumns({});
    const names = tables[0].columns;
    const columns: Record<string, CellValue[]> = {};
    for (const name of names) columns[name] = [];
    for (const table of tables) {
      if (table.columns.length !== names.length || table.columns.some((c, i) => c !== names[i])) {
        throw new RangeError(
          `Cannot concatenate tables with columns [${table.columns.join(', ')}] and [${names.join(', ')}]`
        );
      }
      for (const name of names) {
        const target = columns[name];
        for (const value of table.column(name)) target.push(value);
      }
    }
    return DataTable.fromColumns(columns);
  }
}
