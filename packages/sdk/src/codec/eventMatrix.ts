/**
 * Decoded particle events: `rows × columns` doubles, row-major.
 *
 * Values are the raw unsigned 16-bit channel readings; no log transform or
 * scaling happens at this layer. The constructor copies `data` and accessors
 * return copies, so a matrix never changes after it is built.
 */
export class EventMatrix {
  readonly rows: number;
  readonly columns: number;
  readonly columnNames: readonly string[] | undefined;
  private readonly data: Float64Array;

  constructor(opts: { rows: number; columns: number; data: Float64Array; columnNames?: readonly string[] }) {
    if (!Number.isInteger(opts.rows) || opts.rows < 1) throw new RangeError(`rows must be a positive integer: ${opts.rows}`);
    if (!Number.isInteger(opts.columns) || opts.columns < 1) {
      throw new RangeError(`columns must be a positive integer: ${opts.columns}`);
    }
    if (opts.data.length !== opts.rows * opts.columns) {
      throw new RangeError(`data length ${opts.data.length} does not match ${opts.rows}x${opts.columns}`);
    }
    if (opts.columnNames && opts.columnNames.length !== opts.columns) {
      throw new RangeError(`expected ${opts.columns} column names, got ${opts.columnNames.length}`);
    }
    this.rows = opts.rows;
    this.columns = opts.columns;
    this.columnNames = opts.columnNames ? Object.freeze([...opts.columnNames]) : undefined;
    this.data = opts.data.slice();
  }

  get shape(): [number, number] {
    return [this.rows, this.columns];
  }

  at(row: number, col: number): number {
    this.checkRow(row);
    if (!Number.isInteger(col) || col < 0 || col >= this.columns) throw new RangeError(`column out of range: ${col}`);
    return this.data[row * this.columns + col] ?? Number.NaN;
  }

  row(row: number): Float64Array {
    this.checkRow(row);
    return this.data.slice(row * this.columns, (row + 1) * this.columns);
  }

  column(col: number | string): Float64Array {
    const idx = this.columnIndex(col);
    const out = new Float64Array(this.rows);
    for (let r = 0; r < this.rows; r++) out[r] = this.data[r * this.columns + idx] ?? Number.NaN;
    return out;
  }

  values(): Float64Array {
    return this.data.slice();
  }

  toArray(): number[][] {
    const out: number[][] = [];
    for (let r = 0; r < this.rows; r++) out.push(Array.from(this.row(r)));
    return out;
  }

  private columnIndex(col: number | string): number {
    if (typeof col === "string") {
      const idx = this.columnNames?.indexOf(col) ?? -1;
      if (idx === -1) throw new RangeError(`unknown column: ${col}`);
      return idx;
    }
    if (!Number.isInteger(col) || col < 0 || col >= this.columns) throw new RangeError(`column out of range: ${col}`);
    return col;
  }

  private checkRow(row: number): void {
    if (!Number.isInteger(row) || row < 0 || row >= this.rows) throw new RangeError(`row out of range: ${row}`);
  }
}
