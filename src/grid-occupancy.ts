/**
 * Which cells of the implicit grid hold an item. Rows and columns only ever
 * grow and every row has the same length.
 */
export class OccupationGrid {
  private cells: boolean[][];
  private columns: number;

  constructor(columnCount: number, rowCount: number) {
    this.columns = Math.max(1, columnCount);
    this.cells = [];
    for (let i = 0; i < Math.max(1, rowCount); i++) {
      this.cells.push(new Array<boolean>(this.columns).fill(false));
    }
  }

  get rowCount() {
    return this.cells.length;
  }

  get columnCount() {
    return this.columns;
  }

  maybeAddRow(count: number) {
    while (this.cells.length < count) {
      this.cells.push(new Array<boolean>(this.columns).fill(false));
    }
  }

  maybeAddColumn(count: number) {
    if (count <= this.columns) return;
    for (const row of this.cells) {
      while (row.length < count) row.push(false);
    }
    this.columns = count;
  }

  /**
   * Marks [columnStart, columnEnd) ⨯ [rowStart, rowEnd). Cells outside of the
   * grid are ignored.
   */
  setOccupied(columnStart: number, columnEnd: number, rowStart: number, rowEnd: number) {
    const r0 = Math.max(0, rowStart);
    const r1 = Math.min(this.cells.length, rowEnd);
    const c0 = Math.max(0, columnStart);
    const c1 = Math.min(this.columns, columnEnd);

    for (let row = r0; row < r1; row++) {
      for (let column = c0; column < c1; column++) {
        this.cells[row][column] = true;
      }
    }
  }

  isOccupied(column: number, row: number) {
    if (row < 0 || row >= this.cells.length || column < 0 || column >= this.columns) {
      throw new Error(`Assertion failed: cell ${column},${row} is outside of the grid`);
    }
    return this.cells[row][column];
  }

  repr() {
    return this.cells.map(row => row.map(c => c ? '■' : '□').join('')).join('\n');
  }
}
