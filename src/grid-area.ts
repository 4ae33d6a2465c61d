export interface NamedArea {
  name: string;
  rowStart: number;
  rowEnd: number;
  columnStart: number;
  columnEnd: number;
}

function isNullCellToken(token: string) {
  return /^\.+$/.test(token);
}

/**
 * Splits grid-template-areas rows into cells. A token made only of dots is a
 * null cell and is returned as null.
 */
export function parseAreaRows(rows: string[]): (string | null)[][] {
  return rows.map(row => {
    const tokens = row.trim().split(/\s+/).filter(token => token.length > 0);
    return tokens.map(token => isNullCellToken(token) ? null : token);
  });
}

/**
 * Builds the named areas of a grid-template-areas matrix. Every name has to
 * cover exactly one filled rectangle. If any name doesn't, or the rows have
 * different lengths, the whole matrix is invalid and no areas are returned.
 */
export function buildNamedAreas(rows: string[]) {
  const areas = new Map<string, NamedArea>();
  const matrix = parseAreaRows(rows);

  if (matrix.length === 0) return areas;

  const width = matrix[0].length;
  const cellCounts = new Map<string, number>();

  for (let y = 0; y < matrix.length; y++) {
    if (matrix[y].length !== width) return new Map<string, NamedArea>();

    for (let x = 0; x < width; x++) {
      const name = matrix[y][x];
      if (name === null) continue;

      const area = areas.get(name);
      if (area) {
        area.rowStart = Math.min(area.rowStart, y);
        area.rowEnd = Math.max(area.rowEnd, y + 1);
        area.columnStart = Math.min(area.columnStart, x);
        area.columnEnd = Math.max(area.columnEnd, x + 1);
      } else {
        areas.set(name, {name, rowStart: y, rowEnd: y + 1, columnStart: x, columnEnd: x + 1});
      }

      cellCounts.set(name, (cellCounts.get(name) ?? 0) + 1);
    }
  }

  for (const area of areas.values()) {
    const rowCount = area.rowEnd - area.rowStart;
    const columnCount = area.columnEnd - area.columnStart;
    // the bounding box is only a rectangle of the name if the name fills it
    if (cellCounts.get(area.name) !== rowCount * columnCount) {
      return new Map<string, NamedArea>();
    }
  }

  return areas;
}
