import {OccupationGrid} from './grid-occupancy.js';
import {findLineIndexByName} from './grid-track.js';

import type {Box} from './layout-box.js';
import type {GridPlacement} from './style.js';
import type {NamedArea} from './grid-area.js';
import type {GridAxis} from './grid-track.js';

/**
 * A box and the tracks it was placed in. Positions and spans are in content
 * tracks and don't count gutters.
 */
export class GridItem {
  readonly box: Box;
  readonly rowStart: number;
  readonly rowSpan: number;
  readonly columnStart: number;
  readonly columnSpan: number;

  constructor(box: Box, rowStart: number, rowSpan: number, columnStart: number, columnSpan: number) {
    this.box = box;
    this.rowStart = rowStart;
    this.rowSpan = rowSpan;
    this.columnStart = columnStart;
    this.columnSpan = columnSpan;
  }

  start(axis: GridAxis) {
    return axis === 'row' ? this.rowStart : this.columnStart;
  }

  span(axis: GridAxis) {
    return axis === 'row' ? this.rowSpan : this.columnSpan;
  }

  /**
   * Index into a track list that has gutter tracks between the content tracks
   * when hasGaps is true
   */
  physicalStart(axis: GridAxis, hasGaps: boolean) {
    return hasGaps ? this.start(axis) * 2 : this.start(axis);
  }

  physicalEnd(axis: GridAxis, hasGaps: boolean) {
    const span = this.span(axis);
    return this.physicalStart(axis, hasGaps) + (hasGaps ? span * 2 - 1 : span);
  }

  repr() {
    return `${this.box.id}: row ${this.rowStart} span ${this.rowSpan}, column ${this.columnStart} span ${this.columnSpan}`;
  }
}

export type ResolvedEdge =
  | {type: 'line', index: number}
  | {type: 'span', span: number}
  | {type: 'auto'};

export interface AxisLines {
  explicitCount: number;
  lineNames: string[][];
}

export interface PlacementContext {
  rows: AxisLines;
  columns: AxisLines;
  areas: Map<string, NamedArea>;
}

/**
 * Resolves one of grid-row-start, grid-row-end, grid-column-start or
 * grid-column-end to a 0-based line index or a span
 */
export function resolveEdge(
  placement: GridPlacement,
  edge: 'start' | 'end',
  axis: GridAxis,
  ctx: PlacementContext
): ResolvedEdge {
  if (placement === 'auto') return {type: 'auto'};

  if ('span' in placement) return {type: 'span', span: Math.max(1, placement.span)};

  const lines = axis === 'row' ? ctx.rows : ctx.columns;

  const name = placement.name;

  if (name === undefined) {
    const n = 'line' in placement ? placement.line : 0;
    if (n > 0) return {type: 'line', index: n - 1};
    if (n < 0) return {type: 'line', index: lines.explicitCount + (n - 1) + 2};
    return {type: 'auto'};
  }

  const area = ctx.areas.get(name);

  if (area) {
    if (axis === 'row') {
      return {type: 'line', index: edge === 'start' ? area.rowStart : area.rowEnd};
    } else {
      return {type: 'line', index: edge === 'start' ? area.columnStart : area.columnEnd};
    }
  }

  const nth = 'line' in placement ? placement.line : 1;
  const index = findLineIndexByName(lines.lineNames, name, nth);
  if (index !== undefined) return {type: 'line', index};

  return {type: 'line', index: edge === 'start' ? 0 : 1};
}

/**
 * start is undefined when the item has to be auto-placed in this axis
 */
export interface AxisPosition {
  start: number | undefined;
  span: number;
}

export function combineEdges(start: ResolvedEdge, end: ResolvedEdge): AxisPosition {
  if (start.type === 'line') {
    if (end.type === 'line') {
      const [lo, hi] = start.index > end.index
        ? [end.index, start.index]
        : [start.index, end.index];
      return {start: lo, span: lo === hi ? 1 : hi - lo};
    } else if (end.type === 'span') {
      return {start: start.index, span: end.span};
    } else {
      return {start: start.index, span: 1};
    }
  }

  if (end.type === 'line') {
    if (start.type === 'span') {
      return {start: end.index - start.span, span: start.span};
    } else {
      return {start: end.index - 1, span: 1};
    }
  }

  return {start: undefined, span: start.type === 'span' ? start.span : end.type === 'span' ? end.span : 1};
}

export function resolveItemPosition(box: Box, ctx: PlacementContext) {
  const {gridRowStart, gridRowEnd, gridColumnStart, gridColumnEnd} = box.style;

  return {
    row: combineEdges(
      resolveEdge(gridRowStart, 'start', 'row', ctx),
      resolveEdge(gridRowEnd, 'end', 'row', ctx)
    ),
    column: combineEdges(
      resolveEdge(gridColumnStart, 'start', 'column', ctx),
      resolveEdge(gridColumnEnd, 'end', 'column', ctx)
    )
  };
}

interface PendingItem {
  box: Box;
  row: AxisPosition;
  column: AxisPosition;
}

function isAreaFree(
  occupation: OccupationGrid,
  column: number,
  row: number,
  columnSpan: number,
  rowSpan: number
) {
  const rowEnd = Math.min(occupation.rowCount, row + rowSpan);
  for (let y = row; y < rowEnd; y++) {
    for (let x = column; x < column + columnSpan; x++) {
      if (occupation.isOccupied(x, y)) return false;
    }
  }
  return true;
}

/**
 * Looks for the first place from the cursor onwards, going row by row, where
 * the item fits without overlapping anything
 */
function findAutoPosition(
  occupation: OccupationGrid,
  cursor: {x: number, y: number},
  columnSpan: number,
  rowSpan: number
) {
  for (let y = cursor.y; y < occupation.rowCount; y++) {
    const x0 = y === cursor.y ? cursor.x : 0;
    for (let x = x0; x + columnSpan <= occupation.columnCount; x++) {
      if (isAreaFree(occupation, x, y, columnSpan, rowSpan)) return {x, y};
    }
  }
}

export interface PlacementResult {
  items: GridItem[];
  occupation: OccupationGrid;
}

/**
 * Assigns every child of a grid container to a cell of the implicit grid.
 * Items with definite positions go first, then items locked to a row, then
 * everything else in order with a cursor that never moves backwards (sparse
 * packing).
 */
export function placeGridItems(boxes: Box[], ctx: PlacementContext): PlacementResult {
  const occupation = new OccupationGrid(ctx.columns.explicitCount, ctx.rows.explicitCount);
  const items: GridItem[] = [];
  let pending: PendingItem[] = boxes.map(box => ({box, ...resolveItemPosition(box, ctx)}));

  const place = (box: Box, row: number, rowSpan: number, column: number, columnSpan: number) => {
    occupation.maybeAddRow(row + rowSpan);
    occupation.maybeAddColumn(column + columnSpan);
    occupation.setOccupied(column, column + columnSpan, row, row + rowSpan);
    items.push(new GridItem(box, row, rowSpan, column, columnSpan));
  };

  // 1. Items with a definite row and column
  const definiteRow: PendingItem[] = [];
  for (const item of pending) {
    const {row, column} = item;
    if (row.start !== undefined && column.start !== undefined) {
      place(item.box, row.start, row.span, column.start, column.span);
    } else if (row.start !== undefined) {
      definiteRow.push(item);
    }
  }

  // 2. Items locked to a row
  for (const item of definiteRow) {
    const rowStart = Math.max(0, item.row.start ?? 0);
    const {span: columnSpan} = item.column;

    occupation.maybeAddRow(rowStart + item.row.span);
    occupation.maybeAddColumn(columnSpan);

    let column = 0;
    while (column < occupation.columnCount && occupation.isOccupied(column, rowStart)) {
      column++;
    }

    place(item.box, rowStart, item.row.span, column, columnSpan);
  }

  pending = pending.filter(item => item.row.start === undefined);

  // 3. The rest, in order
  const cursor = {x: 0, y: 0};

  for (const item of pending) {
    const {row: {span: rowSpan}, column} = item;

    if (column.start !== undefined) {
      const columnStart = Math.max(0, column.start);

      if (columnStart < cursor.x) cursor.y += 1;
      cursor.x = columnStart;

      occupation.maybeAddColumn(cursor.x + column.span);
      occupation.maybeAddRow(cursor.y + 1);

      for (;;) {
        occupation.maybeAddRow(cursor.y + rowSpan);
        if (!occupation.isOccupied(cursor.x, cursor.y)) break;
        cursor.y += 1;
      }

      place(item.box, cursor.y, rowSpan, cursor.x, column.span);
    } else {
      occupation.maybeAddColumn(column.span);

      const found = findAutoPosition(occupation, cursor, column.span, rowSpan);

      if (found) {
        cursor.x = found.x;
        cursor.y = found.y;
      } else {
        cursor.x = 0;
        cursor.y = occupation.rowCount;
      }

      place(item.box, cursor.y, rowSpan, cursor.x, column.span);
    }
  }

  return {items, occupation};
}
