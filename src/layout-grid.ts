import {Box} from './layout-box.js';
import {Logger} from './util.js';
import {layoutInside} from './layout-context.js';
import {resolveLengthPercentage} from './style.js';
import {buildNamedAreas} from './grid-area.js';
import {placeGridItems} from './grid-placement.js';
import {buildTracks, expandTrackList} from './grid-track.js';
import {
  runTrackSizing,
  getSpannedRange,
  getContainingBlockWidth,
  getContainingBlockHeight
} from './grid-sizing.js';

import type {Style, GridTemplate, GridTrackListEntry} from './style.js';
import type {LayoutState} from './layout-state.js';
import type {NamedArea} from './grid-area.js';
import type {OccupationGrid} from './grid-occupancy.js';
import type {GridAxis, TrackRecord} from './grid-track.js';
import type {GridTracks} from './grid-sizing.js';
import type {FormattingContext, LayoutMode, AvailableSpace} from './layout-context.js';

export class GridContainer extends Box {
  constructor(style: Style, children: Box[], attrs: number) {
    super(style, children, attrs);
  }

  isGridContainer(): this is GridContainer {
    return true;
  }

  formattingContextType() {
    return 'grid' as const;
  }

  getLogSymbol() {
    return '▦';
  }

  logName(log: Logger) {
    log.text(`Grid ${this.id}`);
  }
}

function getTrackList(template: GridTemplate, property: string): GridTrackListEntry[] {
  if (template === 'subgrid' || template === 'masonry') {
    throw new Error(`${property}: ${template} is not supported`);
  }
  return template;
}

function getAreasExtent(areas: Map<string, NamedArea>) {
  let rows = 0;
  let columns = 0;
  for (const area of areas.values()) {
    rows = Math.max(rows, area.rowEnd);
    columns = Math.max(columns, area.columnEnd);
  }
  return {rows, columns};
}

function isTrackEmpty(occupation: OccupationGrid, axis: GridAxis, index: number) {
  if (axis === 'column') {
    if (index >= occupation.columnCount) return true;
    for (let row = 0; row < occupation.rowCount; row++) {
      if (occupation.isOccupied(index, row)) return false;
    }
  } else {
    if (index >= occupation.rowCount) return true;
    for (let column = 0; column < occupation.columnCount; column++) {
      if (occupation.isOccupied(column, index)) return false;
    }
  }
  return true;
}

function sumFullSizes(tracks: TrackRecord[], axis: GridAxis, start = 0, end = tracks.length) {
  let size = 0;
  for (let i = start; i < end; i++) size += tracks[i].fullSize(axis);
  return size;
}

/**
 * css-grid-1 with sparse auto-placement. Placement runs first and only needs
 * the explicit track counts, then the tracks of both axes are built and sized
 * (columns first), and finally every item gets its area and is laid out.
 */
export class GridFormattingContext implements FormattingContext {
  state: LayoutState;
  box: Box;

  constructor(state: LayoutState, box: Box) {
    this.state = state;
    this.box = box;
  }

  run(mode: LayoutMode, space: AvailableSpace) {
    const style = this.box.style;

    if (style.gridAutoFlow === 'row dense') {
      throw new Error('grid-auto-flow: row dense is not supported');
    }

    const columnList = getTrackList(style.gridTemplateColumns, 'grid-template-columns');
    const rowList = getTrackList(style.gridTemplateRows, 'grid-template-rows');
    const areas = buildNamedAreas(style.gridTemplateAreas);
    const areasExtent = getAreasExtent(areas);
    const columnLines = expandTrackList(columnList, space.width);
    const rowLines = expandTrackList(rowList, space.height);

    const {items, occupation} = placeGridItems(this.box.children, {
      columns: {
        explicitCount: Math.max(columnLines.sizes.length, areasExtent.columns),
        lineNames: columnLines.lineNames
      },
      rows: {
        explicitCount: Math.max(rowLines.sizes.length, areasExtent.rows),
        lineNames: rowLines.lineNames
      },
      areas
    });

    const grid: GridTracks = {
      items: items.filter(item => item.rowStart >= 0 && item.columnStart >= 0),
      columns: buildTracks({
        template: columnList,
        autoSize: style.gridAutoColumns,
        gap: style.columnGap,
        availableSize: space.width,
        trackCount: occupation.columnCount,
        isEmpty: index => isTrackEmpty(occupation, 'column', index)
      }),
      rows: buildTracks({
        template: rowList,
        autoSize: style.gridAutoRows,
        gap: style.rowGap,
        availableSize: space.height,
        trackCount: occupation.rowCount,
        isEmpty: index => isTrackEmpty(occupation, 'row', index)
      }),
      columnGaps: style.columnGap !== 'normal',
      rowGaps: style.rowGap !== 'normal'
    };

    runTrackSizing(grid, 'column', space.width);
    runTrackSizing(grid, 'row', space.height);

    for (const item of grid.items) {
      const [columnStart] = getSpannedRange(grid, item, 'column');
      const [rowStart] = getSpannedRange(grid, item, 'row');
      const startColumn: TrackRecord | undefined = grid.columns[columnStart];
      const startRow: TrackRecord | undefined = grid.rows[rowStart];

      if (!startColumn || !startRow) continue;

      const x = sumFullSizes(grid.columns, 'column', 0, columnStart);
      const y = sumFullSizes(grid.rows, 'row', 0, rowStart);
      const cbWidth = getContainingBlockWidth(grid, item);
      const cbHeight = getContainingBlockHeight(grid, item);
      const {width, height} = item.box.style;
      const used = this.state.get(item.box);

      used.setBorders(item.box);
      used.contentWidth = width === 'auto' ? cbWidth : resolveLengthPercentage(width, cbWidth);
      used.contentHeight = height === 'auto' ? cbHeight : resolveLengthPercentage(height, cbHeight);
      used.offset = {x: x + startColumn.borderStart, y: y + startRow.borderStart};

      layoutInside(this.state, item.box, 'normal', {
        width: used.contentWidth,
        height: used.contentHeight
      });
    }

    const used = this.state.get(this.box);
    const columnsSize = sumFullSizes(grid.columns, 'column');
    const rowsSize = sumFullSizes(grid.rows, 'row');

    if (space.width === 'min-content' || space.width === 'max-content') {
      used.contentWidth = columnsSize;
    }

    if (space.height === 'min-content' || space.height === 'max-content') {
      used.contentHeight = rowsSize;
    }

    used.automaticContentHeight = rowsSize;

    if (this.box.loggingEnabled()) this.log(grid, occupation);
  }

  private log(grid: GridTracks, occupation: OccupationGrid) {
    const log = new Logger();

    log.bold();
    log.text(`Grid ${this.box.id}`);
    log.reset();
    log.text('\n');
    log.pushIndent();

    log.text(`occupation ${occupation.columnCount}⨯${occupation.rowCount}\n`);
    log.pushIndent();
    log.text(occupation.repr() + '\n');
    log.popIndent();

    log.text('items\n');
    log.pushIndent();
    for (const item of grid.items) log.text(item.repr() + '\n');
    log.popIndent();

    log.text('columns\n');
    log.pushIndent();
    for (const track of grid.columns) log.text(track.repr() + '\n');
    log.popIndent();

    log.text('rows\n');
    log.pushIndent();
    for (const track of grid.rows) log.text(track.repr() + '\n');
    log.popIndent();

    log.popIndent();
    log.flush();
  }
}
