import {isIntrinsic} from './grid-track.js';
import {resolveLengthPercentage} from './style.js';
import {
  calculateMinContentWidth,
  calculateMaxContentWidth,
  calculateMinContentHeight,
  calculateMaxContentHeight
} from './measure.js';

import type {GridItem} from './grid-placement.js';
import type {GridAxis, TrackRecord, TrackSizingFunction} from './grid-track.js';
import type {AvailableSize} from './layout-context.js';

export interface GridTracks {
  /**
   * Items that ended up inside the grid. Items placed before the first line
   * are not sized or positioned.
   */
  items: GridItem[];
  columns: TrackRecord[];
  rows: TrackRecord[];
  columnGaps: boolean;
  rowGaps: boolean;
}

type ContentSizeKind = 'min-content' | 'max-content';

export function getTracks(grid: GridTracks, axis: GridAxis) {
  return axis === 'column' ? grid.columns : grid.rows;
}

export function hasGaps(grid: GridTracks, axis: GridAxis) {
  return axis === 'column' ? grid.columnGaps : grid.rowGaps;
}

/**
 * [start, end) of the physical tracks (gutters included) an item spans
 */
export function getSpannedRange(grid: GridTracks, item: GridItem, axis: GridAxis) {
  const tracks = getTracks(grid, axis);
  const gaps = hasGaps(grid, axis);
  const start = item.physicalStart(axis, gaps);
  const end = Math.min(item.physicalEnd(axis, gaps), tracks.length);
  return [start, end] as const;
}

export function getContainingBlockWidth(grid: GridTracks, item: GridItem) {
  const [start, end] = getSpannedRange(grid, item, 'column');
  const startTrack = grid.columns[start];
  let width = 0;
  for (let i = start; i < end; i++) width += grid.columns[i].baseSize;
  if (startTrack) width -= startTrack.borderStart + startTrack.borderEnd;
  return Math.max(0, width);
}

export function getContainingBlockHeight(grid: GridTracks, item: GridItem) {
  const [start, end] = getSpannedRange(grid, item, 'row');
  let height = 0;
  for (let i = start; i < end; i++) height += grid.rows[i].baseSize;
  return height;
}

/**
 * Grows the candidate tracks until their base sizes add up to the target,
 * splitting the space equally and freezing tracks that hit their growth
 * limit. The increases are recorded in plannedIncrease (keeping the largest
 * one any item asked for) and are not applied. Returns the space that could
 * not be given to any track.
 */
export function distributeExtraSpace(candidates: TrackRecord[], target: number) {
  let baseSizes = 0;

  for (const track of candidates) {
    track.frozen = false;
    track.itemIncurredIncrease = 0;
    baseSizes += track.baseSize;
  }

  let extraSpace = Math.max(0, target - baseSizes);

  for (let round = 0; extraSpace > 0 && round < candidates.length; round++) {
    const unfrozen = candidates.filter(track => !track.frozen);
    if (unfrozen.length === 0) break;

    const share = extraSpace / unfrozen.length;
    let froze = false;

    for (const track of unfrozen) {
      const room = track.growthLimit - track.baseSize - track.itemIncurredIncrease;
      if (room <= share) {
        track.itemIncurredIncrease += room;
        track.frozen = true;
        extraSpace -= room;
        froze = true;
      } else {
        track.itemIncurredIncrease += share;
        extraSpace -= share;
      }
    }

    if (!froze) extraSpace = 0;
  }

  for (const track of candidates) {
    track.plannedIncrease = Math.max(track.plannedIncrease, track.itemIncurredIncrease);
  }

  return extraSpace;
}

function assertKnownFunction(fn: never): never {
  throw new Error(`Assertion failed: unknown track sizing function ${JSON.stringify(fn)}`);
}

function fixedOrUndefined(fn: TrackSizingFunction) {
  switch (fn.type) {
    case 'fixed': return fn.value;
    case 'flex':
    case 'auto':
    case 'min-content':
    case 'max-content':
      return undefined;
    default:
      return assertKnownFunction(fn);
  }
}

/**
 * css-grid-1 § 11.3 - 11.8 for one axis. Columns have to be sized first: row
 * sizing measures items at the widths the columns gave them.
 */
export class TrackSizer {
  grid: GridTracks;
  axis: GridAxis;
  availableSize: AvailableSize;
  private measurements: Map<string, number>;

  constructor(grid: GridTracks, axis: GridAxis, availableSize: AvailableSize) {
    this.grid = grid;
    this.axis = axis;
    this.availableSize = availableSize;
    this.measurements = new Map();
  }

  get tracks() {
    return getTracks(this.grid, this.axis);
  }

  spannedTracks(item: GridItem) {
    const [start, end] = getSpannedRange(this.grid, item, this.axis);
    return this.tracks.slice(start, end);
  }

  private startTrack(item: GridItem): TrackRecord | undefined {
    return this.tracks[item.physicalStart(this.axis, hasGaps(this.grid, this.axis))];
  }

  private getBorders(item: GridItem) {
    if (this.axis === 'row') return 0;
    return item.box.style.getBorderLeftWidth() + item.box.style.getBorderRightWidth();
  }

  /**
   * Width rows measure an item at. It's the width the item will end up with
   * if the columns are already sized.
   */
  private getMeasureWidth(item: GridItem): AvailableSize {
    const start = item.physicalStart('column', this.grid.columnGaps);
    const startColumn: TrackRecord | undefined = this.grid.columns[start];

    if (!startColumn || !startColumn.hasDefiniteBaseSize) return 'max-content';

    const cbWidth = getContainingBlockWidth(this.grid, item);
    const {width} = item.box.style;
    return width === 'auto' ? cbWidth : resolveLengthPercentage(width, cbWidth);
  }

  private getContentSize(item: GridItem, kind: ContentSizeKind) {
    const box = item.box;
    let key: string;
    let measure: () => number;

    if (this.axis === 'column') {
      key = `${box.id}:${kind}:column`;
      measure = () => {
        const width = kind === 'min-content'
          ? calculateMinContentWidth(box)
          : calculateMaxContentWidth(box);
        return width + this.getBorders(item);
      };
    } else {
      const width = this.getMeasureWidth(item);
      key = `${box.id}:${kind}:row:${width}`;
      measure = () => kind === 'min-content'
        ? calculateMinContentHeight(box, width)
        : calculateMaxContentHeight(box, width);
    }

    let size = this.measurements.get(key);
    if (size === undefined) this.measurements.set(key, size = measure());
    return size;
  }

  /**
   * The containing block size percentages resolve against, if it is known yet
   */
  private getContainingBlockSize(item: GridItem) {
    const startTrack = this.startTrack(item);
    if (!startTrack || !startTrack.hasDefiniteBaseSize) return undefined;
    return this.axis === 'column'
      ? getContainingBlockWidth(this.grid, item)
      : getContainingBlockHeight(this.grid, item);
  }

  /**
   * The width or height property, unless it behaves as auto
   */
  private getPreferredSize(item: GridItem) {
    const preferred = this.axis === 'column' ? item.box.style.width : item.box.style.height;
    if (preferred === 'auto') return undefined;
    if (typeof preferred === 'number') return preferred;
    const cbSize = this.getContainingBlockSize(item);
    if (cbSize === undefined) return undefined;
    return resolveLengthPercentage(preferred, cbSize);
  }

  minContentContribution(item: GridItem) {
    const preferred = this.getPreferredSize(item);
    if (preferred === undefined) return this.getContentSize(item, 'min-content');
    return preferred + this.getBorders(item);
  }

  maxContentContribution(item: GridItem) {
    const preferred = this.getPreferredSize(item);
    if (preferred === undefined) return this.getContentSize(item, 'max-content');
    return preferred + this.getBorders(item);
  }

  minimumContribution(item: GridItem) {
    if (this.getPreferredSize(item) !== undefined) return this.minContentContribution(item);

    const style = item.box.style;
    const minSize = this.axis === 'column' ? style.minWidth : style.minHeight;

    if (minSize !== 'auto') {
      const cbSize = this.getContainingBlockSize(item) ?? 0;
      return resolveLengthPercentage(minSize, cbSize) + this.getBorders(item);
    }

    // automatic minimum size
    const startTrack = this.startTrack(item);
    if (startTrack && startTrack.min.type === 'auto' && !style.isScrollContainer()) {
      return this.getContentSize(item, 'min-content');
    }

    return 0;
  }

  limitedMinContentContribution(item: GridItem) {
    return Math.max(this.minContentContribution(item), this.minimumContribution(item));
  }

  limitedMaxContentContribution(item: GridItem) {
    return Math.max(this.maxContentContribution(item), this.minimumContribution(item));
  }

  run() {
    this.initializeTrackSizes();
    this.resolveIntrinsicTrackSizes();
    this.maximizeTracks();
    this.expandFlexibleTracks();
    this.stretchAutoTracks();

    for (const track of this.tracks) {
      if (track.growthLimit < track.baseSize) track.growthLimit = track.baseSize;
    }
  }

  initializeTrackSizes() {
    for (const track of this.tracks) {
      const min = fixedOrUndefined(track.min);
      const max = fixedOrUndefined(track.max);
      track.baseSize = min ?? 0;
      track.growthLimit = max ?? Infinity;
      if (track.growthLimit < track.baseSize) track.growthLimit = track.baseSize;
      track.hasDefiniteBaseSize = false;
    }
  }

  resolveIntrinsicTrackSizes() {
    this.sizeTracksToFitSpanOneItems();
    this.increaseSizesToAccommodateSpanningItems();
    this.increaseSizesToAccommodateFlexibleItems();

    for (const track of this.tracks) {
      if (track.growthLimit === Infinity) track.growthLimit = track.baseSize;
      track.hasDefiniteBaseSize = true;
    }
  }

  private sizeTracksToFitSpanOneItems() {
    const {axis, tracks} = this;
    const gaps = hasGaps(this.grid, axis);
    const itemsByTrack = new Map<number, GridItem[]>();

    for (const item of this.grid.items) {
      if (item.span(axis) !== 1) continue;
      const index = item.physicalStart(axis, gaps);
      let list = itemsByTrack.get(index);
      if (!list) itemsByTrack.set(index, list = []);
      list.push(item);
    }

    for (let i = 0; i < tracks.length; i++) {
      const track = tracks[i];
      const items = itemsByTrack.get(i);

      if (track.isGap || !items) continue;

      for (const item of items) {
        const style = item.box.style;
        if (axis === 'column') {
          track.borderStart = Math.max(track.borderStart, style.getBorderLeftWidth());
          track.borderEnd = Math.max(track.borderEnd, style.getBorderRightWidth());
        } else {
          track.borderStart = Math.max(track.borderStart, style.getBorderTopWidth());
          track.borderEnd = Math.max(track.borderEnd, style.getBorderBottomWidth());
        }
      }

      if (!isIntrinsic(track.min) && !isIntrinsic(track.max)) continue;

      const largest = (contribution: (item: GridItem) => number) => {
        let size = 0;
        for (const item of items) size = Math.max(size, contribution(item));
        return size;
      };

      if (track.min.type === 'min-content') {
        track.baseSize = largest(item => this.minContentContribution(item));
      } else if (track.min.type === 'max-content') {
        track.baseSize = largest(item => this.maxContentContribution(item));
      } else if (track.min.type === 'auto') {
        if (this.availableSize === 'min-content') {
          track.baseSize = largest(item => this.limitedMinContentContribution(item));
        } else if (this.availableSize === 'max-content') {
          track.baseSize = largest(item => this.limitedMaxContentContribution(item));
        } else {
          track.baseSize = largest(item => this.minimumContribution(item));
        }
      }

      if (track.max.type === 'min-content') {
        track.growthLimit = largest(item => this.minContentContribution(item));
      } else if (track.max.type === 'max-content' || track.max.type === 'auto') {
        track.growthLimit = largest(item => this.maxContentContribution(item));
      }

      if (track.growthLimit < track.baseSize) track.growthLimit = track.baseSize;
    }
  }

  /**
   * Runs distributeExtraSpace for every item in the group and then applies the
   * planned increases all at once
   */
  private distributeForGroup(
    group: GridItem[],
    isCandidate: (track: TrackRecord) => boolean,
    contribution: (item: GridItem) => number
  ) {
    for (const track of this.tracks) track.plannedIncrease = 0;

    for (const item of group) {
      const spanned = this.spannedTracks(item);
      const candidates = spanned.filter(track => !track.isGap && isCandidate(track));

      if (candidates.length === 0) continue;

      distributeExtraSpace(candidates, contribution(item));
    }

    for (const track of this.tracks) {
      track.baseSize += track.plannedIncrease;
      track.plannedIncrease = 0;
      if (track.growthLimit < track.baseSize) track.growthLimit = track.baseSize;
    }
  }

  private increaseSizesToAccommodateSpanningItems() {
    let largestSpan = 0;
    for (const item of this.grid.items) largestSpan = Math.max(largestSpan, item.span(this.axis));

    for (let span = 2; span <= largestSpan; span++) {
      const group = this.grid.items.filter(item => {
        return item.span(this.axis) === span
          && !this.spannedTracks(item).some(track => track.isFlexible());
      });

      if (group.length === 0) continue;

      this.distributeForGroup(
        group,
        track => isIntrinsic(track.min),
        item => this.minimumContribution(item)
      );
    }
  }

  private increaseSizesToAccommodateFlexibleItems() {
    const group = this.grid.items.filter(item => {
      return this.spannedTracks(item).some(track => track.isFlexible());
    });

    if (group.length === 0) return;

    this.distributeForGroup(
      group,
      track => track.isFlexible(),
      item => this.limitedMinContentContribution(item)
    );
  }

  /**
   * The space left over after every track got its base size
   */
  private getFreeSpace() {
    if (this.availableSize === 'max-content') return Infinity;
    if (typeof this.availableSize !== 'number') return 0;

    let used = 0;
    for (const track of this.tracks) used += track.baseSize;
    return Math.max(0, this.availableSize - used);
  }

  maximizeTracks() {
    const contentTracks = this.tracks.filter(track => !track.isGap);
    let freeSpace = this.getFreeSpace();

    while (freeSpace > 0 && contentTracks.length > 0) {
      const share = freeSpace / contentTracks.length;
      let given = 0;

      for (const track of contentTracks) {
        const increase = Math.min(share, track.growthLimit - track.baseSize);
        if (increase > 0) {
          track.baseSize += increase;
          given += increase;
        }
      }

      const next = freeSpace - given;
      if (given === 0 || !(next < freeSpace)) break;
      freeSpace = next;
    }
  }

  expandFlexibleTracks() {
    const available = this.availableSize;

    if (typeof available !== 'number' || this.getFreeSpace() === 0) return;

    let nonFlexibleSize = 0;
    let flexibleCount = 0;

    for (const track of this.tracks) {
      if (track.isFlexible()) {
        flexibleCount++;
      } else {
        nonFlexibleSize += track.baseSize;
      }
    }

    // the leftover space is split per flexible track, not per flex factor
    const fr = (available - nonFlexibleSize) / Math.max(1, flexibleCount);

    for (const track of this.tracks) {
      if (!track.isFlexible()) continue;
      const size = track.flexFactor() * fr;
      if (size > track.baseSize) track.baseSize = size;
      if (track.growthLimit < track.baseSize) track.growthLimit = track.baseSize;
    }
  }

  stretchAutoTracks() {
    const available = this.availableSize;
    const autoTracks = this.tracks.filter(track => !track.isGap && track.max.type === 'auto');

    if (autoTracks.length === 0) return;

    let remaining = 0;

    if (typeof available === 'number') {
      let used = 0;
      for (const track of this.tracks) {
        if (track.isGap || track.max.type !== 'auto') used += track.baseSize;
      }
      remaining = Math.max(0, available - used);
    }

    const size = remaining / autoTracks.length;

    for (const track of autoTracks) {
      if (size > track.baseSize) track.baseSize = size;
      if (track.growthLimit < track.baseSize) track.growthLimit = track.baseSize;
    }
  }
}

export function runTrackSizing(grid: GridTracks, axis: GridAxis, availableSize: AvailableSize) {
  new TrackSizer(grid, axis, availableSize).run();
}
