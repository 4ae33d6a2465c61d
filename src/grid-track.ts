import {px} from './util.js';

import type {
  Gap,
  GridSize,
  GridTrackSize,
  GridLineNames,
  GridRepeat,
  GridTrackListEntry
} from './style.js';
import type {AvailableSize} from './layout-context.js';

export type GridAxis = 'column' | 'row';

export type TrackSizingFunction =
  | {type: 'fixed', value: number}
  | {type: 'flex', value: number}
  | {type: 'auto'}
  | {type: 'min-content'}
  | {type: 'max-content'};

export function isIntrinsic(fn: TrackSizingFunction) {
  return fn.type === 'auto' || fn.type === 'min-content' || fn.type === 'max-content';
}

function reprFunction(fn: TrackSizingFunction) {
  if (fn.type === 'fixed') return `${px(fn.value)}px`;
  if (fn.type === 'flex') return `${fn.value}fr`;
  return fn.type;
}

export class TrackRecord {
  min: TrackSizingFunction;
  max: TrackSizingFunction;
  baseSize: number;
  growthLimit: number;
  frozen: boolean;
  itemIncurredIncrease: number;
  plannedIncrease: number;
  /**
   * Largest start border (left for columns, top for rows) of the items that
   * span only this track
   */
  borderStart: number;
  borderEnd: number;
  isGap: boolean;
  hasDefiniteBaseSize: boolean;

  constructor(min: TrackSizingFunction, max: TrackSizingFunction, isGap = false) {
    this.min = min;
    this.max = max;
    this.baseSize = 0;
    this.growthLimit = 0;
    this.frozen = false;
    this.itemIncurredIncrease = 0;
    this.plannedIncrease = 0;
    this.borderStart = 0;
    this.borderEnd = 0;
    this.isGap = isGap;
    this.hasDefiniteBaseSize = false;
  }

  static gap(size: number) {
    const fn = {type: 'fixed' as const, value: size};
    return new TrackRecord(fn, fn, true);
  }

  isFlexible() {
    return this.min.type === 'flex' || this.max.type === 'flex';
  }

  flexFactor() {
    if (this.max.type === 'flex') return this.max.value;
    if (this.min.type === 'flex') return this.min.value;
    return 0;
  }

  /**
   * Columns are sized with outer contributions, so their base size already
   * holds the borders. Rows are sized with content heights.
   */
  fullSize(axis: GridAxis) {
    if (axis === 'row') return this.baseSize + this.borderStart + this.borderEnd;
    return this.baseSize;
  }

  repr() {
    const min = reprFunction(this.min);
    const max = reprFunction(this.max);
    const fn = min === max ? min : `minmax(${min}, ${max})`;
    const kind = this.isGap ? 'gap ' : '';
    return `${kind}${fn}: ${px(this.baseSize)} (limit ${px(this.growthLimit)})`;
  }
}

function isLineNames(entry: GridTrackListEntry): entry is GridLineNames {
  return typeof entry === 'object' && 'names' in entry;
}

function isRepeat(entry: GridTrackListEntry): entry is GridRepeat {
  return typeof entry === 'object' && 'repeat' in entry;
}

function definiteSize(size: GridSize, availableSize: AvailableSize) {
  if (typeof size === 'number') return size;
  if (typeof size === 'object' && size.unit === '%' && typeof availableSize === 'number') {
    return size.value / 100 * availableSize;
  }
}

/**
 * The size a track takes up when counting how many auto repetitions fit
 */
function trackDefiniteSize(track: GridTrackSize, availableSize: AvailableSize) {
  if (typeof track === 'object' && 'min' in track) {
    const min = definiteSize(track.min, availableSize);
    const max = definiteSize(track.max, availableSize);
    if (min !== undefined && max !== undefined) return Math.min(min, max);
    return max ?? min ?? 0;
  }

  return definiteSize(track, availableSize) ?? 0;
}

/**
 * Number of repetitions of repeat(auto-fill) or repeat(auto-fit): as many as
 * fit in the space the other tracks leave, but always at least one
 */
export function autoRepeatCount(
  repeat: GridRepeat,
  otherTracksSize: number,
  availableSize: AvailableSize
) {
  if (typeof availableSize !== 'number') return 1;

  let repeatedSize = 0;
  for (const track of repeat.tracks) {
    if (!isLineNames(track)) repeatedSize += trackDefiniteSize(track, availableSize);
  }
  repeatedSize = Math.max(1, repeatedSize);

  return Math.max(1, Math.floor((availableSize - otherTracksSize) / repeatedSize));
}

export interface ExpandedTrackList {
  sizes: GridTrackSize[];
  /**
   * Names of each line. There is one more line than there are tracks.
   */
  lineNames: string[][];
  /**
   * Whether each track came from repeat(auto-fit)
   */
  autoFit: boolean[];
}

export function expandTrackList(
  template: GridTrackListEntry[],
  availableSize: AvailableSize
): ExpandedTrackList {
  const ret: ExpandedTrackList = {sizes: [], lineNames: [[]], autoFit: []};
  let otherTracksSize = 0;

  for (const entry of template) {
    if (isLineNames(entry)) continue;
    if (isRepeat(entry)) {
      if (typeof entry.repeat === 'number') {
        for (const track of entry.tracks) {
          if (!isLineNames(track)) {
            otherTracksSize += entry.repeat * trackDefiniteSize(track, availableSize);
          }
        }
      }
    } else {
      otherTracksSize += trackDefiniteSize(entry, availableSize);
    }
  }

  const pushNames = (names: string[]) => {
    ret.lineNames[ret.lineNames.length - 1].push(...names);
  };

  const pushSize = (size: GridTrackSize, autoFit: boolean) => {
    ret.sizes.push(size);
    ret.autoFit.push(autoFit);
    ret.lineNames.push([]);
  };

  for (const entry of template) {
    if (isLineNames(entry)) {
      pushNames(entry.names);
    } else if (isRepeat(entry)) {
      const count = typeof entry.repeat === 'number'
        ? Math.max(0, entry.repeat)
        : autoRepeatCount(entry, otherTracksSize, availableSize);

      for (let i = 0; i < count; i++) {
        for (const track of entry.tracks) {
          if (isLineNames(track)) {
            pushNames(track.names);
          } else {
            pushSize(track, entry.repeat === 'auto-fit');
          }
        }
      }
    } else {
      pushSize(entry, false);
    }
  }

  return ret;
}

/**
 * Percentages become fixed sizes when the axis has a definite size and act
 * like auto otherwise
 */
export function resolveGridSize(size: GridSize, availableSize: AvailableSize): TrackSizingFunction {
  if (typeof size === 'number') return {type: 'fixed', value: size};

  if (typeof size === 'object') {
    if (size.unit === 'fr') return {type: 'flex', value: size.value};
    if (typeof availableSize === 'number') {
      return {type: 'fixed', value: size.value / 100 * availableSize};
    }
    return {type: 'auto'};
  }

  if (size === 'min-content') return {type: 'min-content'};
  if (size === 'max-content') return {type: 'max-content'};
  return {type: 'auto'};
}

export function resolveTrackSize(track: GridTrackSize, availableSize: AvailableSize) {
  if (typeof track === 'object' && 'min' in track) {
    return {
      min: resolveGridSize(track.min, availableSize),
      max: resolveGridSize(track.max, availableSize)
    };
  }

  const fn = resolveGridSize(track, availableSize);
  return {min: fn, max: fn};
}

/**
 * Size of the gutter tracks, or undefined if there are none
 */
export function resolveGap(gap: Gap, availableSize: AvailableSize) {
  if (gap === 'normal') return undefined;
  if (typeof gap === 'number') return gap;
  return typeof availableSize === 'number' ? gap.value / 100 * availableSize : 0;
}

export interface TrackListOptions {
  template: GridTrackListEntry[];
  autoSize: GridTrackSize;
  gap: Gap;
  availableSize: AvailableSize;
  /**
   * Number of tracks the occupation grid ended up with
   */
  trackCount: number;
  isEmpty: (index: number) => boolean;
}

/**
 * Creates the tracks of one axis: explicit tracks, then implicit tracks up to
 * the size of the occupation grid, with gutter tracks between them
 */
export function buildTracks(options: TrackListOptions) {
  const {sizes, autoFit} = expandTrackList(options.template, options.availableSize);
  const count = Math.max(options.trackCount, sizes.length);
  const contentTracks: TrackRecord[] = [];

  for (let i = 0; i < count; i++) {
    if (i < sizes.length && autoFit[i] && options.isEmpty(i)) {
      const collapsed = {type: 'fixed' as const, value: 0};
      contentTracks.push(new TrackRecord(collapsed, collapsed));
    } else {
      const size = i < sizes.length ? sizes[i] : options.autoSize;
      const {min, max} = resolveTrackSize(size, options.availableSize);
      contentTracks.push(new TrackRecord(min, max));
    }
  }

  const gap = resolveGap(options.gap, options.availableSize);
  if (gap === undefined) return contentTracks;

  const tracks: TrackRecord[] = [];
  for (let i = 0; i < contentTracks.length; i++) {
    if (i > 0) tracks.push(TrackRecord.gap(gap));
    tracks.push(contentTracks[i]);
  }

  return tracks;
}

export function findLineIndexByName(lineNames: string[][], name: string, nth = 1) {
  let seen = 0;

  if (nth >= 0) {
    for (let i = 0; i < lineNames.length; i++) {
      if (lineNames[i].includes(name) && ++seen === Math.max(1, nth)) return i;
    }
  } else {
    for (let i = lineNames.length - 1; i >= 0; i--) {
      if (lineNames[i].includes(name) && ++seen === -nth) return i;
    }
  }
}
