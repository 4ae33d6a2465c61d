import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {TrackRecord} from '../src/grid-track.js';
import {GridItem} from '../src/grid-placement.js';
import {TrackSizer, distributeExtraSpace, runTrackSizing} from '../src/grid-sizing.js';
import {generateGrid} from './helpers.js';

import type {GridTracks} from '../src/grid-sizing.js';
import type {TrackSizingFunction} from '../src/grid-track.js';

const auto: TrackSizingFunction = {type: 'auto'};

function fixed(value: number): TrackSizingFunction {
  return {type: 'fixed', value};
}

function fr(value: number): TrackSizingFunction {
  return {type: 'flex', value};
}

function track(min: TrackSizingFunction, max = min) {
  return new TrackRecord(min, max);
}

function columns(tracks: TrackRecord[], items: GridItem[] = []): GridTracks {
  return {items, columns: tracks, rows: [], columnGaps: false, rowGaps: false};
}

function baseSizes(tracks: TrackRecord[]) {
  return tracks.map(track => track.baseSize);
}

describe('Track sizing', function () {
  describe('distributeExtraSpace', function () {
    it('splits space equally and freezes tracks at their limit', function () {
      const limited = track(auto);
      limited.baseSize = 10;
      limited.growthLimit = 20;
      const unlimited = track(auto);
      unlimited.growthLimit = Infinity;

      const remainder = distributeExtraSpace([limited, unlimited], 50);

      assert.equal(remainder, 0);
      assert.equal(limited.itemIncurredIncrease, 10);
      assert.equal(unlimited.itemIncurredIncrease, 30);
      assert.equal(limited.plannedIncrease, 10);
      assert.equal(unlimited.plannedIncrease, 30);
      assert.equal(limited.baseSize, 10, 'increases are planned, not applied');
    });

    it('never grows a track past its growth limit', function () {
      const a = track(auto);
      a.growthLimit = 5;
      const b = track(auto);
      b.growthLimit = 5;

      const remainder = distributeExtraSpace([a, b], 20);

      assert.equal(remainder, 10);
      assert.ok(a.baseSize + a.itemIncurredIncrease <= a.growthLimit);
      assert.ok(b.baseSize + b.itemIncurredIncrease <= b.growthLimit);
      assert.equal(a.frozen, true);
      assert.equal(b.frozen, true);
    });

    it('does nothing when the tracks are already big enough', function () {
      const a = track(auto);
      a.baseSize = 40;
      a.growthLimit = Infinity;
      assert.equal(distributeExtraSpace([a], 30), 0);
      assert.equal(a.plannedIncrease, 0);
    });

    it('keeps the largest planned increase', function () {
      const a = track(auto);
      a.growthLimit = Infinity;
      distributeExtraSpace([a], 30);
      distributeExtraSpace([a], 10);
      assert.equal(a.plannedIncrease, 30);
      assert.equal(a.itemIncurredIncrease, 10);
    });
  });

  describe('initializeTrackSizes', function () {
    it('raises a growth limit below the base size to the base size', function () {
      const tracks = [track(fixed(100), fixed(50))];
      new TrackSizer(columns(tracks), 'column', 500).initializeTrackSizes();
      assert.equal(tracks[0].baseSize, 100);
      assert.equal(tracks[0].growthLimit, 100);
    });

    it('starts intrinsic tracks at 0 with no growth limit', function () {
      const tracks = [track(auto, fr(1))];
      new TrackSizer(columns(tracks), 'column', 500).initializeTrackSizes();
      assert.equal(tracks[0].baseSize, 0);
      assert.equal(tracks[0].growthLimit, Infinity);
    });

    it('throws on a sizing function it does not know', function () {
      const unknown: TrackSizingFunction = JSON.parse('{"type": "percent", "value": 10}');
      const tracks = [track(unknown, auto)];
      assert.throws(() => runTrackSizing(columns(tracks), 'column', 500), /Assertion failed/);
    });
  });

  describe('tracks without items', function () {
    it('gives flexible tracks the space fixed tracks leave', function () {
      const tracks = [track(fr(1)), track(fixed(200))];
      runTrackSizing(columns(tracks), 'column', 500);
      assert.deepEqual(baseSizes(tracks), [300, 200]);
    });

    it('divides the space by the number of flexible tracks', function () {
      const tracks = [track(fr(1)), track(fr(3))];
      runTrackSizing(columns(tracks), 'column', 400);
      assert.deepEqual(baseSizes(tracks), [200, 600]);
    });

    it('gives a single track below 1fr its factor of the space', function () {
      const tracks = [track(fr(0.5))];
      runTrackSizing(columns(tracks), 'column', 400);
      assert.deepEqual(baseSizes(tracks), [200]);
    });

    it('leaves flexible tracks empty in an indefinite size', function () {
      const tracks = [track(fr(1)), track(fixed(50))];
      runTrackSizing(columns(tracks), 'column', 'indefinite');
      assert.deepEqual(baseSizes(tracks), [0, 50]);
    });

    it('stretches auto tracks around gutters', function () {
      const tracks = [track(auto), TrackRecord.gap(20), track(auto)];
      runTrackSizing({...columns(tracks), columnGaps: true}, 'column', 400);
      assert.deepEqual(baseSizes(tracks), [190, 20, 190]);
    });

    it('grows tracks to their limit in a max-content size', function () {
      const tracks = [track(fixed(10), fixed(50))];
      runTrackSizing(columns(tracks), 'column', 'max-content');
      assert.deepEqual(baseSizes(tracks), [50]);
    });

    it('keeps base sizes in a min-content size', function () {
      const tracks = [track(fixed(10), fixed(50))];
      runTrackSizing(columns(tracks), 'column', 'min-content');
      assert.deepEqual(baseSizes(tracks), [10]);
    });

    it('shares free space until it runs out', function () {
      const tracks = [track(fixed(10), fixed(50))];
      runTrackSizing(columns(tracks), 'column', 30);
      assert.deepEqual(baseSizes(tracks), [30]);
      assert.equal(tracks[0].growthLimit, 50);
      assert.equal(tracks[0].hasDefiniteBaseSize, true);
    });
  });

  describe('tracks with items', function () {
    it('sizes auto tracks to span-1 items', function () {
      const container = generateGrid({}, [{width: 40}, {width: 60}]);
      const [a, b] = container.children;
      const tracks = [track(auto), track(auto)];
      const items = [new GridItem(a, 0, 1, 0, 1), new GridItem(b, 0, 1, 1, 1)];

      runTrackSizing(columns(tracks, items), 'column', 'max-content');

      assert.deepEqual(baseSizes(tracks), [40, 60]);
    });

    it('includes borders in column contributions', function () {
      const container = generateGrid({}, [{
        width: 40,
        borderLeftWidth: 3,
        borderLeftStyle: 'solid',
        borderRightWidth: 2,
        borderRightStyle: 'solid'
      }]);
      const tracks = [track(auto)];
      const items = [new GridItem(container.children[0], 0, 1, 0, 1)];

      runTrackSizing(columns(tracks, items), 'column', 'max-content');

      assert.deepEqual(baseSizes(tracks), [45]);
      assert.equal(tracks[0].borderStart, 3);
      assert.equal(tracks[0].borderEnd, 2);
    });

    it('spreads spanning items over the intrinsic tracks', function () {
      const container = generateGrid({}, [{width: 200}]);
      const tracks = [track(auto), track(auto)];
      const items = [new GridItem(container.children[0], 0, 1, 0, 2)];

      runTrackSizing(columns(tracks, items), 'column', 'max-content');

      assert.deepEqual(baseSizes(tracks), [100, 100]);
    });

    it('gives spanning items their whole contribution in the intrinsic tracks', function () {
      const container = generateGrid({}, [{width: 150}]);
      const tracks = [track(fixed(100)), track(auto)];
      const items = [new GridItem(container.children[0], 0, 1, 0, 2)];

      runTrackSizing(columns(tracks, items), 'column', 'max-content');

      assert.deepEqual(baseSizes(tracks), [100, 150]);
    });

    it('gives items that span flexible tracks to the flexible tracks', function () {
      const container = generateGrid({}, [{width: 300}]);
      const tracks = [track(auto), track(fr(1))];
      const items = [new GridItem(container.children[0], 0, 1, 0, 2)];

      runTrackSizing(columns(tracks, items), 'column', 'max-content');

      assert.deepEqual(baseSizes(tracks), [0, 300]);
    });

    it('counts tracks with a flexible minimum as flexible', function () {
      const container = generateGrid({}, [{width: 300}]);
      const tracks = [track(auto), track(fr(1), auto)];
      const items = [new GridItem(container.children[0], 0, 1, 0, 2)];

      runTrackSizing(columns(tracks, items), 'column', 'max-content');

      assert.deepEqual(baseSizes(tracks), [0, 300]);
    });
  });
});
