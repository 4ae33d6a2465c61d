import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {combineEdges, placeGridItems, resolveEdge} from '../src/grid-placement.js';
import {buildNamedAreas} from '../src/grid-area.js';
import {box} from './helpers.js';

import type {GridItem, PlacementContext} from '../src/grid-placement.js';

function context(columns: number, rows: number, columnNames?: string[][]): PlacementContext {
  const emptyNames = (count: number) => Array.from({length: count + 1}, (): string[] => []);
  return {
    columns: {explicitCount: columns, lineNames: columnNames ?? emptyNames(columns)},
    rows: {explicitCount: rows, lineNames: emptyNames(rows)},
    areas: new Map()
  };
}

function positions(items: GridItem[]) {
  return items.map(item => [item.rowStart, item.rowSpan, item.columnStart, item.columnSpan]);
}

describe('Grid placement', function () {
  describe('resolveEdge', function () {
    const ctx = context(4, 2);

    it('converts positive lines to 0-based indices', function () {
      assert.deepEqual(resolveEdge({line: 3}, 'start', 'column', ctx), {type: 'line', index: 2});
    });

    it('counts negative lines from the end of the explicit grid', function () {
      assert.deepEqual(resolveEdge({line: -1}, 'end', 'column', ctx), {type: 'line', index: 4});
      assert.deepEqual(resolveEdge({line: -1}, 'end', 'row', ctx), {type: 'line', index: 2});
      assert.deepEqual(resolveEdge({line: -5}, 'start', 'column', ctx), {type: 'line', index: 0});
    });

    it('treats line 0 as auto', function () {
      assert.deepEqual(resolveEdge({line: 0}, 'start', 'column', ctx), {type: 'auto'});
    });

    it('clamps spans to at least 1', function () {
      assert.deepEqual(resolveEdge({span: 0}, 'end', 'column', ctx), {type: 'span', span: 1});
      assert.deepEqual(resolveEdge({span: 3}, 'end', 'column', ctx), {type: 'span', span: 3});
    });

    it('uses the edges of named areas', function () {
      const areaCtx = {...context(2, 1), areas: buildNamedAreas(['x y'])};
      assert.deepEqual(resolveEdge({name: 'y'}, 'start', 'column', areaCtx), {type: 'line', index: 1});
      assert.deepEqual(resolveEdge({name: 'y'}, 'end', 'column', areaCtx), {type: 'line', index: 2});
      assert.deepEqual(resolveEdge({name: 'y'}, 'start', 'row', areaCtx), {type: 'line', index: 0});
      assert.deepEqual(resolveEdge({name: 'y'}, 'end', 'row', areaCtx), {type: 'line', index: 1});
    });

    it('finds named lines', function () {
      const namedCtx = context(2, 1, [['a'], ['b'], ['a']]);
      assert.deepEqual(resolveEdge({name: 'a'}, 'start', 'column', namedCtx), {type: 'line', index: 0});
      assert.deepEqual(resolveEdge({line: 2, name: 'a'}, 'start', 'column', namedCtx), {type: 'line', index: 2});
    });

    it('falls back to the first track for unknown names', function () {
      const invalid = {...context(2, 2), areas: buildNamedAreas(['a a', 'a b'])};
      assert.deepEqual(resolveEdge({name: 'a'}, 'start', 'column', invalid), {type: 'line', index: 0});
      assert.deepEqual(resolveEdge({name: 'a'}, 'end', 'column', invalid), {type: 'line', index: 1});
    });
  });

  describe('combineEdges', function () {
    it('swaps reversed lines', function () {
      assert.deepEqual(
        combineEdges({type: 'line', index: 2}, {type: 'line', index: 0}),
        {start: 0, span: 2}
      );
    });

    it('spans one track when both lines are the same', function () {
      assert.deepEqual(
        combineEdges({type: 'line', index: 1}, {type: 'line', index: 1}),
        {start: 1, span: 1}
      );
    });

    it('spans from a start line', function () {
      assert.deepEqual(
        combineEdges({type: 'line', index: 1}, {type: 'span', span: 3}),
        {start: 1, span: 3}
      );
    });

    it('spans backwards from an end line', function () {
      assert.deepEqual(
        combineEdges({type: 'span', span: 2}, {type: 'line', index: 3}),
        {start: 1, span: 2}
      );
      assert.deepEqual(
        combineEdges({type: 'auto'}, {type: 'line', index: 3}),
        {start: 2, span: 1}
      );
    });

    it('leaves the start undefined without a line', function () {
      assert.deepEqual(combineEdges({type: 'span', span: 2}, {type: 'auto'}), {start: undefined, span: 2});
      assert.deepEqual(combineEdges({type: 'auto'}, {type: 'span', span: 3}), {start: undefined, span: 3});
      assert.deepEqual(combineEdges({type: 'auto'}, {type: 'auto'}), {start: undefined, span: 1});
    });
  });

  describe('placeGridItems', function () {
    it('places auto items in order, row by row', function () {
      const {items, occupation} = placeGridItems([box(), box(), box()], context(2, 0));
      assert.deepEqual(positions(items), [[0, 1, 0, 1], [0, 1, 1, 1], [1, 1, 0, 1]]);
      assert.equal(occupation.rowCount, 2);
      assert.equal(occupation.columnCount, 2);
    });

    it('places the rows 3 / 1 over the first two rows', function () {
      const item = box({gridRowStart: {line: 3}, gridRowEnd: {line: 1}, gridColumnStart: {line: 1}});
      const {items} = placeGridItems([item], context(1, 2));
      assert.deepEqual(positions(items), [[0, 2, 0, 1]]);
    });

    it('places definite items first, then items locked to a row', function () {
      const auto = box();
      const rowLocked = box({gridRowStart: {line: 1}});
      const definite = box({gridRowStart: {line: 1}, gridColumnStart: {line: 1}});
      const {items} = placeGridItems([auto, rowLocked, definite], context(3, 1));

      assert.equal(items[0].box, definite);
      assert.equal(items[1].box, rowLocked);
      assert.equal(items[2].box, auto);
      assert.deepEqual(positions(items), [[0, 1, 0, 1], [0, 1, 1, 1], [0, 1, 2, 1]]);
    });

    it('clamps negative rows of row-locked items', function () {
      const {items} = placeGridItems([box({gridRowStart: {line: -5}})], context(1, 1));
      assert.deepEqual(positions(items), [[0, 1, 0, 1]]);
    });

    it('moves down to find a free row for a definite column', function () {
      const first = box();
      const second = box({gridColumnStart: {line: 1}});
      const {items} = placeGridItems([first, second], context(2, 0));
      assert.deepEqual(positions(items), [[0, 1, 0, 1], [1, 1, 0, 1]]);
    });

    it('never moves the cursor backwards', function () {
      const wide = box({gridColumnEnd: {span: 2}});
      const {items} = placeGridItems([box(), wide, box()], context(2, 0));
      assert.deepEqual(positions(items), [[0, 1, 0, 1], [1, 1, 0, 2], [2, 1, 0, 1]]);
    });

    it('adds implicit columns for lines past the explicit grid', function () {
      const item = box({gridColumnStart: {name: 'b'}, gridRowStart: {line: 1}});
      const {items, occupation} = placeGridItems([item], context(2, 0, [['a'], [], ['b']]));
      assert.deepEqual(positions(items), [[0, 1, 2, 1]]);
      assert.equal(occupation.columnCount, 3);
    });

    it('adds implicit columns for spans wider than the grid', function () {
      const {items, occupation} = placeGridItems([box({gridColumnEnd: {span: 3}})], context(2, 0));
      assert.deepEqual(positions(items), [[0, 1, 0, 3]]);
      assert.equal(occupation.columnCount, 3);
    });

    it('marks every cell an item covers', function () {
      const item = box({gridRowStart: {line: 1}, gridRowEnd: {span: 2}, gridColumnStart: {line: 2}});
      const {occupation} = placeGridItems([item], context(2, 2));
      assert.equal(occupation.repr(), '□■\n□■');
    });

    it('describes items', function () {
      const item = box({gridRowStart: {line: 2}, gridColumnStart: {line: 1}, gridColumnEnd: {span: 2}});
      const {items} = placeGridItems([item], context(2, 2));
      assert.equal(items[0].repr(), `${item.id}: row 1 span 1, column 0 span 2`);
      assert.equal(items[0].physicalStart('column', true), 0);
      assert.equal(items[0].physicalEnd('column', true), 3);
      assert.equal(items[0].physicalStart('row', true), 2);
      assert.equal(items[0].physicalEnd('row', false), 2);
    });
  });
});
