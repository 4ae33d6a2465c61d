import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import * as flow from '../src/api.js';
import {BlockFormattingContext} from '../src/layout-flow.js';
import {GridContainer, GridFormattingContext} from '../src/layout-grid.js';
import {calculateMaxContentWidth} from '../src/measure.js';
import {div, generateGrid, grid, layoutGrid} from './helpers.js';

import type {BoxArea} from '../src/api.js';
import type {LayoutMode} from '../src/layout-context.js';

function rect(area: BoxArea) {
  return [area.x, area.y, area.width, area.height];
}

describe('Grid layout', function () {
  it('gives 1fr the space a fixed track leaves', function () {
    const {container, items} = layoutGrid({
      gridTemplateColumns: [{value: 1, unit: 'fr'}, 200]
    }, [{height: 10}, {height: 10}], 500);

    assert.deepEqual(rect(items[0].getBorderArea()), [0, 0, 300, 10]);
    assert.deepEqual(rect(items[1].getBorderArea()), [300, 0, 200, 10]);
    assert.deepEqual(rect(container.getBorderArea()), [0, 0, 500, 10]);
  });

  it('puts gutters between tracks', function () {
    const {container, items} = layoutGrid({
      gridTemplateColumns: [100, 100],
      columnGap: 10,
      rowGap: 5
    }, [{height: 20}, {height: 20}, {height: 20}, {height: 20}]);

    assert.deepEqual(rect(items[1].getBorderArea()), [110, 0, 100, 20]);
    assert.deepEqual(rect(items[2].getBorderArea()), [0, 25, 100, 20]);
    assert.deepEqual(rect(items[3].getBorderArea()), [110, 25, 100, 20]);
    assert.equal(container.getContentArea().height, 45);
  });

  it('places items in named areas', function () {
    const {container, items} = layoutGrid({
      gridTemplateAreas: ['head head', 'side main'],
      gridTemplateColumns: [100, 200],
      gridTemplateRows: [30, 50]
    }, [
      {gridRowStart: {name: 'main'}, gridRowEnd: {name: 'main'}, gridColumnStart: {name: 'main'}, gridColumnEnd: {name: 'main'}},
      {gridRowStart: {name: 'head'}, gridRowEnd: {name: 'head'}, gridColumnStart: {name: 'head'}, gridColumnEnd: {name: 'head'}}
    ]);

    assert.deepEqual(rect(items[0].getBorderArea()), [100, 30, 200, 50]);
    assert.deepEqual(rect(items[1].getBorderArea()), [0, 0, 300, 30]);
    assert.equal(container.getContentArea().height, 80);
  });

  it('uses the first track for names in invalid areas', function () {
    const {items} = layoutGrid({
      gridTemplateAreas: ['a a', 'a b'],
      gridTemplateColumns: [100, 100]
    }, [{gridColumnStart: {name: 'a'}, height: 10}]);

    assert.deepEqual(rect(items[0].getBorderArea()), [0, 0, 100, 10]);
  });

  it('collapses empty auto-fit tracks', function () {
    const {items} = layoutGrid({
      gridTemplateColumns: [{repeat: 'auto-fit', tracks: [100]}]
    }, [{}, {gridColumnStart: {line: -1}}], 350);

    assert.deepEqual(rect(items[0].getBorderArea()), [0, 0, 100, 0]);
    assert.deepEqual(rect(items[1].getBorderArea()), [100, 0, 250, 0]);
  });

  it('keeps empty auto-fill tracks', function () {
    const {items} = layoutGrid({
      gridTemplateColumns: [{repeat: 'auto-fill', tracks: [100]}]
    }, [{}, {gridColumnStart: {line: -1}}], 350);

    assert.deepEqual(rect(items[0].getBorderArea()), [0, 0, 100, 0]);
    assert.deepEqual(rect(items[1].getBorderArea()), [300, 0, 50, 0]);
  });

  it('does not lay out items placed before the first line', function () {
    const {items, state} = layoutGrid({
      gridTemplateColumns: [100, 100]
    }, [{gridColumnStart: {line: -4}, gridRowStart: {line: 1}}, {height: 10}]);

    assert.equal(state.find(items[0]), undefined);
    assert.deepEqual(rect(items[0].getBorderArea()), [0, 0, 0, 0]);
    assert.deepEqual(rect(items[1].getBorderArea()), [0, 0, 100, 10]);
  });

  it('sizes auto tracks to their content and stretches them', function () {
    const root = flow.generate(flow.dom(grid({gridTemplateColumns: ['auto', 'auto']}, [
      div({width: 50}),
      div({}, [flow.h('img', {attrs: {width: '80', height: '10'}})])
    ])));
    flow.layout(root, 300);

    const container = root.children[0];
    assert(container instanceof GridContainer);
    const [a, b] = container.children;

    assert.deepEqual(rect(a.getBorderArea()), [0, 0, 50, 10]);
    assert.deepEqual(rect(b.getBorderArea()), [150, 0, 150, 10]);
    assert.deepEqual(rect(b.children[0].getBorderArea()), [150, 0, 80, 10]);
    assert.equal(container.getContentArea().height, 10);
  });

  it('resolves percentages against the grid area', function () {
    const {items} = layoutGrid({
      gridTemplateColumns: [200],
      gridTemplateRows: [100]
    }, [{width: {value: 50, unit: '%'}, height: {value: 25, unit: '%'}}]);

    assert.deepEqual(rect(items[0].getBorderArea()), [0, 0, 100, 25]);
  });

  it('positions content boxes inside the borders', function () {
    const {container, items} = layoutGrid({
      gridTemplateColumns: ['auto']
    }, [{
      height: 20,
      borderLeftWidth: 5,
      borderLeftStyle: 'solid',
      borderRightWidth: 5,
      borderRightStyle: 'solid',
      borderTopWidth: 2,
      borderTopStyle: 'solid'
    }], 300);

    assert.deepEqual(rect(items[0].getBorderArea()), [0, 0, 300, 22]);
    assert.deepEqual(rect(items[0].getContentArea()), [5, 2, 290, 20]);
    assert.equal(container.getContentArea().height, 22);
  });

  it('measures its max-content width from its columns', function () {
    const container = generateGrid({gridTemplateColumns: ['auto', 'auto']}, [{width: 40}, {width: 60}]);
    assert.equal(calculateMaxContentWidth(container), 100);
  });

  it('spreads spanning items across the tracks and gutters', function () {
    const container = generateGrid({
      gridTemplateColumns: ['auto', 'auto'],
      columnGap: 10
    }, [{gridColumnEnd: {span: 2}, width: 200}]);

    assert.equal(calculateMaxContentWidth(container), 210);
  });

  it('rejects dense packing', function () {
    assert.throws(() => layoutGrid({gridAutoFlow: 'row dense'}, [{}]), /grid-auto-flow: row dense is not supported/);
  });

  it('rejects subgrids', function () {
    assert.throws(() => layoutGrid({gridTemplateColumns: 'subgrid'}, [{}]), /grid-template-columns: subgrid is not supported/);
    assert.throws(() => layoutGrid({gridTemplateRows: 'subgrid'}, [{}]), /grid-template-rows: subgrid is not supported/);
  });

  it('rejects masonry', function () {
    assert.throws(() => layoutGrid({gridTemplateRows: 'masonry'}, [{}]), /grid-template-rows: masonry is not supported/);
  });

  it('lays out its items in normal mode while it is being measured', function () {
    const container = generateGrid({gridTemplateColumns: ['auto', 'auto']}, [{width: 40}, {width: 60}]);
    const modes: LayoutMode[] = [];

    flow.registerFormattingContext('flow', (state, box) => {
      const context = new BlockFormattingContext(state, box);
      return {
        run(mode, space) {
          // measurements never get a definite height, the final layout does
          if (container.children.includes(box) && typeof space.height === 'number') {
            modes.push(mode);
          }
          context.run(mode, space);
        }
      };
    });

    try {
      assert.equal(calculateMaxContentWidth(container), 100);
    } finally {
      flow.registerFormattingContext('flow', (state, box) => new BlockFormattingContext(state, box));
    }

    assert.deepEqual(modes, ['normal', 'normal']);
  });

  it('keeps the width its parent gave it when the width is indefinite', function () {
    const container = generateGrid({gridTemplateColumns: [100, 100]}, [{}, {}]);
    const state = new flow.LayoutState();

    state.get(container).contentWidth = 123;
    new GridFormattingContext(state, container).run('normal', {width: 'indefinite', height: 'indefinite'});

    assert.equal(state.getContentWidth(container), 123);
    assert.equal(state.getContentWidth(container.children[1]), 100);
  });
});
