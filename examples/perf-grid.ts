import * as flow from '../src/api.js';
import {bench, run} from 'mitata';

import type {HTMLElement} from '../src/api.js';

const cells: HTMLElement[] = [];

for (let i = 0; i < 60; i++) {
  cells.push(flow.h('div', {
    style: flow.style({
      height: 20 + i % 7 * 5,
      gridColumnEnd: i % 5 === 0 ? {span: 2} : 'auto',
      borderTopWidth: 1,
      borderTopStyle: 'solid',
      borderTopColor: {r: 0, g: 0, b: 0, a: 1}
    })
  }, [
    flow.h('img', {attrs: {width: String(30 + i % 4 * 10), height: '10'}})
  ]));
}

const rootElement = flow.dom([
  flow.h('div', {
    style: flow.style({
      display: {outer: 'block', inner: 'grid'},
      gridTemplateColumns: [{repeat: 'auto-fill', tracks: [{min: 80, max: {value: 1, unit: 'fr'}}]}],
      gridAutoRows: 'auto',
      columnGap: 8,
      rowGap: 8
    })
  }, cells)
]);

bench('60 grid items generate and layout', () => {
  const root = flow.generate(rootElement);
  flow.layout(root, 800, 600);
});

bench('60 grid items generate, layout, and paint', () => {
  const root = flow.generate(rootElement);
  flow.layout(root, 800, 600);
  flow.paintToHtml(root);
});

await run();
