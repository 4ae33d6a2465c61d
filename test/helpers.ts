import assert from 'node:assert/strict';
import * as flow from '../src/api.js';
import {BlockContainer} from '../src/layout-flow.js';
import {GridContainer} from '../src/layout-grid.js';
import {createStyle, initialStyle} from '../src/style.js';

import type {DeclaredStyle} from '../src/style.js';
import type {HTMLElement} from '../src/dom.js';

export function grid(style: DeclaredStyle, children: HTMLElement[]) {
  return flow.h('div', {style: {...style, display: {outer: 'block', inner: 'grid'}}}, children);
}

export function div(style: DeclaredStyle, children: HTMLElement[] = []) {
  return flow.h('div', {style}, children);
}

/**
 * Lays out a single grid container in the viewport and returns it with its
 * items
 */
export function layoutGrid(
  style: DeclaredStyle,
  items: DeclaredStyle[],
  width = 640,
  height = 480
) {
  const root = flow.generate(flow.dom(grid(style, items.map(item => div(item)))));
  const state = flow.layout(root, width, height);
  const container = root.children[0];
  assert(container instanceof GridContainer);
  return {root, container, items: container.children, state};
}

export function generateGrid(style: DeclaredStyle, items: DeclaredStyle[]) {
  const root = flow.generate(flow.dom(grid(style, items.map(item => div(item)))));
  const container = root.children[0];
  assert(container instanceof GridContainer);
  return container;
}

export function box(style: DeclaredStyle = {}) {
  return new BlockContainer(createStyle(initialStyle, style), [], 0);
}
