import {HTMLElement} from './dom.js';
import {initialStyle, computeElementStyle, resolveLengthPercentage} from './style.js';
import {generateBlockContainer, BlockContainer, BlockFormattingContext} from './layout-flow.js';
import {GridContainer, GridFormattingContext} from './layout-grid.js';
import {ReplacedBox, ReplacedFormattingContext} from './layout-replaced.js';
import {BoxArea, prelayout, postlayout} from './layout-box.js';
import {LayoutState} from './layout-state.js';
import {registerFormattingContext, layoutInside} from './layout-context.js';
import HtmlPaintBackend from './paint-html.js';
import paint from './paint.js';
import {id} from './util.js';

import type {DeclaredStyle} from './style.js';

export type {DeclaredStyle};

export type {Box, BoxArea} from './layout-box.js';

export type {
  FormattingContext,
  FormattingContextFactory,
  AvailableSpace,
  AvailableSize,
  LayoutMode
} from './layout-context.js';

export {HTMLElement, BlockContainer, GridContainer, ReplacedBox, LayoutState};

export {createDeclaredStyle as style} from './style.js';

export {registerFormattingContext};

registerFormattingContext('flow', (state, box) => new BlockFormattingContext(state, box));
registerFormattingContext('flow-root', (state, box) => new BlockFormattingContext(state, box));
registerFormattingContext('grid', (state, box) => new GridFormattingContext(state, box));
registerFormattingContext('replaced', (state, box) => {
  if (!box.isReplacedBox()) throw new Error(`Assertion failed: ${box.id} is not replaced`);
  return new ReplacedFormattingContext(state, box);
});

export function generate(rootElement: HTMLElement): BlockContainer {
  if (rootElement.style === initialStyle) {
    throw new Error(
      'To use the hyperscript API, pass the element tree to dom() and use ' +
      'the return value as the argument to generate().'
    );
  }

  return generateBlockContainer(rootElement);
}

/**
 * Lays out the box tree in a viewport of the given size and fills every box's
 * border and content areas with absolute coordinates
 */
export function layout(root: BlockContainer, width = 640, height = 480) {
  const viewport = new BoxArea(root, 0, 0, width, height);
  const state = new LayoutState();
  const used = state.get(root);
  const style = root.style;

  prelayout(root, viewport);

  used.setBorders(root);
  used.offset = {x: used.borderLeft, y: used.borderTop};
  used.contentWidth = style.width === 'auto'
    ? Math.max(0, width - used.borderLeft - used.borderRight)
    : resolveLengthPercentage(style.width, width);

  if (style.height !== 'auto') {
    used.contentHeight = resolveLengthPercentage(style.height, height);
  }

  layoutInside(state, root, 'normal', {
    width: used.contentWidth,
    height: used.contentHeight ?? 'indefinite'
  });

  if (used.contentHeight === undefined) used.contentHeight = used.automaticContentHeight;

  postlayout(root, state);

  return state;
}

export function paintToHtml(root: BlockContainer): string {
  const backend = new HtmlPaintBackend();
  paint(root, backend);
  return backend.s;
}

interface HsData {
  style?: DeclaredStyle;
  attrs?: {[k: string]: string};
}

export function dom(el: HTMLElement | HTMLElement[]): HTMLElement {
  let rootElement;

  if (el instanceof HTMLElement && el.tagName === 'html') {
    rootElement = el;
  } else {
    rootElement = new HTMLElement('root', 'html');
    rootElement.children = Array.isArray(el) ? el : [el];
  }

  // Assign parents
  const stack: HTMLElement[] = [rootElement];

  rootElement.parent = null;

  while (stack.length) {
    const el = stack.pop();
    if (!el) break;

    computeElementStyle(el);

    for (const child of el.children) {
      child.parent = el;
      stack.push(child);
    }
  }

  return rootElement;
}

export function h(tagName: string): HTMLElement;
export function h(tagName: string, data: HsData): HTMLElement;
export function h(tagName: string, children: HTMLElement[]): HTMLElement;
export function h(tagName: string, data: HsData, children: HTMLElement[]): HTMLElement;
export function h(tagName: string, arg2?: HsData | HTMLElement[], arg3?: HTMLElement[]): HTMLElement {
  let data: HsData | undefined;
  let children: HTMLElement[] | undefined;

  if (Array.isArray(arg2)) {
    children = arg2;
  } else {
    data = arg2;
  }

  if (arg3) children = arg3;

  if (!children) children = [];
  if (!data) data = {};

  const el = new HTMLElement(id(), tagName, null, data.attrs, data.style);
  el.children = children;
  return el;
}
