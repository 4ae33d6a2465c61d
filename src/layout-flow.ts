import {Box} from './layout-box.js';
import {GridContainer} from './layout-grid.js';
import {ReplacedBox} from './layout-replaced.js';
import {layoutInside} from './layout-context.js';
import {resolveLengthPercentage} from './style.js';
import {calculateMinContentWidth, calculateMaxContentWidth} from './measure.js';

import type {HTMLElement} from './dom.js';
import type {Logger} from './util.js';
import type {Style} from './style.js';
import type {LayoutState} from './layout-state.js';
import type {FormattingContext, LayoutMode, AvailableSpace} from './layout-context.js';

export class BlockContainer extends Box {
  constructor(style: Style, children: Box[], attrs: number) {
    super(style, children, attrs);
  }

  isBlockContainer(): this is BlockContainer {
    return true;
  }

  isBfcRoot() {
    return this.style.display.inner === 'flow-root' || this.style.overflow !== 'visible';
  }

  formattingContextType() {
    return this.style.display.inner === 'flow-root' ? 'flow-root' as const : 'flow' as const;
  }

  getLogSymbol() {
    return '◼︎';
  }

  logName(log: Logger) {
    if (this.isBfcRoot()) log.underline();
    log.text(`Block ${this.id}`);
    log.reset();
  }
}

/**
 * Outer (border box) width a block-level child asks for when its parent is
 * sized under a min-content or max-content constraint
 */
function widthContribution(box: Box, mode: 'min-content' | 'max-content') {
  const borders = box.style.getBorderLeftWidth() + box.style.getBorderRightWidth();
  const {width, minWidth} = box.style;

  if (typeof width === 'number') return width + borders;

  let contentWidth = mode === 'min-content'
    ? calculateMinContentWidth(box)
    : calculateMaxContentWidth(box);

  if (typeof minWidth === 'number') contentWidth = Math.max(contentWidth, minWidth);

  return contentWidth + borders;
}

/**
 * Stacks block-level children from top to bottom. There are no margins and
 * no inline content, so each child's border box starts where the previous one
 * ended.
 */
export class BlockFormattingContext implements FormattingContext {
  state: LayoutState;
  box: Box;

  constructor(state: LayoutState, box: Box) {
    this.state = state;
    this.box = box;
  }

  run(mode: LayoutMode, space: AvailableSpace) {
    const used = this.state.get(this.box);
    let contentWidth: number;

    if (typeof space.width === 'number') {
      contentWidth = space.width;
    } else {
      const constraint = space.width === 'min-content' ? 'min-content' : 'max-content';
      contentWidth = 0;
      for (const child of this.box.children) {
        contentWidth = Math.max(contentWidth, widthContribution(child, constraint));
      }
    }

    used.contentWidth = contentWidth;

    const definiteHeight = typeof space.height === 'number' ? space.height : undefined;
    let y = 0;

    for (const child of this.box.children) {
      const childUsed = this.state.get(child);
      const {width, height, minWidth, minHeight} = child.style;

      childUsed.setBorders(child);

      let childWidth: number;
      if (width !== 'auto') {
        childWidth = resolveLengthPercentage(width, contentWidth);
      } else if (child.isReplacedBox()) {
        childWidth = child.intrinsicWidth;
      } else {
        childWidth = Math.max(0, contentWidth - childUsed.borderLeft - childUsed.borderRight);
      }

      if (minWidth !== 'auto') {
        childWidth = Math.max(childWidth, resolveLengthPercentage(minWidth, contentWidth));
      }

      childUsed.contentWidth = childWidth;

      let childHeight: number | undefined;
      if (typeof height === 'number') {
        childHeight = height;
      } else if (height !== 'auto' && definiteHeight !== undefined) {
        childHeight = resolveLengthPercentage(height, definiteHeight);
      }

      if (childHeight !== undefined) childUsed.contentHeight = childHeight;

      layoutInside(this.state, child, mode, {
        width: childWidth,
        height: childHeight ?? 'indefinite'
      });

      if (childHeight === undefined) childHeight = childUsed.automaticContentHeight;

      if (typeof minHeight === 'number') {
        childHeight = Math.max(childHeight, minHeight);
      } else if (minHeight !== 'auto' && definiteHeight !== undefined) {
        childHeight = Math.max(childHeight, resolveLengthPercentage(minHeight, definiteHeight));
      }

      childUsed.contentHeight = childHeight;
      childUsed.offset = {x: childUsed.borderLeft, y: y + childUsed.borderTop};

      y += childUsed.borderTop + childHeight + childUsed.borderBottom;
    }

    used.automaticContentHeight = y;

    if (space.height === 'min-content' || space.height === 'max-content') {
      used.contentHeight = y;
    }

    if (this.box.loggingEnabled()) {
      console.log(`Block ${this.box.id}: ${contentWidth}⨯${y} (${mode})`);
    }
  }
}

function generateChildren(el: HTMLElement) {
  const children: Box[] = [];

  for (const child of el.children) {
    const box = generateBox(child);
    if (box) children.push(box);
  }

  return children;
}

export function generateBox(el: HTMLElement): Box | undefined {
  let attrs = 0;

  if (el.style.display.outer === 'none') return;

  if ('x-gridflow-log' in el.attrs) attrs |= Box.ATTRS.enableLogging;

  let box: Box;

  if (el.tagName === 'img') {
    const width = Number(el.attrs.width);
    const height = Number(el.attrs.height);
    box = new ReplacedBox(
      el.style,
      attrs,
      Number.isFinite(width) ? width : 0,
      Number.isFinite(height) ? height : 0,
      el.attrs.src ?? '',
      el.attrs.alt ?? ''
    );
  } else if (el.style.display.inner === 'grid') {
    box = new GridContainer(el.style, generateChildren(el), attrs);
  } else {
    box = new BlockContainer(el.style, generateChildren(el), attrs);
  }

  el.boxes.push(box);
  return box;
}

export function generateBlockContainer(el: HTMLElement): BlockContainer {
  let attrs = 0;

  if ('x-gridflow-log' in el.attrs) attrs |= Box.ATTRS.enableLogging;

  const box = new BlockContainer(el.style, generateChildren(el), attrs);
  el.boxes.push(box);
  return box;
}
