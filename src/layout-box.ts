import {id, Logger} from './util.js';

import type {Style} from './style.js';
import type {LayoutState} from './layout-state.js';
import type {BlockContainer} from './layout-flow.js';
import type {GridContainer} from './layout-grid.js';
import type {ReplacedBox} from './layout-replaced.js';

export interface BoxLogOptions {
  containingBlocks?: boolean;
  css?: keyof Style;
  bits?: boolean;
}

/**
 * Key into the formatting context registry. Replaced boxes have no inner
 * display type of their own so they get their own key.
 */
export type FormattingContextType = 'flow' | 'flow-root' | 'grid' | 'replaced';

export abstract class Box {
  public id: string;
  public style: Style;
  public children: Box[];
  public containingBlock: BoxArea | null;
  /**
   * General boolean bitfield shared by all box subclasses
   */
  public bitfield: number;
  private borderArea: BoxArea;
  private contentArea: BoxArea;

  static BITS = {
    enableLogging: 1 << 0,
  };

  /**
   * Use this, not BITS, for the ctor! BITS are ~private
   */
  static ATTRS = {
    enableLogging: Box.BITS.enableLogging
  };

  constructor(style: Style, children: Box[], attrs: number) {
    this.id = id();
    this.style = style;
    this.children = children;
    this.bitfield = attrs;
    this.containingBlock = null;
    this.borderArea = new BoxArea(this);
    this.contentArea = new BoxArea(this);
    this.contentArea.setParent(this.borderArea);
  }

  isBlockContainer(): this is BlockContainer {
    return false;
  }

  isGridContainer(): this is GridContainer {
    return false;
  }

  isReplacedBox(): this is ReplacedBox {
    return false;
  }

  loggingEnabled() {
    return Boolean(this.bitfield & Box.BITS.enableLogging);
  }

  abstract formattingContextType(): FormattingContextType;

  abstract logName(log: Logger, options?: BoxLogOptions): void;

  abstract getLogSymbol(): string;

  getBorderArea() {
    return this.borderArea;
  }

  getContentArea() {
    return this.contentArea;
  }

  hasBackground() {
    return this.style.hasBackground();
  }

  log(options?: BoxLogOptions, log?: Logger) {
    const flush = !log;

    log ||= new Logger();

    log.text(`${this.getLogSymbol()} `);
    this.logName(log, options);

    if (options?.containingBlocks) {
      log.text(` (cb: ${this.containingBlock?.box.id ?? '(null)'})`);
    }

    if (options?.css) {
      const css = this.style[options.css];
      log.text(` (${options.css}: ${css && JSON.stringify(css)})`);
    }

    if (options?.bits) {
      log.text(` (bf: ${this.stringifyBitfield()})`);
    }

    log.text('\n');

    log.pushIndent();

    for (let i = 0; i < this.children.length; i++) {
      this.children[i].log(options, log);
    }

    log.popIndent();

    if (flush) log.flush();
  }

  stringifyBitfield() {
    const thirty2 = this.bitfield.toString(2);
    let s = '';
    for (let i = thirty2.length - 1; i >= 0; i--) {
      s = thirty2[i] + s;
      if (i > 0 && (s.length - 4) % 5 === 0) s = '_' + s;
    }
    s = '0b' + s;
    return s;
  }
}

export class BoxArea {
  parent: BoxArea | null;
  box: Box;
  x: number;
  y: number;
  width: number;
  height: number;

  constructor(box: Box, x?: number, y?: number, w?: number, h?: number) {
    this.parent = null;
    this.box = box;
    this.x = x || 0;
    this.y = y || 0;
    this.width = w || 0;
    this.height = h || 0;
  }

  setParent(p: BoxArea) {
    this.parent = p;
  }

  absolutify() {
    if (!this.parent) {
      throw new Error(`Cannot absolutify area for ${this.box.id}, parent was never set`);
    }

    this.x = this.parent.x + this.x;
    this.y = this.parent.y + this.y;
  }

  repr(indent = 0) {
    const {width: w, height: h, x, y} = this;
    return '  '.repeat(indent) + `⚃ Area ${this.box.id}: ${w}⨯${h} @${x},${y}`;
  }
}

/**
 * Links every box's border area to its containing block (the parent's content
 * area). The root is linked to the viewport area.
 */
export function prelayout(root: Box, viewport: BoxArea) {
  const stack: {box: Box, containingBlock: BoxArea}[] = [
    {box: root, containingBlock: viewport}
  ];

  while (stack.length) {
    const item = stack.pop();
    if (!item) break;
    const {box, containingBlock} = item;

    box.containingBlock = containingBlock;
    box.getBorderArea().setParent(containingBlock);

    for (let i = box.children.length - 1; i >= 0; i--) {
      stack.push({box: box.children[i], containingBlock: box.getContentArea()});
    }
  }
}

/**
 * Copies used values from the layout state into the box areas and converts
 * them to absolute coordinates. Offsets in the state are content box offsets
 * relative to the parent's content box. Boxes that layout never reached (like
 * grid items dropped from the grid) keep empty areas.
 */
export function postlayout(root: Box, state: LayoutState) {
  const stack: Box[] = [root];

  while (stack.length) {
    const box = stack.pop();
    if (!box) break;
    const used = state.find(box);

    if (used && used.contentWidth !== undefined && used.contentHeight !== undefined) {
      const borderArea = box.getBorderArea();
      const contentArea = box.getContentArea();

      borderArea.x = used.offset.x - used.borderLeft;
      borderArea.y = used.offset.y - used.borderTop;
      borderArea.width = used.borderLeft + used.contentWidth + used.borderRight;
      borderArea.height = used.borderTop + used.contentHeight + used.borderBottom;
      contentArea.x = used.borderLeft;
      contentArea.y = used.borderTop;
      contentArea.width = used.contentWidth;
      contentArea.height = used.contentHeight;

      borderArea.absolutify();
      contentArea.absolutify();

      for (let i = box.children.length - 1; i >= 0; i--) stack.push(box.children[i]);
    }
  }
}
