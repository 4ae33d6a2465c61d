import {Box} from './layout-box.js';

import type {Logger} from './util.js';
import type {Style} from './style.js';
import type {LayoutState} from './layout-state.js';
import type {FormattingContext, LayoutMode, AvailableSpace} from './layout-context.js';

/**
 * An <img>. Images are never loaded, so the intrinsic size comes from the
 * element's width and height attributes.
 */
export class ReplacedBox extends Box {
  public intrinsicWidth: number;
  public intrinsicHeight: number;
  public src: string;
  public alt: string;

  constructor(
    style: Style,
    attrs: number,
    intrinsicWidth: number,
    intrinsicHeight: number,
    src: string,
    alt: string
  ) {
    super(style, [], attrs);
    this.intrinsicWidth = intrinsicWidth;
    this.intrinsicHeight = intrinsicHeight;
    this.src = src;
    this.alt = alt;
  }

  isReplacedBox(): this is ReplacedBox {
    return true;
  }

  formattingContextType() {
    return 'replaced' as const;
  }

  getLogSymbol() {
    return '◼︎';
  }

  logName(log: Logger) {
    log.text(`Replaced ${this.id} (${this.intrinsicWidth}⨯${this.intrinsicHeight})`);
  }
}

export class ReplacedFormattingContext implements FormattingContext {
  state: LayoutState;
  box: ReplacedBox;

  constructor(state: LayoutState, box: ReplacedBox) {
    this.state = state;
    this.box = box;
  }

  run(mode: LayoutMode, space: AvailableSpace) {
    const used = this.state.get(this.box);
    const {intrinsicWidth, intrinsicHeight} = this.box;
    const width = typeof space.width === 'number' ? space.width : intrinsicWidth;
    // keep the aspect ratio when the width was decided by someone else
    const height = intrinsicWidth > 0
      ? width * intrinsicHeight / intrinsicWidth
      : intrinsicHeight;

    used.contentWidth = width;
    used.automaticContentHeight = height;

    if (space.height === 'min-content' || space.height === 'max-content') {
      used.contentHeight = height;
    }
  }
}
