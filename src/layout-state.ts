import type {Box} from './layout-box.js';

function assumePx(v: number | undefined): asserts v is number {
  if (typeof v !== 'number') {
    throw new TypeError(
      'The value accessed here has not been reduced to a used value in a ' +
        'context where a used value is expected. Make sure to perform any ' +
        'needed layouts.'
    );
  }
}

/**
 * Results of layout for one box. Sizes are content box sizes and the offset is
 * the content box position relative to the parent's content box.
 */
export class UsedValues {
  contentWidth: number | undefined;
  contentHeight: number | undefined;
  offset: {x: number, y: number};
  borderTop: number;
  borderRight: number;
  borderBottom: number;
  borderLeft: number;
  /**
   * Height the box would have if its height were auto. Parents with auto
   * heights read this after laying out the box's contents.
   */
  automaticContentHeight: number;

  constructor() {
    this.contentWidth = undefined;
    this.contentHeight = undefined;
    this.offset = {x: 0, y: 0};
    this.borderTop = 0;
    this.borderRight = 0;
    this.borderBottom = 0;
    this.borderLeft = 0;
    this.automaticContentHeight = 0;
  }

  setBorders(box: Box) {
    this.borderTop = box.style.getBorderTopWidth();
    this.borderRight = box.style.getBorderRightWidth();
    this.borderBottom = box.style.getBorderBottomWidth();
    this.borderLeft = box.style.getBorderLeftWidth();
  }
}

/**
 * The layout-result store. Measuring a box's intrinsic size uses a throw-away
 * LayoutState so that it never disturbs the one being laid out.
 */
export class LayoutState {
  private values: Map<Box, UsedValues>;

  constructor() {
    this.values = new Map();
  }

  get(box: Box) {
    let used = this.values.get(box);
    if (!used) this.values.set(box, used = new UsedValues());
    return used;
  }

  find(box: Box) {
    return this.values.get(box);
  }

  getContentWidth(box: Box) {
    const width = this.values.get(box)?.contentWidth;
    assumePx(width);
    return width;
  }

  getContentHeight(box: Box) {
    const height = this.values.get(box)?.contentHeight;
    assumePx(height);
    return height;
  }
}
