import type {Box} from './layout-box.js';
import type {Color} from './style.js';
import type {ReplacedBox} from './layout-replaced.js';

export interface PaintBackend {
  fillColor: Color;
  strokeColor: Color;
  lineWidth: number;
  edge(x: number, y: number, length: number, side: 'top' | 'right' | 'bottom' | 'left'): void;
  rect(x: number, y: number, w: number, h: number): void;
  image(x: number, y: number, w: number, h: number, box: ReplacedBox): void;
}

/**
 * Paints the background and borders
 */
function paintBoxBackground(box: Box, b: PaintBackend) {
  const style = box.style;
  const borderArea = box.getBorderArea();

  if (style.backgroundColor.a > 0) {
    b.fillColor = style.backgroundColor;
    b.rect(borderArea.x, borderArea.y, borderArea.width, borderArea.height);
  }

  const work = [
    ['top', style.getBorderTopWidth(), style.borderTopColor],
    ['right', style.getBorderRightWidth(), style.borderRightColor],
    ['bottom', style.getBorderBottomWidth(), style.borderBottomColor],
    ['left', style.getBorderLeftWidth(), style.borderLeftColor],
  ] as const;

  for (const [side, lineWidth, color] of work) {
    if (lineWidth === 0 || color.a === 0) continue;
    const length = side === 'top' || side === 'bottom' ? borderArea.width : borderArea.height;
    // edges are stroked along their center line
    let x = side === 'right' ? borderArea.x + borderArea.width - lineWidth : borderArea.x;
    let y = side === 'bottom' ? borderArea.y + borderArea.height - lineWidth : borderArea.y;
    x += side === 'left' || side === 'right' ? lineWidth / 2 : 0;
    y += side === 'top' || side === 'bottom' ? lineWidth / 2 : 0;
    b.strokeColor = color;
    b.lineWidth = lineWidth;
    b.edge(x, y, length, side);
  }
}

/**
 * Paints in tree order, parents before children. Boxes that layout never
 * reached have empty areas and paint nothing.
 */
export default function paint(root: Box, b: PaintBackend) {
  const stack: Box[] = [root];

  while (stack.length) {
    const box = stack.pop();
    if (!box) break;

    const {width, height} = box.getBorderArea();
    if (width === 0 && height === 0) continue;

    if (box.hasBackground()) paintBoxBackground(box, b);

    if (box.isReplacedBox()) {
      const {x, y, width, height} = box.getContentArea();
      b.image(x, y, width, height, box);
    }

    for (let i = box.children.length - 1; i >= 0; i--) stack.push(box.children[i]);
  }
}
