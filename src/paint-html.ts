import {encode} from 'entities';

import type {Color} from './style.js';
import type {PaintBackend} from './paint.js';
import type {ReplacedBox} from './layout-replaced.js';

type StringMap = Record<string, string>;

function camelToKebab(camel: string) {
  return camel.replace(/[A-Z]/g, s => '-' + s.toLowerCase());
}

function rgba(color: Color) {
  const {r, g, b, a} = color;
  return `rgba(${r}, ${g}, ${b}, ${a})`;
}

export default class HtmlPaintBackend implements PaintBackend {
  s: string;
  fillColor: Color;
  strokeColor: Color;
  lineWidth: number;

  constructor() {
    this.s = '';
    this.fillColor = {r: 0, g: 0, b: 0, a: 0};
    this.strokeColor = {r: 0, g: 0, b: 0, a: 0};
    this.lineWidth = 0;
  }

  style(style: StringMap) {
    return Object.entries(style).map(([prop, value]) => {
      return `${camelToKebab(prop)}: ${value}`;
    }).join('; ');
  }

  attrs(attrs: StringMap) {
    return Object.entries(attrs).map(([name, value]) => {
      return `${name}="${encode(value)}"`;
    }).join(' ');
  }

  edge(x: number, y: number, length: number, side: 'top' | 'right' | 'bottom' | 'left') {
    const sw = this.lineWidth;
    const horizontal = side === 'top' || side === 'bottom';
    const left = (horizontal ? x : x - sw/2) + 'px';
    const top = (horizontal ? y - sw/2 : y) + 'px';
    const width = (horizontal ? length : sw) + 'px';
    const height = (horizontal ? sw : length) + 'px';
    const position = 'absolute';
    const backgroundColor = rgba(this.strokeColor);
    const style = this.style({position, left, top, width, height, backgroundColor});

    this.s += `<div style="${style}"></div>`;
  }

  rect(x: number, y: number, w: number, h: number) {
    const style = this.style({
      position: 'absolute',
      left: x + 'px',
      top: y + 'px',
      width: w + 'px',
      height: h + 'px',
      backgroundColor: rgba(this.fillColor)
    });
    this.s += `<div style="${style}"></div>`;
  }

  image(x: number, y: number, w: number, h: number, box: ReplacedBox) {
    const style = this.style({
      position: 'absolute',
      left: x + 'px',
      top: y + 'px',
      width: w + 'px',
      height: h + 'px'
    });
    this.s += `<img ${this.attrs({id: box.id, style, src: box.src, alt: box.alt})}>`;
  }
}
