import {Style, initialStyle, EMPTY_STYLE} from './style.js';

import type {Box} from './layout-box.js';
import type {DeclaredStyle} from './style.js';

export class HTMLElement {
  public id: string;
  public tagName: string;
  public style: Style;
  public declaredStyle: DeclaredStyle;
  public parent: HTMLElement | null;
  public attrs: Record<string, string>;
  public children: HTMLElement[];
  public boxes: Box[];

  constructor(
    id: string,
    tagName: string,
    parent: HTMLElement | null = null,
    attrs: {[k: string]: string} = {},
    declaredStyle: DeclaredStyle = EMPTY_STYLE
  ) {
    this.id = id;
    this.tagName = tagName;
    this.style = initialStyle;
    this.declaredStyle = declaredStyle;
    this.parent = parent;
    this.attrs = attrs;
    this.children = [];
    this.boxes = [];
  }

  repr(indent = 0, styleProp?: keyof Style): string {
    const c = this.children.map(c => c.repr(indent + 1, styleProp)).join('\n');
    const style = styleProp ? ` ${styleProp}: ${JSON.stringify(this.style[styleProp])}` : '';
    const desc = `◼ <${this.tagName}> ${this.id}${style}`
    return '  '.repeat(indent) + desc + (c ? '\n' + c : '');
  }
}
