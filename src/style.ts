import type {HTMLElement} from './dom.js';

export const inherited = Symbol('inherited');

type Inherited = typeof inherited;

export const initial = Symbol('initial');

type Initial = typeof initial;

export type Percentage = {value: number, unit: '%'};

export type Flex = {value: number, unit: 'fr'};

export type LengthPercentage = number | Percentage;

export type Color = {r: number, g: number, b: number, a: number};

type OuterDisplay = 'block' | 'none';

type InnerDisplay = 'flow' | 'flow-root' | 'grid';

export type Display = {outer: OuterDisplay, inner: InnerDisplay};

export type BorderStyle = 'none' | 'hidden' | 'solid' | 'dashed' | 'dotted' | 'double';

type Overflow = 'visible' | 'hidden' | 'scroll' | 'auto';

export type GridSize = number | Percentage | Flex | 'auto' | 'min-content' | 'max-content';

export type GridMinMax = {min: GridSize, max: GridSize};

export type GridTrackSize = GridSize | GridMinMax;

/**
 * Line names sit between track sizes, like [a b] in a CSS track list
 */
export type GridLineNames = {names: string[]};

export type GridRepeat = {
  repeat: number | 'auto-fill' | 'auto-fit',
  tracks: (GridTrackSize | GridLineNames)[]
};

export type GridTrackListEntry = GridTrackSize | GridLineNames | GridRepeat;

export type GridTemplate = GridTrackListEntry[] | 'subgrid' | 'masonry';

export type GridAutoFlow = 'row' | 'row dense';

/**
 * grid-row-start, grid-column-end, etc. {line: -1} is the last line of the
 * explicit grid and {name: 'a'} is a named area edge or named line.
 */
export type GridPlacement = 'auto'
  | {line: number, name?: string}
  | {name: string}
  | {span: number, name?: string};

export type Gap = 'normal' | LengthPercentage;

export interface ComputedStyle {
  display: Display;
  width: LengthPercentage | 'auto';
  height: LengthPercentage | 'auto';
  minWidth: LengthPercentage | 'auto';
  minHeight: LengthPercentage | 'auto';
  borderTopWidth: number;
  borderRightWidth: number;
  borderBottomWidth: number;
  borderLeftWidth: number;
  borderTopStyle: BorderStyle;
  borderRightStyle: BorderStyle;
  borderBottomStyle: BorderStyle;
  borderLeftStyle: BorderStyle;
  borderTopColor: Color;
  borderRightColor: Color;
  borderBottomColor: Color;
  borderLeftColor: Color;
  backgroundColor: Color;
  overflow: Overflow;
  gridTemplateColumns: GridTemplate;
  gridTemplateRows: GridTemplate;
  gridTemplateAreas: string[];
  gridAutoColumns: GridTrackSize;
  gridAutoRows: GridTrackSize;
  gridAutoFlow: GridAutoFlow;
  gridRowStart: GridPlacement;
  gridRowEnd: GridPlacement;
  gridColumnStart: GridPlacement;
  gridColumnEnd: GridPlacement;
  rowGap: Gap;
  columnGap: Gap;
}

export type DeclaredStyle = {
  [K in keyof ComputedStyle]?: ComputedStyle[K] | Inherited | Initial
};

export const EMPTY_STYLE: DeclaredStyle = {};

type CascadedStyle = DeclaredStyle;

export function resolveLengthPercentage(value: LengthPercentage, reference: number) {
  if (typeof value === 'object') return value.value / 100 * reference;
  return value;
}

function hasVisibleStyle(style: BorderStyle) {
  return style !== 'none' && style !== 'hidden';
}

export class Style implements ComputedStyle {
  display: ComputedStyle['display'];
  width: ComputedStyle['width'];
  height: ComputedStyle['height'];
  minWidth: ComputedStyle['minWidth'];
  minHeight: ComputedStyle['minHeight'];
  borderTopWidth: ComputedStyle['borderTopWidth'];
  borderRightWidth: ComputedStyle['borderRightWidth'];
  borderBottomWidth: ComputedStyle['borderBottomWidth'];
  borderLeftWidth: ComputedStyle['borderLeftWidth'];
  borderTopStyle: ComputedStyle['borderTopStyle'];
  borderRightStyle: ComputedStyle['borderRightStyle'];
  borderBottomStyle: ComputedStyle['borderBottomStyle'];
  borderLeftStyle: ComputedStyle['borderLeftStyle'];
  borderTopColor: ComputedStyle['borderTopColor'];
  borderRightColor: ComputedStyle['borderRightColor'];
  borderBottomColor: ComputedStyle['borderBottomColor'];
  borderLeftColor: ComputedStyle['borderLeftColor'];
  backgroundColor: ComputedStyle['backgroundColor'];
  overflow: ComputedStyle['overflow'];
  gridTemplateColumns: ComputedStyle['gridTemplateColumns'];
  gridTemplateRows: ComputedStyle['gridTemplateRows'];
  gridTemplateAreas: ComputedStyle['gridTemplateAreas'];
  gridAutoColumns: ComputedStyle['gridAutoColumns'];
  gridAutoRows: ComputedStyle['gridAutoRows'];
  gridAutoFlow: ComputedStyle['gridAutoFlow'];
  gridRowStart: ComputedStyle['gridRowStart'];
  gridRowEnd: ComputedStyle['gridRowEnd'];
  gridColumnStart: ComputedStyle['gridColumnStart'];
  gridColumnEnd: ComputedStyle['gridColumnEnd'];
  rowGap: ComputedStyle['rowGap'];
  columnGap: ComputedStyle['columnGap'];

  constructor(style: ComputedStyle) {
    this.display = style.display;
    this.width = style.width;
    this.height = style.height;
    this.minWidth = style.minWidth;
    this.minHeight = style.minHeight;
    this.borderTopWidth = style.borderTopWidth;
    this.borderRightWidth = style.borderRightWidth;
    this.borderBottomWidth = style.borderBottomWidth;
    this.borderLeftWidth = style.borderLeftWidth;
    this.borderTopStyle = style.borderTopStyle;
    this.borderRightStyle = style.borderRightStyle;
    this.borderBottomStyle = style.borderBottomStyle;
    this.borderLeftStyle = style.borderLeftStyle;
    this.borderTopColor = style.borderTopColor;
    this.borderRightColor = style.borderRightColor;
    this.borderBottomColor = style.borderBottomColor;
    this.borderLeftColor = style.borderLeftColor;
    this.backgroundColor = style.backgroundColor;
    this.overflow = style.overflow;
    this.gridTemplateColumns = style.gridTemplateColumns;
    this.gridTemplateRows = style.gridTemplateRows;
    this.gridTemplateAreas = style.gridTemplateAreas;
    this.gridAutoColumns = style.gridAutoColumns;
    this.gridAutoRows = style.gridAutoRows;
    this.gridAutoFlow = style.gridAutoFlow;
    this.gridRowStart = style.gridRowStart;
    this.gridRowEnd = style.gridRowEnd;
    this.gridColumnStart = style.gridColumnStart;
    this.gridColumnEnd = style.gridColumnEnd;
    this.rowGap = style.rowGap;
    this.columnGap = style.columnGap;
  }

  getBorderTopWidth() {
    return hasVisibleStyle(this.borderTopStyle) ? this.borderTopWidth : 0;
  }

  getBorderRightWidth() {
    return hasVisibleStyle(this.borderRightStyle) ? this.borderRightWidth : 0;
  }

  getBorderBottomWidth() {
    return hasVisibleStyle(this.borderBottomStyle) ? this.borderBottomWidth : 0;
  }

  getBorderLeftWidth() {
    return hasVisibleStyle(this.borderLeftStyle) ? this.borderLeftWidth : 0;
  }

  hasBackground() {
    return this.backgroundColor.a > 0
      || this.getBorderTopWidth() > 0 && this.borderTopColor.a > 0
      || this.getBorderRightWidth() > 0 && this.borderRightColor.a > 0
      || this.getBorderBottomWidth() > 0 && this.borderBottomColor.a > 0
      || this.getBorderLeftWidth() > 0 && this.borderLeftColor.a > 0;
  }

  /**
   * Scroll containers get no content-based automatic minimum size in grid
   * sizing (css-grid-1 § 6.6)
   */
  isScrollContainer() {
    return this.overflow !== 'visible';
  }
}

// Initial values for every property. Different properties have different
// initial values as specified in the property's specification. This is also
// the style that's used as the root style for inheritance. These are the
// "computed value"s as described in CSS Cascading and Inheritance Level 4 § 4.4
const initialPlainStyle: ComputedStyle = Object.freeze({
  display: {outer: 'block' as const, inner: 'flow' as const},
  width: 'auto',
  height: 'auto',
  minWidth: 'auto',
  minHeight: 'auto',
  borderTopWidth: 0,
  borderRightWidth: 0,
  borderBottomWidth: 0,
  borderLeftWidth: 0,
  borderTopStyle: 'none',
  borderRightStyle: 'none',
  borderBottomStyle: 'none',
  borderLeftStyle: 'none',
  borderTopColor: {r: 0, g: 0, b: 0, a: 0},
  borderRightColor: {r: 0, g: 0, b: 0, a: 0},
  borderBottomColor: {r: 0, g: 0, b: 0, a: 0},
  borderLeftColor: {r: 0, g: 0, b: 0, a: 0},
  backgroundColor: {r: 0, g: 0, b: 0, a: 0},
  overflow: 'visible',
  gridTemplateColumns: [],
  gridTemplateRows: [],
  gridTemplateAreas: [],
  gridAutoColumns: 'auto',
  gridAutoRows: 'auto',
  gridAutoFlow: 'row',
  gridRowStart: 'auto',
  gridRowEnd: 'auto',
  gridColumnStart: 'auto',
  gridColumnEnd: 'auto',
  rowGap: 'normal',
  columnGap: 'normal'
});

export const initialStyle = new Style(initialPlainStyle);

type InheritedStyleDefinitions = {[K in keyof ComputedStyle]: boolean};

// Each CSS property defines whether or not it's inherited. None of the box
// and grid properties are.
const inheritedStyle: InheritedStyleDefinitions = Object.freeze({
  display: false,
  width: false,
  height: false,
  minWidth: false,
  minHeight: false,
  borderTopWidth: false,
  borderRightWidth: false,
  borderBottomWidth: false,
  borderLeftWidth: false,
  borderTopStyle: false,
  borderRightStyle: false,
  borderBottomStyle: false,
  borderLeftStyle: false,
  borderTopColor: false,
  borderRightColor: false,
  borderBottomColor: false,
  borderLeftColor: false,
  backgroundColor: false,
  overflow: false,
  gridTemplateColumns: false,
  gridTemplateRows: false,
  gridTemplateAreas: false,
  gridAutoColumns: false,
  gridAutoRows: false,
  gridAutoFlow: false,
  gridRowStart: false,
  gridRowEnd: false,
  gridColumnStart: false,
  gridColumnEnd: false,
  rowGap: false,
  columnGap: false
});

type UaDeclaredStyles = {[tagName: string]: DeclaredStyle};

export const uaDeclaredStyles: UaDeclaredStyles = Object.freeze({
  head: {display: {outer: 'none', inner: 'flow'}},
  script: {display: {outer: 'none', inner: 'flow'}},
  style: {display: {outer: 'none', inner: 'flow'}},
  template: {display: {outer: 'none', inner: 'flow'}}
});

const cascadedCache = new WeakMap<CascadedStyle, WeakMap<CascadedStyle, DeclaredStyle>>();

export function cascadeStyles(s1: DeclaredStyle, s2: DeclaredStyle): CascadedStyle {
  let m1 = cascadedCache.get(s1);
  let m2 = m1 && m1.get(s2);

  if (m2) return m2;

  const ret = {...s1, ...s2};

  if (m1) {
    m1.set(s2, ret);
    return ret;
  }

  m1 = new WeakMap();
  m1.set(s2, ret);
  cascadedCache.set(s1, m1);

  return ret;
}

function defaultify<T>(
  value: T | Inherited | Initial | undefined,
  parentValue: T,
  initialValue: T,
  isInherited: boolean
): T {
  if (value === inherited || value === undefined && isInherited) return parentValue;
  if (value === initial || value === undefined) return initialValue;
  return value;
}

function defaultifyStyle(parentStyle: ComputedStyle, style: CascadedStyle): ComputedStyle {
  const p = <K extends keyof ComputedStyle>(property: K): ComputedStyle[K] => {
    return defaultify<ComputedStyle[K]>(
      style[property],
      parentStyle[property],
      initialPlainStyle[property],
      inheritedStyle[property]
    );
  };

  return {
    display: p('display'),
    width: p('width'),
    height: p('height'),
    minWidth: p('minWidth'),
    minHeight: p('minHeight'),
    borderTopWidth: p('borderTopWidth'),
    borderRightWidth: p('borderRightWidth'),
    borderBottomWidth: p('borderBottomWidth'),
    borderLeftWidth: p('borderLeftWidth'),
    borderTopStyle: p('borderTopStyle'),
    borderRightStyle: p('borderRightStyle'),
    borderBottomStyle: p('borderBottomStyle'),
    borderLeftStyle: p('borderLeftStyle'),
    borderTopColor: p('borderTopColor'),
    borderRightColor: p('borderRightColor'),
    borderBottomColor: p('borderBottomColor'),
    borderLeftColor: p('borderLeftColor'),
    backgroundColor: p('backgroundColor'),
    overflow: p('overflow'),
    gridTemplateColumns: p('gridTemplateColumns'),
    gridTemplateRows: p('gridTemplateRows'),
    gridTemplateAreas: p('gridTemplateAreas'),
    gridAutoColumns: p('gridAutoColumns'),
    gridAutoRows: p('gridAutoRows'),
    gridAutoFlow: p('gridAutoFlow'),
    gridRowStart: p('gridRowStart'),
    gridRowEnd: p('gridRowEnd'),
    gridColumnStart: p('gridColumnStart'),
    gridColumnEnd: p('gridColumnEnd'),
    rowGap: p('rowGap'),
    columnGap: p('columnGap')
  };
}

const styleCache = new WeakMap<Style, WeakMap<CascadedStyle, Style>>();

/**
 * Very simple property inheritance model. createStyle starts out with cascaded
 * styles (CSS Cascading and Inheritance Level 4 §4.2) which is computed from
 * the [style] HTML attribute and a default internal style. Then it calculates
 * the specified style (§4.3) by doing inheritance and defaulting. There are no
 * relative units, so the specified style is also the computed style (§4.4).
 * Percentages are resolved during layout, external to this file.
 */
export function createStyle(s1: Style, s2: CascadedStyle) {
  let m1 = styleCache.get(s1);
  let m2 = m1 && m1.get(s2);

  if (m2) return m2;

  const ret = new Style(defaultifyStyle(s1, s2));

  if (m1) {
    m1.set(s2, ret);
    return ret;
  }

  m1 = new WeakMap();
  m1.set(s2, ret);
  styleCache.set(s1, m1);

  return ret;
}

// required styles that always come last in the cascade
const rootDeclaredStyle: DeclaredStyle = {
  display: {
    outer: 'block',
    inner: 'flow-root'
  }
};

export function getRootStyle(style: DeclaredStyle = EMPTY_STYLE) {
  return createStyle(initialStyle, cascadeStyles(style, rootDeclaredStyle));
}

export function computeElementStyle(el: HTMLElement) {
  const uaDeclaredStyle = uaDeclaredStyles[el.tagName];
  const cascadedStyle = uaDeclaredStyle
    ? cascadeStyles(uaDeclaredStyle, el.declaredStyle)
    : el.declaredStyle;

  if (el.parent) {
    el.style = createStyle(el.parent.style, cascadedStyle);
  } else {
    el.style = getRootStyle(cascadedStyle);
  }
}

export function createDeclaredStyle(properties: DeclaredStyle): DeclaredStyle {
  return properties;
}
