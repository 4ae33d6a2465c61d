import type {Box, FormattingContextType} from './layout-box.js';
import type {LayoutState} from './layout-state.js';

export type AvailableSize = number | 'min-content' | 'max-content' | 'indefinite';

export interface AvailableSpace {
  width: AvailableSize;
  height: AvailableSize;
}

export type LayoutMode = 'normal' | 'intrinsic-sizing';

export interface FormattingContext {
  run(mode: LayoutMode, space: AvailableSpace): void;
}

export type FormattingContextFactory = (state: LayoutState, box: Box) => FormattingContext;

const registry = new Map<FormattingContextType, FormattingContextFactory>();

export function registerFormattingContext(
  type: FormattingContextType,
  factory: FormattingContextFactory
) {
  registry.set(type, factory);
}

export function createFormattingContext(state: LayoutState, box: Box) {
  const factory = registry.get(box.formattingContextType());
  if (!factory) {
    throw new Error(`No formatting context registered for ${box.formattingContextType()}`);
  }
  return factory(state, box);
}

/**
 * Lays out the contents of a box whose own size and position were already
 * decided by its parent's formatting context
 */
export function layoutInside(
  state: LayoutState,
  box: Box,
  mode: LayoutMode,
  space: AvailableSpace
) {
  createFormattingContext(state, box).run(mode, space);
}
