import {LayoutState} from './layout-state.js';
import {layoutInside} from './layout-context.js';

import type {Box} from './layout-box.js';
import type {AvailableSize} from './layout-context.js';

// Intrinsic sizes are content box sizes measured in a fresh LayoutState so
// that the caller's used values are left untouched.

export function calculateMinContentWidth(box: Box) {
  return calculateIntrinsicWidth(box, 'min-content');
}

export function calculateMaxContentWidth(box: Box) {
  return calculateIntrinsicWidth(box, 'max-content');
}

function calculateIntrinsicWidth(box: Box, size: 'min-content' | 'max-content') {
  const state = new LayoutState();
  state.get(box).setBorders(box);
  layoutInside(state, box, 'intrinsic-sizing', {width: size, height: 'indefinite'});
  return state.getContentWidth(box);
}

export function calculateMinContentHeight(box: Box, availableWidth: AvailableSize) {
  return calculateIntrinsicHeight(box, availableWidth, 'min-content');
}

export function calculateMaxContentHeight(box: Box, availableWidth: AvailableSize) {
  return calculateIntrinsicHeight(box, availableWidth, 'max-content');
}

function calculateIntrinsicHeight(
  box: Box,
  availableWidth: AvailableSize,
  size: 'min-content' | 'max-content'
) {
  const width = typeof availableWidth === 'number'
    ? availableWidth
    : calculateMaxContentWidth(box);
  const state = new LayoutState();
  const used = state.get(box);
  used.setBorders(box);
  used.contentWidth = width;
  layoutInside(state, box, 'intrinsic-sizing', {width, height: size});
  return state.getContentHeight(box);
}
