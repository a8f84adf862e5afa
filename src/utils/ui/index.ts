/**
 * UI Module Barrel Export
 *
 * Re-exports all UI components from modular files
 * @module utils/ui
 */

// Types and constants
export { COLORS, moduleCache, initialized, setInitialized } from './types';
export type { ChalkInstance, BoxenFunction, GradientStringInstance, OraModule, ColorName } from './types';

// Initialization
export { initUI, useColors, isInteractive } from './init';

// Colors
export { color, gradientText, bold, dim } from './colors';

// Status indicators
export { ok, fail, warn, info } from './indicators';

// Boxes
export { box } from './boxes';
export type { BoxOptions } from './boxes';

// Tables
export { table } from './tables';
export type { TableOptions } from './tables';

// Text formatting
export { header, subheader, hr, sectionHeader } from './text';

// Spinner
export { spinner } from './spinner';
export type { Spinner } from './spinner';

// Import all functions for the ui object
import { initUI, isInteractive } from './init';
import { color, gradientText, bold, dim } from './colors';
import { ok, fail, warn, info } from './indicators';
import { box } from './boxes';
import { table } from './tables';
import { header, subheader, hr, sectionHeader } from './text';
import { spinner } from './spinner';

// Unified UI object for convenient access
export const ui = {
  // Initialization
  init: initUI,
  isInteractive,

  // Colors
  color,
  gradientText,
  bold,
  dim,

  // Status indicators (ASCII only)
  ok,
  fail,
  warn,
  info,

  // Containers
  box,
  table,

  // Progress
  spinner,

  // Headers
  header,
  subheader,
  sectionHeader,
  hr,
} as const;

export default ui;
