/**
 * Central UI Abstraction Layer
 *
 * Provides semantic, TTY-aware styling for CLI output.
 * Wraps chalk, boxen, cli-table3, ora with consistent API.
 *
 * Constraints:
 * - NO EMOJIS (ASCII only: [OK], [X], [!], [i])
 * - TTY-aware (plain text in pipes/CI)
 * - Respects NO_COLOR environment variable
 *
 * @module utils/ui
 */

export {
  // Initialization
  initUI,
  isInteractive,

  // Colors
  color,
  gradientText,
  bold,
  dim,

  // Status indicators
  ok,
  fail,
  warn,
  info,

  // Boxes
  box,

  // Tables
  table,

  // Spinner
  spinner,

  // Text formatting
  header,
  subheader,
  hr,
  sectionHeader,

  // Unified object
  ui,
} from './ui/index';

export type { Spinner, TableOptions, BoxOptions, ColorName } from './ui/index';
