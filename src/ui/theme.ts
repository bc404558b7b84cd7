/**
 * Design tokens for the coffer CLI: colors, icons and formatting helpers
 */

import chalk from 'chalk';
import figures from 'figures';
import logSymbols from 'log-symbols';
import type { ContainerState } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Layout
// ─────────────────────────────────────────────────────────────────────────────

export const DIVIDER_WIDTH = 60;

// ─────────────────────────────────────────────────────────────────────────────
// Colors (semantic naming)
// ─────────────────────────────────────────────────────────────────────────────

export const colors = {
  brand: chalk.cyan,
  brandBold: chalk.bold.cyan,

  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,

  muted: chalk.dim,
  bold: chalk.bold,
};

// Shorthand alias
export const c = colors;

// ─────────────────────────────────────────────────────────────────────────────
// Icons (figures falls back to ASCII on limited terminals)
// ─────────────────────────────────────────────────────────────────────────────

export const icons = {
  success: logSymbols.success,
  error: logSymbols.error,
  warning: logSymbols.warning,
  info: logSymbols.info,

  pointer: figures.pointer,
  arrowRight: figures.arrowRight,
  bullet: figures.bullet,
  circle: figures.circle,
  circleFilled: figures.circleFilled,
};

// ─────────────────────────────────────────────────────────────────────────────
// Container states
// ─────────────────────────────────────────────────────────────────────────────

interface StateStyle {
  icon: string;
  color: (text: string) => string;
}

const stateStyles: Record<ContainerState, StateStyle> = {
  unprovisioned: { icon: figures.circleDotted, color: c.muted },
  allocated: { icon: figures.circle, color: c.warning },
  formatted: { icon: figures.circle, color: c.info },
  opened: { icon: figures.circleDouble, color: c.brand },
  mounted: { icon: figures.circleFilled, color: c.success },
};

export const formatState = (state: ContainerState): string => {
  const style = stateStyles[state];
  return style.color(`${style.icon} ${state}`);
};

// ─────────────────────────────────────────────────────────────────────────────
// Text helpers
// ─────────────────────────────────────────────────────────────────────────────

export const divider = (width = DIVIDER_WIDTH): string => c.muted('─'.repeat(width));

export const formatPath = (path: string): string => c.brand(path);

/** "3 containers" */
export const formatCount = (n: number, singular: string, plural?: string): string => {
  const word = n === 1 ? singular : plural || `${singular}s`;
  return `${c.bold(n.toString())} ${word}`;
};

const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

/** 1073741824 -> "1.0 GiB" */
export const formatBytes = (bytes: number): string => {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
};

export const hint = (message: string): string => c.muted(message);

export const sectionHeader = (title: string): void => {
  console.log();
  console.log(c.brandBold(title));
  console.log(divider());
};

// ─────────────────────────────────────────────────────────────────────────────
// Box styles (boxen)
// ─────────────────────────────────────────────────────────────────────────────

export const boxStyles = {
  header: {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderStyle: 'round' as const,
    borderColor: 'cyan' as const,
  },
};
