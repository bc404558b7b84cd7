/**
 * UI module exports for the coffer CLI
 */

// Theme system (design tokens, colors, icons)
export * from './theme.js';

// Components
export * from './banner.js';
export * from './logger.js';
export * from './prompts.js';
export * from './spinner.js';
export * from './table.js';
export * from './progress.js';
