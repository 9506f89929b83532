/**
 * Centralized strings and messages for user-facing text
 *
 * This module provides a single source of truth for all user-facing text,
 * making it easier to maintain consistent tone and review messaging across
 * the entire CLI.
 */

export * from './labels.js';
export * from './guidance.js';
export * from './validation.js';
export * from './errors.js';
