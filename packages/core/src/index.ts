/**
 * @outpost/core
 *
 * Core types, errors and utilities for Outpost.
 * This package provides the foundational building blocks used by
 * the supervisor package.
 */

// Types - shared type definitions
export * from './types/index.js';

// Errors - structured error handling
export * from './errors/index.js';
