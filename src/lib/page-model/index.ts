/**
 * Page Model
 * Main export file for page parsing
 */

export * from './page-model.types';
export * from './page-model.builder';
