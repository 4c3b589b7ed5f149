/**
 * pg-dependents
 *
 * Counts and cascades the dependents of PostgreSQL tables, views and
 * functions, as a text report or a Graphviz drawing.
 */

export * from './database';
export * from './graph';
export * from './report';
export * from './utils';
