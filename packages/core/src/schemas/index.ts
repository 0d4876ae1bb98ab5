// packages/core/src/schemas/index.ts

// Expression schemas (JSON form of predicate trees)
export * from './expression-schemas';
