export * from './cell-set.js';
export * from './command-rewriter.js';
export * from './command-rules.js';
export * from './conversion-tag.js';
export * from './convert-document.js';
export * from './coordinate-validator.js';
export * from './dependency-order.js';
export * from './diagnostics.js';
export * from './document-scanner.js';
export * from './grid.js';
export * from './header.js';
export * from './record-shape.js';
export * from './replacement-tracker.js';
export * from './runtime-error.js';
export * from './structured-fields.js';
export * from './translation-context.js';
