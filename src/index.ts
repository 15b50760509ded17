/**
 * topic-deck
 *
 * YAML topic documents → PowerPoint decks and LaTeX Beamer slides.
 */

// Models
export * from './models/topic.model';
export * from './models/deck.model';
export * from './models/batch.model';

// Theme
export * from './theme/theme';
export * from './theme/style-table';

export * from './errors';
export * from './logging/console-logger';

// Decoding and layout
export * from './parsers/topic-parser';
export * from './layout/classifier';
export * from './layout/placement';

// Drawing
export * from './renderers';
export * from './builders/slide-builder';
export * from './builders/deck-assembler';

// Backends
export * from './output/output-writer';
export * from './output/pptx-backend';
export * from './typeset/template-renderer';
export * from './typeset/latex-compiler';

// Batch
export * from './services/batch.service';
export * from './services/input-resolver.service';
export * from './services/presentation-pipeline.service';
export * from './services/typeset-pipeline.service';
