// Public library surface.

export const VERSION = '0.1.0';

export * from './args/kinds';
export * from './args/arg';
export * from './parser/outcome';
export * from './parser/argParser';
export * from './help/renderHelp';
export * from './schema/loadArgSchema';
export * from './output/deterministicJson';
export * from './output/resolvedValues';
