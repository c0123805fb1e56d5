// Public library surface.

export const VERSION = '0.1.0';

export * from './errors';
export * from './parseArgs';
export * from './spec/types';
export * from './spec/switches';
export * from './spec/compileSpec';
export * from './spec/builtins';
export * from './parse/defaults';
export * from './parse/matcher';
export * from './parse/argumentLoop';
export * from './banner/banner';
export * from './specFile/loadSpecFile';
export * from './util/deterministicJson';
