// Public library surface.

export const VERSION = '0.1.0';

export * from './errors';
export * from './python/classify';
export * from './python/imports';
export * from './python/syntax';
export * from './resolve/moduleResolver';
export * from './bundle/session';
export * from './bundle/splice';
export * from './bundle/bundler';
export * from './deps/deadline';
export * from './deps/importGraph';
export * from './deps/listDependencies';
export * from './config/loadBundlerConfig';
export * from './launch/launcher';
export * from './report/bundleReport';
export * from './report/reportBuilder';
export * from './report/markdownReport';
export * from './report/writeReport';
export * from './scan/sourceScanner';
export * from './scan/inventory';
export * from './util/deterministicJson';
