export * from './errors.js';
export * from './fs.js';
export * from './paths.js';
export * from './recycle-bin.js';
export * from './size.js';
export * from './progress.js';
export * from './config.js';
