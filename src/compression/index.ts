export * from './media-type.js';
export * from './encoding.js';
export * from './body.js';
export * from './response.js';
export * from './config.js';
export * from './negotiation.js';
export * from './compressor.js';
export * from './compress.js';
export * from './hook.js';
