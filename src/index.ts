export * from './errors.js';
export * from './config.js';
export * from './logger.js';
export * from './schemas.js';
export * from './units.js';
export * from './idAllocator.js';
export * from './constraints.js';
export * from './wire.js';
export * from './queryToken.js';
export * from './sketchEntities.js';
export * from './references.js';
export * from './builders/index.js';
export * from './featureBuilder.js';
export * from './onshapeApi.js';
export * from './variables.js';
export * from './session.js';
export * from './bridge.js';
