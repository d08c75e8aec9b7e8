/**
 * @file Public API for the discovery postcard.
 *
 * @module
 */

export * from './core/models/types.js';
export * from './core/models/project.js';
export * from './core/models/schemas.js';
export * from './core/reactive/Signal.js';
export * from './config/settings.js';
export * from './logging/log.js';
export * from './strings/types.js';
export * from './strings/en.js';
export * from './env/types.js';
export * from './env/memory.js';
export * from './env/clock.js';
export * from './env/Environment.js';
export * from './api/StarService.js';
export * from './api/HttpStarService.js';
export * from './api/MockStarService.js';
export * from './postcard/types.js';
export * from './postcard/fields.js';
export * from './postcard/metadata.js';
export * from './postcard/starToggle.js';
export * from './postcard/PostcardPresenter.js';
