/**
 * @gitglance/core
 *
 * Inspection pipeline and table renderers for gitglance:
 *
 * - Entity model and fact codes
 * - Worker pool and phase schedulers
 * - Sequential (stream) and direct-addressed (ANSI) renderers
 * - JSON reporter
 *
 * No git or child_process I/O lives here; hosts supply a FactProvider.
 */

export * from './logger.js';

// Entities
export * from './entity/shared.js';
export * from './entity/codes.js';
export * from './entity/status.js';

// Pipeline
export * from './pipeline/pool.js';
export * from './pipeline/scheduler.js';

// Rendering
export * from './render/layout.js';
export * from './render/ansi.js';
export * from './render/palette.js';
export * from './render/sequential.js';
export * from './render/direct.js';
export * from './render/json.js';
