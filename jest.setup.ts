/**
 * Jest setup file.
 * Runs before any test module is loaded, so the logger picks up the level.
 */

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}

export {};
