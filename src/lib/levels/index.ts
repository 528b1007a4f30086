/**
 * JSON5 level packs.
 */

export { parseLevelPack, verifyLevelPack, DEFAULT_LEVEL_MAX_STEPS } from './levels.js';
export type { Level, LevelPack, LevelReport } from './levels.js';
