/**
 * Public library surface
 */

export * from './core';
export * from './features/watering';
export * from './features/game-round';
export * from './validation';
export * from './logging';
export * from './types';
export { GAME_RULES, WATERING_SYSTEM, LOG_LEVELS, LOGGING } from './boot/config';
export type { LoggingSettings } from './boot/types';
