import type { GameRules } from '@core/turn-move';
import type { FuzzySystem } from '@core/inference';
import type { LogLevels } from '@logging';
import type { LoggingSettings } from './types';

// ─────────────────────────────────────────────────────────────
// GAME RULES
//   "Don't Say 21": players alternately speak the next 1-3
//   numbers counting up from 1; whoever speaks 21 loses.
// ─────────────────────────────────────────────────────────────

export const GAME_RULES: Readonly<GameRules> = {
  // target
  //   Role: The number nobody wants to speak; the player who says it loses.
  //   Critical: Integer in [2, 1000], greater than maxSay.
  //   Recommended: 21.
  target: 21,

  // maxSay
  //   Role: Most numbers a player may speak in one turn (at least 1).
  //   Critical: Integer in [1, 100], less than target.
  //   Recommended: 3; safe totals are then the multiples of 4.
  maxSay: 3
};

// ─────────────────────────────────────────────────────────────
// WATERING RULE BASE
//   Fuzzy inputs, output and rules for the watering-time
//   estimator. Bump `version` on any change.
// ─────────────────────────────────────────────────────────────

export const WATERING_SYSTEM: Readonly<FuzzySystem> = {
  // version
  //   Role: Identifies the rule base in logs and explanations.
  //   Critical: Non-empty string.
  version: '1.0.0',

  // inputs
  //   Role: Sensor readings and their linguistic categories.
  //   Critical: Unique names; universe min < max; breakpoints non-decreasing
  //             with non-zero width.
  //   Recommended: Neighbouring categories overlap so no reading falls in a gap.
  inputs: [
    {
      name: 'soil_moisture',
      unit: '%',
      universe: { min: 0, max: 100 },
      categories: {
        dry: { kind: 'trapezoidal', points: [0, 0, 20, 40] },
        moist: { kind: 'triangular', points: [30, 50, 70] },
        wet: { kind: 'trapezoidal', points: [60, 80, 100, 100] }
      }
    },
    {
      name: 'temperature',
      unit: 'C',
      universe: { min: 0, max: 45 },
      categories: {
        cold: { kind: 'trapezoidal', points: [0, 0, 10, 18] },
        warm: { kind: 'triangular', points: [15, 23, 30] },
        hot: { kind: 'trapezoidal', points: [27, 35, 45, 45] }
      }
    },
    {
      name: 'air_humidity',
      unit: '%',
      universe: { min: 0, max: 100 },
      categories: {
        low: { kind: 'trapezoidal', points: [0, 0, 25, 45] },
        medium: { kind: 'triangular', points: [35, 50, 65] },
        high: { kind: 'trapezoidal', points: [55, 75, 100, 100] }
      }
    }
  ],

  // output
  //   Role: Watering duration in minutes.
  //   Critical: resolution in (0, max - min].
  //   Recommended: resolution 1 min; finer steps change the centroid by
  //                well under a minute.
  output: {
    name: 'watering_time',
    unit: ' min',
    universe: { min: 0, max: 60 },
    resolution: 1,
    categories: {
      none: { kind: 'triangular', points: [0, 0, 10] },
      short: { kind: 'triangular', points: [5, 15, 25] },
      medium: { kind: 'triangular', points: [20, 30, 40] },
      long: { kind: 'trapezoidal', points: [35, 45, 60, 60] }
    }
  },

  // rules
  //   Role: IF <conditions, min-combined> THEN watering_time IS <category>.
  //   Critical: At least one rule; unique ids; every variable and category
  //             must exist.
  rules: [
    {
      id: 'R1',
      description: 'Wet soil needs no water',
      when: [{ variable: 'soil_moisture', category: 'wet' }],
      then: 'none'
    },
    {
      id: 'R2',
      description: 'Dry soil on a hot day needs a long watering',
      when: [
        { variable: 'soil_moisture', category: 'dry' },
        { variable: 'temperature', category: 'hot' }
      ],
      then: 'long'
    },
    {
      id: 'R3',
      description: 'Dry soil on a warm day needs a medium watering',
      when: [
        { variable: 'soil_moisture', category: 'dry' },
        { variable: 'temperature', category: 'warm' }
      ],
      then: 'medium'
    },
    {
      id: 'R4',
      description: 'Dry soil on a cold day needs a short watering',
      when: [
        { variable: 'soil_moisture', category: 'dry' },
        { variable: 'temperature', category: 'cold' }
      ],
      then: 'short'
    },
    {
      id: 'R5',
      description: 'Moist soil on a hot day needs a medium watering',
      when: [
        { variable: 'soil_moisture', category: 'moist' },
        { variable: 'temperature', category: 'hot' }
      ],
      then: 'medium'
    },
    {
      id: 'R6',
      description: 'Moist soil on a warm day needs a short watering',
      when: [
        { variable: 'soil_moisture', category: 'moist' },
        { variable: 'temperature', category: 'warm' }
      ],
      then: 'short'
    },
    {
      id: 'R7',
      description: 'Moist soil on a cold day needs no water',
      when: [
        { variable: 'soil_moisture', category: 'moist' },
        { variable: 'temperature', category: 'cold' }
      ],
      then: 'none'
    },
    {
      id: 'R8',
      description: 'Dry air over dry soil needs a long watering',
      when: [
        { variable: 'air_humidity', category: 'low' },
        { variable: 'soil_moisture', category: 'dry' }
      ],
      then: 'long'
    },
    {
      id: 'R9',
      description: 'Humid air needs no water unless the soil is dry',
      when: [
        { variable: 'air_humidity', category: 'high' },
        { variable: 'soil_moisture', category: 'dry', negated: true }
      ],
      then: 'none'
    }
  ]
};

// ─────────────────────────────────────────────────────────────
// LOGGING
// ─────────────────────────────────────────────────────────────

export const LOG_LEVELS: Readonly<LogLevels> = {
  // LOG_LEVELS
  //   Role: Numeric severity scale shared by the logger and its sinks.
  //   Critical: Values must be distinct and ascending by severity.
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

export const LOGGING: Readonly<LoggingSettings> = {
  // LEVEL
  //   Role: Lowest level the command line logger emits.
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: INFO; DEBUG traces every estimate.
  LEVEL: 1,

  // COLORS
  //   Role: Colour console lines by level.
  //   Recommended: true on a terminal, false when output is piped to a file.
  COLORS: true
};
