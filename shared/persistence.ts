// ============================================
// Persisted Records
// Versioned encode/decode for each storage key
// ============================================

import { clampSpeedLevel, clampUiOpacity } from './constants';
import type { GameSettings, JsonValue, LastResult } from './types';

export const LAST_RESULT_VERSION = 1;
export const SETTINGS_VERSION = 1;

type JsonObject = { [key: string]: JsonValue };

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Records written before versioning have no version field; treat them as v1.
function hasSupportedVersion(record: JsonObject, version: number): boolean {
  const stored = record.version;
  return stored === undefined || stored === version;
}

function readNumber(record: JsonObject, key: string, fallback: number): number {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function readInt(record: JsonObject, key: string): number {
  return Math.trunc(readNumber(record, key, 0));
}

// ============================================
// Last result
// ============================================

export function encodeLastResult(result: LastResult): JsonValue {
  return {
    version: LAST_RESULT_VERSION,
    spawned: Math.trunc(result.spawned),
    escaped: Math.trunc(result.escaped),
    hits: Math.trunc(result.hits),
    misses: Math.trunc(result.misses),
    score: Math.trunc(result.score),
    difficultyMultiplier: result.difficultyMultiplier,
    timeMs: Math.round(result.timeMs),
  };
}

/**
 * Returns undefined for anything that is not a last-result record of a
 * known version. Missing fields read as 0 (multiplier as 1).
 */
export function decodeLastResult(raw: JsonValue | undefined): LastResult | undefined {
  if (!isJsonObject(raw) || !hasSupportedVersion(raw, LAST_RESULT_VERSION)) {
    return undefined;
  }
  return {
    spawned: readInt(raw, 'spawned'),
    escaped: readInt(raw, 'escaped'),
    hits: readInt(raw, 'hits'),
    misses: readInt(raw, 'misses'),
    score: readInt(raw, 'score'),
    difficultyMultiplier: readNumber(raw, 'difficultyMultiplier', 1),
    timeMs: readInt(raw, 'timeMs'),
  };
}

// ============================================
// Settings
// ============================================

export function encodeSettings(settings: GameSettings): JsonValue {
  return {
    version: SETTINGS_VERSION,
    uiOpacity: clampUiOpacity(settings.uiOpacity),
    speedLevel: clampSpeedLevel(settings.speedLevel),
    difficultyProgression: settings.difficultyProgression,
  };
}

/**
 * Missing or malformed fields take the given defaults; values are clamped
 * into their legal ranges.
 */
export function decodeSettings(
  raw: JsonValue | undefined,
  defaults: GameSettings
): GameSettings | undefined {
  if (!isJsonObject(raw) || !hasSupportedVersion(raw, SETTINGS_VERSION)) {
    return undefined;
  }
  const progression = raw.difficultyProgression;
  return {
    uiOpacity: clampUiOpacity(readNumber(raw, 'uiOpacity', defaults.uiOpacity)),
    speedLevel: clampSpeedLevel(readNumber(raw, 'speedLevel', defaults.speedLevel)),
    difficultyProgression:
      typeof progression === 'boolean' ? progression : defaults.difficultyProgression,
  };
}
