/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { SETTING_KEYS, type SettingKey } from './settings.js';

/**
 * Where a raw value was read from. Line numbers are 1-based.
 */
export interface ConfigOrigin {
  readonly path: string;
  readonly line: number;
}

export interface ConfigEntry {
  readonly value: string;
  readonly origin?: ConfigOrigin;
}

/**
 * Raw values from one configuration source, in the order they were read.
 */
export type ConfigLayer = ReadonlyMap<SettingKey, ConfigEntry>;

export const EMPTY_LAYER: ConfigLayer = new Map();

export function createLayer(
  values: Partial<Record<SettingKey, string>>,
  origin?: ConfigOrigin,
): ConfigLayer {
  const layer = new Map<SettingKey, ConfigEntry>();
  for (const key of SETTING_KEYS) {
    const value = values[key];
    if (value !== undefined) {
      layer.set(key, origin ? { value, origin } : { value });
    }
  }
  return layer;
}

export function layerValues(
  layer: ConfigLayer,
): Partial<Record<SettingKey, string>> {
  const values: Partial<Record<SettingKey, string>> = {};
  for (const [key, entry] of layer) {
    values[key] = entry.value;
  }
  return values;
}

/**
 * Merges layers given most authoritative first. The first layer that
 * defines a key supplies its value; later layers only fill gaps.
 */
export function mergeLayers(layers: readonly ConfigLayer[]): ConfigLayer {
  return layers.reduce<Map<SettingKey, ConfigEntry>>((merged, layer) => {
    for (const [key, entry] of layer) {
      if (!merged.has(key)) {
        merged.set(key, entry);
      }
    }
    return merged;
  }, new Map());
}

export function withoutKeys(
  layer: ConfigLayer,
  keys: readonly SettingKey[],
): ConfigLayer {
  return new Map([...layer].filter(([key]) => !keys.includes(key)));
}

/**
 * Writes a layer back out as `key = value` lines.
 */
export function formatLayer(layer: ConfigLayer): string {
  return [...layer]
    .map(([key, entry]) => `${key} = ${entry.value}\n`)
    .join('');
}
