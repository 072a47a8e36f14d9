// src/config/config-keys.ts - Configuration file key convention

export const CONFIG_KEY_DELIMITER = '_';

/**
 * Maps a command path to the key it is stored under in the configuration file
 * and back. The configuration reader and the schema generator must share one
 * joiner, otherwise generated property names never match real config keys.
 */
export interface KeyJoiner {
  join(segments: readonly string[]): string;
  split(key: string): string[];
}

/**
 * Joins command path segments into a configuration key,
 * e.g. ['local', 'start-api'] -> 'local_start_api'.
 */
export function toConfigKey(segments: readonly string[]): string {
  return segments
    .map((segment) => segment.replace(/-/g, CONFIG_KEY_DELIMITER).replace(/ /g, CONFIG_KEY_DELIMITER))
    .join(CONFIG_KEY_DELIMITER);
}

export const configKeyJoiner: KeyJoiner = {
  join: toConfigKey,
  split: (key) => key.split(CONFIG_KEY_DELIMITER),
};
