import type { PluginOptions } from './types';

// Readers for loosely typed plugin options. Unknown or mistyped values fall
// back to the default rather than failing configuration.

export function getString(options: PluginOptions, key: string, fallback = ''): string {
  const value = options[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

export function getBool(options: PluginOptions, key: string, fallback = false): boolean {
  const value = options[key];
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return fallback;
}

/** Accepts an array of strings or a single string. */
export function getStringList(options: PluginOptions, key: string): string[] {
  const value = options[key];
  if (typeof value === 'string') return value ? [value] : [];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return [];
}

export function getStringMap(options: PluginOptions, key: string): Record<string, string> {
  const value = options[key];
  const result: Record<string, string> = {};
  if (!value || typeof value !== 'object' || Array.isArray(value)) return result;

  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'string') result[k] = v;
  }
  return result;
}

export function getSection(options: PluginOptions, key: string): PluginOptions {
  const value = options[key];
  if (!value || typeof value !== 'object' || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}
