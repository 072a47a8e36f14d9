// src/utils/text.ts

// C0 controls and DEL, minus tab, newline and carriage return
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

/**
 * Cleans help text for use as a schema description: drops control characters
 * (help formatters use \b as a no-rewrap marker), leading/trailing newlines and
 * surrounding whitespace.
 */
export function cleanText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  return text.replace(CONTROL_CHARS, '').replace(/^\n+|\n+$/g, '').trim();
}

/**
 * Capitalizes the first letter of every word and lower-cases the rest.
 */
export function toTitleCase(text: string): string {
  return text.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}
