import type { Coordinates, LocationInput } from "@shared/conversation";

// Keywords users type instead of pressing a button, per supported language
const SKIP_KEYWORDS = new Set(['skip', 'pomiń', 'pomin', 'пропустить', 'пропуск', '-', 'нет', 'no', 'nie']);
const POSTAL_CODE_KEYWORDS = new Set([
  'zip',
  'zip code',
  'enter zip',
  'enter zip code',
  'postal code',
  'wpisz kod',
  'wpisz kod pocztowy',
  'kod pocztowy',
  'ввести zip',
  'ввести zip код',
  'zip код',
]);

const POSTAL_CODE_PATTERN = /^[\p{L}\p{N}][\p{L}\p{N} -]{1,8}[\p{L}\p{N}]$/u;

function normalizeKeyword(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function isSkipKeyword(text: string): boolean {
  return SKIP_KEYWORDS.has(normalizeKeyword(text));
}

export function isPostalCodeKeyword(text: string): boolean {
  return POSTAL_CODE_KEYWORDS.has(normalizeKeyword(text));
}

/**
 * Uppercased, single-spaced postal code, or null when it can't be one.
 * Accepts 3-10 letters/digits/spaces/hyphens with at least one digit.
 */
export function normalizePostalCode(raw: string): string | null {
  const candidate = raw.trim().replace(/\s+/g, ' ').toUpperCase();
  if (!POSTAL_CODE_PATTERN.test(candidate)) return null;
  if (!/\p{N}/u.test(candidate)) return null;
  return candidate;
}

export function validateCoordinates(latitude: number, longitude: number): Coordinates | null {
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;
  if (latitude < -90 || latitude > 90) return null;
  if (longitude < -180 || longitude > 180) return null;
  return { latitude, longitude };
}

export type LocationTextInterpretation =
  | { kind: 'location'; input: LocationInput }
  | { kind: 'postal_code_requested' }
  | { kind: 'unrecognized' };

/**
 * Free text received while a location is expected.
 */
export function interpretLocationText(text: string): LocationTextInterpretation {
  if (isSkipKeyword(text)) {
    return { kind: 'location', input: { kind: 'skip' } };
  }
  if (isPostalCodeKeyword(text)) {
    return { kind: 'postal_code_requested' };
  }

  const postalCode = normalizePostalCode(text);
  if (postalCode) {
    return { kind: 'location', input: { kind: 'postal_code', postalCode } };
  }
  return { kind: 'unrecognized' };
}
