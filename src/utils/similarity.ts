const FORM_WORDS = new Set([
  'tab', 'tabs', 'tablet', 'tablets', 'cap', 'caps', 'capsule', 'capsules',
  'syrup', 'suspension', 'susp', 'solution', 'soln', 'injection', 'inj',
  'cream', 'ointment', 'oint', 'gel', 'drops', 'drop', 'spray', 'inhaler',
  'patch', 'lotion', 'elixir', 'suppository', 'oral', 'er', 'xr', 'sr', 'cr',
  'dr', 'xl', 'la', 'ec', 'odt',
]);

const SALT_WORDS = new Set([
  'hcl', 'hydrochloride', 'sodium', 'potassium', 'calcium', 'magnesium',
  'sulfate', 'sulphate', 'maleate', 'besylate', 'succinate', 'tartrate',
  'citrate', 'mesylate', 'fumarate', 'acetate', 'phosphate', 'bromide',
  'monohydrate', 'trihydrate', 'dihydrate',
]);

const STRENGTH_PATTERN = /\b\d+(?:[.,]\d+)?\s*(?:mcg|mg|µg|ml|iu|units?|g|%)?(?=[^a-z0-9]|$)/g;

/** Case-insensitive, whitespace-collapsed key. */
export const normalizeKey = (value: string): string =>
  value.toLowerCase().replace(/\s+/g, ' ').trim();

/**
 * Reduces a drug name to its bare ingredient words: strengths, punctuation,
 * dosage-form words and salt suffixes are removed.
 */
export const stripDrugName = (value: string): string =>
  value
    .toLowerCase()
    .replace(STRENGTH_PATTERN, ' ')
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter((word) => word && !FORM_WORDS.has(word) && !SALT_WORDS.has(word))
    .join(' ');

export const levenshtein = (a: string, b: string): number => {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(current[j - 1] + 1, previous[j] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
};

export const levenshteinRatio = (a: string, b: string): number => {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(a, b) / longest;
};

const SOUNDEX_CODES: Record<string, string> = {
  b: '1', f: '1', p: '1', v: '1',
  c: '2', g: '2', j: '2', k: '2', q: '2', s: '2', x: '2', z: '2',
  d: '3', t: '3',
  l: '4',
  m: '5', n: '5',
  r: '6',
};

export const soundex = (value: string): string => {
  const letters = value.toLowerCase().replace(/[^a-z]/g, '');
  if (!letters) return '';

  let code = letters[0].toUpperCase();
  let previous = SOUNDEX_CODES[letters[0]] ?? '';
  for (const ch of letters.slice(1)) {
    const digit = SOUNDEX_CODES[ch] ?? '';
    if (digit && digit !== previous) code += digit;
    // h and w do not separate letters with the same code
    if (ch !== 'h' && ch !== 'w') previous = digit;
    if (code.length === 4) break;
  }
  return code.padEnd(4, '0');
};

const PHONETIC_BONUS = 0.05;

const round4 = (value: number): number => Math.round(value * 10000) / 10000;

/**
 * Similarity of two drug names in [0, 1]: Levenshtein ratio over the stripped
 * names, with a small bonus when both sound alike.
 */
export const nameSimilarity = (a: string, b: string): number => {
  const left = stripDrugName(a) || normalizeKey(a);
  const right = stripDrugName(b) || normalizeKey(b);
  if (!left || !right) return 0;

  let score = levenshteinRatio(left, right);
  if (score < 1 && soundex(left) === soundex(right)) {
    score += PHONETIC_BONUS;
  }
  return round4(Math.min(score, 1));
};
