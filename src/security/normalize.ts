/**
 * Text normalization applied before pattern matching.
 *
 * Folds compatibility forms (fullwidth letters, ligatures, circled digits)
 * with NFKC, maps Cyrillic lookalikes that NFKC leaves alone, and strips
 * invisible characters that would otherwise split a keyword in two.
 */

const LOOKALIKE_MAP: Record<string, string> = {
	"\u0410": "A", // Cyrillic А
	"\u0412": "B", // Cyrillic В
	"\u0421": "C", // Cyrillic С
	"\u0415": "E", // Cyrillic Е
	"\u041D": "H", // Cyrillic Н
	"\u041A": "K", // Cyrillic К
	"\u041C": "M", // Cyrillic М
	"\u041E": "O", // Cyrillic О
	"\u0420": "P", // Cyrillic Р
	"\u0422": "T", // Cyrillic Т
	"\u0425": "X", // Cyrillic Х
	"\u0430": "a", // Cyrillic а
	"\u0435": "e", // Cyrillic е
	"\u043E": "o", // Cyrillic о
	"\u0440": "p", // Cyrillic р
	"\u0441": "c", // Cyrillic с
	"\u0443": "y", // Cyrillic у
	"\u0445": "x", // Cyrillic х
};

const LOOKALIKE_REGEX = new RegExp(`[${Object.keys(LOOKALIKE_MAP).join("")}]`, "g");

// Zero-width space/joiners, directional marks, BOM, soft hyphen, invisible operators
const INVISIBLE_REGEX = /[\u200B-\u200F\uFEFF\u00AD\u2060-\u2064]/g;

/**
 * Fold text to the form the threat signatures are written against.
 */
export function normalizeForScan(input: string): string {
	return input
		.normalize("NFKC")
		.replace(INVISIBLE_REGEX, "")
		.replace(LOOKALIKE_REGEX, (ch) => LOOKALIKE_MAP[ch] ?? ch);
}

/**
 * Check if a string contains invisible characters.
 */
export function containsInvisible(input: string): boolean {
	return new RegExp(INVISIBLE_REGEX.source).test(input);
}
