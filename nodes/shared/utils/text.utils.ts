/**
 * ============================================================================
 * UTILITAIRES TEXTE - Manipulation et nettoyage de chaînes
 * ============================================================================
 *
 * Ce module contient les fonctions utilitaires pour manipuler le texte
 * extrait des documents Word.
 *
 * PROBLÈMES COURANTS RÉSOLUS :
 * - Les espaces insécables (non-breaking spaces) de Word
 * - Les symboles Wingdings (cases à cocher, ronds) stockés dans la Private Use Area
 * - Les caractères de contrôle invisibles
 * - Les espaces multiples consécutifs
 *
 * @version 2.0.0
 */

// ============================================================================
// SYMBOLES WORD
// ============================================================================

/**
 * Correspondance des symboles Wingdings / Wingdings 2 vers Unicode.
 * Clé : code hexadécimal de <w:sym w:char="..."> (ou caractère PUA U+F0xx).
 */
const SYMBOL_GLYPHS: Record<string, string> = {
	// Wingdings
	F06F: '□',
	F071: '❑',
	F0A8: '□',
	F0FE: '☒',
	F078: '☒',
	F0FD: '☒',
	F06C: '●',
	F0A1: '○',
	F09F: '•',
	F0A7: '▪',
	// Wingdings 2
	F0A3: '□',
	F052: '☑',
	F053: '☒',
	F099: '○',
	F09A: '◉',
};

/**
 * Convertit un code de symbole Word en caractère Unicode lisible.
 *
 * @param charCode - Code hexadécimal (ex: "F0A8", "00A8", "a8")
 * @returns Le glyphe Unicode, ou '' si le symbole est inconnu
 *
 * @example
 * mapSymbolGlyph('F0A8'); // '□'
 * mapSymbolGlyph('F0A1'); // '○'
 */
export function mapSymbolGlyph(charCode: string): string {
	const hex = charCode.toUpperCase().padStart(4, '0');
	// Word écrit indifféremment "F0A8" ou "00A8" pour le même symbole
	const key = hex.startsWith('00') ? `F0${hex.substring(2)}` : hex;
	return SYMBOL_GLYPHS[key] ?? '';
}

// ============================================================================
// NORMALISATION DU TEXTE
// ============================================================================

/**
 * Normalise le texte en supprimant les caractères spéciaux Word.
 *
 * CARACTÈRES SUPPRIMÉS OU REMPLACÉS :
 * - Private Use Area (U+E000-U+F8FF) : symboles connus convertis, autres supprimés
 * - Caractères de contrôle (U+0000-U+001F) : remplacés par un espace
 * - Espaces insécables (U+00A0) : remplacés par des espaces normaux
 * - Espaces multiples : réduits à un seul espace
 *
 * @param text - Le texte à normaliser
 * @returns Le texte nettoyé et normalisé
 *
 * @example
 * normalizeText('Nom\u00A0commercial');  // "Nom commercial"
 * normalizeText('\uF0A8 Oui');          // "□ Oui"
 */
export function normalizeText(text: string): string {
	return text
		.replace(/[\uE000-\uF8FF]/g, (char) =>
			mapSymbolGlyph(char.charCodeAt(0).toString(16))
		)
		.replace(/[\u0000-\u001F]/g, ' ')
		.replace(/\u00A0/g, ' ')
		.replace(/\s+/g, ' ')
		.trim();
}

// ============================================================================
// ANALYSE DE TEXTE
// ============================================================================

/**
 * Vérifie si un texte est une ligne de réponse ("______", "........", "………").
 *
 * @example
 * isRuledText('__________');  // true
 * isRuledText('Nom : ____');  // false
 */
export function isRuledText(text: string): boolean {
	return /^[_.…\s]{3,}$/.test(text) && /[_.…]{3,}/.test(text);
}

/**
 * Vérifie si un texte est entièrement en majuscules (et contient des lettres).
 *
 * @example
 * isAllCaps('DONNÉES PERSONNELLES'); // true
 * isAllCaps('Données');              // false
 */
export function isAllCaps(text: string): boolean {
	return containsLetters(text) && text === text.toUpperCase() && text !== text.toLowerCase();
}

/**
 * Compte les mots dans un texte.
 */
export function countWords(text: string): number {
	return text
		.trim()
		.split(/\s+/)
		.filter((w) => w.length > 0).length;
}

/**
 * Tronque un texte à une longueur maximale avec ellipse.
 *
 * @param text - Le texte à tronquer
 * @param maxLength - Longueur maximale (défaut: 100)
 * @returns Le texte tronqué avec "..." si nécessaire
 *
 * @example
 * truncate('Un texte très long...', 10);  // 'Un texte t...'
 */
export function truncate(text: string, maxLength: number = 100): string {
	if (text.length <= maxLength) {
		return text;
	}
	return text.substring(0, maxLength) + '...';
}

/**
 * Vérifie si un texte contient des lettres (alphabétiques).
 *
 * @example
 * containsLetters('Nom :');    // true
 * containsLetters('---');      // false
 * containsLetters('123');      // false
 */
export function containsLetters(text: string): boolean {
	return /\p{L}/u.test(text);
}

/**
 * Concatène un fragment à un texte existant (retour à la ligne dans Word).
 */
export function appendText(current: string, fragment: string): string {
	if (!current) return fragment;
	if (!fragment) return current;
	return `${current} ${fragment}`;
}
