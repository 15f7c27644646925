/**
 * ============================================================================
 * DÉTECTEUR DE STYLES - Indices de mise en forme des paragraphes DOCX
 * ============================================================================
 *
 * Ce fichier contient les utilitaires pour détecter les styles d'un
 * paragraphe Word (titres, listes, gras, lignes de réponse). Ces indices
 * alimentent les heuristiques du parser de questionnaire.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Word utilise des styles prédéfinis (Heading1, Heading2, etc.)
 * - Ces styles sont stockés dans <w:pStyle w:val="...">
 * - Les listes utilisent <w:numPr> pour le niveau et le type
 * - Une "ligne de réponse" est souvent une bordure basse <w:pBdr><w:bottom>
 *
 * @version 1.0.0
 */

import type { HeadingLevel, StyleHints } from '../types';
import { isRuledText } from './text.utils';

// ============================================================================
// DÉTECTION DES TITRES
// ============================================================================

/**
 * Mapping des styles Word vers les niveaux de titre.
 * Couvre les styles anglais et français courants.
 */
const HEADING_STYLE_MAP: Record<string, HeadingLevel> = {
	// Styles anglais
	Heading1: 1,
	Heading2: 2,
	Heading3: 3,
	Heading4: 4,
	Heading5: 5,
	Heading6: 6,
	// Styles français
	Titre1: 1,
	Titre2: 2,
	Titre3: 3,
	Titre4: 4,
	Titre5: 5,
	Titre6: 6,
	// Variantes
	Subtitle: 2,
	'Sous-titre': 2,
};

/**
 * Styles de titre de document (et non de section).
 */
const DOCUMENT_TITLE_STYLES = new Set(['Title', 'Titre']);

const HEADING_LEVELS: HeadingLevel[] = [1, 2, 3, 4, 5, 6];

/**
 * Détecte le niveau de titre depuis le style Word.
 *
 * @param styleId - ID du style Word (ex: "Heading1", "Titre2")
 * @returns Niveau de titre (1-6) ou null si pas un titre
 *
 * @example
 * const level = detectHeadingFromStyle('Heading2'); // 2
 * const notHeading = detectHeadingFromStyle('Normal'); // null
 */
export function detectHeadingFromStyle(styleId: string): HeadingLevel | null {
	const direct = HEADING_STYLE_MAP[styleId];
	if (direct) {
		return direct;
	}

	// Recherche par pattern (heading 1, titre-2, etc.)
	const headingMatch = styleId.match(/(?:heading|titre|head)[\s\-_]?(\d)/i);
	if (headingMatch) {
		const level = parseInt(headingMatch[1], 10);
		return HEADING_LEVELS.find((candidate) => candidate === level) ?? null;
	}

	return null;
}

/**
 * Indique si le style est celui du titre du document ("Title", "Titre").
 */
export function isDocumentTitleStyle(styleId: string | undefined): boolean {
	return styleId !== undefined && DOCUMENT_TITLE_STYLES.has(styleId);
}

/**
 * Extrait le style ID d'un paragraphe XML.
 *
 * @param paragraphXml - XML du paragraphe (<w:p>...</w:p>)
 * @returns ID du style ou null
 *
 * @example
 * const styleId = extractStyleId('<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr>...</w:p>');
 * // 'Heading1'
 */
export function extractStyleId(paragraphXml: string): string | null {
	const match = paragraphXml.match(/<w:pStyle\s+w:val="([^"]+)"/);
	return match ? match[1] : null;
}

// ============================================================================
// DÉTECTION DES LISTES
// ============================================================================

/**
 * Détecte si un paragraphe est un élément de liste automatique.
 *
 * Les listes Word utilisent <w:numPr> avec:
 * - <w:ilvl> : niveau d'indentation (0 = premier niveau)
 * - <w:numId> : ID de la définition de liste (0 = numérotation retirée)
 *
 * @param paragraphXml - XML du paragraphe
 * @returns Information sur l'élément de liste ou null
 */
export function detectListItem(paragraphXml: string): { level: number; numId: string } | null {
	const numPrMatch = paragraphXml.match(/<w:numPr>([\s\S]*?)<\/w:numPr>/);
	if (!numPrMatch) {
		return null;
	}

	const numPrContent = numPrMatch[1];

	const ilvlMatch = numPrContent.match(/<w:ilvl\s+w:val="(\d+)"/);
	const level = ilvlMatch ? parseInt(ilvlMatch[1], 10) : 0;

	const numIdMatch = numPrContent.match(/<w:numId\s+w:val="(\d+)"/);
	const numId = numIdMatch ? numIdMatch[1] : '0';

	if (numId === '0') {
		return null;
	}

	return { level, numId };
}

// ============================================================================
// DÉTECTION DES STYLES DE TEXTE
// ============================================================================

/**
 * Détecte si un run de texte est en gras.
 *
 * @param runXml - XML du run (<w:r>...</w:r>)
 * @returns true si le texte est en gras
 */
export function isBold(runXml: string): boolean {
	// <w:b/> ou <w:b w:val="true"/> ou <w:b w:val="1"/>
	return /<w:b(?:\s+w:val="(?:true|1|on)")?\s*\/?>/.test(runXml);
}

/**
 * Détecte si un run de texte est en italique.
 */
export function isItalic(runXml: string): boolean {
	return /<w:i(?:\s+w:val="(?:true|1|on)")?\s*\/?>/.test(runXml);
}

/**
 * Détecte si un run de texte est souligné.
 */
export function isUnderline(runXml: string): boolean {
	// <w:u w:val="single"/> ou autres valeurs de soulignement
	return /<w:u\s+w:val="(?!none)[^"]+"\s*\/?>/.test(runXml);
}

/**
 * Calcule l'emphase d'un paragraphe : une propriété est retenue seulement
 * si TOUS les runs portant du texte l'ont (un mot en gras ne fait pas un titre).
 *
 * @param paragraphXml - XML du paragraphe
 * @returns { bold, italic, underline }
 */
export function detectParagraphEmphasis(paragraphXml: string): {
	bold: boolean;
	italic: boolean;
	underline: boolean;
} {
	const runRegex = /<w:r(?:\s[^>]*)?>([\s\S]*?)<\/w:r>/g;
	const textRuns: string[] = [];

	let match;
	while ((match = runRegex.exec(paragraphXml)) !== null) {
		if (/<w:t(?:\s[^>]*)?>[^<]*\S[^<]*<\/w:t>/.test(match[0])) {
			textRuns.push(match[0]);
		}
	}

	if (textRuns.length === 0) {
		return { bold: false, italic: false, underline: false };
	}

	return {
		bold: textRuns.every(isBold),
		italic: textRuns.every(isItalic),
		underline: textRuns.every(isUnderline),
	};
}

/**
 * Détecte une bordure basse de paragraphe (ligne de réponse tracée).
 */
export function hasBottomBorder(paragraphXml: string): boolean {
	const borderMatch = paragraphXml.match(/<w:pBdr>([\s\S]*?)<\/w:pBdr>/);
	if (!borderMatch) {
		return false;
	}
	return /<w:bottom\s+w:val="(?!none|nil)[^"]+"/.test(borderMatch[1]);
}

// ============================================================================
// SYNTHÈSE
// ============================================================================

/**
 * Construit les indices de style d'un paragraphe.
 * Seuls les indices présents sont renseignés (objet compact).
 *
 * @param paragraphXml - XML du paragraphe
 * @param text - Texte normalisé du paragraphe
 * @returns Indices de style
 *
 * @example
 * detectStyleHints('<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr>...</w:p>', 'Profil');
 * // { styleId: 'Heading1', headingLevel: 1 }
 */
export function detectStyleHints(paragraphXml: string, text: string): StyleHints {
	const hints: StyleHints = {};

	const styleId = extractStyleId(paragraphXml);
	if (styleId) {
		hints.styleId = styleId;
		const headingLevel = detectHeadingFromStyle(styleId);
		if (headingLevel) {
			hints.headingLevel = headingLevel;
		}
	}

	const listItem = detectListItem(paragraphXml);
	if (listItem) {
		hints.listLevel = listItem.level;
	}

	const emphasis = detectParagraphEmphasis(paragraphXml);
	if (emphasis.bold) hints.bold = true;
	if (emphasis.italic) hints.italic = true;
	if (emphasis.underline) hints.underline = true;

	if (hasBottomBorder(paragraphXml) || isRuledText(text)) {
		hints.ruled = true;
	}

	return hints;
}
