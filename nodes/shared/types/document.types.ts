/**
 * ============================================================================
 * TYPES DOCUMENT - Blocs lus depuis un conteneur DOCX
 * ============================================================================
 *
 * Un document est lu comme une suite ordonnée de blocs, sans aucune
 * interprétation "questionnaire". Le parser consomme ces blocs une seule fois.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - TextBlock = un paragraphe <w:p> (texte normalisé + indices de style)
 * - TableBlock = un tableau <w:tbl> (lignes → cellules → texte)
 * - Un paragraphe vide est conservé : il sert de "ligne de réponse"
 *
 * @version 1.0.0
 */

import type { HeadingLevel } from './survey.types';

// ============================================================================
// INDICES DE STYLE
// ============================================================================

/**
 * Indices de mise en forme d'un paragraphe.
 * Tous les champs sont optionnels : un paragraphe "Normal" n'en porte aucun.
 */
export interface StyleHints {
	/** ID du style Word (ex: "Heading1", "Titre2", "ListParagraph") */
	styleId?: string;

	/** Niveau de titre déduit du style */
	headingLevel?: HeadingLevel;

	/** Niveau de liste automatique (<w:numPr>/<w:ilvl>) */
	listLevel?: number;

	/** Tout le texte visible est en gras */
	bold?: boolean;

	/** Tout le texte visible est en italique */
	italic?: boolean;

	/** Tout le texte visible est souligné */
	underline?: boolean;

	/** Ligne de réponse : bordure basse ou texte fait de "____" / "....." */
	ruled?: boolean;
}

// ============================================================================
// BLOCS
// ============================================================================

export interface TextBlock {
	kind: 'text';
	/** Position du bloc dans le document (0-based) */
	position: number;
	text: string;
	hints: StyleHints;
}

export interface TableBlock {
	kind: 'table';
	position: number;
	/** Lignes du tableau, chaque ligne étant la liste des textes de cellule */
	rows: string[][];
}

export type Block = TextBlock | TableBlock;

// ============================================================================
// SOURCE DE DOCUMENT
// ============================================================================

/**
 * Propriétés lues dans docProps/core.xml.
 */
export interface DocumentProperties {
	title?: string;
	author?: string;
	created?: string;
	modified?: string;
}

/**
 * Document ouvert : les blocs sont produits à la demande (générateur),
 * les propriétés sont lues immédiatement.
 */
export interface DocumentSource {
	blocks: Iterable<Block>;
	properties: DocumentProperties;
}
