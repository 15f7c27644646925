/**
 * ============================================================================
 * MARKERS CONFIG - Marqueurs reconnus dans les questionnaires
 * ============================================================================
 *
 * Ce fichier regroupe, sous forme de données, toutes les conventions de
 * rédaction que le parser sait reconnaître : numérotation des questions,
 * marqueurs d'options (lettres, cases à cocher, ronds), titres de section,
 * logique de filtrage, indications de type et formulations de contraintes.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Ajouter une convention = ajouter une entrée ici, sans toucher au parser
 * - Les groupes nommés des regex sont lus par le classifieur :
 *   (?<number>) (?<text>) pour les questions, (?<value>) (?<label>) pour les options
 * - Aucune regex n'a le flag "g" : elles sont réutilisées sans état
 * - `resolveMarkers()` permet de surcharger une partie de la configuration
 *
 * @version 1.0.0
 */

import type { QuestionConstraints, QuestionType } from '../../shared/types';

// ============================================================================
// TYPES
// ============================================================================

/** Style de numérotation d'une question */
export type NumberingStyle = 'prefixed' | 'dotted' | 'plain' | 'list';

/** Type de marqueur d'option */
export type OptionMarkerKind =
	| 'checkbox'
	| 'radio'
	| 'letter'
	| 'parenthesized'
	| 'bullet'
	| 'numeric'
	| 'list'
	| 'trailing-code'
	| 'table';

/** Sémantique de sélection portée par un marqueur */
export type SelectionKind = 'multiple' | 'single' | 'neutral';

export interface QuestionNumberingRule {
	style: Exclude<NumberingStyle, 'list'>;
	/** Groupes nommés : number, text */
	pattern: RegExp;
}

export interface OptionMarkerRule {
	kind: OptionMarkerKind;
	/** Groupes nommés : label (obligatoire), value (optionnel) */
	pattern: RegExp;
	selection: SelectionKind;
}

export interface TypeHintRule {
	pattern: RegExp;
	type: QuestionType;
	constraints?: QuestionConstraints;
}

/**
 * Configuration complète des marqueurs.
 */
export interface SurveyMarkers {
	/** Numérotation des questions, par ordre de priorité */
	questionNumbering: QuestionNumberingRule[];

	/** Marqueurs d'options en tête de ligne, par ordre de priorité */
	optionMarkers: OptionMarkerRule[];

	/** Option avec code en fin de ligne ("Homme 1") - groupes label, value */
	trailingCode: RegExp;

	/** Titre de section par mot-clé ("Section A", "Partie 2") */
	sectionKeyword: RegExp;

	/** Logique de filtrage ("ASK ALL", "ASK IF Q1=1") - groupe condition */
	answerLogic: RegExp;

	/** Lignes d'indication de type ("Single Answer", "Réponse libre") */
	typeHints: TypeHintRule[];

	/** Libellés d'options exclusives ("Autre, précisez", "Ne sait pas") */
	exclusiveKeywords: RegExp[];

	/** Formulations de choix multiple dans le texte de la question */
	multiSelectPhrases: RegExp[];

	/** Nombre maximum de choix ("up to 3") - groupe 1 */
	maxSelectionPhrases: RegExp[];

	/** Longueur maximum ("max 200 characters") - groupe 1 */
	maxLengthPhrases: RegExp[];

	/** Plage numérique "(0-99)" - groupes 1 et 2 */
	numericRange: RegExp;

	/** Échelle de notation ("scale of 1 to 10") - groupes 1 et 2 */
	ratingScalePhrases: RegExp[];

	/** Marqueurs de question obligatoire, retirés du texte */
	requiredMarkers: RegExp[];
}

// ============================================================================
// CONFIGURATION PAR DÉFAUT
// ============================================================================

export const CHECKBOX_GLYPHS = '□☐■☑☒❑';
export const RADIO_GLYPHS = '○◯●◉◦';

export const DEFAULT_MARKERS: SurveyMarkers = {
	questionNumbering: [
		// Q1. / Q 1) / Q1a: / Q.3
		{ style: 'prefixed', pattern: /^[Qq]\.?\s*(?<number>\d+(?:\.\d+)*[a-z]?)(?:[.):]\s*|\s+)(?<text>\S.*)$/ },
		// 1.4 / 1.4a / 2.1.3)
		{ style: 'dotted', pattern: /^(?<number>\d+\.\d+(?:\.\d+)*[a-z]?)[.)]?\s+(?<text>\S.*)$/ },
		// 3. / 3) / 3a.
		{ style: 'plain', pattern: /^(?<number>\d+[a-z]?)[.)]\s*(?<text>\S.*)$/ },
	],

	optionMarkers: [
		{ kind: 'checkbox', pattern: /^[□☐■☑☒❑]\s*(?<label>\S.*)$/, selection: 'multiple' },
		{ kind: 'radio', pattern: /^[○◯●◉◦]\s*(?<label>\S.*)$/, selection: 'single' },
		{ kind: 'letter', pattern: /^(?<value>[A-Za-z])[.)]\s+(?<label>\S.*)$/, selection: 'neutral' },
		{ kind: 'parenthesized', pattern: /^\((?<value>[A-Za-z0-9]{1,2})\)\s*(?<label>\S.*)$/, selection: 'neutral' },
		{ kind: 'bullet', pattern: /^[-–—•▪]\s+(?<label>\S.*)$/, selection: 'neutral' },
		// Soumis à condition : voir le classifieur (série numérique déjà commencée)
		{ kind: 'numeric', pattern: /^(?<value>\d{1,2})[.)]\s+(?<label>\S.*)$/, selection: 'neutral' },
	],

	trailingCode: /^(?<label>\D.*?)\s+(?<value>\d{1,3})$/,

	sectionKeyword: /^(?:section|part|partie|module)\s+(?:\d{1,2}|[A-Z]|[IVX]{1,4})(?=$|[\s.:–—-])/i,

	answerLogic: /^\[?\s*(?<condition>ASK\s+(?:ALL|IF|THOSE)\b[^\]]*?)\s*\]?$/i,

	typeHints: [
		{ pattern: /^[([]?\s*single\s+(?:answer|response|choice|code)\s*[)\]]?$/i, type: 'single-choice' },
		{
			pattern: /^[([]?\s*multi(?:ple)?\s+(?:answers?|responses?|choices?|codes?)(?:\s+possible)?\s*[)\]]?$/i,
			type: 'multi-choice',
		},
		{ pattern: /^[([]?\s*open(?:[\s-]+ended)?(?:\s+(?:answer|response|text))?\s*[)\]]?$/i, type: 'open-text' },
		{
			pattern: /^[([]?\s*numeric(?:\s+(?:answer|response))?\s*[)\]]?$/i,
			type: 'open-text',
			constraints: { format: 'numeric' },
		},
		{ pattern: /^[([]?\s*(?:rating|scale)\s*[)\]]?$/i, type: 'rating' },
		{ pattern: /^[([]?\s*réponse\s+unique\s*[)\]]?$/i, type: 'single-choice' },
		{ pattern: /^[([]?\s*(?:plusieurs\s+réponses(?:\s+possibles)?|réponses\s+multiples)\s*[)\]]?$/i, type: 'multi-choice' },
		{ pattern: /^[([]?\s*réponse\s+(?:libre|ouverte)\s*[)\]]?$/i, type: 'open-text' },
	],

	exclusiveKeywords: [
		/\bother\b.*\bspecify\b/i,
		/\bplease specify\b/i,
		/\bnone of the above\b/i,
		/\bdon['’]?t know\b/i,
		/\bprefer not to (?:say|answer)\b/i,
		/\bautre\b.*\bpr[ée]cise[rz]\b/i,
		/\bne sait pas\b/i,
		/\baucun(?:e)? de(?:s)? (?:ces )?réponses?\b/i,
	],

	multiSelectPhrases: [
		/\bselect all that apply\b/i,
		/\b(?:tick|check|mark) all\b/i,
		/\bplusieurs réponses possibles\b/i,
		/\bcochez toutes\b/i,
	],

	maxSelectionPhrases: [
		/\b(?:up to|at most|max(?:imum)?\.?|select|choose|pick)\s+(\d{1,2})\b(?!\s*(?:characters?|words?|caract))/i,
		/\bjusqu['’]à\s+(\d{1,2})\s+(?:réponses?|choix)\b/i,
	],

	maxLengthPhrases: [
		/\bmax(?:imum)?\.?\s+(\d+)\s+(?:characters?|words?|caract[eè]res?|mots?)\b/i,
	],

	numericRange: /\((\d+)\s*[-–]\s*(\d+)\)/,

	ratingScalePhrases: [
		/\bscale\s+(?:of|from)\s+(\d+)\s*(?:to|-|–)\s*(\d+)/i,
		/[ée]chelle\s+de\s+(\d+)\s*(?:à|-|–)\s*(\d+)/i,
	],

	requiredMarkers: [/\s*\*+$/, /\s*\((?:required|obligatoire)\)/i],
};

// ============================================================================
// RÉSOLUTION
// ============================================================================

/**
 * Fusionne une configuration partielle avec la configuration par défaut.
 * Une liste fournie remplace la liste par défaut (elle ne s'y ajoute pas).
 *
 * @example
 * const markers = resolveMarkers({ sectionKeyword: /^(?:bloc|chapitre)\s+\d+/i });
 */
export function resolveMarkers(overrides: Partial<SurveyMarkers> = {}): SurveyMarkers {
	return { ...DEFAULT_MARKERS, ...overrides };
}
