/**
 * ============================================================================
 * TYPE INFERENCE SERVICE - Type de question et contraintes de validation
 * ============================================================================
 *
 * Ce service déduit le type d'une question (choix unique, choix multiple,
 * texte libre, notation, matrice) à partir des indices collectés par le
 * parser, puis extrait ses contraintes (nombre de choix, plage, longueur).
 *
 * ORDRE DE PRIORITÉ :
 * 1. Indication explicite ("Single Answer", "Réponse libre"...)
 * 2. Tableau en grille → matrix
 * 3. Cases à cocher → multi-choice
 * 4. Ronds → single-choice
 * 5. Échelle (options 1..N consécutives, "scale of 1 to 10") → rating
 * 6. "Select all that apply" → multi-choice
 * 7. Aucune option et ligne de réponse → open-text
 * 8. Sinon → unknown
 *
 * @version 1.0.0
 */

import type { QuestionConstraints, QuestionType } from '../../shared/types';
import type { OptionCandidate } from './block-classifier.service';
import type { SelectionKind, SurveyMarkers, TypeHintRule } from './markers.config';

/** Taille maximum d'une échelle pour générer ses options */
const MAX_SYNTHETIC_SCALE_POINTS = 11;

// ============================================================================
// TYPES
// ============================================================================

/**
 * Indices collectés par le parser pour une question.
 */
export interface QuestionEvidence {
	text: string;
	options: OptionCandidate[];
	/** Sémantique de sélection de chaque option (même ordre que options) */
	selections: SelectionKind[];
	hint: TypeHintRule | null;
	matrix: boolean;
	/** Ligne vide ou tracée après la question */
	answerSpace: boolean;
}

export interface InferredType {
	type: QuestionType;
	constraints: QuestionConstraints;
	/** Options générées pour une échelle sans options explicites */
	syntheticOptions: OptionCandidate[];
	/** Type inconnu alors que des options existent */
	uncertain: boolean;
}

// ============================================================================
// INFÉRENCE
// ============================================================================

/**
 * Déduit le type et les contraintes d'une question.
 *
 * @example
 * inferQuestionType(
 *   { text: 'Sexe', options: [...], selections: ['single', 'single'], hint: null, matrix: false, answerSpace: false },
 *   DEFAULT_MARKERS
 * );
 * // { type: 'single-choice', constraints: {}, syntheticOptions: [], uncertain: false }
 */
export function inferQuestionType(evidence: QuestionEvidence, markers: SurveyMarkers): InferredType {
	const type = detectType(evidence, markers);
	const constraints = extractConstraints(evidence, type, markers);

	let syntheticOptions: OptionCandidate[] = [];
	if (type === 'rating' && evidence.options.length === 0) {
		syntheticOptions = buildScaleOptions(constraints);
	}

	return {
		type,
		constraints,
		syntheticOptions,
		uncertain: type === 'unknown' && evidence.options.length > 0,
	};
}

function detectType(evidence: QuestionEvidence, markers: SurveyMarkers): QuestionType {
	const { text, options, selections, hint } = evidence;

	if (hint) return hint.type;
	if (evidence.matrix) return 'matrix';
	if (selections.includes('multiple')) return 'multi-choice';
	if (selections.includes('single')) return 'single-choice';
	if (isConsecutiveScale(options) || findScale(text, markers.ratingScalePhrases) !== null) return 'rating';
	if (markers.multiSelectPhrases.some((phrase) => phrase.test(text))) return 'multi-choice';
	if (options.length === 0 && evidence.answerSpace) return 'open-text';

	return 'unknown';
}

/**
 * Options "1", "2", "3"... entiers consécutifs croissants (au moins 3).
 */
function isConsecutiveScale(options: OptionCandidate[]): boolean {
	if (options.length < 3) {
		return false;
	}
	const points = options.map((option) => (/^\d+$/.test(option.label) ? parseInt(option.label, 10) : NaN));
	return points.every((point, index) => !Number.isNaN(point) && (index === 0 || point === points[index - 1] + 1));
}

// ============================================================================
// CONTRAINTES
// ============================================================================

/**
 * Extrait les contraintes autorisées par le type de la question.
 * Les questions à choix n'ont pas de contrainte numérique, sauf
 * maxSelections pour le choix multiple.
 */
export function extractConstraints(
	evidence: QuestionEvidence,
	type: QuestionType,
	markers: SurveyMarkers
): QuestionConstraints {
	const { text } = evidence;
	const constraints: QuestionConstraints = { ...(evidence.hint?.constraints ?? {}) };

	switch (type) {
		case 'multi-choice': {
			const maxSelections = findNumber(text, markers.maxSelectionPhrases);
			if (maxSelections !== null && maxSelections > 0) {
				constraints.maxSelections = maxSelections;
			}
			break;
		}

		case 'rating': {
			const scale =
				findScale(text, markers.ratingScalePhrases) ??
				findScale(text, [markers.numericRange]) ??
				scaleFromOptions(evidence.options);
			if (scale) {
				constraints.min = scale.min;
				constraints.max = scale.max;
			}
			break;
		}

		case 'open-text': {
			const maxLength = findNumber(text, markers.maxLengthPhrases);
			if (maxLength !== null) {
				constraints.maxLength = maxLength;
			}
			const range = findScale(text, [markers.numericRange]);
			if (range) {
				constraints.format = 'numeric';
				constraints.min = range.min;
				constraints.max = range.max;
			}
			break;
		}

		default:
			break;
	}

	return constraints;
}

function findNumber(text: string, patterns: RegExp[]): number | null {
	for (const pattern of patterns) {
		const match = pattern.exec(text);
		if (match) {
			return parseInt(match[1], 10);
		}
	}
	return null;
}

function findScale(text: string, patterns: RegExp[]): { min: number; max: number } | null {
	for (const pattern of patterns) {
		const match = pattern.exec(text);
		if (match) {
			const min = parseInt(match[1], 10);
			const max = parseInt(match[2], 10);
			if (min < max) {
				return { min, max };
			}
		}
	}
	return null;
}

function scaleFromOptions(options: OptionCandidate[]): { min: number; max: number } | null {
	if (!isConsecutiveScale(options)) {
		return null;
	}
	return {
		min: parseInt(options[0].label, 10),
		max: parseInt(options[options.length - 1].label, 10),
	};
}

/**
 * Génère une option par point de l'échelle (min..max), jusqu'à 11 points.
 */
function buildScaleOptions(constraints: QuestionConstraints): OptionCandidate[] {
	const { min, max } = constraints;
	if (typeof min !== 'number' || typeof max !== 'number') {
		return [];
	}
	if (max - min + 1 > MAX_SYNTHETIC_SCALE_POINTS) {
		return [];
	}

	const options: OptionCandidate[] = [];
	for (let point = min; point <= max; point++) {
		options.push({ label: String(point), value: String(point) });
	}
	return options;
}

// ============================================================================
// TEXTE DE LA QUESTION
// ============================================================================

/**
 * Détecte et retire les marqueurs de question obligatoire ("*", "(required)").
 *
 * @example
 * detectRequired('Votre âge ? *', DEFAULT_MARKERS); // { text: 'Votre âge ?', required: true }
 */
export function detectRequired(text: string, markers: SurveyMarkers): { text: string; required: boolean } {
	let cleaned = text;
	let required = false;

	for (const marker of markers.requiredMarkers) {
		if (marker.test(cleaned)) {
			required = true;
			cleaned = cleaned.replace(marker, '');
		}
	}

	return { text: cleaned.trim(), required };
}

/**
 * Indique si une option est exclusive ("Autre, précisez", "Ne sait pas").
 */
export function isExclusiveLabel(label: string, markers: SurveyMarkers): boolean {
	return markers.exclusiveKeywords.some((keyword) => keyword.test(label));
}
