/**
 * ============================================================================
 * SURVEY NORMALIZER SERVICE - Invariants du modèle et gel
 * ============================================================================
 *
 * Passe de normalisation exécutée après le parsing. Elle ne modifie jamais le
 * modèle reçu : elle en construit une copie qui respecte les invariants, puis
 * la gèle en profondeur (Object.freeze) avant de la confier aux sérialiseurs.
 *
 * INVARIANTS GARANTIS :
 * - options vides ⇔ type open-text
 * - seules les contraintes autorisées par le type sont conservées
 * - identifiants de question uniques, identifiants d'option uniques par question
 * - lignes de matrice uniquement pour le type matrix
 *
 * @version 1.0.0
 */

import type {
	ParseWarning,
	ParsedSurvey,
	Question,
	QuestionConstraints,
	QuestionType,
	Section,
	SurveyModel,
} from '../../shared/types';
import { truncate } from '../../shared/utils';

/**
 * Contraintes autorisées par type de question.
 */
const ALLOWED_CONSTRAINTS: Record<QuestionType, readonly string[]> = {
	'single-choice': [],
	'multi-choice': ['maxSelections'],
	'open-text': ['format', 'min', 'max', 'maxLength'],
	rating: ['min', 'max'],
	matrix: [],
	unknown: [],
};

// ============================================================================
// FONCTION PRINCIPALE
// ============================================================================

/**
 * Normalise un modèle parsé et retourne une copie gelée.
 * Les avertissements reçus sont conservés, ceux de la normalisation ajoutés.
 *
 * @param parsed - Sortie du parser
 * @returns Modèle normalisé (gelé) et avertissements cumulés
 *
 * @example
 * const { model, warnings } = normalizeSurvey(parseSurvey(blocks));
 * Object.isFrozen(model.sections[0]); // true
 */
export function normalizeSurvey(parsed: ParsedSurvey): ParsedSurvey {
	const warnings: ParseWarning[] = [...parsed.warnings];
	const usedQuestionIds = new Set<string>();

	const sections: Section[] = parsed.model.sections.map((section) => ({
		id: section.id,
		title: section.title,
		implicit: section.implicit,
		questions: section.questions.map((question) => normalizeQuestion(question, usedQuestionIds, warnings)),
	}));

	const model: SurveyModel = { title: parsed.model.title, sections };

	return { model: deepFreeze(model), warnings };
}

// ============================================================================
// QUESTIONS
// ============================================================================

function normalizeQuestion(question: Question, usedIds: Set<string>, warnings: ParseWarning[]): Question {
	let type = question.type;
	const label = truncate(question.text, 40);

	if (question.options.length === 0 && type !== 'open-text') {
		warnings.push({
			code: 'no-options',
			message: `La question ${question.id} ("${label}") n'a aucune option détectée : traitée en texte libre`,
		});
		type = 'open-text';
	} else if (question.options.length > 0 && type === 'open-text') {
		warnings.push({
			code: 'uncertain-type',
			message: `La question ${question.id} ("${label}") est en texte libre mais a ${question.options.length} option(s)`,
		});
		type = 'unknown';
	}

	let id = question.id;
	if (usedIds.has(id)) {
		let suffix = 2;
		while (usedIds.has(`${question.id}_${suffix}`)) {
			suffix++;
		}
		id = `${question.id}_${suffix}`;
		warnings.push({
			code: 'duplicate-question-id',
			message: `Identifiant ${question.id} en double, renommé en ${id}`,
		});
	}
	usedIds.add(id);

	return {
		id,
		number: question.number,
		text: question.text,
		type,
		options: uniqueOptionIds(question.options).map((option) => ({ ...option })),
		rows: type === 'matrix' ? question.rows.map((row) => ({ ...row })) : [],
		required: question.required,
		condition: question.condition,
		constraints: filterConstraints(question.constraints, type),
	};
}

/**
 * Renumérote les options si un identifiant est répété.
 */
function uniqueOptionIds(options: Question['options']): Question['options'] {
	const ids = new Set(options.map((option) => option.id));
	if (ids.size === options.length) {
		return options;
	}
	const prefix = options[0].id.charAt(0);
	return options.map((option, index) => ({ ...option, id: `${prefix}${index + 1}` }));
}

function filterConstraints(constraints: QuestionConstraints, type: QuestionType): QuestionConstraints {
	const allowed = ALLOWED_CONSTRAINTS[type];
	const filtered: QuestionConstraints = {};
	for (const [name, value] of Object.entries(constraints)) {
		if (allowed.includes(name)) {
			filtered[name] = value;
		}
	}
	return filtered;
}

// ============================================================================
// GEL
// ============================================================================

/**
 * Gèle un objet et tous ses descendants.
 */
export function deepFreeze<T extends object>(value: T): Readonly<T> {
	const children: unknown[] = Object.values(value);
	for (const child of children) {
		if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
			deepFreeze(child);
		}
	}
	return Object.freeze(value);
}
