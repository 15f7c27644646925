/**
 * ============================================================================
 * JSON SERIALIZER SERVICE - Projection JSON du modèle (référence)
 * ============================================================================
 *
 * Types de sortie déclarés en alias : assignables à IDataObject (n8n).
 *
 * CONVENTION (appliquée partout, sans exception) :
 * - Toutes les clés sont toujours présentes ; une valeur absente vaut `null`
 * - Collections vides : `[]` pour les listes, `{}` pour les contraintes
 * - L'ordre des sections, questions, options et lignes est celui du document
 * - Les clés de contraintes sont triées (sortie stable et comparable)
 * - Les caractères non ASCII restent en UTF-8 ; un surrogate isolé est
 *   échappé en \uXXXX (jamais supprimé)
 *
 * @version 1.0.0
 */

import type { ConstraintValue, SurveyModel } from '../../shared/types';
import { SerializationError } from '../../shared/errors';

/** Indentation par défaut (2 espaces) */
const DEFAULT_JSON_INDENT = 2;

// ============================================================================
// TYPES DE SORTIE
// ============================================================================

export type SurveyJsonOption = {
	id: string;
	label: string;
	value: string | null;
	exclusive: boolean;
};

export type SurveyJsonQuestion = {
	id: string;
	number: string | null;
	text: string;
	type: string;
	required: boolean;
	condition: string | null;
	options: SurveyJsonOption[];
	rows: Array<{ id: string; label: string }>;
	constraints: Record<string, ConstraintValue>;
};

export type SurveyJsonDocument = {
	title: string | null;
	sections: Array<{
		id: string;
		title: string;
		implicit: boolean;
		questions: SurveyJsonQuestion[];
	}>;
};

export interface JsonSerializerOptions {
	/** Indentation (0 = compact, max 10) */
	indent?: number;
}

// ============================================================================
// PROJECTION
// ============================================================================

/**
 * Construit l'objet JSON du questionnaire, avec l'ordre de clés fixe.
 *
 * @example
 * const doc = toJsonDocument(model);
 * doc.sections[0].questions[0].number; // '1' ou null
 */
export function toJsonDocument(model: SurveyModel): SurveyJsonDocument {
	return {
		title: model.title,
		sections: model.sections.map((section) => ({
			id: section.id,
			title: section.title,
			implicit: section.implicit,
			questions: section.questions.map((question) => ({
				id: question.id,
				number: question.number,
				text: question.text,
				type: question.type,
				required: question.required,
				condition: question.condition,
				options: question.options.map((option) => ({
					id: option.id,
					label: option.label,
					value: option.value,
					exclusive: option.exclusive,
				})),
				rows: question.rows.map((row) => ({ id: row.id, label: row.label })),
				constraints: sortKeys(question.constraints),
			})),
		})),
	};
}

function sortKeys(constraints: Record<string, ConstraintValue>): Record<string, ConstraintValue> {
	const sorted: Record<string, ConstraintValue> = {};
	for (const name of Object.keys(constraints).sort()) {
		sorted[name] = constraints[name];
	}
	return sorted;
}

// ============================================================================
// SÉRIALISATION
// ============================================================================

/**
 * Sérialise le questionnaire en JSON.
 *
 * @param model - Modèle normalisé
 * @param options - Indentation
 * @returns Le document JSON (UTF-8)
 * @throws SerializationError si le modèle ne peut pas être encodé
 *
 * @example
 * const json = serializeSurveyToJson(model, { indent: 0 });
 */
export function serializeSurveyToJson(model: SurveyModel, options: JsonSerializerOptions = {}): string {
	const indent = options.indent ?? DEFAULT_JSON_INDENT;
	if (!Number.isInteger(indent) || indent < 0 || indent > 10) {
		throw new SerializationError('json', `indentation invalide (${indent}), attendu un entier entre 0 et 10`);
	}

	try {
		return JSON.stringify(toJsonDocument(model), null, indent);
	} catch (error) {
		throw new SerializationError('json', 'encodage impossible', error);
	}
}
