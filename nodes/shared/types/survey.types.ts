/**
 * ============================================================================
 * TYPES QUESTIONNAIRE - Modèle canonique produit par le parser
 * ============================================================================
 *
 * Ce fichier définit le SurveyModel : la structure typée (sections, questions,
 * options) que le parser construit et que les sérialiseurs JSON et XML
 * projettent sans jamais la modifier.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Une Section contient des Questions, une Question contient des Options
 * - Le `type` d'une question dit quels champs ont un sens :
 *   open-text → aucune option ; choix → options (+ maxSelections en multi)
 * - Le modèle est figé (Object.freeze) après normalisation
 *
 * @example
 * const model: SurveyModel = {
 *   title: 'Enquête satisfaction',
 *   sections: [{ id: 'S1', title: 'Profil', implicit: false, questions: [...] }],
 * };
 *
 * @version 1.0.0
 */

// ============================================================================
// TYPES DE BASE
// ============================================================================

/** Niveau de titre Word (Heading1 → 1, ..., Heading6 → 6) */
export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

/** Types de question reconnus */
export type QuestionType =
	| 'single-choice'
	| 'multi-choice'
	| 'open-text'
	| 'rating'
	| 'matrix'
	| 'unknown';

/** Valeur d'une contrainte (maxSelections: 3, format: 'numeric', ...) */
export type ConstraintValue = string | number | boolean;

/** Contraintes de validation d'une question, par nom */
export type QuestionConstraints = Record<string, ConstraintValue>;

// ============================================================================
// MODÈLE
// ============================================================================

export interface Option {
	/** Identifiant unique dans la question (r1, r2... ou c1, c2... en matrice) */
	id: string;

	/** Libellé affiché */
	label: string;

	/** Code distinct du libellé ("1", "A"...), null si aucun */
	value: string | null;

	/** Option qui appelle une saisie libre ("Autre, précisez") */
	exclusive: boolean;
}

/**
 * Ligne d'une question matrice (énoncé évalué sur les colonnes).
 */
export interface MatrixRow {
	id: string;
	label: string;
}

export interface Question {
	/** Identifiant stable (Q3, Q1x4a, Q7...) */
	id: string;

	/** Numérotation détectée dans le document ("3", "1.4a"), null sinon */
	number: string | null;

	text: string;
	type: QuestionType;
	options: Option[];

	/** Lignes de la matrice (vide pour les autres types) */
	rows: MatrixRow[];

	required: boolean;

	/** Logique de filtrage ("ASK ALL", "ASK IF Q1=1"), null si aucune */
	condition: string | null;

	constraints: QuestionConstraints;
}

export interface Section {
	/** Identifiant positionnel (S1, S2...) */
	id: string;

	/** Titre ('' pour une section implicite) */
	title: string;

	/** Section créée par le parser faute de titre détecté */
	implicit: boolean;

	questions: Question[];
}

export interface SurveyModel {
	title: string | null;
	sections: Section[];
}

// ============================================================================
// AVERTISSEMENTS DE PARSING
// ============================================================================

/** Codes des anomalies non bloquantes */
export type ParseWarningCode =
	| 'skipped-block'
	| 'unattached-logic'
	| 'orphan-type-hint'
	| 'unrecognized-table'
	| 'no-options'
	| 'uncertain-type'
	| 'duplicate-question-id';

/**
 * Anomalie récupérable détectée pendant le parsing.
 * N'interrompt jamais la conversion.
 */
export interface ParseWarning {
	code: ParseWarningCode;

	/** Message lisible (affiché ou loggé par l'appelant) */
	message: string;

	/** Position du bloc concerné, si applicable */
	position?: number;
}

/**
 * Résultat du parser : le modèle et les avertissements, dans l'ordre.
 */
export interface ParsedSurvey {
	model: SurveyModel;
	warnings: ParseWarning[];
}
