/**
 * ============================================================================
 * TYPES CONVERSION - Options et résultat du pipeline DOCX → JSON / XML
 * ============================================================================
 *
 * @version 1.0.0
 */

import type { SurveyConversionError } from '../errors';
import type { ParseWarning, QuestionType, SurveyModel } from './survey.types';

// ============================================================================
// OPTIONS
// ============================================================================

/**
 * Options du pipeline de conversion.
 *
 * @example
 * const options: ConversionOptions = { jsonIndent: 2, verbose: true };
 */
export interface ConversionOptions {
	/** Indentation du JSON produit (0 = compact) */
	jsonIndent?: number;

	/** Utiliser le titre de docProps/core.xml si aucun paragraphe "Title" */
	useDocumentTitle?: boolean;

	/** Affiche les étapes dans la console */
	verbose?: boolean;
}

// ============================================================================
// RÉSULTAT
// ============================================================================

/**
 * Statistiques de conversion (alias : assignable à un objet JSON générique).
 */
export type ConversionStats = {
	sectionsFound: number;
	questionsFound: number;
	optionsFound: number;
	questionsByType: Record<QuestionType, number>;
	processingTimeMs: number;
};

export interface ConversionSuccess {
	success: true;
	model: SurveyModel;
	json: string;
	xml: string;
	/** Avertissements lisibles, dans l'ordre de détection */
	warnings: string[];
	parseWarnings: ParseWarning[];
	stats: ConversionStats;
}

export interface ConversionFailure {
	success: false;
	error: SurveyConversionError;
	warnings: string[];
}

export type ConversionResult = ConversionSuccess | ConversionFailure;
