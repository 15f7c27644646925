/**
 * ============================================================================
 * CONVERTER SERVICE - Orchestrateur DOCX → JSON / XML
 * ============================================================================
 *
 * Ce service enchaîne les étapes du pipeline et rend un résultat discriminé
 * (`success: true | false`). C'est le SEUL endroit où une erreur bloquante
 * devient un résultat : les autres services lèvent des erreurs typées.
 *
 * ÉTAPES :
 * 1. Lecture du document (DocumentReader)
 * 2. Parsing (SurveyParser) - consomme les blocs
 * 3. Normalisation (copie gelée du modèle)
 * 4. Sérialisation JSON
 * 5. Génération XML
 *
 * Aucune nouvelle tentative : la première erreur bloquante arrête tout et
 * est retournée avec sa cause.
 *
 * @version 1.0.0
 */

import type {
	ConversionOptions,
	ConversionResult,
	ConversionStats,
	ParseWarning,
	QuestionType,
	SurveyModel,
} from '../../shared/types';
import {
	SerializationError,
	SurveyConversionError,
	UnreadableDocumentError,
	isSurveyConversionError,
} from '../../shared/errors';
import { openDocument } from './document-reader.service';
import { serializeSurveyToJson } from './json-serializer.service';
import type { SurveyMarkers } from './markers.config';
import { normalizeSurvey } from './survey-normalizer.service';
import { parseSurvey } from './survey-parser.service';
import { generateSurveyXml } from './xml-generator.service';

/**
 * Options de l'orchestrateur : options de conversion + surcharge des marqueurs.
 */
export interface ConverterOptions extends ConversionOptions {
	markers?: Partial<SurveyMarkers>;
}

// ============================================================================
// FONCTION PRINCIPALE
// ============================================================================

/**
 * Convertit un questionnaire Word en JSON et XML.
 *
 * @param source - Chemin du fichier ou buffer DOCX
 * @param options - Options de conversion
 * @returns Résultat discriminé : modèle + artefacts, ou erreur typée
 *
 * @example
 * const result = convertSurvey('questionnaire.docx', { jsonIndent: 2 });
 * if (result.success) {
 *   fs.writeFileSync('survey.json', result.json);
 *   fs.writeFileSync('survey.xml', result.xml);
 * } else {
 *   console.error(result.error.code, result.error.message);
 * }
 */
export function convertSurvey(source: string | Buffer, options: ConverterOptions = {}): ConversionResult {
	const startTime = Date.now();

	// Options par défaut
	const opts: Required<ConversionOptions> = {
		jsonIndent: options.jsonIndent ?? 2,
		useDocumentTitle: options.useDocumentTitle ?? true,
		verbose: options.verbose ?? false,
	};

	try {
		// 1. Lire le document
		log(opts.verbose, '\n📄 === CONVERSION QUESTIONNAIRE ===');
		const document = runStage(
			() => openDocument(source),
			(error) => new UnreadableDocumentError('ouverture impossible.', error)
		);

		// 2. Parser (la lecture des blocs a lieu pendant ce passage)
		log(opts.verbose, '🔍 Parsing des blocs...');
		const parsed = runStage(
			() => parseSurvey(document.blocks, { markers: options.markers, verbose: opts.verbose }),
			(error) => new UnreadableDocumentError('contenu illisible.', error)
		);

		let model: SurveyModel = parsed.model;
		if (model.title === null && opts.useDocumentTitle && document.properties.title) {
			model = { ...model, title: document.properties.title };
		}

		// 3. Normaliser
		const normalized = normalizeSurvey({ model, warnings: parsed.warnings });

		// 4. Sérialiser
		const json = runStage(
			() => serializeSurveyToJson(normalized.model, { indent: opts.jsonIndent }),
			(error) => new SerializationError('json', 'erreur inattendue.', error)
		);
		const xml = runStage(
			() => generateSurveyXml(normalized.model),
			(error) => new SerializationError('xml', 'erreur inattendue.', error)
		);

		const stats = computeStats(normalized.model, startTime);
		log(
			opts.verbose,
			`✅ ${stats.sectionsFound} section(s), ${stats.questionsFound} question(s), ` +
				`${normalized.warnings.length} avertissement(s) en ${stats.processingTimeMs} ms`
		);

		return {
			success: true,
			model: normalized.model,
			json,
			xml,
			warnings: formatWarnings(normalized.warnings),
			parseWarnings: normalized.warnings,
			stats,
		};
	} catch (error) {
		if (isSurveyConversionError(error)) {
			log(opts.verbose, `❌ ${error.code}: ${error.message}`);
			return { success: false, error, warnings: [] };
		}
		throw error;
	}
}

// ============================================================================
// FONCTIONS UTILITAIRES
// ============================================================================

/**
 * Exécute une étape ; une erreur non typée est enveloppée dans l'erreur de l'étape.
 */
function runStage<T>(stage: () => T, wrap: (error: unknown) => SurveyConversionError): T {
	try {
		return stage();
	} catch (error) {
		throw isSurveyConversionError(error) ? error : wrap(error);
	}
}

/**
 * Avertissements lisibles, dans l'ordre de détection.
 */
export function formatWarnings(warnings: ParseWarning[]): string[] {
	return warnings.map((warning) => warning.message);
}

/**
 * Calcule les statistiques de conversion.
 */
export function computeStats(model: SurveyModel, startTime: number): ConversionStats {
	const questionsByType: Record<QuestionType, number> = {
		'single-choice': 0,
		'multi-choice': 0,
		'open-text': 0,
		rating: 0,
		matrix: 0,
		unknown: 0,
	};
	let questionsFound = 0;
	let optionsFound = 0;

	for (const section of model.sections) {
		for (const question of section.questions) {
			questionsFound++;
			optionsFound += question.options.length;
			questionsByType[question.type]++;
		}
	}

	return {
		sectionsFound: model.sections.length,
		questionsFound,
		optionsFound,
		questionsByType,
		processingTimeMs: Date.now() - startTime,
	};
}

/**
 * Valide les options de conversion.
 */
export function validateConversionOptions(options: ConversionOptions): { isValid: boolean; errors: string[] } {
	const errors: string[] = [];

	if (options.jsonIndent !== undefined) {
		if (!Number.isInteger(options.jsonIndent) || options.jsonIndent < 0 || options.jsonIndent > 10) {
			errors.push('jsonIndent doit être un entier entre 0 et 10');
		}
	}

	return {
		isValid: errors.length === 0,
		errors,
	};
}

function log(verbose: boolean, message: string): void {
	if (verbose) {
		console.log(message);
	}
}
