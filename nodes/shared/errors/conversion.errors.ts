/**
 * ============================================================================
 * ERREURS DE CONVERSION - Taxonomie des échecs bloquants
 * ============================================================================
 *
 * Chaque étape du pipeline échoue avec une erreur typée qui conserve la cause
 * d'origine (`error.cause`). Seul l'orchestrateur transforme ces erreurs en
 * résultat pour l'appelant ; le nœud n8n les convertit en NodeOperationError.
 *
 * | Classe                  | Code                  | Étape          |
 * |-------------------------|-----------------------|----------------|
 * | UnreadableDocumentError | UNREADABLE_DOCUMENT   | lecture        |
 * | EmptyDocumentError      | EMPTY_DOCUMENT        | lecture        |
 * | NoQuestionsFoundError   | NO_QUESTIONS_FOUND    | parsing        |
 * | SerializationError      | SERIALIZATION_FAILED  | JSON / XML     |
 *
 * @version 1.0.0
 */

export type ConversionErrorCode =
	| 'UNREADABLE_DOCUMENT'
	| 'EMPTY_DOCUMENT'
	| 'NO_QUESTIONS_FOUND'
	| 'SERIALIZATION_FAILED';

/**
 * Classe de base des erreurs bloquantes du pipeline.
 */
export abstract class SurveyConversionError extends Error {
	abstract readonly code: ConversionErrorCode;

	constructor(message: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = new.target.name;
	}
}

/**
 * Le conteneur ne peut pas être ouvert (ZIP corrompu, .doc binaire, fichier absent).
 */
export class UnreadableDocumentError extends SurveyConversionError {
	readonly code = 'UNREADABLE_DOCUMENT';

	constructor(detail: string, cause?: unknown) {
		super(`Document invalide : ${detail}`, cause);
	}
}

/**
 * Le document ne contient aucun bloc exploitable.
 */
export class EmptyDocumentError extends SurveyConversionError {
	readonly code = 'EMPTY_DOCUMENT';

	constructor() {
		super("Le document n'a aucun contenu.");
	}
}

/**
 * Aucune question détectée après un passage complet.
 */
export class NoQuestionsFoundError extends SurveyConversionError {
	readonly code = 'NO_QUESTIONS_FOUND';

	constructor(blockCount: number) {
		super(`Aucune structure de questionnaire détectée (${blockCount} bloc(s) analysé(s)).`);
	}
}

/**
 * Contenu non représentable dans le format de sortie.
 * Signale une violation d'invariant en amont (caractère interdit dans le modèle).
 */
export class SerializationError extends SurveyConversionError {
	readonly code = 'SERIALIZATION_FAILED';

	constructor(format: 'json' | 'xml', detail: string, cause?: unknown) {
		super(`Échec de la sérialisation ${format.toUpperCase()} : ${detail}`, cause);
	}
}

/**
 * Vérifie qu'une valeur inconnue (catch) est une erreur du pipeline.
 */
export function isSurveyConversionError(error: unknown): error is SurveyConversionError {
	return error instanceof SurveyConversionError;
}
