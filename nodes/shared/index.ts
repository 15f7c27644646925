/**
 * ============================================================================
 * MODULE PARTAGÉ - INDEX PRINCIPAL
 * ============================================================================
 *
 * Ce module centralise l'export des types, erreurs et utilitaires partagés
 * par le nœud SurveyConverter et ses services.
 *
 * UTILISATION :
 * ```typescript
 * import { SurveyModel, normalizeText, UnreadableDocumentError } from '../shared';
 * ```
 *
 * @version 2.0.0
 */

// Types partagés
export * from './types';

// Erreurs du pipeline
export * from './errors';

// Utilitaires partagés
export * from './utils';
