/**
 * ============================================================================
 * TYPES PARTAGÉS - INDEX
 * ============================================================================
 *
 * Ce fichier centralise l'export de tous les types partagés.
 * Cela permet un import propre : import { SurveyModel, Block } from '../shared/types';
 *
 * @version 1.0.0
 */

export * from './document.types';
export * from './survey.types';
export * from './conversion.types';
