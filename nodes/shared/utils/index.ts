/**
 * ============================================================================
 * UTILITAIRES PARTAGÉS - INDEX
 * ============================================================================
 *
 * @version 2.0.0
 */

export * from './text.utils';
export * from './xml.utils';
export * from './style-detector.utils';
export * from './docx.utils';
