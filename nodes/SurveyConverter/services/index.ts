/**
 * ============================================================================
 * SERVICES SURVEY CONVERTER - INDEX
 * ============================================================================
 *
 * Point d'entrée pour tous les services du SurveyConverter.
 *
 * PIPELINE :
 * - document-reader.service.ts : DOCX → blocs (paragraphes, tableaux)
 * - block-classifier.service.ts : règles de classification des blocs
 * - survey-parser.service.ts : blocs → modèle (machine à états)
 * - type-inference.service.ts : type de question et contraintes
 * - survey-normalizer.service.ts : invariants + gel du modèle
 * - json-serializer.service.ts / xml-generator.service.ts : projections
 * - converter.service.ts : orchestrateur
 *
 * @version 1.0.0
 */

export * from './markers.config';
export * from './document-reader.service';
export * from './block-classifier.service';
export * from './type-inference.service';
export * from './survey-parser.service';
export * from './survey-normalizer.service';
export * from './json-serializer.service';
export * from './xml-generator.service';
export * from './converter.service';
