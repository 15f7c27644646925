/**
 * ============================================================================
 * XML GENERATOR SERVICE - Projection XML du modèle
 * ============================================================================
 *
 * Schéma fixe : identifiants, types, drapeaux et codes en attributs ; texte
 * libre en contenu d'élément. La sortie ne dépend que du modèle (jamais des
 * avertissements) : deux modèles identiques donnent les mêmes octets.
 *
 * EXEMPLE :
 * ```xml
 * <?xml version="1.0" encoding="UTF-8"?>
 * <survey>
 *   <title>Enquête</title>
 *   <section id="S1" title="Profil" implicit="false">
 *     <question id="Q1" type="single-choice" required="false" number="1">
 *       <text>Sexe</text>
 *       <option id="r1" value="1" exclusive="false">Homme</option>
 *     </question>
 *   </section>
 * </survey>
 * ```
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Un attribut optionnel absent (number, value) est omis
 * - Les caractères interdits en XML 1.0, même échappés (contrôles, surrogates
 *   isolés), provoquent une SerializationError
 *
 * @version 1.0.0
 */

import type { ConstraintValue, Question, Section, SurveyModel } from '../../shared/types';
import { SerializationError } from '../../shared/errors';
import { escapeXml, findInvalidXmlChar } from '../../shared/utils';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const INDENT = '  ';

// ============================================================================
// FONCTION PRINCIPALE
// ============================================================================

/**
 * Génère le document XML du questionnaire.
 *
 * @param model - Modèle normalisé
 * @returns Document XML, lignes terminées par "\n"
 * @throws SerializationError si un texte contient un caractère interdit
 */
export function generateSurveyXml(model: SurveyModel): string {
	const lines: string[] = [XML_DECLARATION, '<survey>'];

	if (model.title !== null) {
		lines.push(`${INDENT}<title>${text(model.title, 'titre du questionnaire')}</title>`);
	}

	for (const section of model.sections) {
		lines.push(...renderSection(section));
	}

	lines.push('</survey>');
	return lines.join('\n') + '\n';
}

// ============================================================================
// RENDU
// ============================================================================

function renderSection(section: Section): string[] {
	const open = element('section', [
		['id', section.id],
		['title', section.title],
		['implicit', String(section.implicit)],
	]);

	if (section.questions.length === 0) {
		return [`${INDENT}${open}/>`];
	}

	const lines = [`${INDENT}${open}>`];
	for (const question of section.questions) {
		lines.push(...renderQuestion(question));
	}
	lines.push(`${INDENT}</section>`);
	return lines;
}

function renderQuestion(question: Question): string[] {
	const pad = INDENT.repeat(2);
	const inner = INDENT.repeat(3);
	const where = `question ${question.id}`;

	const lines = [
		`${pad}${element('question', [
			['id', question.id],
			['type', question.type],
			['required', String(question.required)],
			['number', question.number],
		])}>`,
		`${inner}<text>${text(question.text, where)}</text>`,
	];

	if (question.condition !== null) {
		lines.push(`${inner}<condition>${text(question.condition, where)}</condition>`);
	}

	for (const option of question.options) {
		const open = element('option', [
			['id', option.id],
			['value', option.value],
			['exclusive', String(option.exclusive)],
		]);
		lines.push(`${inner}${open}>${text(option.label, `${where}, option ${option.id}`)}</option>`);
	}

	for (const row of question.rows) {
		lines.push(`${inner}${element('row', [['id', row.id]])}>${text(row.label, `${where}, ligne ${row.id}`)}</row>`);
	}

	for (const name of Object.keys(question.constraints).sort()) {
		const value = question.constraints[name];
		const open = element('constraint', [
			['name', name],
			['value', String(value)],
			['type', constraintType(value)],
		]);
		lines.push(`${inner}${open}/>`);
	}

	lines.push(`${pad}</question>`);
	return lines;
}

function constraintType(value: ConstraintValue): 'number' | 'boolean' | 'string' {
	if (typeof value === 'number') return 'number';
	if (typeof value === 'boolean') return 'boolean';
	return 'string';
}

// ============================================================================
// ÉCHAPPEMENT
// ============================================================================

/**
 * Ouvre une balise (sans le ">" final) ; les attributs null sont omis.
 */
function element(name: string, attributes: Array<[string, string | null]>): string {
	const rendered = attributes
		.filter((entry): entry is [string, string] => entry[1] !== null)
		.map(([key, value]) => ` ${key}="${text(value, `attribut ${key} de <${name}>`)}"`)
		.join('');
	return `<${name}${rendered}`;
}

/**
 * Échappe un texte après avoir vérifié qu'il est représentable en XML 1.0.
 */
function text(value: string, where: string): string {
	const invalid = findInvalidXmlChar(value);
	if (invalid) {
		const code = invalid.codePoint.toString(16).toUpperCase().padStart(4, '0');
		throw new SerializationError('xml', `caractère U+${code} interdit en XML (${where}, position ${invalid.index})`);
	}
	return escapeXml(value);
}
