import { XMLParser } from 'fast-xml-parser';
import { afterEach, describe, expect, it, vi } from 'vitest';

import type { ConversionResult, ConversionSuccess } from '../../shared/types';
import {
	convertSurvey,
	formatWarnings,
	validateConversionOptions,
	type SurveyJsonDocument,
} from '../services';
import { buildDocx, type BodyPart } from './helpers/docx-builder';

const QUESTIONNAIRE: BodyPart[] = [
	{ text: 'Enquête mobilité', style: 'Title' },
	{ text: 'Profil', style: 'Heading1' },
	'Q1. Sexe',
	'○ Homme',
	'○ Femme',
	'Q2. Moyens de transport utilisés ?',
	'□ Voiture',
	'□ Vélo',
	'□ Autre, précisez',
	{ text: 'Avis', style: 'Heading1' },
	'Q3. Évaluez',
	{
		table: [
			['', 'Faible', 'Fort'],
			['Prix', '□', '□'],
			['Confort', '', ''],
		],
	},
	'Q4. Commentaires',
	{ text: '', bottomBorder: true },
];

function expectSuccess(result: ConversionResult): ConversionSuccess {
	if (!result.success) {
		throw new Error(`conversion en échec : ${result.error.message}`);
	}
	return result;
}

// ============================================================================
// LECTURE DU XML PRODUIT
// ============================================================================

const xmlParser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: '',
	parseAttributeValue: false,
	parseTagValue: false,
	isArray: (name) => ['section', 'question', 'option', 'row', 'constraint'].includes(name),
});

function record(value: unknown): Record<string, unknown> {
	if (typeof value !== 'object' || value === null || Array.isArray(value)) {
		throw new Error(`objet attendu, reçu ${JSON.stringify(value)}`);
	}
	return Object.fromEntries(Object.entries(value));
}

function list(value: unknown): Record<string, unknown>[] {
	if (value === undefined) return [];
	if (!Array.isArray(value)) throw new Error('liste attendue');
	return value.map(record);
}

function nullable(value: unknown): string | null {
	return typeof value === 'string' ? value : null;
}

function textOf(value: unknown): string {
	if (typeof value === 'string') return value;
	const content = record(value)['#text'];
	return typeof content === 'string' ? content : '';
}

/**
 * Relit le XML dans la forme du document JSON pour comparer les deux projections.
 */
function readXmlAsJson(xml: string): SurveyJsonDocument {
	const root = record(record(xmlParser.parse(xml)).survey);

	return {
		title: nullable(root.title),
		sections: list(root.section).map((section) => ({
			id: String(section.id),
			title: String(section.title),
			implicit: section.implicit === 'true',
			questions: list(section.question).map((question) => ({
				id: String(question.id),
				number: nullable(question.number),
				text: textOf(question.text),
				type: String(question.type),
				required: question.required === 'true',
				condition: nullable(question.condition),
				options: list(question.option).map((option) => ({
					id: String(option.id),
					label: textOf(option),
					value: nullable(option.value),
					exclusive: option.exclusive === 'true',
				})),
				rows: list(question.row).map((row) => ({ id: String(row.id), label: textOf(row) })),
				constraints: Object.fromEntries(
					list(question.constraint).map((constraint) => [
						String(constraint.name),
						constraint.type === 'number'
							? Number(constraint.value)
							: constraint.type === 'boolean'
								? constraint.value === 'true'
								: String(constraint.value),
					])
				),
			})),
		})),
	};
}

// ============================================================================
// TESTS
// ============================================================================

describe('convertSurvey', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('converts a questionnaire end to end', () => {
		const result = expectSuccess(convertSurvey(buildDocx(QUESTIONNAIRE)));

		expect(result.warnings).toEqual([]);
		expect(result.model.title).toBe('Enquête mobilité');
		expect(result.model.sections.map((section) => section.title)).toEqual(['Profil', 'Avis']);
		expect(
			result.model.sections.flatMap((section) => section.questions.map((question) => [question.id, question.type]))
		).toEqual([
			['Q1', 'single-choice'],
			['Q2', 'multi-choice'],
			['Q3', 'matrix'],
			['Q4', 'open-text'],
		]);
		expect(result.model.sections[0].questions[1].options[2]).toEqual({
			id: 'r3',
			label: 'Autre, précisez',
			value: null,
			exclusive: true,
		});
		expect(result.model.sections[1].questions[0].rows).toEqual([
			{ id: 'r1', label: 'Prix' },
			{ id: 'r2', label: 'Confort' },
		]);
	});

	it('keeps an open question that follows an option run', () => {
		const demographics: BodyPart[] = [{ text: 'Demographics', style: 'Heading1' }, 'Gender', '○ Male', '○ Female', 'Comments'];

		const withAnswerSpace = expectSuccess(convertSurvey(buildDocx([...demographics, ''])));
		const atDocumentEnd = expectSuccess(convertSurvey(buildDocx(demographics)));

		const document: SurveyJsonDocument = JSON.parse(withAnswerSpace.json);
		expect(withAnswerSpace.warnings).toEqual([]);
		expect(document.sections[0].questions.map((question) => [question.id, question.type, question.options.length])).toEqual([
			['Q1', 'single-choice', 2],
			['Q2', 'open-text', 0],
		]);
		expect(document.sections[0].questions[0].options[1].label).toBe('Female');

		expect(atDocumentEnd.model.sections[0].questions[1]).toMatchObject({ text: 'Comments', type: 'open-text' });
		expect(atDocumentEnd.warnings).toEqual([
			'La question Q2 ("Comments") n\'a aucune option détectée : traitée en texte libre',
		]);
	});

	it('produces JSON and XML that describe the same survey', () => {
		const result = expectSuccess(convertSurvey(buildDocx(QUESTIONNAIRE)));

		expect(readXmlAsJson(result.xml)).toEqual(JSON.parse(result.json));
	});

	it('produces identical bytes for the same document', () => {
		const buffer = buildDocx(QUESTIONNAIRE);
		const first = expectSuccess(convertSurvey(buffer));
		const second = expectSuccess(convertSurvey(buffer));

		expect(second.json).toBe(first.json);
		expect(second.xml).toBe(first.xml);
	});

	it('returns a frozen model', () => {
		const result = expectSuccess(convertSurvey(buildDocx(QUESTIONNAIRE)));

		expect(Object.isFrozen(result.model.sections[0].questions[0])).toBe(true);
	});

	it('computes statistics', () => {
		const { stats } = expectSuccess(convertSurvey(buildDocx(QUESTIONNAIRE)));

		expect(stats).toMatchObject({
			sectionsFound: 2,
			questionsFound: 4,
			optionsFound: 7,
			questionsByType: {
				'single-choice': 1,
				'multi-choice': 1,
				'open-text': 1,
				rating: 0,
				matrix: 1,
				unknown: 0,
			},
		});
		expect(stats.processingTimeMs).toBeGreaterThanOrEqual(0);
	});

	it('falls back on the document properties for the title', () => {
		const buffer = buildDocx(['Q1. Nom ?', ''], { title: 'Enquête interne' });

		expect(expectSuccess(convertSurvey(buffer)).model.title).toBe('Enquête interne');
		expect(expectSuccess(convertSurvey(buffer, { useDocumentTitle: false })).model.title).toBeNull();
	});

	it('applies the JSON indent', () => {
		const result = expectSuccess(convertSurvey(buildDocx(['Q1. Nom ?', '']), { jsonIndent: 0 }));

		expect(result.json).not.toContain('\n');
	});

	it('passes custom markers to the parser', () => {
		const buffer = buildDocx(['Chapitre 1', 'Nom ?', '']);
		const result = expectSuccess(convertSurvey(buffer, { markers: { sectionKeyword: /^chapitre\s+\d+/i } }));

		expect(result.model.sections[0].title).toBe('Chapitre 1');
	});

	it('logs its steps in verbose mode', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

		expectSuccess(convertSurvey(buildDocx(['Q1. Nom ?', '']), { verbose: true }));

		expect(log).toHaveBeenCalledWith('\n📄 === CONVERSION QUESTIONNAIRE ===');
	});

	describe('failures', () => {
		it.each([
			['an invalid archive', Buffer.from('pas un docx'), 'UNREADABLE_DOCUMENT'],
			['an empty document', buildDocx(['', '']), 'EMPTY_DOCUMENT'],
			['a document without questions', buildDocx(['Bonjour', 'Au revoir']), 'NO_QUESTIONS_FOUND'],
		])('reports %s', (_label, buffer, code) => {
			const result = convertSurvey(buffer);

			expect(result.success).toBe(false);
			expect(!result.success && result.error.code).toBe(code);
			expect(result.warnings).toEqual([]);
		});

		it('reports a missing file', () => {
			const result = convertSurvey('/chemin/inexistant/questionnaire.docx');

			expect(!result.success && result.error.message).toBe(
				'Document invalide : impossible d\'ouvrir le fichier "/chemin/inexistant/questionnaire.docx".'
			);
		});

		it('reports text that XML cannot carry', () => {
			const buffer = buildDocx([{ runsXml: '<w:r><w:t>Q1. Nom &#xD800; ?</w:t></w:r>' }, '']);

			const result = convertSurvey(buffer);

			expect(!result.success && result.error.message).toBe(
				'Échec de la sérialisation XML : caractère U+D800 interdit en XML (question Q1, position 4)'
			);
		});

		it('reports an invalid indent as a serialization failure', () => {
			const result = convertSurvey(buildDocx(['Q1. Nom ?', '']), { jsonIndent: 11 });

			expect(!result.success && result.error.code).toBe('SERIALIZATION_FAILED');
		});
	});
});

describe('formatWarnings', () => {
	it('keeps the detection order', () => {
		expect(
			formatWarnings([
				{ code: 'skipped-block', message: 'premier', position: 0 },
				{ code: 'no-options', message: 'second' },
			])
		).toEqual(['premier', 'second']);
	});
});

describe('validateConversionOptions', () => {
	it('accepts an indent between 0 and 10', () => {
		expect(validateConversionOptions({ jsonIndent: 4 })).toEqual({ isValid: true, errors: [] });
		expect(validateConversionOptions({})).toEqual({ isValid: true, errors: [] });
	});

	it('rejects other indents', () => {
		expect(validateConversionOptions({ jsonIndent: 2.5 })).toEqual({
			isValid: false,
			errors: ['jsonIndent doit être un entier entre 0 et 10'],
		});
	});
});
