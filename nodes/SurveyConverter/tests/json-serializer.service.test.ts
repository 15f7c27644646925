import { describe, expect, it } from 'vitest';

import { SerializationError } from '../../shared/errors';
import { serializeSurveyToJson, toJsonDocument } from '../services';
import { question, section, survey } from './helpers/model-builder';

describe('toJsonDocument', () => {
	it('writes every key, with null for absent values', () => {
		const model = survey([
			section([question({ number: null, options: [{ id: 'r1', label: 'Oui', value: null, exclusive: false }] })]),
		]);

		const document = toJsonDocument(model);
		const [json] = document.sections[0].questions;

		expect(document.title).toBeNull();
		expect(Object.keys(json)).toEqual([
			'id',
			'number',
			'text',
			'type',
			'required',
			'condition',
			'options',
			'rows',
			'constraints',
		]);
		expect(json.number).toBeNull();
		expect(json.condition).toBeNull();
		expect(json.options[0].value).toBeNull();
	});

	it('sorts constraint keys', () => {
		const model = survey([
			section([question({ type: 'open-text', options: [], constraints: { min: 1, format: 'numeric', max: 9 } })]),
		]);

		const constraints = toJsonDocument(model).sections[0].questions[0].constraints;

		expect(Object.keys(constraints)).toEqual(['format', 'max', 'min']);
	});
});

describe('serializeSurveyToJson', () => {
	const model = survey([section([question({ options: [], type: 'open-text' })])], 'Enquête');

	it('indents with two spaces by default and keeps UTF-8 text', () => {
		const json = serializeSurveyToJson(model);

		expect(json.startsWith('{\n  "title": "Enquête",\n  "sections": [')).toBe(true);
		expect(JSON.parse(json)).toEqual(toJsonDocument(model));
	});

	it('writes compact output with an indent of 0', () => {
		expect(serializeSurveyToJson(survey([], null), { indent: 0 })).toBe('{"title":null,"sections":[]}');
	});

	it('escapes lone surrogates instead of dropping them', () => {
		const json = serializeSurveyToJson(survey([], 'A\uD800'), { indent: 0 });

		expect(json).toBe('{"title":"A\\ud800","sections":[]}');
	});

	it('rejects an invalid indent', () => {
		expect(() => serializeSurveyToJson(model, { indent: 11 })).toThrow(
			new SerializationError('json', 'indentation invalide (11), attendu un entier entre 0 et 10')
		);
	});
});
