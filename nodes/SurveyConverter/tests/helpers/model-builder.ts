/**
 * Modèles de questionnaire construits à la main pour les tests des sérialiseurs.
 */

import type { Question, Section, SurveyModel } from '../../../shared/types';

export function question(overrides: Partial<Question> = {}): Question {
	return {
		id: 'Q1',
		number: '1',
		text: 'Sexe',
		type: 'single-choice',
		options: [
			{ id: 'r1', label: 'Homme', value: '1', exclusive: false },
			{ id: 'r2', label: 'Femme', value: '2', exclusive: false },
		],
		rows: [],
		required: false,
		condition: null,
		constraints: {},
		...overrides,
	};
}

export function section(questions: Question[], overrides: Partial<Section> = {}): Section {
	return { id: 'S1', title: 'Profil', implicit: false, questions, ...overrides };
}

export function survey(sections: Section[], title: string | null = null): SurveyModel {
	return { title, sections };
}
