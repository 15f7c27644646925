/**
 * ============================================================================
 * BLOCK CLASSIFIER SERVICE - Classification des blocs du questionnaire
 * ============================================================================
 *
 * Ce service décide ce qu'est un bloc (titre, section, question, option,
 * tableau d'options, matrice...) à partir de son texte, de ses indices de
 * style, de l'état du parser et du bloc suivant (lookahead d'un bloc).
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Chaque règle est une paire indépendante "prédicat → classification"
 * - Les règles sont essayées dans l'ordre ; la première qui répond gagne
 * - Quand une question est ouverte, les règles d'option passent AVANT la
 *   règle de question : l'entité ouverte l'emporte ("1. Oui" reste une option)
 * - Le résultat est un type discriminé (`kind`) : le parser fait un switch
 *
 * @version 1.0.0
 */

import type { Block, TableBlock } from '../../shared/types';
import { countWords, isAllCaps, isDocumentTitleStyle, isRuledText } from '../../shared/utils';
import {
	CHECKBOX_GLYPHS,
	RADIO_GLYPHS,
	type NumberingStyle,
	type OptionMarkerKind,
	type SelectionKind,
	type SurveyMarkers,
	type TypeHintRule,
} from './markers.config';

// ============================================================================
// TYPES
// ============================================================================

/** États du parser */
export type ParserState = 'NoSection' | 'InSection' | 'InQuestion';

/**
 * Vue en lecture seule de la question ouverte, fournie par le parser.
 */
export interface OpenQuestionView {
	numberingStyle: NumberingStyle | null;
	optionCount: number;
	/** Marqueur de la première option de la série */
	runMarker: OptionMarkerKind | null;
	/** Une ligne de réponse tracée suit déjà la question */
	answerSpace: boolean;
	/** Une ligne vide ou tracée suit déjà la question */
	blankAfter: boolean;
}

export interface ClassifierContext {
	state: ParserState;
	hasTitle: boolean;
	question: OpenQuestionView | null;
	/** Bloc suivant (lookahead), undefined en fin de document */
	next: Block | undefined;
	markers: SurveyMarkers;
}

/** Option candidate issue d'une ligne ou d'une cellule */
export interface OptionCandidate {
	label: string;
	value: string | null;
}

/**
 * Résultat de la classification d'un bloc.
 */
export type BlockClassification =
	| { kind: 'blank'; ruled: boolean }
	| { kind: 'title'; text: string }
	| { kind: 'section'; title: string; heading: boolean }
	| { kind: 'logic'; condition: string }
	| { kind: 'typeHint'; hint: TypeHintRule }
	| {
			kind: 'question';
			number: string | null;
			style: NumberingStyle | null;
			text: string;
			answerSpace: boolean;
	  }
	| {
			kind: 'option';
			label: string;
			value: string | null;
			marker: OptionMarkerKind;
			selection: SelectionKind;
	  }
	| { kind: 'optionTable'; options: OptionCandidate[] }
	| { kind: 'matrix'; columns: string[]; rows: string[] }
	| { kind: 'continuation'; text: string }
	| { kind: 'unrecognized' };

export type BlockClassificationKind = BlockClassification['kind'];

/**
 * Règle de classification : renvoie null si elle ne s'applique pas.
 */
export interface ClassifierRule {
	name: BlockClassificationKind;
	classify(block: Block, context: ClassifierContext): BlockClassification | null;
}

/** Nombre maximum de mots d'un titre de section "isolé" */
const STANDALONE_SECTION_MAX_WORDS = 8;

/** Nombre maximum de mots d'une cellule d'option */
const OPTION_CELL_MAX_WORDS = 8;

/** Ligne de réponse en fin de texte ("Nom : ______") */
const INLINE_ANSWER_SPACE = /\s*(?:[_…]{3,}|\.{4,})$/;

const GLYPH_CELL = new RegExp(`^(?:[${CHECKBOX_GLYPHS}${RADIO_GLYPHS}]|\\d{1,2})?$`);

// ============================================================================
// PATTERNS
// ============================================================================

/**
 * Reconnaît une numérotation de question.
 *
 * @example
 * matchQuestionNumbering('Q3. Quel âge avez-vous ?', DEFAULT_MARKERS);
 * // { number: '3', style: 'prefixed', text: 'Quel âge avez-vous ?' }
 */
export function matchQuestionNumbering(
	text: string,
	markers: SurveyMarkers
): { number: string; style: NumberingStyle; text: string } | null {
	for (const rule of markers.questionNumbering) {
		const groups = rule.pattern.exec(text)?.groups;
		if (groups?.number && groups.text) {
			return { number: groups.number, style: rule.style, text: groups.text };
		}
	}
	return null;
}

/**
 * Reconnaît un marqueur d'option en tête de ligne (y compris numérique).
 *
 * @example
 * matchOptionMarker('□ Presse écrite', DEFAULT_MARKERS);
 * // { kind: 'checkbox', label: 'Presse écrite', value: null, selection: 'multiple' }
 */
export function matchOptionMarker(
	text: string,
	markers: SurveyMarkers
): { kind: OptionMarkerKind; label: string; value: string | null; selection: SelectionKind } | null {
	for (const rule of markers.optionMarkers) {
		const groups = rule.pattern.exec(text)?.groups;
		if (groups?.label) {
			return {
				kind: rule.kind,
				label: groups.label,
				value: groups.value ?? null,
				selection: rule.selection,
			};
		}
	}
	return null;
}

/**
 * Indique si un bloc ressemble à une option (utilisé en lookahead).
 * Les marqueurs numériques ne comptent pas : "1." annonce plus souvent une question.
 */
export function isOptionLike(block: Block | undefined, markers: SurveyMarkers): boolean {
	if (!block || block.kind !== 'text' || block.text === '') {
		return false;
	}
	if ((block.hints.listLevel ?? 0) >= 1) {
		return true;
	}
	const marker = matchOptionMarker(block.text, markers);
	return marker !== null && marker.kind !== 'numeric';
}

function isQuestionNumbered(block: Block | undefined, markers: SurveyMarkers): boolean {
	return block?.kind === 'text' && matchQuestionNumbering(block.text, markers) !== null;
}

function isRuledLine(block: Block | undefined): boolean {
	return block?.kind === 'text' && block.text !== '' && isRuledText(block.text);
}

/** Paragraphe vide (espace de réponse) ou fin du document */
function isBlankOrEnd(block: Block | undefined): boolean {
	return block === undefined || (block.kind === 'text' && block.text === '');
}

function matchesTrailingCode(block: Block | undefined, markers: SurveyMarkers): boolean {
	return (
		block?.kind === 'text' &&
		matchQuestionNumbering(block.text, markers) === null &&
		markers.trailingCode.test(block.text)
	);
}

// ============================================================================
// RÈGLES
// ============================================================================

const blankRule: ClassifierRule = {
	name: 'blank',
	classify(block) {
		if (block.kind !== 'text' || (block.text !== '' && !isRuledText(block.text))) {
			return null;
		}
		return { kind: 'blank', ruled: block.hints.ruled === true };
	},
};

const titleRule: ClassifierRule = {
	name: 'title',
	classify(block, context) {
		if (block.kind !== 'text' || context.state !== 'NoSection' || context.hasTitle) {
			return null;
		}
		return isDocumentTitleStyle(block.hints.styleId) ? { kind: 'title', text: block.text } : null;
	},
};

const sectionRule: ClassifierRule = {
	name: 'section',
	classify(block, context) {
		if (block.kind !== 'text') {
			return null;
		}
		const { text, hints } = block;
		const { markers } = context;
		const numbered = matchQuestionNumbering(text, markers) !== null;

		if (hints.headingLevel !== undefined && !numbered) {
			return { kind: 'section', title: text, heading: true };
		}

		if (markers.sectionKeyword.test(text)) {
			return { kind: 'section', title: text, heading: false };
		}

		// Ligne courte isolée suivie d'une question numérotée
		const standalone =
			countWords(text) <= STANDALONE_SECTION_MAX_WORDS &&
			!/[?:;,.]$/.test(text) &&
			(hints.bold === true || hints.underline === true || isAllCaps(text) || context.question === null) &&
			!numbered &&
			matchOptionMarker(text, markers) === null &&
			!markers.answerLogic.test(text) &&
			!markers.typeHints.some((rule) => rule.pattern.test(text)) &&
			isQuestionNumbered(context.next, markers);

		return standalone ? { kind: 'section', title: text, heading: false } : null;
	},
};

const logicRule: ClassifierRule = {
	name: 'logic',
	classify(block, context) {
		if (block.kind !== 'text') {
			return null;
		}
		const condition = context.markers.answerLogic.exec(block.text)?.groups?.condition;
		return condition ? { kind: 'logic', condition: condition.trim() } : null;
	},
};

const typeHintRule: ClassifierRule = {
	name: 'typeHint',
	classify(block, context) {
		if (block.kind !== 'text') {
			return null;
		}
		const hint = context.markers.typeHints.find((rule) => rule.pattern.test(block.text));
		return hint ? { kind: 'typeHint', hint } : null;
	},
};

const questionRule: ClassifierRule = {
	name: 'question',
	classify(block, context) {
		if (block.kind !== 'text') {
			return null;
		}
		const { markers, question } = context;

		const numbering = matchQuestionNumbering(block.text, markers);
		if (numbering) {
			return questionFrom(numbering.text, numbering.number, numbering.style);
		}

		// Une question ouverte sans option ni ligne de réponse se poursuit
		const mayOpen = question === null || question.optionCount > 0 || question.blankAfter;

		// Liste automatique de premier niveau
		if (block.hints.listLevel === 0 && (mayOpen || question?.numberingStyle === 'list')) {
			return questionFrom(block.text, null, 'list');
		}

		if (!mayOpen) {
			return null;
		}

		const questionLike =
			block.text.endsWith('?') ||
			INLINE_ANSWER_SPACE.test(block.text) ||
			isOptionLike(context.next, markers) ||
			isRuledLine(context.next) ||
			(question !== null && question.optionCount > 0 && isBlankOrEnd(context.next));

		return questionLike ? questionFrom(block.text, null, null) : null;
	},
};

function questionFrom(
	text: string,
	number: string | null,
	style: NumberingStyle | null
): BlockClassification {
	const stripped = text.replace(INLINE_ANSWER_SPACE, '');
	return {
		kind: 'question',
		number,
		style,
		text: stripped,
		answerSpace: stripped !== text,
	};
}

const optionRule: ClassifierRule = {
	name: 'option',
	classify(block, context) {
		const { question, markers, next } = context;
		if (block.kind !== 'text' || question === null) {
			return null;
		}

		const marker = matchOptionMarker(block.text, markers);
		if (marker && (marker.kind !== 'numeric' || acceptsNumericOption(question))) {
			return {
				kind: 'option',
				label: marker.label,
				value: marker.value,
				marker: marker.kind,
				selection: marker.selection,
			};
		}

		const listLevel = block.hints.listLevel;
		const listOption =
			listLevel !== undefined &&
			(listLevel >= 1 || question.numberingStyle !== 'list') &&
			matchQuestionNumbering(block.text, markers) === null;
		if (listOption) {
			return { kind: 'option', label: block.text, value: null, marker: 'list', selection: 'neutral' };
		}

		if (matchesTrailingCode(block, markers)) {
			const runStarted = question.runMarker === 'trailing-code';
			const runStarts =
				question.optionCount === 0 && (matchesTrailingCode(next, markers) || isOptionLike(next, markers));
			const groups = markers.trailingCode.exec(block.text)?.groups;
			if ((runStarted || runStarts) && groups?.label && groups.value) {
				return {
					kind: 'option',
					label: groups.label,
					value: groups.value,
					marker: 'trailing-code',
					selection: 'neutral',
				};
			}
		}

		return null;
	},
};

/**
 * "1." est une option si la série est déjà numérique, ou si la question
 * n'a encore ni option ni ligne de réponse et n'est pas elle-même numérotée "N.".
 */
function acceptsNumericOption(question: OpenQuestionView): boolean {
	if (question.runMarker === 'numeric') {
		return true;
	}
	return question.optionCount === 0 && !question.answerSpace && question.numberingStyle !== 'plain';
}

const tableRule: ClassifierRule = {
	name: 'optionTable',
	classify(block, context) {
		if (block.kind !== 'table' || context.question === null) {
			return null;
		}
		return classifyTable(block, context.markers);
	},
};

const continuationRule: ClassifierRule = {
	name: 'continuation',
	classify(block) {
		return block.kind === 'text' ? { kind: 'continuation', text: block.text } : null;
	},
};

const unrecognizedRule: ClassifierRule = {
	name: 'unrecognized',
	classify(block) {
		return block.kind === 'table' ? { kind: 'unrecognized' } : null;
	},
};

// ============================================================================
// TABLEAUX
// ============================================================================

/**
 * Classe un tableau placé sous une question : matrice, paires
 * (libellé, code), cellules d'options courtes, ou rien.
 */
export function classifyTable(block: TableBlock, markers: SurveyMarkers): BlockClassification | null {
	const rows = block.rows.filter((row) => row.some((cell) => cell !== ''));
	if (rows.length === 0) {
		return null;
	}

	return matchMatrix(rows) ?? matchCodedPairs(rows) ?? matchLabelCells(rows, markers);
}

/**
 * Grille : coin supérieur gauche vide, au moins 2 colonnes libellées,
 * lignes libellées, cellules vides ou réduites à un symbole / un code.
 */
function matchMatrix(rows: string[][]): BlockClassification | null {
	const [header, ...body] = rows;
	if (header.length < 3 || header[0] !== '' || body.length === 0) {
		return null;
	}

	const columns = header.slice(1);
	if (columns.some((label) => label === '')) {
		return null;
	}

	const isGridRow = (row: string[]): boolean =>
		row.length === header.length && row[0] !== '' && row.slice(1).every((cell) => GLYPH_CELL.test(cell));

	if (!body.every(isGridRow)) {
		return null;
	}

	return { kind: 'matrix', columns, rows: body.map((row) => row[0]) };
}

/**
 * Lignes de 2 ou 4 cellules (libellé, code) : "Homme | 1".
 */
function matchCodedPairs(rows: string[][]): BlockClassification | null {
	const options: OptionCandidate[] = [];

	for (const row of rows) {
		if (row.length !== 2 && row.length !== 4) {
			return null;
		}
		for (let i = 0; i < row.length; i += 2) {
			const [label, code] = [row[i], row[i + 1]];
			if (label === '' && code === '') {
				continue;
			}
			if (label === '' || !/^(?:\d{1,3}|[A-Za-z])$/.test(code)) {
				return null;
			}
			options.push({ label, value: code });
		}
	}

	return options.length > 0 ? { kind: 'optionTable', options } : null;
}

/**
 * Cellules courtes, une option par cellule non vide (lecture ligne par ligne).
 */
function matchLabelCells(rows: string[][], markers: SurveyMarkers): BlockClassification | null {
	const options: OptionCandidate[] = [];

	for (const cell of rows.flat()) {
		if (cell === '') {
			continue;
		}
		if (countWords(cell) > OPTION_CELL_MAX_WORDS || cell.endsWith('?')) {
			return null;
		}
		// Sans code explicite, le code est la position de l'option
		const marker = matchOptionMarker(cell, markers);
		const value = marker?.value ?? String(options.length + 1);
		options.push({ label: marker ? marker.label : cell, value });
	}

	return options.length > 0 ? { kind: 'optionTable', options } : null;
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/** Ordre des règles hors question ouverte */
const DEFAULT_ORDER: ClassifierRule[] = [
	blankRule,
	titleRule,
	sectionRule,
	logicRule,
	typeHintRule,
	questionRule,
	optionRule,
	tableRule,
	continuationRule,
	unrecognizedRule,
];

/** Ordre quand une question est ouverte : l'option passe avant la question */
const OPEN_QUESTION_ORDER: ClassifierRule[] = [
	blankRule,
	titleRule,
	sectionRule,
	logicRule,
	typeHintRule,
	optionRule,
	tableRule,
	questionRule,
	continuationRule,
	unrecognizedRule,
];

/**
 * Classe un bloc : la première règle applicable gagne.
 *
 * @param block - Bloc courant
 * @param context - État du parser et bloc suivant
 * @returns La classification (jamais null : continuation / unrecognized en dernier recours)
 *
 * @example
 * classifyBlock(block, { state: 'InSection', hasTitle: false, question: null, next, markers });
 * // { kind: 'question', number: '1', style: 'plain', text: 'Sexe', answerSpace: false }
 */
export function classifyBlock(block: Block, context: ClassifierContext): BlockClassification {
	const rules = context.question === null ? DEFAULT_ORDER : OPEN_QUESTION_ORDER;

	for (const rule of rules) {
		const classification = rule.classify(block, context);
		if (classification) {
			return classification;
		}
	}

	return block.kind === 'text' ? { kind: 'continuation', text: block.text } : { kind: 'unrecognized' };
}

