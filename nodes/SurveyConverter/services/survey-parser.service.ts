/**
 * ============================================================================
 * SURVEY PARSER SERVICE - Construction du modèle de questionnaire
 * ============================================================================
 *
 * Ce service consomme la suite de blocs du document en UN SEUL passage, avec
 * un bloc d'avance (lookahead), et assemble l'arbre Section → Question → Option.
 *
 * MACHINE À ÉTATS :
 * ```
 *   NoSection  --section-->  InSection
 *   NoSection  --question--> InQuestion   (section implicite créée)
 *   InSection  --section-->  InSection
 *   InSection  --question--> InQuestion
 *   InQuestion --section-->  InSection
 *   InQuestion --question--> InQuestion
 * ```
 * Les autres classifications (option, tableau, indication de type, ligne
 * vide, continuation) ne changent pas l'état.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Le parser ne revient jamais en arrière
 * - Les blocs avant la première section/question sont ignorés avec un
 *   avertissement (jamais d'erreur bloquante)
 * - Les types de question sont déduits à la fermeture de la question
 *
 * @version 1.0.0
 */

import type {
	Block,
	MatrixRow,
	Option,
	ParseWarning,
	ParseWarningCode,
	ParsedSurvey,
	Question,
	Section,
} from '../../shared/types';
import { NoQuestionsFoundError } from '../../shared/errors';
import { appendText, truncate } from '../../shared/utils';
import {
	classifyBlock,
	type BlockClassification,
	type OpenQuestionView,
	type OptionCandidate,
	type ParserState,
} from './block-classifier.service';
import {
	resolveMarkers,
	type NumberingStyle,
	type OptionMarkerKind,
	type SelectionKind,
	type SurveyMarkers,
	type TypeHintRule,
} from './markers.config';
import { detectRequired, inferQuestionType, isExclusiveLabel } from './type-inference.service';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Options du parser.
 */
export interface ParserOptions {
	/** Surcharge partielle des marqueurs reconnus */
	markers?: Partial<SurveyMarkers>;

	/** Affiche la classification de chaque bloc dans la console */
	verbose?: boolean;
}

interface OptionDraft extends OptionCandidate {
	marker: OptionMarkerKind;
	selection: SelectionKind;
}

interface QuestionDraft {
	position: number;
	number: string | null;
	numberingStyle: NumberingStyle | null;
	text: string;
	condition: string | null;
	options: OptionDraft[];
	rows: string[];
	matrix: boolean;
	hint: TypeHintRule | null;
	/** Ligne tracée après la question */
	ruledSpace: boolean;
	/** Ligne vide (ou tracée) après la question */
	blankAfter: boolean;
}

interface SectionDraft {
	title: string;
	/** Titre de style Titre 1..6 : il ne se prolonge pas */
	heading: boolean;
	implicit: boolean;
	questions: QuestionDraft[];
}

type Transition = 'section' | 'question';

/** Transitions explicites de la machine à états */
const TRANSITIONS: Record<ParserState, Record<Transition, ParserState>> = {
	NoSection: { section: 'InSection', question: 'InQuestion' },
	InSection: { section: 'InSection', question: 'InQuestion' },
	InQuestion: { section: 'InSection', question: 'InQuestion' },
};

const SENTENCE_END = /[.!?:]$/;

// ============================================================================
// LOOKAHEAD
// ============================================================================

/**
 * Itérateur avec un élément d'avance.
 */
export class PeekableIterator<T> {
	private readonly iterator: Iterator<T>;
	private buffered: IteratorResult<T> | null = null;

	constructor(iterable: Iterable<T>) {
		this.iterator = iterable[Symbol.iterator]();
	}

	peek(): T | undefined {
		if (this.buffered === null) {
			this.buffered = this.iterator.next();
		}
		return this.buffered.done ? undefined : this.buffered.value;
	}

	next(): T | undefined {
		const value = this.peek();
		if (this.buffered !== null && !this.buffered.done) {
			this.buffered = null;
		}
		return value;
	}
}

// ============================================================================
// FONCTION PRINCIPALE
// ============================================================================

/**
 * Construit le modèle de questionnaire à partir des blocs du document.
 *
 * @param blocks - Blocs du document (consommés une seule fois)
 * @param options - Options du parser
 * @returns Le modèle et les avertissements, dans l'ordre de détection
 * @throws EmptyDocumentError propagée depuis le lecteur
 * @throws NoQuestionsFoundError si aucune question n'est détectée
 *
 * @example
 * const { blocks } = openDocument(buffer);
 * const { model, warnings } = parseSurvey(blocks);
 * console.log(model.sections[0].questions.length);
 */
export function parseSurvey(blocks: Iterable<Block>, options: ParserOptions = {}): ParsedSurvey {
	const parser = new SurveyParser(resolveMarkers(options.markers), options.verbose ?? false);
	return parser.parse(blocks);
}

// ============================================================================
// PARSER
// ============================================================================

/**
 * Parser à états. Une instance par document : l'état n'est jamais partagé.
 */
export class SurveyParser {
	private state: ParserState = 'NoSection';
	private title: string | null = null;
	private readonly sections: SectionDraft[] = [];
	private section: SectionDraft | null = null;
	private question: QuestionDraft | null = null;
	private pendingCondition: { condition: string; position: number } | null = null;
	private readonly warnings: ParseWarning[] = [];
	private blockCount = 0;

	constructor(
		private readonly markers: SurveyMarkers,
		private readonly verbose: boolean = false
	) {}

	parse(blocks: Iterable<Block>): ParsedSurvey {
		const iterator = new PeekableIterator(blocks);

		let block = iterator.next();
		while (block !== undefined) {
			this.blockCount++;
			const classification = classifyBlock(block, {
				state: this.state,
				hasTitle: this.title !== null,
				question: this.openQuestionView(),
				next: iterator.peek(),
				markers: this.markers,
			});

			if (this.verbose) {
				console.log(`   [${block.position}] ${this.state} → ${classification.kind}`);
			}

			this.apply(classification, block);
			block = iterator.next();
		}

		if (this.pendingCondition) {
			this.warn(
				'unattached-logic',
				`Logique "${this.pendingCondition.condition}" sans question qui la suive`,
				this.pendingCondition.position
			);
		}

		const sections = this.buildSections();
		const questionCount = sections.reduce((total, section) => total + section.questions.length, 0);
		if (questionCount === 0) {
			throw new NoQuestionsFoundError(this.blockCount);
		}

		if (this.verbose) {
			console.log(`✅ Parsing terminé: ${sections.length} section(s), ${questionCount} question(s)`);
		}

		return {
			model: { title: this.title, sections },
			warnings: this.warnings,
		};
	}

	// ========================================================================
	// APPLICATION DES CLASSIFICATIONS
	// ========================================================================

	private apply(classification: BlockClassification, block: Block): void {
		const position = block.position;

		switch (classification.kind) {
			case 'blank':
				if (this.question) {
					this.question.blankAfter = true;
					if (classification.ruled || (block.kind === 'text' && block.text !== '')) {
						this.question.ruledSpace = true;
					}
				}
				break;

			case 'title':
				this.title = classification.text;
				break;

			case 'section':
				this.openSection(classification.title, false, classification.heading);
				this.transition('section');
				break;

			case 'logic':
				if (this.pendingCondition) {
					this.warn(
						'unattached-logic',
						`Logique "${this.pendingCondition.condition}" remplacée avant toute question`,
						this.pendingCondition.position
					);
				}
				this.pendingCondition = { condition: classification.condition, position };
				break;

			case 'typeHint':
				if (this.question) {
					this.question.hint = classification.hint;
				} else {
					this.warn('orphan-type-hint', 'Indication de type hors de toute question', position);
				}
				break;

			case 'question':
				this.openQuestion(classification, position);
				this.transition('question');
				break;

			case 'option':
				this.addOption({
					label: classification.label,
					value: classification.value,
					marker: classification.marker,
					selection: classification.selection,
				});
				break;

			case 'optionTable':
				for (const option of classification.options) {
					this.addOption({ ...option, marker: 'table', selection: 'neutral' });
				}
				break;

			case 'matrix':
				if (this.question) {
					this.question.matrix = true;
					this.question.rows.push(...classification.rows);
					for (const column of classification.columns) {
						this.addOption({ label: column, value: null, marker: 'table', selection: 'neutral' });
					}
				}
				break;

			case 'continuation':
				this.appendContinuation(classification.text, position);
				break;

			case 'unrecognized':
				if (this.state === 'NoSection') {
					this.warn('skipped-block', `Tableau ignoré avant la première section (position ${position})`, position);
				} else {
					this.warn('unrecognized-table', `Tableau non reconnu à la position ${position}`, position);
				}
				break;
		}
	}

	private transition(event: Transition): void {
		this.state = TRANSITIONS[this.state][event];
	}

	private openSection(title: string, implicit: boolean, heading = false): SectionDraft {
		this.question = null;
		const section: SectionDraft = { title, heading, implicit, questions: [] };
		this.sections.push(section);
		this.section = section;
		return section;
	}

	private openQuestion(
		classification: Extract<BlockClassification, { kind: 'question' }>,
		position: number
	): void {
		const section = this.section ?? this.openSection('', true);

		const question: QuestionDraft = {
			position,
			number: classification.number,
			numberingStyle: classification.style,
			text: classification.text,
			condition: this.pendingCondition?.condition ?? null,
			options: [],
			rows: [],
			matrix: false,
			hint: null,
			ruledSpace: classification.answerSpace,
			blankAfter: classification.answerSpace,
		};

		this.pendingCondition = null;
		section.questions.push(question);
		this.question = question;
	}

	private addOption(option: OptionDraft): void {
		if (this.question) {
			this.question.options.push(option);
		}
	}

	/**
	 * Ajoute le texte à la dernière entité ouverte : dernière option, sinon
	 * texte de la question, sinon titre de section (sauf titre issu d'un style
	 * de titre ou texte terminé comme une phrase : le bloc est alors ignoré).
	 */
	private appendContinuation(text: string, position: number): void {
		if (this.question) {
			const lastOption = this.question.options[this.question.options.length - 1];
			if (lastOption && !this.question.matrix) {
				lastOption.label = appendText(lastOption.label, text);
			} else {
				this.question.text = appendText(this.question.text, text);
			}
			return;
		}

		if (this.section) {
			// Une phrase après le titre est une consigne, pas la suite du titre
			if (this.section.heading || SENTENCE_END.test(text)) {
				this.warn(
					'skipped-block',
					`Texte ignoré dans la section "${truncate(this.section.title, 40)}" (position ${position}) : "${truncate(text, 60)}"`,
					position
				);
				return;
			}
			this.section.title = appendText(this.section.title, text);
			return;
		}

		this.warn('skipped-block', `Bloc ignoré avant la première section (position ${position}) : "${truncate(text, 60)}"`, position);
	}

	private openQuestionView(): OpenQuestionView | null {
		if (!this.question) {
			return null;
		}
		const { options } = this.question;
		return {
			numberingStyle: this.question.numberingStyle,
			optionCount: options.length,
			runMarker: options.length > 0 ? options[0].marker : null,
			answerSpace: this.question.ruledSpace,
			blankAfter: this.question.blankAfter,
		};
	}

	private warn(code: ParseWarningCode, message: string, position?: number): void {
		this.warnings.push(position === undefined ? { code, message } : { code, message, position });
	}

	// ========================================================================
	// CONSTRUCTION DU MODÈLE
	// ========================================================================

	private buildSections(): Section[] {
		const usedIds = new Set<string>();
		let ordinal = 0;

		return this.sections.map((section, index) => ({
			id: `S${index + 1}`,
			title: section.title,
			implicit: section.implicit,
			questions: section.questions.map((draft) => {
				ordinal++;
				return this.buildQuestion(draft, ordinal, usedIds);
			}),
		}));
	}

	private buildQuestion(draft: QuestionDraft, ordinal: number, usedIds: Set<string>): Question {
		const { text, required } = detectRequired(draft.text, this.markers);
		const inferred = inferQuestionType(
			{
				text,
				options: draft.options,
				selections: draft.options.map((option) => option.selection),
				hint: draft.hint,
				matrix: draft.matrix,
				answerSpace: draft.blankAfter,
			},
			this.markers
		);

		if (inferred.uncertain) {
			this.warn(
				'uncertain-type',
				`Type de la question "${truncate(text, 40)}" non déterminé malgré ${draft.options.length} option(s)`,
				draft.position
			);
		}

		const candidates: OptionCandidate[] = draft.options.length > 0 ? draft.options : inferred.syntheticOptions;
		const optionPrefix = inferred.type === 'matrix' ? 'c' : 'r';
		const options: Option[] = candidates.map((candidate, index) => ({
			id: `${optionPrefix}${index + 1}`,
			label: candidate.label,
			value: candidate.value,
			exclusive: isExclusiveLabel(candidate.label, this.markers),
		}));

		const rows: MatrixRow[] =
			inferred.type === 'matrix' ? draft.rows.map((label, index) => ({ id: `r${index + 1}`, label })) : [];

		return {
			id: this.questionId(draft, ordinal, usedIds),
			number: draft.number,
			text,
			type: inferred.type,
			options,
			rows,
			required,
			condition: draft.condition,
			constraints: inferred.constraints,
		};
	}

	/**
	 * Identifiant stable : "Q" + numérotation ("1.4a" → "Q1x4a"), sinon
	 * "Q" + rang de la question. En cas de doublon, le rang est ajouté.
	 */
	private questionId(draft: QuestionDraft, ordinal: number, usedIds: Set<string>): string {
		const base = draft.number ? `Q${draft.number.replace(/\./g, 'x')}` : `Q${ordinal}`;
		let id = base;

		if (usedIds.has(id)) {
			id = `${base}_${ordinal}`;
			this.warn('duplicate-question-id', `Identifiant ${base} en double, renommé en ${id}`, draft.position);
		}

		usedIds.add(id);
		return id;
	}
}
