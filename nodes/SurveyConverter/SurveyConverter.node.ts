/**
 * ============================================================================
 * SURVEY CONVERTER - Nœud n8n pour convertir un questionnaire DOCX
 * ============================================================================
 *
 * Ce nœud convertit un questionnaire Word (DOCX) en deux représentations
 * structurées : un modèle JSON (sections, questions, options, types,
 * contraintes) et sa projection XML.
 *
 * WORKFLOW TYPIQUE :
 * 1. Un nœud de lecture (Read Binary File, HTTP, Drive...) fournit le DOCX
 * 2. SurveyConverter produit le JSON et le XML
 * 3. Les nœuds suivants stockent les fichiers ou exploitent le JSON
 *
 * ENTRÉES :
 * - Document DOCX dans une propriété binaire
 *
 * SORTIE :
 * - json : { success, filename, survey, warnings, stats }
 * - binary.json / binary.xml : les artefacts (optionnels)
 *
 * @version 1.0.0
 */

import {
	type IBinaryData,
	type IExecuteFunctions,
	type INode,
	type INodeExecutionData,
	type INodeType,
	type INodeTypeDescription,
	NodeConnectionTypes,
	NodeOperationError,
} from 'n8n-workflow';

import type { ConversionSuccess } from '../shared';
import { convertSurvey, toJsonDocument, validateConversionOptions } from './services';

// ============================================================================
// INTERFACES LOCALES
// ============================================================================

/**
 * Options du nœud extraites des paramètres.
 */
interface NodeOptions {
	jsonIndent: number;
	includeJsonBinary: boolean;
	includeXmlBinary: boolean;
	outputBaseName: string;
	useDocumentTitle: boolean;
	strictMode: boolean;
	verbose: boolean;
}

/**
 * Partie du contexte d'exécution n8n utilisée par la conversion.
 * IExecuteFunctions la satisfait.
 */
export interface SurveyConverterContext {
	getInputData(): INodeExecutionData[];
	getNodeParameter(parameterName: string, itemIndex: number, fallbackValue?: unknown): unknown;
	getNode(): INode;
	continueOnFail(): boolean;
	helpers: {
		getBinaryDataBuffer(itemIndex: number, propertyName: string): Promise<Buffer>;
		prepareBinaryData(binaryData: Buffer, filePath?: string, mimeType?: string): Promise<IBinaryData>;
	};
}

// ============================================================================
// DÉFINITION DU NŒUD
// ============================================================================

export class SurveyConverter implements INodeType {
	/**
	 * Description du nœud pour l'interface n8n.
	 */
	description: INodeTypeDescription = {
		// Identification
		displayName: 'Survey Converter',
		name: 'surveyConverter',
		group: ['transform'],
		version: 1,
		subtitle: 'Questionnaire DOCX → JSON / XML',

		// Description
		description:
			"Convertit un questionnaire Word (DOCX) en modèle JSON structuré et en XML. " +
			'Détecte sections, questions, options, types de question et contraintes.',

		// Configuration par défaut
		defaults: {
			name: 'Survey Converter',
		},

		// Entrées/Sorties
		inputs: [{ displayName: '', type: NodeConnectionTypes.Main }],
		outputs: [{ displayName: '', type: NodeConnectionTypes.Main }],

		// Paramètres
		properties: [
			// ==================== DOCUMENT SOURCE ====================
			{
				displayName: 'Questionnaire',
				name: 'binaryProperty',
				type: 'string',
				default: 'data',
				required: true,
				description: 'Nom de la propriété binaire contenant le questionnaire DOCX à convertir.',
			},

			// ==================== OPTIONS ====================
			{
				displayName: 'Options',
				name: 'options',
				type: 'collection',
				placeholder: 'Ajouter une option',
				default: {},
				options: [
					{
						displayName: 'Indentation JSON',
						name: 'jsonIndent',
						type: 'number',
						typeOptions: { minValue: 0, maxValue: 10 },
						default: 2,
						description: 'Nombre d\'espaces d\'indentation du JSON produit (0 = compact).',
					},
					{
						displayName: 'Inclure le Fichier JSON',
						name: 'includeJsonBinary',
						type: 'boolean',
						default: true,
						description: 'Ajoute le JSON en propriété binaire "json".',
					},
					{
						displayName: 'Inclure le Fichier XML',
						name: 'includeXmlBinary',
						type: 'boolean',
						default: true,
						description: 'Ajoute le XML en propriété binaire "xml".',
					},
					{
						displayName: 'Nom de Base des Fichiers',
						name: 'outputBaseName',
						type: 'string',
						default: '',
						placeholder: 'ex: enquete_2024',
						description:
							'Nom des fichiers générés (sans extension). Si vide, utilise le nom du document source.',
					},
					{
						displayName: 'Titre depuis les Propriétés',
						name: 'useDocumentTitle',
						type: 'boolean',
						default: true,
						description:
							'Utilise le titre des propriétés du document si aucun paragraphe de style "Titre" n\'est trouvé.',
					},
					{
						displayName: 'Mode Strict',
						name: 'strictMode',
						type: 'boolean',
						default: false,
						description: "Fait échouer l'item si la conversion produit des avertissements.",
					},
					{
						displayName: 'Mode Verbeux',
						name: 'verbose',
						type: 'boolean',
						default: false,
						description: 'Affiche les étapes de la conversion dans les logs du serveur n8n.',
					},
				],
			},
		],
	};

	// ============================================================================
	// EXÉCUTION DU NŒUD
	// ============================================================================

	/**
	 * Point d'entrée principal du nœud.
	 */
	async execute(this: IExecuteFunctions): Promise<INodeExecutionData[][]> {
		return runSurveyConverter(this);
	}
}

/**
 * Convertit chaque item d'entrée.
 */
export async function runSurveyConverter(ctx: SurveyConverterContext): Promise<INodeExecutionData[][]> {
	const items = ctx.getInputData();
	const returnData: INodeExecutionData[] = [];

	for (let itemIndex = 0; itemIndex < items.length; itemIndex++) {
		try {
			const result = await processItem(ctx, itemIndex, items[itemIndex]);
			returnData.push(result);
		} catch (error) {
			if (ctx.continueOnFail()) {
				returnData.push({
					json: {
						success: false,
						error: error instanceof Error ? error.message : String(error),
						errorCode: extractErrorCode(error),
					},
					pairedItem: { item: itemIndex },
				});
			} else {
				throw error;
			}
		}
	}

	return [returnData];
}

// ============================================================================
// FONCTIONS DE TRAITEMENT
// ============================================================================

/**
 * Traite un item individuel.
 *
 * @param ctx - Le contexte d'exécution n8n
 * @param itemIndex - Index de l'item
 * @param item - Les données de l'item
 * @returns Le résultat du traitement
 */
async function processItem(
	ctx: SurveyConverterContext,
	itemIndex: number,
	item: INodeExecutionData
): Promise<INodeExecutionData> {
	// ============================================================
	// ÉTAPE 1: Récupérer les paramètres
	// ============================================================

	const binaryProperty = ctx.getNodeParameter('binaryProperty', itemIndex) as string;
	const options = extractOptions(ctx, itemIndex);

	const validation = validateConversionOptions({ jsonIndent: options.jsonIndent });
	if (!validation.isValid) {
		throw new NodeOperationError(ctx.getNode(), `Options invalides : ${validation.errors.join(', ')}`, {
			itemIndex,
		});
	}

	// ============================================================
	// ÉTAPE 2: Charger le document DOCX
	// ============================================================

	const { buffer, filename } = await loadDocument(ctx, itemIndex, item, binaryProperty);

	// ============================================================
	// ÉTAPE 3: Convertir
	// ============================================================

	const result = convertSurvey(buffer, {
		jsonIndent: options.jsonIndent,
		useDocumentTitle: options.useDocumentTitle,
		verbose: options.verbose,
	});

	if (!result.success) {
		const nodeError = new NodeOperationError(ctx.getNode(), result.error, {
			itemIndex,
			message: result.error.message,
			description: `Code : ${result.error.code}`,
		});
		nodeError.context.errorCode = result.error.code;
		throw nodeError;
	}

	if (options.strictMode && result.warnings.length > 0) {
		throw new NodeOperationError(
			ctx.getNode(),
			`Conversion avec ${result.warnings.length} avertissement(s) en mode strict : ${result.warnings[0]}`,
			{ itemIndex }
		);
	}

	// ============================================================
	// ÉTAPE 4: Préparer la sortie
	// ============================================================

	const baseName = options.outputBaseName || filename.replace(/\.docx$/i, '');

	return {
		json: {
			success: true,
			filename,
			survey: toJsonDocument(result.model),
			warnings: result.warnings,
			stats: result.stats,
		},
		binary: await prepareArtifacts(ctx, result, baseName, options),
		pairedItem: { item: itemIndex },
	};
}

// ============================================================================
// FONCTIONS UTILITAIRES
// ============================================================================

/**
 * Extrait les options du nœud.
 */
function extractOptions(ctx: SurveyConverterContext, itemIndex: number): NodeOptions {
	const options = ctx.getNodeParameter('options', itemIndex, {}) as {
		jsonIndent?: number;
		includeJsonBinary?: boolean;
		includeXmlBinary?: boolean;
		outputBaseName?: string;
		useDocumentTitle?: boolean;
		strictMode?: boolean;
		verbose?: boolean;
	};

	return {
		jsonIndent: options.jsonIndent ?? 2,
		includeJsonBinary: options.includeJsonBinary !== false,
		includeXmlBinary: options.includeXmlBinary !== false,
		outputBaseName: options.outputBaseName || '',
		useDocumentTitle: options.useDocumentTitle !== false,
		strictMode: options.strictMode || false,
		verbose: options.verbose || false,
	};
}

/**
 * Charge le document DOCX depuis les données binaires.
 */
async function loadDocument(
	ctx: SurveyConverterContext,
	itemIndex: number,
	item: INodeExecutionData,
	binaryProperty: string
): Promise<{ buffer: Buffer; filename: string }> {
	const binaryData = item.binary?.[binaryProperty];

	if (!binaryData) {
		throw new NodeOperationError(
			ctx.getNode(),
			`Aucun document trouvé dans la propriété binaire "${binaryProperty}". ` +
				"Assurez-vous qu'un questionnaire DOCX est connecté en entrée.",
			{ itemIndex }
		);
	}

	const buffer = await ctx.helpers.getBinaryDataBuffer(itemIndex, binaryProperty);
	return { buffer, filename: binaryData.fileName || 'questionnaire.docx' };
}

/**
 * Prépare les artefacts JSON et XML en données binaires n8n.
 */
async function prepareArtifacts(
	ctx: SurveyConverterContext,
	result: ConversionSuccess,
	baseName: string,
	options: NodeOptions
): Promise<NonNullable<INodeExecutionData['binary']>> {
	const binary: NonNullable<INodeExecutionData['binary']> = {};

	if (options.includeJsonBinary) {
		binary.json = await ctx.helpers.prepareBinaryData(
			Buffer.from(result.json, 'utf8'),
			`${baseName}.json`,
			'application/json'
		);
	}

	if (options.includeXmlBinary) {
		binary.xml = await ctx.helpers.prepareBinaryData(
			Buffer.from(result.xml, 'utf8'),
			`${baseName}.xml`,
			'application/xml'
		);
	}

	return binary;
}

/**
 * Code de l'erreur de conversion, s'il existe.
 */
function extractErrorCode(error: unknown): string | null {
	if (error instanceof NodeOperationError && typeof error.context.errorCode === 'string') {
		return error.context.errorCode;
	}
	return null;
}
