import { NodeOperationError, type IBinaryData, type INode } from 'n8n-workflow';
import { describe, expect, it, vi } from 'vitest';

import { SurveyConverter, runSurveyConverter, type SurveyConverterContext } from '../SurveyConverter.node';
import { buildDocx } from './helpers/docx-builder';

describe('SurveyConverter node description', () => {
	const { description } = new SurveyConverter();

	it('reads the questionnaire from the "data" binary property by default', () => {
		expect(description.name).toBe('surveyConverter');
		expect(description.properties[0]).toMatchObject({ name: 'binaryProperty', default: 'data', required: true });
	});

	it('exposes the conversion options', () => {
		const options = description.properties.find((property) => property.name === 'options');
		const names = options?.options?.map((option) => option.name);

		expect(names).toEqual([
			'jsonIndent',
			'includeJsonBinary',
			'includeXmlBinary',
			'outputBaseName',
			'useDocumentTitle',
			'strictMode',
			'verbose',
		]);
	});
});

// ============================================================================
// EXÉCUTION
// ============================================================================

const NODE: INode = {
	id: 'node-1',
	name: 'Survey Converter',
	type: 'n8n-nodes-survey-converter.surveyConverter',
	typeVersion: 1,
	position: [0, 0],
	parameters: {},
};

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

interface ContextSetup {
	buffer?: Buffer;
	options?: Record<string, unknown>;
	continueOnFail?: boolean;
	withBinary?: boolean;
}

function createContext({ buffer, options = {}, continueOnFail = false, withBinary = true }: ContextSetup = {}) {
	const document = buffer ?? buildDocx(['Q1. Sexe', '○ Homme', '○ Femme']);
	const parameters: Record<string, unknown> = { binaryProperty: 'data', options };

	const getBinaryDataBuffer = vi.fn(async (_itemIndex: number, _propertyName: string) => document);
	const prepareBinaryData = vi.fn(
		async (binaryData: Buffer, filePath?: string, mimeType?: string): Promise<IBinaryData> => ({
			data: binaryData.toString('base64'),
			fileName: filePath,
			mimeType: mimeType ?? 'application/octet-stream',
		})
	);

	const ctx: SurveyConverterContext = {
		getInputData: () => [
			withBinary
				? { json: {}, binary: { data: { data: '', mimeType: DOCX_MIME, fileName: 'enquete.docx' } } }
				: { json: {} },
		],
		getNodeParameter: (name, _itemIndex, fallbackValue) => (name in parameters ? parameters[name] : fallbackValue),
		getNode: () => NODE,
		continueOnFail: () => continueOnFail,
		helpers: { getBinaryDataBuffer, prepareBinaryData },
	};

	return { ctx, getBinaryDataBuffer, prepareBinaryData };
}

async function executionError(ctx: SurveyConverterContext): Promise<unknown> {
	try {
		await runSurveyConverter(ctx);
	} catch (error) {
		return error;
	}
	throw new Error('exécution terminée sans erreur');
}

describe('runSurveyConverter', () => {
	it('returns the survey and both artifacts named after the source document', async () => {
		const { ctx, getBinaryDataBuffer, prepareBinaryData } = createContext();

		const [[item]] = await runSurveyConverter(ctx);

		expect(getBinaryDataBuffer).toHaveBeenCalledWith(0, 'data');
		expect(item.pairedItem).toEqual({ item: 0 });
		expect(item.json).toMatchObject({ success: true, filename: 'enquete.docx', warnings: [] });
		expect(item.json.survey).toMatchObject({
			title: null,
			sections: [{ id: 'S1', questions: [{ id: 'Q1', type: 'single-choice' }] }],
		});
		expect(prepareBinaryData.mock.calls.map(([, fileName, mimeType]) => [fileName, mimeType])).toEqual([
			['enquete.json', 'application/json'],
			['enquete.xml', 'application/xml'],
		]);
		expect(Object.keys(item.binary ?? {})).toEqual(['json', 'xml']);
	});

	it('applies the output base name and the include flags', async () => {
		const { ctx, prepareBinaryData } = createContext({
			options: { outputBaseName: 'export_2024', includeXmlBinary: false, jsonIndent: 0 },
		});

		const [[item]] = await runSurveyConverter(ctx);

		expect(Object.keys(item.binary ?? {})).toEqual(['json']);
		expect(item.binary?.json.fileName).toBe('export_2024.json');
		const [[written]] = prepareBinaryData.mock.calls;
		expect(written.toString('utf8').startsWith('{"title":null,"sections":[')).toBe(true);
	});

	it('fails on warnings in strict mode', async () => {
		const { ctx } = createContext({
			buffer: buildDocx(['(Single Answer)', 'Q1. Sexe ?', '']),
			options: { strictMode: true },
		});

		const error = await executionError(ctx);

		expect(error).toBeInstanceOf(NodeOperationError);
		expect(error instanceof Error && error.message).toBe(
			'Conversion avec 1 avertissement(s) en mode strict : Indication de type hors de toute question'
		);
	});

	it('reports a failed conversion with its error code', async () => {
		const { ctx } = createContext({ buffer: Buffer.from('pas un docx') });

		const error = await executionError(ctx);

		expect(error).toBeInstanceOf(NodeOperationError);
		expect(error instanceof NodeOperationError && error.context.errorCode).toBe('UNREADABLE_DOCUMENT');
	});

	it('returns the failure as an item when the workflow continues on fail', async () => {
		const { ctx } = createContext({ buffer: Buffer.from('pas un docx'), continueOnFail: true });

		const [[item]] = await runSurveyConverter(ctx);

		expect(item).toEqual({
			json: { success: false, error: expect.any(String), errorCode: 'UNREADABLE_DOCUMENT' },
			pairedItem: { item: 0 },
		});
	});

	it('rejects an item without the binary property', async () => {
		const { ctx, getBinaryDataBuffer } = createContext({ withBinary: false });

		const error = await executionError(ctx);

		expect(error).toBeInstanceOf(NodeOperationError);
		expect(error instanceof Error && error.message).toContain('Aucun document trouvé dans la propriété binaire "data".');
		expect(getBinaryDataBuffer).not.toHaveBeenCalled();
	});

	it('rejects an invalid indent before reading the document', async () => {
		const { ctx, getBinaryDataBuffer } = createContext({ options: { jsonIndent: 12 } });

		const error = await executionError(ctx);

		expect(error instanceof Error && error.message).toBe('Options invalides : jsonIndent doit être un entier entre 0 et 10');
		expect(getBinaryDataBuffer).not.toHaveBeenCalled();
	});
});
