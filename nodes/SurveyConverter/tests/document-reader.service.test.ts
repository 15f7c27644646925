import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import PizZip from 'pizzip';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { EmptyDocumentError, UnreadableDocumentError } from '../../shared/errors';
import { openDocument, readDocumentFile } from '../services';
import { buildDocx } from './helpers/docx-builder';

vi.mock('fs', async (importOriginal) => {
	const actual = await importOriginal<typeof import('fs')>();
	return {
		...actual,
		closeSync: vi.fn(actual.closeSync),
		readSync: vi.fn(actual.readSync),
	};
});

describe('openDocument', () => {
	it('reads paragraphs and tables as ordered blocks', () => {
		const buffer = buildDocx([
			{ text: 'Profil', style: 'Heading1' },
			'Q1. Sexe',
			{ table: [['Homme', '1'], ['Femme', '2']] },
			'',
		]);

		const { blocks } = openDocument(buffer);

		expect([...blocks]).toEqual([
			{ kind: 'text', position: 0, text: 'Profil', hints: { styleId: 'Heading1', headingLevel: 1 } },
			{ kind: 'text', position: 1, text: 'Q1. Sexe', hints: {} },
			{ kind: 'table', position: 2, rows: [['Homme', '1'], ['Femme', '2']] },
			{ kind: 'text', position: 3, text: '', hints: {} },
		]);
	});

	it('unwraps content controls and keeps positions consecutive', () => {
		const buffer = buildDocx([
			'Avant',
			{ rawXml: '<w:sdt><w:sdtPr/><w:sdtContent><w:p><w:r><w:t>Dans le contrôle</w:t></w:r></w:p></w:sdtContent></w:sdt>' },
			'Après',
		]);

		const blocks = [...openDocument(buffer).blocks];

		expect(blocks.map((block) => (block.kind === 'text' ? [block.position, block.text] : null))).toEqual([
			[0, 'Avant'],
			[1, 'Dans le contrôle'],
			[2, 'Après'],
		]);
	});

	it('joins cell paragraphs, flattens nested tables and skips rows without cells', () => {
		const table =
			'<w:tbl><w:tr>' +
			'<w:tc><w:p><w:r><w:t>A</w:t></w:r></w:p><w:p><w:r><w:t>suite</w:t></w:r></w:p></w:tc>' +
			'<w:tc><w:tbl><w:tr><w:tc><w:p><w:r><w:t>imbriqué</w:t></w:r></w:p></w:tc></w:tr></w:tbl></w:tc>' +
			'</w:tr><w:tr></w:tr></w:tbl>';

		const [block] = [...openDocument(buildDocx([{ rawXml: table }])).blocks];

		expect(block).toEqual({ kind: 'table', position: 0, rows: [['A suite', 'imbriqué']] });
	});

	it('reads Wingdings symbols as option glyphs', () => {
		const runs = '<w:r><w:sym w:font="Wingdings" w:char="F0A8"/></w:r><w:r><w:t xml:space="preserve"> Oui</w:t></w:r>';
		const [block] = [...openDocument(buildDocx([{ runsXml: runs }])).blocks];

		expect(block).toMatchObject({ kind: 'text', text: '□ Oui' });
	});

	it('reads the core properties', () => {
		const { properties } = openDocument(buildDocx(['Q1. Age'], { title: 'Enquête & bilan' }));

		expect(properties).toEqual({ title: 'Enquête & bilan', author: 'test-author' });
	});

	it('rejects legacy binary Word documents', () => {
		const legacy = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1, 0x00, 0x00]);

		expect(() => openDocument(legacy)).toThrow(
			new UnreadableDocumentError('format Word binaire (.doc) non supporté. Enregistrez le document au format .docx.')
		);
	});

	it('wraps archive errors with their cause', () => {
		let caught: unknown;
		try {
			openDocument(Buffer.from('not a zip archive'));
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(UnreadableDocumentError);
		expect(caught).toHaveProperty('code', 'UNREADABLE_DOCUMENT');
		expect(caught).toHaveProperty('cause');
	});

	it('rejects an archive without word/document.xml', () => {
		const zip = new PizZip();
		zip.file('readme.txt', 'bonjour');

		expect(() => openDocument(zip.generate({ type: 'nodebuffer' }))).toThrow(UnreadableDocumentError);
	});

	it('signals an empty document once the blocks are exhausted', () => {
		const { blocks } = openDocument(buildDocx(['', { text: '', bottomBorder: true }]));
		const iterator = blocks[Symbol.iterator]();

		expect(iterator.next().value).toMatchObject({ kind: 'text', position: 0 });
		expect(iterator.next().value).toMatchObject({ kind: 'text', position: 1, hints: { ruled: true } });
		expect(() => iterator.next()).toThrow(EmptyDocumentError);
	});
});

describe('readDocumentFile', () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'survey-reader-'));
		vi.mocked(fs.closeSync).mockClear();
		vi.mocked(fs.readSync).mockClear();
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it('reads the whole file and releases the descriptor', () => {
		const filePath = path.join(dir, 'questionnaire.docx');
		const buffer = buildDocx(['Q1. Age']);
		fs.writeFileSync(filePath, buffer);

		expect(readDocumentFile(filePath).equals(buffer)).toBe(true);
		expect(fs.closeSync).toHaveBeenCalledTimes(1);
	});

	it('opens a document from its path', () => {
		const filePath = path.join(dir, 'questionnaire.docx');
		fs.writeFileSync(filePath, buildDocx(['Q1. Age']));

		const [block] = [...openDocument(filePath).blocks];

		expect(block).toMatchObject({ kind: 'text', text: 'Q1. Age' });
	});

	it('releases the descriptor when reading fails', () => {
		const filePath = path.join(dir, 'questionnaire.docx');
		fs.writeFileSync(filePath, buildDocx(['Q1. Age']));
		vi.mocked(fs.readSync).mockImplementationOnce(() => {
			throw new Error('EIO');
		});

		expect(() => readDocumentFile(filePath)).toThrow(
			new UnreadableDocumentError(`lecture du fichier "${filePath}" impossible.`)
		);
		expect(fs.closeSync).toHaveBeenCalledTimes(1);
	});

	it('reports a missing file', () => {
		const filePath = path.join(dir, 'absent.docx');

		expect(() => readDocumentFile(filePath)).toThrow(
			new UnreadableDocumentError(`impossible d'ouvrir le fichier "${filePath}".`)
		);
		expect(fs.closeSync).not.toHaveBeenCalled();
	});
});
