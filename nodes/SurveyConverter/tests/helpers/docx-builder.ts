/**
 * Construction de documents DOCX en mémoire pour les tests.
 */

import PizZip from 'pizzip';
import type { Block, StyleHints, TableBlock, TextBlock } from '../../../shared/types';

export interface ParagraphOptions {
	text?: string;
	style?: string;
	bold?: boolean;
	/** Liste automatique : niveau (ilvl) */
	listLevel?: number;
	/** Bordure basse (ligne de réponse) */
	bottomBorder?: boolean;
	/** XML brut des runs, à la place de `text` */
	runsXml?: string;
}

export type BodyPart = string | ParagraphOptions | { table: string[][] } | { rawXml: string };

const CONTENT_TYPES =
	'<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
	'<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
	'<Default Extension="xml" ContentType="application/xml"/>' +
	'<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
	'</Types>';

function escape(value: string): string {
	return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function paragraphXml(part: ParagraphOptions | string): string {
	const p: ParagraphOptions = typeof part === 'string' ? { text: part } : part;
	const props: string[] = [];

	if (p.style) props.push(`<w:pStyle w:val="${p.style}"/>`);
	if (p.listLevel !== undefined) {
		props.push(`<w:numPr><w:ilvl w:val="${p.listLevel}"/><w:numId w:val="1"/></w:numPr>`);
	}
	if (p.bottomBorder) {
		props.push('<w:pBdr><w:bottom w:val="single" w:sz="4" w:space="1" w:color="auto"/></w:pBdr>');
	}

	const pPr = props.length > 0 ? `<w:pPr>${props.join('')}</w:pPr>` : '';
	const rPr = p.bold ? '<w:rPr><w:b/></w:rPr>' : '';
	const runs =
		p.runsXml ?? (p.text ? `<w:r>${rPr}<w:t xml:space="preserve">${escape(p.text)}</w:t></w:r>` : '');

	return `<w:p>${pPr}${runs}</w:p>`;
}

export function tableXml(rows: string[][]): string {
	const body = rows
		.map((row) => `<w:tr>${row.map((cell) => `<w:tc>${paragraphXml(cell)}</w:tc>`).join('')}</w:tr>`)
		.join('');
	return `<w:tbl><w:tblPr/>${body}</w:tbl>`;
}

function bodyXml(body: BodyPart[]): string {
	return body
		.map((part) => {
			if (typeof part === 'string') return paragraphXml(part);
			if ('table' in part) return tableXml(part.table);
			if ('rawXml' in part) return part.rawXml;
			return paragraphXml(part);
		})
		.join('');
}

/**
 * Construit un DOCX minimal (document.xml + propriétés optionnelles).
 */
export function buildDocx(body: BodyPart[], properties: { title?: string } = {}): Buffer {
	const zip = new PizZip();
	zip.file('[Content_Types].xml', CONTENT_TYPES);
	zip.file(
		'word/document.xml',
		'<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
			'<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">' +
			`<w:body>${bodyXml(body)}<w:sectPr/></w:body></w:document>`
	);

	if (properties.title !== undefined) {
		zip.file(
			'docProps/core.xml',
			'<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
				'<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" ' +
				'xmlns:dc="http://purl.org/dc/elements/1.1/">' +
				`<dc:title>${escape(properties.title)}</dc:title><dc:creator>test-author</dc:creator>` +
				'</cp:coreProperties>'
		);
	}

	return zip.generate({ type: 'nodebuffer' });
}

// ============================================================================
// BLOCS (sans passer par un DOCX)
// ============================================================================

/**
 * Construit une suite de blocs avec des positions consécutives.
 */
export function blocks(...parts: Array<string | { text: string; hints: StyleHints } | { table: string[][] }>): Block[] {
	return parts.map((part, position): Block => {
		if (typeof part === 'string') {
			return textBlock(part, {}, position);
		}
		if ('table' in part) {
			const table: TableBlock = { kind: 'table', position, rows: part.table };
			return table;
		}
		return textBlock(part.text, part.hints, position);
	});
}

export function textBlock(text: string, hints: StyleHints = {}, position = 0): TextBlock {
	return { kind: 'text', position, text, hints };
}

export function heading(text: string): { text: string; hints: StyleHints } {
	return { text, hints: { styleId: 'Heading1', headingLevel: 1 } };
}
