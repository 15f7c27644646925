/**
 * ============================================================================
 * DOCUMENT READER SERVICE - Lecture d'un DOCX en suite de blocs
 * ============================================================================
 *
 * Ce service ouvre un document Word (chemin ou buffer) et produit, à la
 * demande, la suite ordonnée de ses blocs de premier niveau : paragraphes
 * (texte + indices de style) et tableaux (lignes de cellules). Il n'interprète
 * pas le questionnaire : c'est le rôle du survey-parser.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Le fichier est lu puis refermé immédiatement (try/finally)
 * - Les blocs sont produits par un générateur : un seul passage, dans l'ordre
 * - Un .doc binaire (ancien format) est refusé : seul le DOCX est supporté
 * - Les contrôles de contenu (<w:sdt>) sont "dépliés"
 *
 * @version 1.0.0
 */

import * as fs from 'fs';
import type PizZip from 'pizzip';
import type { Block, DocumentSource, TableBlock, TextBlock } from '../../shared/types';
import { EmptyDocumentError, UnreadableDocumentError } from '../../shared/errors';
import {
	detectStyleHints,
	extractCoreProperties,
	extractTextFromXml,
	innerXml,
	isLegacyWordBinary,
	iterateTopLevelElements,
	loadDocxContent,
	normalizeText,
} from '../../shared/utils';

// ============================================================================
// FONCTION PRINCIPALE
// ============================================================================

/**
 * Ouvre un document DOCX et prépare la lecture de ses blocs.
 *
 * @param source - Chemin du fichier ou buffer du DOCX
 * @returns Les blocs (paresseux) et les propriétés du document
 * @throws UnreadableDocumentError si le conteneur ne peut pas être ouvert
 *
 * @example
 * const { blocks, properties } = openDocument('questionnaire.docx');
 * for (const block of blocks) {
 *   console.log(block.kind, block.position);
 * }
 */
export function openDocument(source: string | Buffer): DocumentSource {
	const buffer = typeof source === 'string' ? readDocumentFile(source) : source;

	if (isLegacyWordBinary(buffer)) {
		throw new UnreadableDocumentError(
			'format Word binaire (.doc) non supporté. Enregistrez le document au format .docx.'
		);
	}

	let zip: PizZip;
	let xml: string;
	try {
		({ zip, xml } = loadDocxContent(buffer));
	} catch (error) {
		throw new UnreadableDocumentError(
			"le fichier n'est pas un document DOCX valide (archive ZIP corrompue ou format incorrect).",
			error
		);
	}

	const bodyMatch = xml.match(/<w:body>([\s\S]*)<\/w:body>/);

	return {
		blocks: readBlocks(bodyMatch ? bodyMatch[1] : ''),
		properties: extractCoreProperties(zip),
	};
}

// ============================================================================
// LECTURE DU FICHIER
// ============================================================================

/**
 * Lit le fichier en entier. Le descripteur est libéré sur tous les chemins,
 * y compris en cas d'échec de lecture.
 *
 * @param filePath - Chemin du document
 * @returns Contenu du fichier
 * @throws UnreadableDocumentError si le fichier ne peut pas être lu
 */
export function readDocumentFile(filePath: string): Buffer {
	let fd: number;
	try {
		fd = fs.openSync(filePath, 'r');
	} catch (error) {
		throw new UnreadableDocumentError(`impossible d'ouvrir le fichier "${filePath}".`, error);
	}

	try {
		const { size } = fs.fstatSync(fd);
		const buffer = Buffer.alloc(size);

		let offset = 0;
		while (offset < size) {
			const bytesRead = fs.readSync(fd, buffer, offset, size - offset, offset);
			if (bytesRead === 0) break;
			offset += bytesRead;
		}

		return buffer.subarray(0, offset);
	} catch (error) {
		throw new UnreadableDocumentError(`lecture du fichier "${filePath}" impossible.`, error);
	} finally {
		fs.closeSync(fd);
	}
}

// ============================================================================
// PRODUCTION DES BLOCS
// ============================================================================

/**
 * Produit les blocs du corps du document, dans l'ordre.
 *
 * Le contrôle "document vide" a lieu à la fin du parcours : si aucun bloc
 * porteur de contenu n'a été produit, EmptyDocumentError est levée.
 *
 * @param bodyXml - Contenu de <w:body>
 */
function* readBlocks(bodyXml: string): Generator<Block, void, undefined> {
	const counter = { position: 0, contentBlocks: 0 };

	yield* readContainer(bodyXml, counter);

	if (counter.contentBlocks === 0) {
		throw new EmptyDocumentError();
	}
}

/**
 * Parcourt un conteneur (corps ou contenu de <w:sdt>).
 */
function* readContainer(
	containerXml: string,
	counter: { position: number; contentBlocks: number }
): Generator<Block, void, undefined> {
	for (const element of iterateTopLevelElements(containerXml, ['w:p', 'w:tbl', 'w:sdt'])) {
		if (element.name === 'w:sdt') {
			const contentMatch = element.xml.match(/<w:sdtContent>([\s\S]*)<\/w:sdtContent>/);
			if (contentMatch) {
				yield* readContainer(contentMatch[1], counter);
			}
			continue;
		}

		const block =
			element.name === 'w:tbl'
				? parseTableBlock(element.xml, counter.position)
				: parseTextBlock(element.xml, counter.position);

		counter.position++;
		if (hasContent(block)) {
			counter.contentBlocks++;
		}

		yield block;
	}
}

/**
 * Convertit un paragraphe <w:p> en TextBlock.
 */
function parseTextBlock(paragraphXml: string, position: number): TextBlock {
	const text = normalizeText(extractTextFromXml(paragraphXml));

	return {
		kind: 'text',
		position,
		text,
		hints: detectStyleHints(paragraphXml, text),
	};
}

/**
 * Convertit un tableau <w:tbl> en TableBlock.
 * Le texte d'une cellule joint ses paragraphes par un espace ; un tableau
 * imbriqué dans une cellule est aplati dans le texte de cette cellule.
 */
function parseTableBlock(tableXml: string, position: number): TableBlock {
	const rows: string[][] = [];

	for (const row of iterateTopLevelElements(innerXml(tableXml), ['w:tr'])) {
		const cells: string[] = [];

		for (const cell of iterateTopLevelElements(innerXml(row.xml), ['w:tc'])) {
			const paragraphs: string[] = [];
			for (const paragraph of iterateTopLevelElements(innerXml(cell.xml), ['w:p', 'w:tbl'])) {
				paragraphs.push(extractTextFromXml(paragraph.xml));
			}
			cells.push(normalizeText(paragraphs.join(' ')));
		}

		if (cells.length > 0) {
			rows.push(cells);
		}
	}

	return { kind: 'table', position, rows };
}

function hasContent(block: Block): boolean {
	if (block.kind === 'text') {
		return block.text.length > 0;
	}
	return block.rows.some((row) => row.some((cell) => cell.length > 0));
}
