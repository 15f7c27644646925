/**
 * ============================================================================
 * UTILITAIRES DOCX - Ouverture des documents Word
 * ============================================================================
 *
 * Ce module contient les fonctions de haut niveau pour ouvrir un document
 * DOCX (archive ZIP) et lire ses parties XML. Il s'appuie sur xml.utils.
 *
 * @version 2.0.0
 */

import PizZip from 'pizzip';
import type { DocumentProperties } from '../types';
import { decodeXmlEntities, reconstructFragmentedText } from './xml.utils';

/** Signature des fichiers OLE2 (ancien format binaire .doc) */
const OLE2_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

// ============================================================================
// CHARGEMENT DE DOCUMENTS
// ============================================================================

/**
 * Indique si le buffer est un document Word binaire (.doc, format OLE2).
 *
 * @example
 * isLegacyWordBinary(fs.readFileSync('ancien.doc')); // true
 */
export function isLegacyWordBinary(buffer: Buffer): boolean {
	if (buffer.length < OLE2_SIGNATURE.length) {
		return false;
	}
	return OLE2_SIGNATURE.every((byte, index) => buffer[index] === byte);
}

/**
 * Charge un document DOCX et extrait son contenu XML principal.
 *
 * @param buffer - Le buffer du fichier DOCX
 * @returns Un objet contenant le zip et le XML du document
 * @throws Error si l'archive est illisible ou sans word/document.xml
 *
 * @example
 * const { zip, xml } = loadDocxContent(buffer);
 * // xml contient le contenu de word/document.xml
 */
export function loadDocxContent(buffer: Buffer): { zip: PizZip; xml: string } {
	const zip = new PizZip(buffer);
	const documentFile = zip.file('word/document.xml');

	if (!documentFile) {
		throw new Error(
			'Le fichier DOCX ne contient pas de document.xml. ' +
			'Vérifiez que le fichier est un document Word valide.'
		);
	}

	// Reconstruire le texte fragmenté pour faciliter la détection des numéros
	const xml = reconstructFragmentedText(documentFile.asText());

	return { zip, xml };
}

// ============================================================================
// PROPRIÉTÉS DU DOCUMENT
// ============================================================================

/**
 * Lit les propriétés du document depuis docProps/core.xml.
 * Une partie absente donne un objet vide (elle est optionnelle dans un DOCX).
 *
 * @param zip - L'archive du document
 * @returns Titre, auteur et dates si présents
 */
export function extractCoreProperties(zip: PizZip): DocumentProperties {
	const properties: DocumentProperties = {};
	const coreXml = zip.file('docProps/core.xml')?.asText();

	if (!coreXml) {
		return properties;
	}

	const read = (pattern: RegExp): string | undefined => {
		const match = coreXml.match(pattern);
		const value = match ? decodeXmlEntities(match[1]).trim() : '';
		return value || undefined;
	};

	const title = read(/<dc:title>([^<]*)<\/dc:title>/);
	if (title) properties.title = title;

	const author = read(/<dc:creator>([^<]*)<\/dc:creator>/);
	if (author) properties.author = author;

	const created = read(/<dcterms:created[^>]*>([^<]*)<\/dcterms:created>/);
	if (created) properties.created = created;

	const modified = read(/<dcterms:modified[^>]*>([^<]*)<\/dcterms:modified>/);
	if (modified) properties.modified = modified;

	return properties;
}
