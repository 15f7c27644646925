/**
 * ============================================================================
 * UTILITAIRES XML - Lecture du XML Word et écriture de XML
 * ============================================================================
 *
 * Ce module contient les fonctions utilitaires pour lire le XML des documents
 * Word (DOCX) et pour produire du XML valide. Les fichiers DOCX sont des
 * archives ZIP contenant des fichiers XML, principalement word/document.xml.
 *
 * STRUCTURE XML WORD (pour les développeurs juniors) :
 * ----------------------------------------------------
 * - <w:body>  : Corps du document (paragraphes et tableaux de premier niveau)
 * - <w:p>     : Paragraphe (paragraph)
 * - <w:r>     : Run - une portion de texte avec un formatage uniforme
 * - <w:t>     : Texte brut (text)
 * - <w:sym>   : Symbole d'une police (Wingdings : cases à cocher, ronds)
 * - <w:tbl>   : Tableau (table), <w:tr> ligne, <w:tc> cellule
 * - <w:pPr>   : Propriétés de paragraphe, <w:rPr> propriétés de run
 *
 * EXEMPLE DE STRUCTURE XML :
 * ```xml
 * <w:p>                                      <!-- Paragraphe -->
 *   <w:r>
 *     <w:sym w:font="Wingdings" w:char="F0A8"/>  <!-- Case à cocher -->
 *   </w:r>
 *   <w:r><w:t xml:space="preserve"> Oui</w:t></w:r>
 * </w:p>
 * ```
 *
 * @version 2.0.0
 */

import { mapSymbolGlyph } from './text.utils';

// ============================================================================
// EXTRACTION DE TEXTE
// ============================================================================

/**
 * Extrait le texte visible d'un contenu XML Word.
 *
 * Parcourt dans l'ordre les éléments <w:t> (texte), <w:sym> (symbole),
 * <w:tab/> et <w:br/> (convertis en espace). Les entités XML sont décodées.
 *
 * @param xmlContent - Contenu XML à analyser
 * @returns Le texte extrait, concaténé (non normalisé)
 *
 * @example
 * const xml = '<w:p><w:r><w:t>Hello </w:t></w:r><w:r><w:t>World</w:t></w:r></w:p>';
 * const text = extractTextFromXml(xml); // "Hello World"
 */
export function extractTextFromXml(xmlContent: string): string {
	const textParts: string[] = [];

	// Note: [^>]* permet de gérer les attributs comme xml:space="preserve"
	const tokenRegex = /<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>|<w:sym\b([^>]*)\/>|<w:(?:tab|br|cr)\b[^>]*\/>/g;

	let match;
	while ((match = tokenRegex.exec(xmlContent)) !== null) {
		if (match[1] !== undefined) {
			textParts.push(decodeXmlEntities(match[1]));
		} else if (match[2] !== undefined) {
			const charMatch = match[2].match(/w:char="([0-9A-Fa-f]+)"/);
			const glyph = charMatch ? mapSymbolGlyph(charMatch[1]) : '';
			if (glyph) {
				textParts.push(glyph);
			}
		} else {
			textParts.push(' ');
		}
	}

	return textParts.join('');
}

// ============================================================================
// RECONSTRUCTION DE TEXTE FRAGMENTÉ
// ============================================================================

/**
 * Reconstruit le texte fragmenté dans les runs XML.
 *
 * PROBLÈME RÉSOLU :
 * Word fragmente parfois le texte en plusieurs éléments <w:t> pour des raisons
 * de formatage ou de vérification orthographique. Par exemple, "1.2" peut
 * devenir "<w:t>1</w:t><w:t>.2</w:t>", ce qui casse la détection des numéros.
 *
 * Cette fonction fusionne les éléments <w:t> consécutifs dans un même <w:r>.
 *
 * @param xml - Le XML à reconstruire
 * @returns Le XML avec le texte reconstruit
 *
 * @example
 * // Avant: <w:r><w:t>1</w:t><w:t>.2</w:t></w:r>
 * // Après: <w:r><w:t>1.2</w:t></w:r>
 */
export function reconstructFragmentedText(xml: string): string {
	const runRegex = /(<w:r(?:\s[^>]*)?>)([\s\S]*?)(<\/w:r>)/g;

	return xml.replace(runRegex, (fullMatch: string, openingTag: string, content: string, closingTag: string) => {
		const textElements: Array<{ full: string; text: string; attrs: string }> = [];
		const textTagRegex = /<w:t(\s[^>]*)?>([^<]*)<\/w:t>/g;

		let textMatch;
		while ((textMatch = textTagRegex.exec(content)) !== null) {
			textElements.push({
				full: textMatch[0],
				text: textMatch[2],
				attrs: textMatch[1] ?? '',
			});
		}

		if (textElements.length <= 1) {
			return fullMatch;
		}

		const combinedText = textElements.map((element) => element.text).join('');
		const attrs = textElements[0].attrs;

		let newContent = content;
		for (let i = textElements.length - 1; i >= 0; i--) {
			newContent = newContent.replace(
				textElements[i].full,
				i === 0 ? `<w:t${attrs}>${combinedText}</w:t>` : ''
			);
		}

		return openingTag + newContent + closingTag;
	});
}

// ============================================================================
// PARCOURS DES ÉLÉMENTS
// ============================================================================

/**
 * Élément XML de premier niveau trouvé dans un conteneur.
 */
export interface XmlElementSpan {
	/** Nom qualifié (ex: "w:p", "w:tbl") */
	name: string;

	/** XML complet de l'élément, balises incluses */
	xml: string;

	/** Position de début dans le conteneur */
	start: number;
}

/**
 * Parcourt les éléments enfants directs (parmi `names`) d'un contenu XML, dans l'ordre.
 *
 * Les éléments imbriqués du même nom (tableau dans une cellule) sont gérés
 * par comptage de profondeur : seul l'élément de premier niveau est produit.
 * Le parcours est paresseux (générateur).
 *
 * @param xml - Contenu XML (ex: contenu de <w:body>)
 * @param names - Noms des éléments à retourner (ex: ['w:p', 'w:tbl'])
 * @returns Éléments de premier niveau, dans l'ordre du document
 *
 * @example
 * [...iterateTopLevelElements('<w:p/><w:tbl>...</w:tbl>', ['w:p', 'w:tbl'])];
 * // [{ name: 'w:p', xml: '<w:p/>', start: 0 }, { name: 'w:tbl', ... }]
 */
export function* iterateTopLevelElements(xml: string, names: string[]): Generator<XmlElementSpan, void, undefined> {
	const alternatives = names.map(escapeRegExp).join('|');
	const openRegex = new RegExp(`<(${alternatives})(?=[\\s/>])[^>]*?(/?)>`, 'g');

	let match;
	while ((match = openRegex.exec(xml)) !== null) {
		const name = match[1];
		const start = match.index;

		if (match[2] === '/') {
			yield { name, xml: match[0], start };
			continue;
		}

		const end = findClosingTagEnd(xml, name, openRegex.lastIndex);
		openRegex.lastIndex = end;
		yield { name, xml: xml.substring(start, end), start };
	}
}

/**
 * Retourne le contenu d'un élément sans ses balises ouvrante et fermante.
 *
 * @example
 * innerXml('<w:tc><w:p/></w:tc>'); // '<w:p/>'
 * innerXml('<w:p/>');              // ''
 */
export function innerXml(elementXml: string): string {
	const openEnd = elementXml.indexOf('>');
	if (openEnd === -1 || elementXml[openEnd - 1] === '/') {
		return '';
	}
	const closeStart = elementXml.lastIndexOf('</');
	return closeStart > openEnd ? elementXml.substring(openEnd + 1, closeStart) : elementXml.substring(openEnd + 1);
}

/**
 * Trouve la fin de la balise fermante correspondant à un élément ouvert.
 * Retourne la longueur du XML si l'élément n'est jamais fermé.
 */
function findClosingTagEnd(xml: string, name: string, from: number): number {
	const tagRegex = new RegExp(`<(/?)${escapeRegExp(name)}(?=[\\s/>])[^>]*?(/?)>`, 'g');
	tagRegex.lastIndex = from;

	let depth = 1;
	let match;
	while ((match = tagRegex.exec(xml)) !== null) {
		if (match[1] === '/') {
			depth--;
		} else if (match[2] !== '/') {
			depth++;
		}

		if (depth === 0) {
			return tagRegex.lastIndex;
		}
	}

	return xml.length;
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// ============================================================================
// ÉCHAPPEMENT XML
// ============================================================================

/**
 * Échappe les caractères spéciaux pour les inclure dans du XML.
 *
 * Les caractères <, >, &, " et ' ont une signification spéciale en XML
 * et doivent être échappés pour apparaître en tant que texte.
 *
 * @param value - La chaîne à échapper
 * @returns La chaîne avec les caractères spéciaux échappés
 *
 * @example
 * escapeXml('A & B');   // "A &amp; B"
 * escapeXml('<tag>');   // "&lt;tag&gt;"
 * escapeXml('"test"');  // "&quot;test&quot;"
 */
export function escapeXml(value: string): string {
	return value
		.replace(/&/g, '&amp;') // & doit être premier (sinon on échapperait les autres)
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;')
		.replace(/'/g, '&apos;');
}

/**
 * Décode les entités XML prédéfinies et les références numériques.
 *
 * @example
 * decodeXmlEntities('A &amp; B &#8211; C'); // "A & B – C"
 */
export function decodeXmlEntities(value: string): string {
	return value.replace(/&(amp|lt|gt|quot|apos|#\d+|#x[0-9A-Fa-f]+);/g, (entity: string, body: string) => {
		switch (body) {
			case 'amp':
				return '&';
			case 'lt':
				return '<';
			case 'gt':
				return '>';
			case 'quot':
				return '"';
			case 'apos':
				return "'";
			default: {
				const codePoint = body.startsWith('#x')
					? parseInt(body.substring(2), 16)
					: parseInt(body.substring(1), 10);
				return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
			}
		}
	});
}

/**
 * Retourne le premier caractère interdit en XML 1.0 (même sous forme de
 * référence numérique), ou null si la chaîne est représentable.
 *
 * Interdits : caractères de contrôle hors \t \n \r, U+FFFE, U+FFFF,
 * et surrogates UTF-16 isolés.
 *
 * @example
 * findInvalidXmlChar('Bonjour');       // null
 * findInvalidXmlChar('A\u0001B');      // { index: 1, codePoint: 1 }
 */
export function findInvalidXmlChar(value: string): { index: number; codePoint: number } | null {
	for (let i = 0; i < value.length; i++) {
		const code = value.charCodeAt(i);

		if (code >= 0xd800 && code <= 0xdbff) {
			const next = value.charCodeAt(i + 1);
			if (next >= 0xdc00 && next <= 0xdfff) {
				i++;
				continue;
			}
			return { index: i, codePoint: code };
		}

		const forbidden =
			(code < 0x20 && code !== 0x09 && code !== 0x0a && code !== 0x0d) ||
			(code >= 0xdc00 && code <= 0xdfff) ||
			code === 0xfffe ||
			code === 0xffff;

		if (forbidden) {
			return { index: i, codePoint: code };
		}
	}

	return null;
}
