import path from 'path';
import fs from 'fs/promises';

import { IDocument } from '../../types';

const VERBATIM_EXTENSIONS = ['md', 'txt', 'json'];
const MARKUP_EXTENSIONS = ['html', 'htm'];

const ENTITIES: Record<string, string> = {
	'&nbsp;': ' ',
	'&amp;': '&',
	'&lt;': '<',
	'&gt;': '>',
	'&quot;': '"',
	'&#39;': "'",
	'&apos;': "'",
};

/**
 * Extracts readable text from an HTML page: scripts, styles and comments are dropped,
 * block-level boundaries become newlines, remaining tags are removed.
 */
export const htmlToText = (html: string): string => {
	let text = html;
	text = text.replace(/<script\b[^>]*>[\s\S]*?<\/script>/gi, ' ');
	text = text.replace(/<style\b[^>]*>[\s\S]*?<\/style>/gi, ' ');
	text = text.replace(/<!--[\s\S]*?-->/g, ' ');
	text = text.replace(/<br\s*\/?\s*>/gi, '\n');
	text = text.replace(/<\/?(p|div|li|ul|ol|tr|table|section|form|label|h[1-6]|title|button|option|select)\b[^>]*>/gi, '\n');
	text = text.replace(/<[^>]+>/g, ' ');
	text = text.replace(/&(nbsp|amp|lt|gt|quot|#39|apos);/g, (entity) => ENTITIES[entity] ?? entity);

	return text
		.replace(/\r/g, '')
		.replace(/[ \t]+/g, ' ')
		.split('\n')
		.map((line) => line.trim())
		.filter(Boolean)
		.join('\n');
};

/**
 * Reads a document, picking the decoding by extension:
 * md/txt/json verbatim, html/htm text-extracted, anything else decoded as UTF-8
 * with invalid byte sequences dropped.
 */
export const readDocument = async (filePath: string): Promise<IDocument> => {
	const filename = path.basename(filePath);
	const ext = path.extname(filePath).slice(1).toLowerCase();

	if (VERBATIM_EXTENSIONS.includes(ext)) {
		return { filename, text: await fs.readFile(filePath, 'utf-8') };
	}

	if (MARKUP_EXTENSIONS.includes(ext)) {
		return { filename, text: htmlToText(await fs.readFile(filePath, 'utf-8')) };
	}

	const bytes = await fs.readFile(filePath);
	return { filename, text: new TextDecoder('utf-8', { fatal: false }).decode(bytes).replace(/\uFFFD/g, '') };
};
