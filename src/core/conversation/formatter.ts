/**
 * Display normalization of model output.
 *
 * `stripEscapes` is a blunt de-escape: it deletes every backslash, including
 * ones that belong to code or paths.
 */

const BULLET = '•';

export function stripEscapes(text: string): string {
	return text.replaceAll('\\', '');
}

/**
 * Rewrites `-` list items to `•` bullets and trims every line. Each output line,
 * the last one included, ends with a newline.
 */
export function normalizeLists(text: string): string {
	const lines = text.split('\n');
	// A trailing newline ends the last line rather than starting an empty one
	if (lines.length > 1 && lines[lines.length - 1] === '') {
		lines.pop();
	}

	return lines.map(line => normalizeLine(line) + '\n').join('');
}

function normalizeLine(line: string): string {
	const trimmed = line.trim();
	if (trimmed.startsWith('-')) {
		return `${BULLET} ${trimmed.slice(1).trim()}`;
	}
	// Numbered items (1. to 5.) keep their marker and are only trimmed
	return trimmed;
}

/**
 * Full outbound pipeline: list normalization, then escape stripping.
 */
export function formatReply(raw: string): string {
	return stripEscapes(normalizeLists(raw));
}
