import { describe, it, expect } from 'vitest';
import { formatReply, normalizeLists, stripEscapes } from '../formatter.js';

describe('stripEscapes', () => {
	it('removes every backslash', () => {
		expect(stripEscapes('a\\nb\\\\c')).toBe('anbc');
	});

	it('leaves text without backslashes unchanged', () => {
		expect(stripEscapes('plain text')).toBe('plain text');
	});

	it('removes backslashes that belong to paths', () => {
		expect(stripEscapes('C:\\Users\\me')).toBe('C:Usersme');
	});
});

describe('normalizeLists', () => {
	it('turns dash items into bullets', () => {
		expect(normalizeLists('- a\n- b')).toBe('• a\n• b\n');
	});

	it('trims surrounding whitespace of each line', () => {
		expect(normalizeLists('   -   spaced  \n  text  ')).toBe('• spaced\ntext\n');
	});

	it('bullets an indented dash item without keeping the dash', () => {
		expect(normalizeLists('  - a')).toBe('• a\n');
	});

	it('keeps numbered items and trims them', () => {
		expect(normalizeLists('  1. first\n2. second ')).toBe('1. first\n2. second\n');
	});

	it('treats a trailing newline as the end of the last line', () => {
		expect(normalizeLists('- a\n- b\n')).toBe('• a\n• b\n');
	});

	it('appends a newline to single-line text', () => {
		expect(normalizeLists('Hi there')).toBe('Hi there\n');
	});

	it('keeps blank lines between paragraphs', () => {
		expect(normalizeLists('one\n\ntwo')).toBe('one\n\ntwo\n');
	});

	it('renders an empty text as a single newline', () => {
		expect(normalizeLists('')).toBe('\n');
	});

	it('turns a dash without content into a bare bullet', () => {
		expect(normalizeLists('-')).toBe('• \n');
	});
});

describe('formatReply', () => {
	it('normalizes lists and then strips escapes', () => {
		expect(formatReply('- item \\*one\\*\n2. two')).toBe('• item *one*\n2. two\n');
	});

	it('formats a plain greeting', () => {
		expect(formatReply('Hi there')).toBe('Hi there\n');
	});
});
