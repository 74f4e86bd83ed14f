const REGEX_SPECIALS = /[.+^${}()|\\[\]]/;

// `*` stays within one path segment, `**` crosses separators.
export function globToRegExp(pattern: string): RegExp {
	let source = "";
	for (let i = 0; i < pattern.length; i += 1) {
		const char = pattern[i];
		if (char === "*") {
			if (pattern[i + 1] === "*") {
				const followedBySlash = pattern[i + 2] === "/";
				source += followedBySlash ? "(?:.*/)?" : ".*";
				i += followedBySlash ? 2 : 1;
			} else {
				source += "[^/]*";
			}
			continue;
		}
		if (char === "?") {
			source += "[^/]";
			continue;
		}
		if (char === "[") {
			const close = pattern.indexOf("]", i + 1);
			if (close > i + 1) {
				source += `[${pattern.slice(i + 1, close).replace(/\\/g, "\\\\")}]`;
				i = close;
				continue;
			}
		}
		source += REGEX_SPECIALS.test(char) ? `\\${char}` : char;
	}
	return new RegExp(`^${source}$`);
}

export function matchesGlob(value: string, pattern: string): boolean {
	return globToRegExp(pattern).test(value);
}

export function hasGlobMagic(pattern: string): boolean {
	return /[*?[]/.test(pattern);
}

// Patterns apply in order; a later `!pattern` excludes, a later positive pattern re-includes.
export function matchesPatternList(value: string, patterns: string[]): boolean {
	let matched = false;
	for (const pattern of patterns) {
		if (pattern.startsWith("!")) {
			if (matchesGlob(value, pattern.slice(1))) {
				matched = false;
			}
		} else if (matchesGlob(value, pattern)) {
			matched = true;
		}
	}
	return matched;
}
