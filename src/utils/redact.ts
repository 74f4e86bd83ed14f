export const MASK = "***";

// Values shorter than this would mask ordinary text.
const MIN_SECRET_LENGTH = 3;

export type SecretMasker = (text: string) => string;

export function collectSecretValues(secrets: Record<string, string>): string[] {
	const values = new Set<string>();
	for (const value of Object.values(secrets)) {
		for (const candidate of [value, ...value.split(/\r?\n/)]) {
			const trimmed = candidate.trim();
			if (trimmed.length >= MIN_SECRET_LENGTH) {
				values.add(trimmed);
			}
		}
	}
	return [...values].sort((a, b) => b.length - a.length);
}

export function createSecretMasker(secrets: Record<string, string>): SecretMasker {
	const values = collectSecretValues(secrets);
	if (values.length === 0) {
		return (text) => text;
	}
	const pattern = new RegExp(values.map(escapeRegExp).join("|"), "g");
	return (text) => text.replace(pattern, MASK);
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
