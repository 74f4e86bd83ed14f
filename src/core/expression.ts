import { ExpressionError } from "./errors.js";

export type ExpressionValue =
	| string
	| number
	| boolean
	| null
	| undefined
	| ExpressionValue[]
	| { [key: string]: ExpressionValue };

export type JobStatusFlags = {
	success: boolean;
	failure: boolean;
	cancelled: boolean;
};

export type ExpressionScope = {
	contexts: Record<string, ExpressionValue>;
	status?: JobStatusFlags;
};

type Token =
	| { kind: "punct"; value: string }
	| { kind: "string"; value: string }
	| { kind: "number"; value: number }
	| { kind: "ident"; value: string };

type Node =
	| { type: "literal"; value: ExpressionValue }
	| { type: "context"; name: string }
	| { type: "property"; object: Node; key: Node }
	| { type: "call"; name: string; args: Node[] }
	| { type: "not"; operand: Node }
	| { type: "compare"; op: "==" | "!=" | "<" | "<=" | ">" | ">="; left: Node; right: Node }
	| { type: "logical"; op: "&&" | "||"; left: Node; right: Node };

const STATUS_FUNCTIONS = new Set(["success", "failure", "always", "cancelled"]);
const DEFAULT_STATUS: JobStatusFlags = { success: true, failure: false, cancelled: false };
const PUNCTUATION = ["==", "!=", "<=", ">=", "&&", "||", "(", ")", "[", "]", ",", ".", "!", "<", ">", "*"];

export function evaluateExpression(source: string, scope: ExpressionScope): ExpressionValue {
	return evaluate(parseExpression(source), scope, source);
}

export function evaluateCondition(condition: string | undefined, scope: ExpressionScope): boolean {
	const source = unwrapExpression(condition ?? "").trim();
	const status = scope.status ?? DEFAULT_STATUS;
	if (source.length === 0) {
		return status.success;
	}
	const ast = parseExpression(source);
	const value = isTruthy(evaluate(ast, scope, source));
	return usesStatusFunction(ast) ? value : status.success && value;
}

export function interpolate(template: string, scope: ExpressionScope): string {
	let output = "";
	let cursor = 0;
	while (cursor < template.length) {
		const start = template.indexOf("${{", cursor);
		if (start === -1) {
			output += template.slice(cursor);
			break;
		}
		const end = findExpressionEnd(template, start + 3);
		if (end === -1) {
			throw new ExpressionError("Unterminated ${{", template);
		}
		output += template.slice(cursor, start);
		output += stringifyValue(evaluateExpression(template.slice(start + 3, end), scope));
		cursor = end + 2;
	}
	return output;
}

export function interpolateRecord(
	values: Record<string, string> | undefined,
	scope: ExpressionScope,
): Record<string, string> {
	const result: Record<string, string> = {};
	for (const [key, value] of Object.entries(values ?? {})) {
		result[key] = interpolate(value, scope);
	}
	return result;
}

export function stringifyValue(value: ExpressionValue): string {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "object") {
		return JSON.stringify(value, null, 2);
	}
	return String(value);
}

export function isTruthy(value: ExpressionValue): boolean {
	if (value === null || value === undefined || value === false || value === "") {
		return false;
	}
	if (typeof value === "number") {
		return value !== 0 && !Number.isNaN(value);
	}
	return true;
}

/** Finds the `}}` closing an expression, ignoring braces inside string literals. */
function findExpressionEnd(template: string, from: number): number {
	let inString = false;
	for (let index = from; index < template.length; index += 1) {
		if (template[index] === "'") {
			inString = !inString;
		} else if (!inString && template.startsWith("}}", index)) {
			return index;
		}
	}
	return -1;
}

function unwrapExpression(source: string): string {
	const trimmed = source.trim();
	if (trimmed.startsWith("${{") && trimmed.endsWith("}}") && trimmed.indexOf("${{", 3) === -1) {
		return trimmed.slice(3, -2);
	}
	return trimmed;
}

function tokenize(source: string): Token[] {
	const tokens: Token[] = [];
	let index = 0;
	while (index < source.length) {
		const char = source[index];
		if (/\s/.test(char)) {
			index += 1;
			continue;
		}
		if (char === "'") {
			let value = "";
			index += 1;
			for (;;) {
				if (index >= source.length) {
					throw new ExpressionError("Unterminated string literal", source);
				}
				if (source[index] === "'") {
					if (source[index + 1] === "'") {
						value += "'";
						index += 2;
						continue;
					}
					index += 1;
					break;
				}
				value += source[index];
				index += 1;
			}
			tokens.push({ kind: "string", value });
			continue;
		}
		const previous = tokens.at(-1);
		const numberMatch = /^-?(?:0x[0-9a-fA-F]+|\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)/.exec(source.slice(index));
		// A leading minus is a sign only where an operand is expected.
		const signAllowed =
			previous === undefined || (previous.kind === "punct" && previous.value !== ")" && previous.value !== "]");
		if (
			numberMatch &&
			(char !== "-" || signAllowed) &&
			!(previous?.kind === "punct" && previous.value === ".")
		) {
			const literal = numberMatch[0];
			const value = literal.startsWith("-") ? -Number(literal.slice(1)) : Number(literal);
			tokens.push({ kind: "number", value });
			index += numberMatch[0].length;
			continue;
		}
		const identMatch = /^[A-Za-z_][A-Za-z0-9_-]*/.exec(source.slice(index));
		if (identMatch) {
			tokens.push({ kind: "ident", value: identMatch[0] });
			index += identMatch[0].length;
			continue;
		}
		const punct = PUNCTUATION.find((candidate) => source.startsWith(candidate, index));
		if (!punct) {
			throw new ExpressionError(`Unexpected character "${char}"`, source);
		}
		tokens.push({ kind: "punct", value: punct });
		index += punct.length;
	}
	return tokens;
}

export function parseExpression(source: string): Node {
	const tokens = tokenize(source);
	let position = 0;

	const peek = (): Token | undefined => tokens[position];
	const isPunct = (value: string): boolean => {
		const token = peek();
		return token?.kind === "punct" && token.value === value;
	};
	const expect = (value: string): void => {
		if (!isPunct(value)) {
			throw new ExpressionError(`Expected "${value}"`, source);
		}
		position += 1;
	};

	const parseOr = (): Node => {
		let left = parseAnd();
		while (isPunct("||")) {
			position += 1;
			left = { type: "logical", op: "||", left, right: parseAnd() };
		}
		return left;
	};

	const parseAnd = (): Node => {
		let left = parseComparison();
		while (isPunct("&&")) {
			position += 1;
			left = { type: "logical", op: "&&", left, right: parseComparison() };
		}
		return left;
	};

	const parseComparison = (): Node => {
		let left = parseUnary();
		for (;;) {
			const token = peek();
			if (
				token?.kind !== "punct" ||
				!(["==", "!=", "<", "<=", ">", ">="] as const).some((op) => op === token.value)
			) {
				return left;
			}
			const op = toComparisonOperator(token.value);
			position += 1;
			left = { type: "compare", op, left, right: parseUnary() };
		}
	};

	const parseUnary = (): Node => {
		if (isPunct("!")) {
			position += 1;
			return { type: "not", operand: parseUnary() };
		}
		return parsePostfix(parsePrimary());
	};

	const parsePostfix = (initial: Node): Node => {
		let node = initial;
		for (;;) {
			if (isPunct(".")) {
				position += 1;
				const token = peek();
				if (token?.kind === "punct" && token.value === "*") {
					throw new ExpressionError("Property wildcards are not supported", source);
				}
				if (token?.kind !== "ident") {
					throw new ExpressionError("Expected property name after \".\"", source);
				}
				position += 1;
				node = { type: "property", object: node, key: { type: "literal", value: token.value } };
				continue;
			}
			if (isPunct("[")) {
				position += 1;
				const key = parseOr();
				expect("]");
				node = { type: "property", object: node, key };
				continue;
			}
			return node;
		}
	};

	const parsePrimary = (): Node => {
		const token = peek();
		if (!token) {
			throw new ExpressionError("Unexpected end of expression", source);
		}
		position += 1;
		if (token.kind === "string" || token.kind === "number") {
			return { type: "literal", value: token.value };
		}
		if (token.kind === "punct") {
			if (token.value === "(") {
				const inner = parseOr();
				expect(")");
				return inner;
			}
			throw new ExpressionError(`Unexpected "${token.value}"`, source);
		}
		switch (token.value) {
			case "true":
				return { type: "literal", value: true };
			case "false":
				return { type: "literal", value: false };
			case "null":
				return { type: "literal", value: null };
		}
		if (isPunct("(")) {
			position += 1;
			const args: Node[] = [];
			if (!isPunct(")")) {
				args.push(parseOr());
				while (isPunct(",")) {
					position += 1;
					args.push(parseOr());
				}
			}
			expect(")");
			return { type: "call", name: token.value.toLowerCase(), args };
		}
		return { type: "context", name: token.value };
	};

	const ast = parseOr();
	if (position < tokens.length) {
		throw new ExpressionError("Unexpected trailing input", source);
	}
	return ast;
}

function toComparisonOperator(value: string): "==" | "!=" | "<" | "<=" | ">" | ">=" {
	switch (value) {
		case "==":
		case "!=":
		case "<":
		case "<=":
		case ">":
		case ">=":
			return value;
		default:
			throw new ExpressionError(`Unknown operator "${value}"`, value);
	}
}

function usesStatusFunction(node: Node): boolean {
	switch (node.type) {
		case "call":
			return STATUS_FUNCTIONS.has(node.name) || node.args.some(usesStatusFunction);
		case "not":
			return usesStatusFunction(node.operand);
		case "compare":
		case "logical":
			return usesStatusFunction(node.left) || usesStatusFunction(node.right);
		case "property":
			return usesStatusFunction(node.object) || usesStatusFunction(node.key);
		default:
			return false;
	}
}

function evaluate(node: Node, scope: ExpressionScope, source: string): ExpressionValue {
	switch (node.type) {
		case "literal":
			return node.value;
		case "context": {
			const value = lookupProperty(scope.contexts, node.name);
			if (value === undefined && !hasProperty(scope.contexts, node.name)) {
				throw new ExpressionError(`Unrecognized named-value "${node.name}"`, source);
			}
			return value;
		}
		case "property": {
			const target = evaluate(node.object, scope, source);
			const key = evaluate(node.key, scope, source);
			if (Array.isArray(target)) {
				return typeof key === "number" ? target[key] : undefined;
			}
			if (target && typeof target === "object") {
				return lookupProperty(target, stringifyValue(key));
			}
			return undefined;
		}
		case "not":
			return !isTruthy(evaluate(node.operand, scope, source));
		case "logical": {
			const left = evaluate(node.left, scope, source);
			if (node.op === "&&") {
				return isTruthy(left) ? evaluate(node.right, scope, source) : left;
			}
			return isTruthy(left) ? left : evaluate(node.right, scope, source);
		}
		case "compare":
			return compare(node.op, evaluate(node.left, scope, source), evaluate(node.right, scope, source));
		case "call":
			return callFunction(
				node.name,
				node.args.map((arg) => evaluate(arg, scope, source)),
				scope,
				source,
			);
	}
}

function hasProperty(target: { [key: string]: ExpressionValue }, key: string): boolean {
	const lowered = key.toLowerCase();
	return Object.keys(target).some((candidate) => candidate.toLowerCase() === lowered);
}

function lookupProperty(target: { [key: string]: ExpressionValue }, key: string): ExpressionValue {
	if (Object.prototype.hasOwnProperty.call(target, key)) {
		return target[key];
	}
	const lowered = key.toLowerCase();
	const match = Object.keys(target).find((candidate) => candidate.toLowerCase() === lowered);
	return match === undefined ? undefined : target[match];
}

function toNumber(value: ExpressionValue): number {
	if (value === null || value === undefined) {
		return 0;
	}
	if (typeof value === "boolean") {
		return value ? 1 : 0;
	}
	if (typeof value === "number") {
		return value;
	}
	if (typeof value === "string") {
		return value.trim() === "" ? 0 : Number(value);
	}
	return Number.NaN;
}

export function looseEquals(left: ExpressionValue, right: ExpressionValue): boolean {
	const a = left === undefined ? null : left;
	const b = right === undefined ? null : right;
	if (typeof a === "string" && typeof b === "string") {
		return a.toLowerCase() === b.toLowerCase();
	}
	if (a === null || b === null) {
		return a === b || (typeof (a ?? b) !== "object" && toNumber(a) === toNumber(b));
	}
	if (typeof a === "object" || typeof b === "object") {
		return a === b;
	}
	if (typeof a === typeof b) {
		return a === b;
	}
	return toNumber(a) === toNumber(b);
}

function compare(
	op: "==" | "!=" | "<" | "<=" | ">" | ">=",
	left: ExpressionValue,
	right: ExpressionValue,
): boolean {
	if (op === "==") {
		return looseEquals(left, right);
	}
	if (op === "!=") {
		return !looseEquals(left, right);
	}
	let a: string | number;
	let b: string | number;
	if (typeof left === "string" && typeof right === "string") {
		a = left.toLowerCase();
		b = right.toLowerCase();
	} else {
		a = toNumber(left);
		b = toNumber(right);
	}
	switch (op) {
		case "<":
			return a < b;
		case "<=":
			return a <= b;
		case ">":
			return a > b;
		case ">=":
			return a >= b;
	}
}

function callFunction(
	name: string,
	args: ExpressionValue[],
	scope: ExpressionScope,
	source: string,
): ExpressionValue {
	const status = scope.status ?? DEFAULT_STATUS;
	const arity = (min: number, max = min): void => {
		if (args.length < min || args.length > max) {
			throw new ExpressionError(`${name}() takes ${min === max ? min : `${min}-${max}`} argument(s)`, source);
		}
	};

	switch (name) {
		case "success":
			arity(0);
			return status.success;
		case "failure":
			arity(0);
			return status.failure;
		case "cancelled":
			arity(0);
			return status.cancelled;
		case "always":
			arity(0);
			return true;
		case "contains": {
			arity(2);
			const [haystack, needle] = args;
			if (Array.isArray(haystack)) {
				return haystack.some((item) => looseEquals(item, needle));
			}
			return stringifyValue(haystack).toLowerCase().includes(stringifyValue(needle).toLowerCase());
		}
		case "startswith":
			arity(2);
			return stringifyValue(args[0]).toLowerCase().startsWith(stringifyValue(args[1]).toLowerCase());
		case "endswith":
			arity(2);
			return stringifyValue(args[0]).toLowerCase().endsWith(stringifyValue(args[1]).toLowerCase());
		case "format": {
			if (args.length < 1) {
				throw new ExpressionError("format() needs a format string", source);
			}
			const [template, ...rest] = args;
			return stringifyValue(template).replace(/\{(\d+)\}/g, (match, index: string) => {
				const position = Number(index);
				return position < rest.length ? stringifyValue(rest[position]) : match;
			});
		}
		case "join": {
			arity(1, 2);
			const separator = args.length > 1 ? stringifyValue(args[1]) : ",";
			const value = args[0];
			return Array.isArray(value) ? value.map(stringifyValue).join(separator) : stringifyValue(value);
		}
		case "tojson":
			arity(1);
			return JSON.stringify(args[0] ?? null, null, 2);
		case "fromjson": {
			arity(1);
			try {
				return toExpressionValue(JSON.parse(stringifyValue(args[0])));
			} catch (error) {
				throw new ExpressionError(
					`fromJSON() received invalid JSON (${error instanceof Error ? error.message : "parse error"})`,
					source,
				);
			}
		}
		default:
			throw new ExpressionError(`Unknown function "${name}"`, source);
	}
}

export function toExpressionValue(value: unknown): ExpressionValue {
	if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
		return value;
	}
	if (Array.isArray(value)) {
		return value.map(toExpressionValue);
	}
	if (typeof value === "object") {
		const result: { [key: string]: ExpressionValue } = {};
		for (const [key, entry] of Object.entries(value)) {
			result[key] = toExpressionValue(entry);
		}
		return result;
	}
	return undefined;
}
