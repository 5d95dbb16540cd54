/**
 * Identifier-boundary scanning over raw target text
 *
 * The only place that tokenizes `opaque` text. A token counts as a variable
 * when it starts lowercase or with `_`, is not a field (`a.b`), atom (`:b`),
 * attribute (`@b`), capture (`&b`), keyword key (`b:`) or local call (`b(`),
 * and is not a language keyword. String, charlist and sigil bodies are
 * skipped except for their `#{...}` interpolations; uppercase sigils do not
 * interpolate.
 */

export interface IdentifierToken {
  name: string;
  start: number;
  end: number;
}

const KEYWORDS = new Set([
  'true', 'false', 'nil', 'when', 'and', 'or', 'not', 'in',
  'fn', 'do', 'end', 'catch', 'rescue', 'after', 'else',
  'case', 'cond', 'with', 'for', 'if', 'unless', 'receive', 'try',
]);

const HEAD = /[a-z_]/;
const WORD = /[A-Za-z0-9_]/;
const UPPER = /[A-Z]/;
const DIGIT = /[0-9]/;
const LETTER = /[A-Za-z]/;

const SIGIL_CLOSE: Partial<Record<string, string>> = {
  '(': ')',
  '[': ']',
  '{': '}',
  '<': '>',
  '/': '/',
  '|': '|',
  '"': '"',
  "'": "'",
};

type Frame =
  | { mode: 'code'; depth: number }
  | { mode: 'string'; close: string; interpolates: boolean; modifiers: boolean };

/**
 * `~name<delim>` at `i`: the frame for its body and where the body starts
 */
function openSigil(text: string, i: number): { frame: Frame; next: number } | undefined {
  let end = i + 1;
  while (end < text.length && LETTER.test(text[end])) end++;
  if (end === i + 1) return undefined;
  const close = SIGIL_CLOSE[text[end]];
  if (close === undefined) return undefined;
  const interpolates = !UPPER.test(text[i + 1]);
  return { frame: { mode: 'string', close, interpolates, modifiers: true }, next: end + 1 };
}

export function identifierTokens(text: string): IdentifierToken[] {
  const tokens: IdentifierToken[] = [];
  const stack: Frame[] = [{ mode: 'code', depth: 0 }];
  let i = 0;

  while (i < text.length) {
    const frame = stack[stack.length - 1];
    const ch = text[i];

    if (frame.mode === 'string') {
      if (ch === '\\') {
        i += 2;
      } else if (ch === frame.close) {
        stack.pop();
        i++;
        if (frame.modifiers) while (i < text.length && LETTER.test(text[i])) i++;
      } else if (frame.interpolates && ch === '#' && text[i + 1] === '{') {
        stack.push({ mode: 'code', depth: 0 });
        i += 2;
      } else {
        i++;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      stack.push({ mode: 'string', close: ch, interpolates: true, modifiers: false });
      i++;
      continue;
    }
    if (ch === '~') {
      const sigil = openSigil(text, i);
      if (sigil) {
        stack.push(sigil.frame);
        i = sigil.next;
      } else {
        i++;
      }
      continue;
    }
    if (ch === '?') {
      // character literal: ?a, ?" or ?\n
      i += text[i + 1] === '\\' ? 3 : 2;
      continue;
    }
    if (ch === '{') {
      frame.depth++;
      i++;
      continue;
    }
    if (ch === '}') {
      if (frame.depth === 0 && stack.length > 1) stack.pop();
      else frame.depth--;
      i++;
      continue;
    }
    if (DIGIT.test(ch) || UPPER.test(ch)) {
      // numbers and module aliases: consume the whole word
      i++;
      while (i < text.length && WORD.test(text[i])) i++;
      continue;
    }
    if (!HEAD.test(ch)) {
      i++;
      continue;
    }

    let end = i + 1;
    while (end < text.length && WORD.test(text[end])) end++;
    if (text[end] === '?' || text[end] === '!') end++;

    const name = text.slice(i, end);
    if (isVariablePosition(text, i, end) && name !== '_' && !KEYWORDS.has(name)) {
      tokens.push({ name, start: i, end });
    }
    i = end;
  }

  return tokens;
}

function isVariablePosition(text: string, start: number, end: number): boolean {
  const prev = start > 0 ? text[start - 1] : '';
  if (prev === '.' && text[start - 2] !== '.') return false;
  if (prev === ':' || prev === '@' || prev === '&') return false;

  const next = text[end];
  if (next === '(') return false;
  if (next === ':' && text[end + 1] !== ':') return false;
  return true;
}

/**
 * Names of the variable tokens in `text`
 */
export function scanIdentifiers(text: string): Set<string> {
  return new Set(identifierTokens(text).map((token) => token.name));
}

export function containsIdentifier(text: string, name: string): boolean {
  return identifierTokens(text).some((token) => token.name === name);
}

/**
 * Replace whole-token occurrences of `from`; "query" inside "search_query" stays.
 */
export function replaceIdentifier(text: string, from: string, to: string): string {
  let result = '';
  let last = 0;
  for (const token of identifierTokens(text)) {
    if (token.name !== from) continue;
    result += text.slice(last, token.start) + to;
    last = token.end;
  }
  return last === 0 ? text : result + text.slice(last);
}
