import { NginxSyntaxError } from '../core/errors.js';

export interface NginxDirective {
  name: string;
  args: string[];
  line: number;
  /** Present for block directives (`server { ... }`), even when empty. */
  block?: NginxDirective[];
}

type Token =
  | { kind: 'word'; value: string; line: number }
  | { kind: 'punct'; value: ';' | '{' | '}'; line: number };

const ESCAPES: Record<string, string> = { n: '\n', r: '\r', t: '\t' };

const isSpace = (ch: string): boolean => ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';

const tokenize = (text: string): Token[] => {
  const tokens: Token[] = [];
  let line = 1;
  let index = 0;

  while (index < text.length) {
    const ch = text.charAt(index);

    if (ch === '\n') {
      line += 1;
      index += 1;
      continue;
    }
    if (isSpace(ch)) {
      index += 1;
      continue;
    }
    if (ch === '#') {
      while (index < text.length && text.charAt(index) !== '\n') index += 1;
      continue;
    }
    if (ch === ';' || ch === '{' || ch === '}') {
      tokens.push({ kind: 'punct', value: ch, line });
      index += 1;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const startLine = line;
      let value = '';
      index += 1;
      for (;;) {
        if (index >= text.length) {
          throw new NginxSyntaxError('Unterminated string', startLine);
        }
        const current = text.charAt(index);
        if (current === ch) {
          index += 1;
          break;
        }
        if (current === '\\' && index + 1 < text.length) {
          const next = text.charAt(index + 1);
          value += ESCAPES[next] ?? next;
          index += 2;
          continue;
        }
        if (current === '\n') line += 1;
        value += current;
        index += 1;
      }
      tokens.push({ kind: 'word', value, line: startLine });
      continue;
    }

    let value = '';
    while (index < text.length) {
      const current = text.charAt(index);
      if (isSpace(current) || current === ';' || current === '}') break;
      if (current === '{') {
        // `${name}` is variable syntax, not a block opener.
        if (!value.endsWith('$')) break;
        const close = text.indexOf('}', index);
        if (close === -1) {
          throw new NginxSyntaxError('Unterminated variable reference', line);
        }
        value += text.slice(index, close + 1);
        index = close + 1;
        continue;
      }
      value += current;
      index += 1;
    }
    tokens.push({ kind: 'word', value, line });
  }

  return tokens;
};

/**
 * Parse nginx configuration text into a directive tree. Covers the syntax
 * nginx itself checks before looking at directive semantics: statement
 * termination, block balance and quoting.
 */
export const parseNginxConfig = (text: string): NginxDirective[] => {
  const root: NginxDirective[] = [];
  const stack: Array<{ directive: NginxDirective | null; children: NginxDirective[] }> = [
    { directive: null, children: root },
  ];
  let pending: Array<{ value: string; line: number }> = [];

  const current = () => {
    const top = stack[stack.length - 1];
    if (!top) {
      throw new NginxSyntaxError('Unexpected "}"', 0);
    }
    return top;
  };

  const takeDirective = (line: number, found: string): NginxDirective => {
    const [head, ...rest] = pending;
    if (!head) {
      throw new NginxSyntaxError(`Unexpected "${found}"`, line);
    }
    pending = [];
    return { name: head.value, args: rest.map((token) => token.value), line: head.line };
  };

  for (const token of tokenize(text)) {
    if (token.kind === 'word') {
      pending.push({ value: token.value, line: token.line });
      continue;
    }

    if (token.value === ';') {
      current().children.push(takeDirective(token.line, ';'));
    } else if (token.value === '{') {
      const directive = takeDirective(token.line, '{');
      directive.block = [];
      current().children.push(directive);
      stack.push({ directive, children: directive.block });
    } else {
      const [head] = pending;
      if (head) {
        throw new NginxSyntaxError(`Directive "${head.value}" is not terminated by ";"`, head.line);
      }
      if (stack.length === 1) {
        throw new NginxSyntaxError('Unexpected "}"', token.line);
      }
      stack.pop();
    }
  }

  const [head] = pending;
  if (head) {
    throw new NginxSyntaxError(`Directive "${head.value}" is not terminated by ";"`, head.line);
  }
  const open = current().directive;
  if (open) {
    throw new NginxSyntaxError(`Block "${open.name}" is not closed`, open.line);
  }

  return root;
};

export const findDirectives = (directives: readonly NginxDirective[], name: string): NginxDirective[] =>
  directives.filter((directive) => directive.name === name);

export const findDirective = (
  directives: readonly NginxDirective[],
  name: string,
): NginxDirective | undefined => directives.find((directive) => directive.name === name);
