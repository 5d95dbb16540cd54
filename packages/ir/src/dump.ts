/**
 * Debug dump - compact S-expression rendering of IR trees
 *
 * Not target syntax: the serializer owns that. The dump exists for
 * diagnostics, the CLI's --dump flag and readable test assertions.
 *
 *   block(bind('x', int(1)), ref('x'))  =>  (block (= x 1) x)
 */

import type { IRNode, IRPattern, IRClause, Literal } from './types.js';

export function dumpLiteral(literal: Literal): string {
  switch (literal.type) {
    case 'integer':
      return String(literal.value);
    case 'float':
      return Number.isInteger(literal.value) ? `${literal.value}.0` : String(literal.value);
    case 'string':
      return JSON.stringify(literal.value);
    case 'atom':
      return `:${literal.value}`;
    case 'boolean':
      return literal.value ? 'true' : 'false';
    case 'nil':
      return 'nil';
  }
}

export function dumpPattern(pattern: IRPattern): string {
  switch (pattern.kind) {
    case 'var':
      return pattern.name;
    case 'wildcard':
      return '_';
    case 'literal':
      return dumpLiteral(pattern.literal);
    case 'tuple':
      return sexp('tuple', pattern.elements.map(dumpPattern));
    case 'list':
      return sexp('list', pattern.elements.map(dumpPattern));
    case 'cons':
      return sexp('cons', [dumpPattern(pattern.head), dumpPattern(pattern.tail)]);
    case 'map':
      return sexp('map', pattern.entries.map((e) => `(${dumpLiteral(e.key)} ${dumpPattern(e.value)})`));
    case 'struct':
      return sexp('struct', [pattern.module, ...pattern.fields.map((f) => `(${f.name} ${dumpPattern(f.pattern)})`)]);
    case 'pin':
      return `^${pattern.name}`;
    case 'alias':
      return sexp('as', [pattern.name, dumpPattern(pattern.pattern)]);
    case 'binary':
      return sexp(
        'bin',
        pattern.segments.map((s) =>
          sexp('seg', [
            dumpPattern(s.pattern),
            ...(s.size ? [dump(s.size)] : []),
            ...(s.type ? [s.type] : []),
          ])
        )
      );
  }
}

function dumpClause(c: IRClause): string {
  const head = `(${c.patterns.map(dumpPattern).join(' ')})`;
  return c.guard
    ? sexp('->', [head, sexp('when', [dump(c.guard)]), dump(c.body)])
    : sexp('->', [head, dump(c.body)]);
}

export function dump(node: IRNode): string {
  switch (node.kind) {
    case 'var':
      return node.name;
    case 'literal':
      return dumpLiteral(node.literal);
    case 'interpolation':
      return sexp(
        'interp',
        node.parts.map((part) => (part.kind === 'text' ? JSON.stringify(part.text) : dump(part.expr)))
      );
    case 'block':
      return sexp('block', node.body.map(dump));
    case 'bind':
      return sexp('=', [dumpPattern(node.pattern), dump(node.value)]);
    case 'if':
      return sexp('if', [dump(node.condition), dump(node.then), ...(node.else ? [dump(node.else)] : [])]);
    case 'case':
      return sexp('case', [dump(node.subject), ...node.clauses.map(dumpClause)]);
    case 'fn':
      return sexp('fn', node.clauses.map(dumpClause));
    case 'def':
      return sexp(node.private ? 'defp' : 'def', [
        node.name,
        `(${node.params.map(dumpPattern).join(' ')})`,
        ...(node.guard ? [sexp('when', [dump(node.guard)])] : []),
        dump(node.body),
      ]);
    case 'call':
      return sexp(node.name, node.args.map(dump));
    case 'remote':
      return sexp(`${node.module}.${node.name}`, node.args.map(dump));
    case 'apply':
      return sexp('.', [dump(node.fn), ...node.args.map(dump)]);
    case 'field':
      return sexp('field', [dump(node.target), node.name]);
    case 'index':
      return sexp('index', [dump(node.target), dump(node.key)]);
    case 'tuple':
      return sexp('tuple', node.elements.map(dump));
    case 'list':
      return sexp('list', [...node.elements.map(dump), ...(node.tail ? ['|', dump(node.tail)] : [])]);
    case 'map':
      return sexp('map', node.entries.map((e) => `(${dump(e.key)} ${dump(e.value)})`));
    case 'struct':
      return sexp('struct', [node.module, ...node.fields.map((f) => `(${f.name} ${dump(f.value)})`)]);
    case 'update':
      return sexp('update', [dump(node.target), ...node.fields.map((f) => `(${f.name} ${dump(f.value)})`)]);
    case 'pipe':
      return sexp('|>', [dump(node.left), dump(node.right)]);
    case 'binary':
      return sexp(node.op, [dump(node.left), dump(node.right)]);
    case 'unary':
      return sexp(node.op, [dump(node.operand)]);
    case 'with':
      return sexp('with', [
        `(${node.clauses
          .map((step) =>
            sexp('<-', [dumpPattern(step.pattern), dump(step.value), ...(step.guard ? [sexp('when', [dump(step.guard)])] : [])])
          )
          .join(' ')})`,
        dump(node.body),
        ...(node.else ? [sexp('else', node.else.map(dumpClause))] : []),
      ]);
    case 'for':
      return sexp('for', [
        `(${node.qualifiers
          .map((q) =>
            q.kind === 'generator'
              ? sexp('<-', [dumpPattern(q.pattern), dump(q.source)])
              : sexp('filter', [dump(q.condition)])
          )
          .join(' ')})`,
        ...(node.into ? [sexp('into', [dump(node.into)])] : []),
        dump(node.body),
      ]);
    case 'try':
      return sexp('try', [
        dump(node.body),
        ...(node.rescue.length > 0 ? [sexp('rescue', node.rescue.map(dumpClause))] : []),
        ...(node.after ? [sexp('after', [dump(node.after)])] : []),
      ]);
    case 'receive':
      return sexp('receive', [
        ...node.clauses.map(dumpClause),
        ...(node.after ? [sexp('after', [dump(node.after.timeout), dump(node.after.body)])] : []),
      ]);
    case 'module':
      return sexp('module', [node.name, ...node.body.map(dump)]);
    case 'opaque':
      return sexp('opaque', [JSON.stringify(node.text)]);
  }
}

function sexp(head: string, items: string[]): string {
  return items.length === 0 ? `(${head})` : `(${head} ${items.join(' ')})`;
}
