import { describe, it, expect } from 'vitest';
import { scanIdentifiers, containsIdentifier, replaceIdentifier } from '../src/identifiers.js';

describe('scanIdentifiers', () => {
  it('should match whole tokens only', () => {
    expect(containsIdentifier('search_query + 1', 'query')).toBe(false);
    expect(containsIdentifier('query + 1', 'query')).toBe(true);
  });

  it('should skip fields, atoms, attributes, keyword keys and local calls', () => {
    const names = scanIdentifiers('user.name == :admin and @limit > count(items, max: depth)');
    expect([...names].sort()).toEqual(['depth', 'items', 'user']);
  });

  it('should skip keywords and module aliases', () => {
    expect([...scanIdentifiers('case Map.get(acc, key) do nil -> acc end')].sort()).toEqual(['acc', 'key']);
  });

  it('should read inside string interpolation but not plain string text', () => {
    expect([...scanIdentifiers('"total: #{sum} items"')]).toEqual(['sum']);
  });

  it('should skip charlist bodies', () => {
    expect([...scanIdentifiers("'abc' <> x")]).toEqual(['x']);
  });

  it('should skip sigil bodies and their modifiers', () => {
    expect([...scanIdentifiers('~w(foo bar)a ++ y')]).toEqual(['y']);
    expect([...scanIdentifiers('~r/a b/i')]).toEqual([]);
  });

  it('should read interpolations in lowercase sigils only', () => {
    expect([...scanIdentifiers('~s(#{name} rest)')]).toEqual(['name']);
    expect([...scanIdentifiers('~S(#{name} rest)')]).toEqual([]);
  });

  it('should skip character literals', () => {
    expect([...scanIdentifiers('c == ?" or c == ?a')]).toEqual(['c']);
  });

  it('should keep the right side of a range', () => {
    expect([...scanIdentifiers('1..n')]).toEqual(['n']);
  });
});

describe('replaceIdentifier', () => {
  it('should replace every whole-token occurrence', () => {
    expect(replaceIdentifier('x + x_1 + x.x', 'x', 'y')).toBe('y + x_1 + y.x');
  });

  it('should return the same text when nothing matches', () => {
    const text = 'foo(bar)';
    expect(replaceIdentifier(text, 'baz', 'qux')).toBe(text);
  });
});
