/**
 * Cell Content Resolver Tests
 *
 * The first meaningful nested element wins; raw cell text is the fallback.
 */

import { describe, it, expect } from 'vitest';
import { CellContext, MEANINGFUL_TAGS } from '../src/table/index.js';

type CellEvent = ['open' | 'close' | 'text', string];

function resolveCell(events: CellEvent[]): string {
  const cell = new CellContext('data');
  for (const [kind, value] of events) {
    if (kind === 'open') cell.openTag(value);
    else if (kind === 'close') cell.closeTag(value);
    else cell.appendText(value);
  }
  return cell.resolve();
}

describe('CellContext', () => {
  it('uses trimmed raw text when there is no nested element', () => {
    expect(resolveCell([['text', '  plain value \n']])).toBe('plain value');
  });

  it('defaults to an empty string', () => {
    expect(resolveCell([])).toBe('');
  });

  it('prefers the nested element over surrounding text', () => {
    expect(resolveCell([
      ['text', 'before '],
      ['open', 'b'],
      ['text', ' Bold '],
      ['close', 'b'],
      ['text', ' after'],
    ])).toBe('Bold');
  });

  it('keeps only the first of two sibling elements', () => {
    expect(resolveCell([
      ['open', 'div'], ['text', '30'], ['close', 'div'],
      ['open', 'div'], ['text', 'thirty'], ['close', 'div'],
    ])).toBe('30');
  });

  it('captures text of children of the first element', () => {
    expect(resolveCell([
      ['open', 'div'],
      ['text', 'a'],
      ['open', 'span'], ['text', 'b'], ['close', 'span'],
      ['text', 'c'],
      ['close', 'div'],
    ])).toBe('abc');
  });

  it('lets a later sibling capture when the first element is blank', () => {
    expect(resolveCell([
      ['open', 'span'], ['text', '   '], ['close', 'span'],
      ['open', 'em'], ['text', 'X'], ['close', 'em'],
    ])).toBe('X');
  });

  it('finishes a capture still open when the cell resolves', () => {
    expect(resolveCell([['open', 'p'], ['text', ' unclosed ']])).toBe('unclosed');
  });

  it('ignores tags outside the meaningful set', () => {
    expect(resolveCell([
      ['open', 'img'],
      ['open', 'u'], ['text', 'underlined'], ['close', 'u'],
      ['text', ' text'],
    ])).toBe('underlined text');
  });

  it('reports the captured value separately from the resolution', () => {
    const cell = new CellContext('header');
    cell.appendText('raw ');
    cell.openTag('a');
    cell.appendText('link');
    cell.closeTag('a');

    expect(cell.captured).toBe('link');
    expect(cell.kind).toBe('header');
  });

  it('covers the documented tag set', () => {
    expect([...MEANINGFUL_TAGS].sort()).toEqual(['a', 'b', 'div', 'em', 'i', 'p', 'span', 'strong']);
  });
});
