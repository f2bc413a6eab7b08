import { describe, expect, it } from 'vitest';
import { findSection, markerFor, splitSections } from '../src';
import { handLines, loadFixture } from './testUtils';

describe('splitSections', () => {
  it('splits a hand at its markers', () => {
    const sections = splitSections(loadFixture('omaha-cash-showdown'));
    expect(sections.map((s) => s.marker)).toEqual([
      'header',
      'holeCards',
      'flop',
      'turn',
      'river',
      'showDown',
      'summary',
    ]);
    expect(sections[0].lines).toHaveLength(7);
    expect(findSection(sections, 'turn')?.board).toBe('[Kh 8d 2c] [7h]');
    expect(findSection(sections, 'showDown')?.label).toBe('SHOW DOWN');
    expect(findSection(sections, 'holeCards')?.board).toBeNull();
  });

  it('trims lines and accepts CRLF endings', () => {
    const sections = splitSections(handLines('header  ', '*** HOLE CARDS ***\r', '  a: folds\r', ''));
    expect(sections[0].lines).toEqual(['header']);
    expect(sections[1].lines).toEqual(['a: folds']);
  });

  it('moves text after a blank line into an unknown block', () => {
    const sections = splitSections(
      handLines('header', '*** SUMMARY ***', 'Total pot 10 | Rake 0', '', 'stray text', 'more text')
    );
    expect(sections).toHaveLength(3);
    expect(sections[2]).toEqual({ marker: 'unknown', label: '', board: null, lines: ['stray text', 'more text'] });
  });

  it('keeps unrecognized markers as unknown blocks', () => {
    const sections = splitSections(handLines('header', '*** FIRST FLOP *** [2s 3s 4s]', 'a: checks'));
    expect(sections[1]).toEqual({
      marker: 'unknown',
      label: 'FIRST FLOP',
      board: '[2s 3s 4s]',
      lines: ['a: checks'],
    });
  });

  it('returns null for a missing section', () => {
    expect(findSection(splitSections('header'), 'flop')).toBeNull();
  });
});

describe('markerFor', () => {
  it('ignores spacing and case', () => {
    expect(markerFor('SHOW DOWN')).toBe('showDown');
    expect(markerFor('Hole Cards')).toBe('holeCards');
    expect(markerFor('DEALING HANDS')).toBe('unknown');
  });
});
