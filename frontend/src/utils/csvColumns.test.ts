import { describe, it, expect } from 'vitest';
import { columnIndex, columnLabel, subtitleFormatOf } from './csvColumns';

describe('subtitleFormatOf', () => {
  it('should read the extension case-insensitively', () => {
    expect(subtitleFormatOf('/media/film.SRT')).toBe('srt');
    expect(subtitleFormatOf('styled.ssa')).toBe('ass');
    expect(subtitleFormatOf('lines.csv')).toBe('csv');
    expect(subtitleFormatOf('notes.txt')).toBeNull();
    expect(subtitleFormatOf('README')).toBeNull();
  });
});

describe('columnIndex', () => {
  const columns = ['start_time', 'end_time', 'text'];

  it('should resolve names, indexes and digit strings', () => {
    expect(columnIndex('text', columns)).toBe(2);
    expect(columnIndex(1, columns)).toBe(1);
    expect(columnIndex('0', columns)).toBe(0);
  });

  it('should return -1 for unknown references', () => {
    expect(columnIndex('speaker', columns)).toBe(-1);
    expect(columnIndex(5, columns)).toBe(-1);
    expect(columnIndex(null, columns)).toBe(-1);
  });
});

describe('columnLabel', () => {
  it('should number columns from 1', () => {
    expect(columnLabel(['in', ''], 0)).toBe('1: in');
    expect(columnLabel(['in', ''], 1)).toBe('Column 2');
  });
});
