import { describe, it, expect } from 'vitest';
import { SubtitleParseError } from '../errors';
import { guessCsvMapping, parseCsvContent, parseCsvRecords, resolveCsvColumn } from './csvParser';

describe('parseCsvRecords', () => {
  it('should handle quoted fields, escaped quotes and blank lines', () => {
    const content = 'a,b\n"x, y","he said ""hi"""\r\n\n1,2';
    expect(parseCsvRecords(content)).toEqual([
      ['a', 'b'],
      ['x, y', 'he said "hi"'],
      ['1', '2'],
    ]);
  });

  it('should keep line breaks inside quotes', () => {
    expect(parseCsvRecords('text\n"one\ntwo"\n')).toEqual([['text'], ['one\ntwo']]);
  });

  it('should reject an unterminated quote', () => {
    expect(() => parseCsvRecords('a\n"open')).toThrow(SubtitleParseError);
  });
});

describe('guessCsvMapping', () => {
  it('should prefer named columns', () => {
    expect(guessCsvMapping(['text', 'end_time', 'start_time'])).toEqual({
      startColumn: 'start_time',
      endColumn: 'end_time',
      textColumn: 'text',
      timeUnit: 'seconds',
      fps: 30,
    });
  });

  it('should fall back to the first three columns', () => {
    expect(guessCsvMapping(['a', 'b', 'c', 'd'])).toEqual({
      startColumn: 0,
      endColumn: 1,
      textColumn: 2,
      timeUnit: 'seconds',
      fps: 30,
    });
  });

  it('should use start and text only for two columns', () => {
    expect(guessCsvMapping(['time', 'caption'])).toEqual({
      startColumn: 0,
      endColumn: null,
      textColumn: 1,
      timeUnit: 'seconds',
      fps: 30,
    });
  });
});

describe('resolveCsvColumn', () => {
  const header = ['start', 'end', 'line'];

  it('should resolve names, indexes and digit strings', () => {
    expect(resolveCsvColumn('line', header)).toBe(2);
    expect(resolveCsvColumn(1, header)).toBe(1);
    expect(resolveCsvColumn('0', header)).toBe(0);
  });

  it('should reject unknown columns', () => {
    expect(() => resolveCsvColumn('dialogue', header)).toThrow(
      'CSV column "dialogue" not found in header'
    );
    expect(() => resolveCsvColumn(3, header)).toThrow('CSV column 3 is out of range (3 columns)');
  });
});

describe('parseCsvContent', () => {
  it('should parse rows with a guessed mapping', () => {
    const content = [
      'start_time,end_time,text',
      '1.5,3,Hello',
      '4,,"Line, with comma"',
      '5,4.5,Backwards',
    ].join('\n');

    expect(parseCsvContent(content)).toEqual([
      { index: 1, startTime: 1.5, endTime: 3, text: 'Hello' },
      { index: 2, startTime: 4, endTime: 7, text: 'Line, with comma' },
      { index: 3, startTime: 5, endTime: 8, text: 'Backwards' },
    ]);
  });

  it('should convert frame numbers with the mapping frame rate', () => {
    const content = 'in,out,line\n50,100,Hi';
    const lines = parseCsvContent(content, {
      startColumn: 'in',
      endColumn: 'out',
      textColumn: 'line',
      timeUnit: 'frames',
      fps: 25,
    });

    expect(lines).toEqual([{ index: 1, startTime: 2, endTime: 4, text: 'Hi' }]);
  });

  it('should give lines without an end column a fixed duration', () => {
    expect(parseCsvContent('time,caption\n1,Hi')).toEqual([
      { index: 1, startTime: 1, endTime: 4, text: 'Hi' },
    ]);
  });

  it('should report the row of an invalid start time', () => {
    expect(() => parseCsvContent('start_time,end_time,text\nabc,2,Oops')).toThrow(
      'CSV row 2: invalid start time "abc"'
    );
  });

  it('should reject frame times without a frame rate', () => {
    expect(() =>
      parseCsvContent('a,b,c\n1,2,x', {
        startColumn: 0,
        endColumn: 1,
        textColumn: 2,
        timeUnit: 'frames',
        fps: 0,
      })
    ).toThrow('Invalid frame rate for CSV frame times: 0');
  });

  it('should return nothing for empty content', () => {
    expect(parseCsvContent('')).toEqual([]);
  });
});
