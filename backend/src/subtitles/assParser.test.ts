import { describe, it, expect } from 'vitest';
import { SubtitleParseError } from '../errors';
import { assTextToPlain, assTimeToSeconds, parseAssContent, secondsToAssTime } from './assParser';

const SCRIPT = `[Script Info]
Title: Test
ScriptType: v4.00+

[V4+ Styles]
Format: Name, Fontname, Fontsize
Style: Default,Arial,20

[Events]
Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text
Comment: 0,0:00:00.00,0:00:01.00,Default,,0,0,0,,ignored
Dialogue: 0,0:00:01.50,0:00:03.00,Default,,0,0,0,,Hello, world
Dialogue: 0,0:00:04.00,0:00:06.25,Default,,0,0,0,,{\\i1}Two\\Nlines{\\i0}
Dialogue: 0,bad,0:00:07.00,Default,,0,0,0,,Broken timing
Dialogue: 0,0:00:08.00,0:00:09.00,Default,,0,0,0,,{\\pos(10,10)}
`;

describe('assTimeToSeconds', () => {
  it('should convert centisecond timestamps', () => {
    expect(assTimeToSeconds('0:00:01.50')).toBe(1.5);
    expect(assTimeToSeconds('1:02:03.04')).toBeCloseTo(3723.04);
  });

  it('should accept a timestamp without fraction', () => {
    expect(assTimeToSeconds('0:00:05')).toBe(5);
  });

  it('should throw on invalid format', () => {
    expect(() => assTimeToSeconds('00:05')).toThrow('Invalid ASS timestamp format: 00:05');
  });
});

describe('secondsToAssTime', () => {
  it('should format as h:mm:ss.cc', () => {
    expect(secondsToAssTime(0)).toBe('0:00:00.00');
    expect(secondsToAssTime(3723.04)).toBe('1:02:03.04');
    expect(secondsToAssTime(1.5)).toBe('0:00:01.50');
  });
});

describe('assTextToPlain', () => {
  it('should strip override blocks and convert breaks', () => {
    expect(assTextToPlain('{\\b1}Bold{\\b0}\\Nnext\\hword')).toBe('Bold\nnext word');
  });
});

describe('parseAssContent', () => {
  it('should read dialogue lines from the events section', () => {
    expect(parseAssContent(SCRIPT)).toEqual([
      { index: 1, startTime: 1.5, endTime: 3, text: 'Hello, world' },
      { index: 2, startTime: 4, endTime: 6.25, text: 'Two\nlines' },
    ]);
  });

  it('should follow a custom Format order', () => {
    const script = `[Events]
Format: Start, End, Text
Dialogue: 0:00:02.00,0:00:03.00,Reordered, with comma`;

    expect(parseAssContent(script)).toEqual([
      { index: 1, startTime: 2, endTime: 3, text: 'Reordered, with comma' },
    ]);
  });

  it('should reject a script without events', () => {
    expect(() => parseAssContent('[Script Info]\nTitle: nothing')).toThrow(SubtitleParseError);
  });
});
