import { describe, it, expect } from 'vitest';
import { StyleValidationError } from '../errors';
import { DEFAULT_STYLE } from '../settings';
import { parseAssContent } from './assParser';
import { assDialogueLine, buildAssDocument, escapeAssText, hexToAssColor } from './assWriter';

describe('hexToAssColor', () => {
  it('should reverse the channels into &H00BBGGRR', () => {
    expect(hexToAssColor('#ff8000')).toBe('&H000080FF');
    expect(hexToAssColor('12abEF')).toBe('&H00EFAB12');
    expect(hexToAssColor('#ffffff')).toBe('&H00FFFFFF');
  });

  it('should reject malformed colours', () => {
    expect(() => hexToAssColor('#fff')).toThrow(StyleValidationError);
  });
});

describe('assDialogueLine', () => {
  it('should format timing and convert line breaks', () => {
    expect(assDialogueLine({ index: 1, startTime: 1.5, endTime: 3, text: 'A\nB' })).toBe(
      'Dialogue: 0,0:00:01.50,0:00:03.00,Default,,0,0,0,,A\\NB'
    );
  });

  it('should escape braces in the text', () => {
    expect(assDialogueLine({ index: 1, startTime: 0, endTime: 1, text: '{sigh}\nOK' })).toBe(
      'Dialogue: 0,0:00:00.00,0:00:01.00,Default,,0,0,0,,\\{sigh\\}\\NOK'
    );
  });
});

describe('escapeAssText', () => {
  it('should keep braces from opening override blocks', () => {
    expect(escapeAssText('Say {hi}')).toBe('Say \\{hi\\}');
  });

  it('should break up a backslash that would form an escape', () => {
    expect(escapeAssText('C:\\new\\{x')).toBe('C:\\\u2060new\\\u2060\\{x');
  });

  it('should leave other backslashes alone', () => {
    expect(escapeAssText('a\\b')).toBe('a\\b');
  });
});

describe('buildAssDocument', () => {
  const lines = [
    { index: 1, startTime: 1, endTime: 2, text: 'First' },
    { index: 2, startTime: 3, endTime: 4.5, text: 'Second, line' },
  ];

  it('should carry the style into the Default style line', () => {
    const document = buildAssDocument(lines, { ...DEFAULT_STYLE });
    expect(document.split('\n')).toContain(
      'Style: Default,Arial,32,&H00FFFFFF,&H000000FF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,2,3,2,10,10,10,1'
    );
  });

  it('should mark bold and drop the shadow when asked', () => {
    const document = buildAssDocument(lines, {
      ...DEFAULT_STYLE,
      fontFamily: 'Verdana',
      fontColor: '#ffcc00',
      bold: true,
      shadow: false,
      marginV: 40,
    });
    expect(document.split('\n')).toContain(
      'Style: Default,Verdana,32,&H0000CCFF,&H000000FF,&H00000000,&H00000000,-1,0,0,0,100,100,0,0,1,2,0,2,10,10,40,1'
    );
  });

  it('should produce a script the parser reads back', () => {
    const document = buildAssDocument(lines, { ...DEFAULT_STYLE });
    expect(document.startsWith('[Script Info]\n')).toBe(true);
    expect(parseAssContent(document)).toEqual(lines);
  });
});
