import { describe, it, expect } from 'vitest';
import { decodeSubtitleBuffer } from './encoding';

describe('decodeSubtitleBuffer', () => {
  it('should drop a UTF-8 byte order mark', () => {
    const buffer = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('héllo', 'utf-8')]);
    expect(decodeSubtitleBuffer(buffer)).toEqual({ text: 'héllo', encoding: 'utf-8' });
  });

  it('should decode UTF-16 LE with a byte order mark', () => {
    const buffer = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from('hi', 'utf16le')]);
    expect(decodeSubtitleBuffer(buffer)).toEqual({ text: 'hi', encoding: 'utf-16le' });
  });

  it('should decode UTF-16 BE with a byte order mark', () => {
    const buffer = Buffer.from([0xfe, 0xff, 0x00, 0x68, 0x00, 0x69]);
    expect(decodeSubtitleBuffer(buffer)).toEqual({ text: 'hi', encoding: 'utf-16be' });
  });

  it('should read plain UTF-8', () => {
    expect(decodeSubtitleBuffer(Buffer.from('naïve', 'utf-8'))).toEqual({ text: 'naïve', encoding: 'utf-8' });
  });

  it('should fall back to Windows-1252 for invalid UTF-8', () => {
    expect(decodeSubtitleBuffer(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toEqual({
      text: 'café',
      encoding: 'windows-1252',
    });
  });
});
