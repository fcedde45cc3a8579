import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { InputFileError, SubtitleParseError } from '../errors';
import { DEFAULT_STYLE } from '../settings';
import {
  detectSubtitleFormat,
  loadSubtitleFile,
  parseSubtitleContent,
  prepareSubtitleForBurn,
  readCsvHeader,
} from './subtitleLoader';

const SRT = '1\n00:00:01,000 --> 00:00:02,000\nHello\n';

describe('detectSubtitleFormat', () => {
  it('should map extensions case-insensitively', () => {
    expect(detectSubtitleFormat('a.SRT')).toBe('srt');
    expect(detectSubtitleFormat('b.ssa')).toBe('ass');
    expect(detectSubtitleFormat('c.ass')).toBe('ass');
    expect(detectSubtitleFormat('d.csv')).toBe('csv');
  });

  it('should reject other extensions', () => {
    expect(() => detectSubtitleFormat('notes.txt')).toThrow(
      'Unsupported subtitle format: notes.txt'
    );
  });
});

describe('parseSubtitleContent', () => {
  it('should treat text without any cue as malformed', () => {
    expect(() => parseSubtitleContent('just some words', 'srt')).toThrow(
      'No subtitle lines found in SRT content'
    );
  });

  it('should accept an empty file', () => {
    expect(parseSubtitleContent('', 'srt')).toEqual([]);
  });
});

describe('loading subtitle files', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'subburn-subs-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should report a missing file', () => {
    const missing = path.join(tempDir, 'missing.srt');
    expect(() => loadSubtitleFile(missing)).toThrow(InputFileError);
    expect(() => loadSubtitleFile(missing)).toThrow(`Subtitle file not found: ${missing}`);
  });

  it('should load an SRT file', () => {
    const filePath = path.join(tempDir, 'movie.srt');
    fs.writeFileSync(filePath, SRT);

    expect(loadSubtitleFile(filePath)).toEqual({
      format: 'srt',
      lines: [{ index: 1, startTime: 1, endTime: 2, text: 'Hello' }],
    });
  });

  it('should surface parse errors', () => {
    const filePath = path.join(tempDir, 'broken.ass');
    fs.writeFileSync(filePath, '[Script Info]\nTitle: x\n');
    expect(() => loadSubtitleFile(filePath)).toThrow(SubtitleParseError);
  });

  it('should burn SRT files as they are', () => {
    const filePath = path.join(tempDir, 'movie.srt');
    fs.writeFileSync(filePath, SRT);

    const prepared = prepareSubtitleForBurn(filePath, { style: { ...DEFAULT_STYLE }, tempDir });
    expect(prepared.burnPath).toBe(filePath);
    prepared.cleanup();
    expect(fs.existsSync(filePath)).toBe(true);
  });

  it('should hand ffmpeg a UTF-8 copy of a Windows-1252 SRT file', () => {
    const filePath = path.join(tempDir, 'legacy.srt');
    fs.writeFileSync(
      filePath,
      Buffer.concat([Buffer.from('1\n00:00:01,000 --> 00:00:02,000\nCaf', 'latin1'), Buffer.from([0xe9, 0x0a])])
    );
    const workDir = path.join(tempDir, 'work');

    const prepared = prepareSubtitleForBurn(filePath, { style: { ...DEFAULT_STYLE }, tempDir: workDir });

    expect(prepared.lines[0]?.text).toBe('Café');
    expect(path.dirname(prepared.burnPath)).toBe(workDir);
    expect(path.extname(prepared.burnPath)).toBe('.srt');
    expect(fs.readFileSync(prepared.burnPath, 'utf-8')).toBe('1\n00:00:01,000 --> 00:00:02,000\nCafé\n');

    prepared.cleanup();
    expect(fs.existsSync(prepared.burnPath)).toBe(false);
    expect(fs.existsSync(filePath)).toBe(true);
  });

  it('should convert CSV files to a temporary ASS script', () => {
    const filePath = path.join(tempDir, 'lines.csv');
    fs.writeFileSync(filePath, 'start_time,end_time,text\n1,2,Hi there\n');
    const workDir = path.join(tempDir, 'work');

    const prepared = prepareSubtitleForBurn(filePath, {
      style: { ...DEFAULT_STYLE },
      tempDir: workDir,
    });

    expect(prepared.format).toBe('csv');
    expect(path.dirname(prepared.burnPath)).toBe(workDir);
    expect(path.extname(prepared.burnPath)).toBe('.ass');
    expect(fs.readFileSync(prepared.burnPath, 'utf-8').split('\n')).toContain(
      'Dialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,Hi there'
    );

    prepared.cleanup();
    expect(fs.existsSync(prepared.burnPath)).toBe(false);
  });

  it('should read the header of a CSV file', () => {
    const filePath = path.join(tempDir, 'cues.csv');
    fs.writeFileSync(filePath, '\ufeff in , out ,"line"\n1,2,Hi\n');
    expect(readCsvHeader(filePath)).toEqual(['in', 'out', 'line']);
  });
});
