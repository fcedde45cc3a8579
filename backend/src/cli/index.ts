#!/usr/bin/env node
import { config } from '../config';
import { describeError } from '../errors';
import { settingsStore } from '../settings';
import { FFmpegProcessor } from '../video';
import { CliExit, parseBurnArgs } from './args';
import { BurnOptions, runBurn } from './burn';

async function main(argv: string[]): Promise<number> {
  let options: BurnOptions;
  try {
    options = parseBurnArgs(argv, config.verbose);
  } catch (error) {
    if (error instanceof CliExit) {
      if (error.message) process.stderr.write(error.message);
      return error.status;
    }
    throw error;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  return runBurn(options, {
    settings: settingsStore,
    ffmpeg: new FFmpegProcessor(),
    stdout: process.stdout,
    stderr: process.stderr,
    signal: controller.signal,
  });
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Unexpected failure:', describeError(error));
    process.exitCode = 1;
  });
