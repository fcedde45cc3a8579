import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { createDefaultSettings } from './defaults';
import { AppSettings, AppSettingsPatch, CsvMapping } from './types';
import { applyStyleOverrides, mergeWithDefaults, validateEncoder, validateStyle } from './validation';

/**
 * File-backed store for the persisted style and output settings.
 *
 * Callers always receive copies: per-run overrides are applied to those copies
 * and only an explicit `save`, `update`, `reset` or `saveCsvMapping` writes the file.
 */
export class SettingsStore {
  readonly filePath: string;

  constructor(filePath?: string) {
    this.filePath = filePath ?? config.settingsPath;
  }

  /**
   * Loads settings, creating the file with defaults on first use.
   * A file that cannot be parsed is kept as `<name>.bak` and replaced by defaults.
   */
  load(): AppSettings {
    if (!fs.existsSync(this.filePath)) {
      const defaults = createDefaultSettings();
      this.write(defaults);
      return defaults;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      const backupPath = this.backupPath();
      console.warn(
        `Settings file ${this.filePath} is corrupted, moved to ${backupPath}:`,
        error instanceof Error ? error.message : error
      );
      fs.renameSync(this.filePath, backupPath);
      const defaults = createDefaultSettings();
      this.write(defaults);
      return defaults;
    }

    return mergeWithDefaults(parsed);
  }

  /**
   * Validates and writes the complete settings record
   */
  save(settings: AppSettings): AppSettings {
    const validated: AppSettings = {
      ...settings,
      font: validateStyle(settings.font),
      ...validateEncoder({ crf: settings.crf, preset: settings.preset }),
    };
    this.write(validated);
    return validated;
  }

  /**
   * Applies a partial change to the stored settings and saves the result
   */
  update(patch: AppSettingsPatch): AppSettings {
    const current = this.load();
    const next: AppSettings = {
      font: applyStyleOverrides(current.font, patch.font),
      crf: patch.crf ?? current.crf,
      preset: patch.preset ?? current.preset,
      outputDir: patch.outputDir ?? current.outputDir,
      csvMappings: patch.csvMappings ?? current.csvMappings,
    };
    return this.save(next);
  }

  /**
   * Restores the default style and encoder values, keeping saved CSV mappings
   */
  reset(): AppSettings {
    const current = this.load();
    const defaults = createDefaultSettings();
    return this.save({ ...defaults, csvMappings: current.csvMappings });
  }

  saveCsvMapping(subtitlePath: string, mapping: CsvMapping): AppSettings {
    const current = this.load();
    return this.save({
      ...current,
      csvMappings: { ...current.csvMappings, [subtitlePath]: mapping },
    });
  }

  getCsvMapping(subtitlePath: string): CsvMapping | undefined {
    return this.load().csvMappings[subtitlePath];
  }

  private backupPath(): string {
    const parsed = path.parse(this.filePath);
    return path.join(parsed.dir, `${parsed.name}.bak`);
  }

  private write(settings: AppSettings): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.filePath, JSON.stringify(settings, null, 2), 'utf-8');
  }
}

// Singleton instance
export const settingsStore = new SettingsStore();
