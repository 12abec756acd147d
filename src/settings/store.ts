import { readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { isMap, isNode, isScalar, parseDocument, type Document } from 'yaml';
import type { TableSettings } from '../reconcile';
import { validateSettings, ValidationError } from '../schemas';
import { createLogger, type Logger } from '../reliability';

export const DEFAULT_SETTINGS_FILE = 'config.yml';
export const USER_SETTINGS_FILE = 'config.user.yml'; // git-ignored override

/**
 * Picks the settings file: an explicit path, else config.user.yml when it
 * exists, else config.yml.
 */
export function resolveSettingsPath(cwd: string, override?: string): string {
  if (override) {
    return override;
  }
  const userFile = join(cwd, USER_SETTINGS_FILE);
  return existsSync(userFile) ? userFile : join(cwd, DEFAULT_SETTINGS_FILE);
}

export interface SettingsHandle {
  read(): TableSettings;
  update(settings: Partial<TableSettings>): void;
  save(): Promise<void>;
}

/**
 * The YAML settings file, held as a document so that comments, key order and
 * unrelated keys survive a save.
 */
export class SettingsStore implements SettingsHandle {
  private constructor(
    readonly path: string,
    private readonly doc: Document,
    readonly existed: boolean
  ) {}

  static async open(path: string, logger: Logger = createLogger('settings')): Promise<SettingsStore> {
    let content = '';
    let existed = true;

    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
      logger.warn('Settings file not found, starting with empty settings', { path });
      existed = false;
    }

    const doc = parseDocument(content);
    if (doc.errors.length > 0) {
      throw new ValidationError(`Invalid YAML in ${path}: ${doc.errors[0].message}`, 'root');
    }

    const store = new SettingsStore(path, doc, existed);
    store.read(); // validate up front
    return store;
  }

  read(): TableSettings {
    return validateSettings(this.doc.toJS(), this.path);
  }

  /**
   * Replaces the given sections. Existing keys are updated in place, so their
   * comments stay attached; keys absent from the new section are removed.
   */
  update(settings: Partial<TableSettings>): void {
    if (settings.tables) {
      this.replaceSection('tables', settings.tables);
    }
    if (settings.variables) {
      this.replaceSection('variables', settings.variables);
    }
  }

  async save(): Promise<void> {
    await writeFile(this.path, this.doc.toString());
  }

  toString(): string {
    return this.doc.toString();
  }

  private replaceSection(section: string, values: Record<string, unknown>): void {
    const current = this.doc.get(section);

    if (!isMap(current)) {
      this.doc.set(section, this.doc.createNode(values));
      return;
    }

    for (const item of [...current.items]) {
      const key = item.key;
      const name = typeof key === 'object' && key !== null && 'value' in key ? key.value : key;
      if (typeof name === 'string' && !Object.hasOwn(values, name)) {
        current.delete(name);
      }
    }

    for (const [key, value] of Object.entries(values)) {
      const existing = current.get(key, true);
      if (isScalar(existing) && (typeof value !== 'object' || value === null)) {
        existing.value = value;
      } else if (isNode(existing) && JSON.stringify(existing.toJS(this.doc)) === JSON.stringify(value)) {
        continue;
      } else {
        current.set(key, this.doc.createNode(value));
      }
    }
  }
}
