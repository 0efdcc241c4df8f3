import fs from 'fs';
import os from 'os';
import path from 'path';
import { parse as yamlParse } from 'yaml';

export type FileFormat = 'yaml' | 'json';

export const DEFAULT_DIR_MODE = 0o755;
export const DEFAULT_FILE_MODE = 0o644;

export function resolvePath(filePath: string): string {
  if (filePath.startsWith('~')) {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return path.resolve(filePath);
}

export function isFile(filepath: string): boolean {
  if (!filepath) return false;
  try {
    return fs.statSync(filepath).isFile();
  } catch {
    return false;
  }
}

export function isExecutable(filepath: string): boolean {
  if (!isFile(filepath)) return false;
  try {
    fs.accessSync(filepath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function readFileAtPath(filepath: string): string {
  if (!isFile(filepath)) {
    throw Error(`File doesn't exist at ${filepath}`);
  }
  return fs.readFileSync(filepath, 'utf8');
}

export function writeFileAtPath(
  filepath: string,
  value: string,
  mode = DEFAULT_FILE_MODE,
): void {
  const dirname = path.dirname(filepath);
  if (!fs.existsSync(dirname)) {
    fs.mkdirSync(dirname, { recursive: true, mode: DEFAULT_DIR_MODE });
  }
  fs.writeFileSync(filepath, value, { mode });
}

/**
 * Writes to a sibling temp file and renames it over the target, so readers
 * only ever see the old or the new content.
 */
export function writeFileAtomic(
  filepath: string,
  value: string,
  mode = DEFAULT_FILE_MODE,
): void {
  const tmpPath = `${filepath}.${process.pid}.${Date.now()}.tmp`;
  writeFileAtPath(tmpPath, value, mode);
  try {
    fs.renameSync(tmpPath, filepath);
  } catch (error) {
    fs.rmSync(tmpPath, { force: true });
    throw error;
  }
}

export function readJson(filepath: string): unknown {
  return JSON.parse(readFileAtPath(filepath));
}

export function stringifyJson(obj: unknown): string {
  return JSON.stringify(obj, null, 2) + '\n';
}

export function readYaml(filepath: string): unknown {
  return yamlParse(readFileAtPath(filepath));
}

export function resolveFileFormat(
  filepath: string,
  format?: FileFormat,
): FileFormat | undefined {
  if (format) return format;
  if (filepath.endsWith('.json')) return 'json';
  if (filepath.endsWith('.yaml') || filepath.endsWith('.yml')) return 'yaml';
  return undefined;
}

export function readYamlOrJson(filepath: string, format?: FileFormat): unknown {
  const fileFormat = resolveFileFormat(filepath, format);
  if (fileFormat === 'json') return readJson(filepath);
  if (fileFormat === 'yaml') return readYaml(filepath);
  throw new Error(`Invalid file format for ${filepath}`);
}
