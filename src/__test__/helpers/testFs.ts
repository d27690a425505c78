import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const FIXTURES_DIR = path.resolve(__dirname, '..', 'fixtures');

export function fixturePath(name: string): string {
  return path.join(FIXTURES_DIR, name);
}

export function prepareTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `thermo-${label}-`));
}

export function cleanDir(p: string) {
  fs.rmSync(p, { recursive: true, force: true });
}

export function writeLog(dir: string, name: string, lines: string[]): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, lines.join('\n') + '\n', 'utf8');
  return filePath;
}
