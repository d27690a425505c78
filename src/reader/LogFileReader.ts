import * as fs from 'fs';
import * as path from 'path';
import { NotFoundError } from '../errors/ThermoError';

export class LogFileReader {
  /**
   * Reads a log file into lines. The descriptor is closed before returning.
   * @param filePath Path to the log file.
   */
  static readLines(filePath: string): string[] {
    const resolvedPath = path.resolve(filePath);
    if (!fs.existsSync(resolvedPath)) {
      throw new NotFoundError(`Log file "${filePath}" not found`, { filePath });
    }

    const fd = fs.openSync(resolvedPath, 'r');
    let content: string;
    try {
      content = fs.readFileSync(fd, 'utf8');
    } finally {
      fs.closeSync(fd);
    }
    return this.splitLines(content);
  }

  static splitLines(content: string): string[] {
    if (content === '') {
      return [];
    }
    const lines = content.split(/\r?\n/);
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }
}
