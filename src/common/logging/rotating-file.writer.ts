import * as fs from 'fs';
import * as path from 'path';

export interface RotatingFileOptions {
  filePath: string;
  maxFileSize: number;
  maxFiles: number;
}

/**
 * Append-only log file that rolls over by size.
 *
 * `app.log` is renamed to `app.log.1`, `app.log.1` to `app.log.2` and so on;
 * anything past `maxFiles` is removed.
 */
export class RotatingFileWriter {
  private currentSize: number;

  constructor(private readonly options: RotatingFileOptions) {
    const logDir = path.dirname(options.filePath);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    this.currentSize = fs.existsSync(options.filePath) ? fs.statSync(options.filePath).size : 0;
  }

  write(line: string): void {
    const entry = line.endsWith('\n') ? line : `${line}\n`;
    const bytes = Buffer.byteLength(entry);

    if (this.currentSize > 0 && this.currentSize + bytes > this.options.maxFileSize) {
      this.rotate();
    }

    fs.appendFileSync(this.options.filePath, entry);
    this.currentSize += bytes;
  }

  rotatedPath(index: number): string {
    return `${this.options.filePath}.${index}`;
  }

  private rotate(): void {
    const { filePath, maxFiles } = this.options;

    if (maxFiles < 1) {
      fs.rmSync(filePath, { force: true });
      this.currentSize = 0;
      return;
    }

    fs.rmSync(this.rotatedPath(maxFiles), { force: true });
    for (let index = maxFiles - 1; index >= 1; index--) {
      const source = this.rotatedPath(index);
      if (fs.existsSync(source)) {
        fs.renameSync(source, this.rotatedPath(index + 1));
      }
    }
    fs.renameSync(filePath, this.rotatedPath(1));
    this.currentSize = 0;
  }
}
