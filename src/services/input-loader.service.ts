import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import { ALLOWED_INPUT_EXTENSIONS } from '../config';

/**
 * InputLoaderService
 * Reads the domain list, one domain per line
 */
export class InputLoaderService {
  constructor(private readonly allowedExtensions: readonly string[] = ALLOWED_INPUT_EXTENSIONS) {}

  async load(filename: string): Promise<string[]> {
    this.checkFileExtension(filename);

    if (!existsSync(filename)) {
      throw new Error(`Provided filename \`${filename}\` does not exist. Please provide a valid filename.`);
    }

    const content = await readFile(filename, 'utf-8');
    return parseDomainList(content);
  }

  checkFileExtension(filename: string): void {
    const ext = extname(filename).replace(/^\./, '').toLowerCase();
    if (!this.allowedExtensions.includes(ext)) {
      throw new Error(
        `Unsupported extension \`${ext}\`. Expected one of: ${this.allowedExtensions.join(', ')}`
      );
    }
  }
}

export function parseDomainList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
