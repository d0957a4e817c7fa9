import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Destination } from '../../domain/index.js';

/** Appends each rendered event, newline-terminated, to a local file. */
export class FileDestination implements Destination {
  readonly kind = 'file';
  readonly id: string;
  readonly filePath: string;

  constructor(id: string, filePath: string) {
    this.id = id;
    this.filePath = filePath;
  }

  async send(content: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${content}\n`, 'utf-8');
  }
}
