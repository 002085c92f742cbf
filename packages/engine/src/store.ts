import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { z } from 'zod';
import { SerialQueue } from '@semdrop/core';

/**
 * A zod-validated JSON document on disk. Saves are written in call order, so
 * the last value passed to save() is what ends up on disk.
 */
export class JsonFileStore<Schema extends z.ZodTypeAny> {
  private writes: SerialQueue = new SerialQueue();

  constructor(
    private path: string,
    private schema: Schema
  ) {}

  /**
   * Load and validate the document; undefined when the file does not exist yet
   */
  async load(): Promise<z.output<Schema> | undefined> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
    return this.schema.parse(JSON.parse(content));
  }

  async save(value: z.input<Schema>): Promise<void> {
    const content = JSON.stringify(this.schema.parse(value), null, 2);
    await this.writes.run(async () => {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, content, 'utf8');
    });
  }

  getPath(): string {
    return this.path;
  }
}
