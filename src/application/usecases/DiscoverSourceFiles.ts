import { readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import type { SourceFile } from '../../domain/model/SourceFile.js';
import { uniqueName } from '../../domain/services/NameSanitizer.js';
import { directoryNotFound } from '../../errors.js';
import type { LoadContext } from '../LoadContext.js';

/** Use case: list the input files and give each a unique table name. */
export class DiscoverSourceFiles {
  constructor(private readonly ctx: LoadContext) {}

  async execute(): Promise<SourceFile[]> {
    const directory = resolve(this.ctx.settings.directory);
    await this.assertDirectory(directory);

    const entries = await readdir(directory, { withFileTypes: true });
    const fileNames = entries
      .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === this.ctx.settings.extension)
      .map((entry) => entry.name)
      .sort();

    const taken = new Set<string>();
    const files = fileNames.map((fileName): SourceFile => {
      const base = fileName.slice(0, fileName.length - extname(fileName).length);
      const sanitized = this.ctx.policies.sanitizeName(base) || 'table';
      return {
        path: join(directory, fileName),
        fileName,
        tableName: uniqueName(sanitized, taken),
      };
    });

    for (const file of files) {
      this.ctx.eventBus.emit({
        type: 'file:discovered',
        runId: this.ctx.runId,
        file,
        timestamp: Date.now(),
      });
    }

    return files;
  }

  private async assertDirectory(directory: string): Promise<void> {
    const stats = await stat(directory).catch(() => null);
    if (!stats?.isDirectory()) {
      throw directoryNotFound(directory);
    }
  }
}
