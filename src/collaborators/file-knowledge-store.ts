import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { StorageLockedError } from '../common/errors/index.js';
import type { Logger } from '../common/logger.js';
import type { KnowledgeStore, StorageHandle } from '../common/types/collaborators.js';

/**
 * Directory-per-credential knowledge store. A directory can be held by one
 * handle at a time within this process.
 */
export class FileKnowledgeStore implements KnowledgeStore {
  private readonly held = new Set<string>();

  constructor(private readonly logger: Logger) {}

  async open(isolatedPath: string, options: { semanticSearch: boolean }): Promise<StorageHandle> {
    const dir = path.resolve(isolatedPath);
    if (this.held.has(dir)) throw new StorageLockedError(dir);
    this.held.add(dir);

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(
        path.join(dir, 'store.json'),
        `${JSON.stringify({ semanticSearch: options.semanticSearch, openedAt: new Date().toISOString() }, null, 2)}\n`,
      );
    } catch (err) {
      this.held.delete(dir);
      throw err;
    }

    this.logger.debug({ path: dir, semanticSearch: options.semanticSearch }, 'Knowledge store opened');
    let open = true;
    return {
      path: dir,
      close: async () => {
        if (!open) return;
        open = false;
        this.held.delete(dir);
        this.logger.debug({ path: dir }, 'Knowledge store closed');
      },
    };
  }
}
