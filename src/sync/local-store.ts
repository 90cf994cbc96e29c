import { stat } from 'fs/promises';
import { ResourceIdentifier } from '../types';
import { localPath } from '../archive';

/**
 * Read-only view of the mirror directory. A file counts as present only when
 * it is a regular, non-empty file at the identifier's derived path; partial
 * downloads live under a different name until they are renamed into place.
 */
export class LocalStore {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  pathFor(id: ResourceIdentifier): string {
    return localPath(id, this.root);
  }

  async exists(id: ResourceIdentifier): Promise<boolean> {
    try {
      const stats = await stat(this.pathFor(id));
      return stats.isFile() && stats.size > 0;
    } catch {
      // Missing or unreadable files are downloaded again
      return false;
    }
  }
}
