import type { Command } from '../types.js';
import { closeDb, openDb } from '../../storage/db.js';
import { VectorIndex } from '../../storage/vector-index.js';
import { STORAGE_OPTIONS, resolveCliConfig } from '../utils.js';

export const infoCommand: Command = {
  name: 'info',
  description: 'Show index status and chapters',
  usage: 'studyrag info [options]',
  options: { '--json': 'Print as JSON', ...STORAGE_OPTIONS },
  handler: async (args) => {
    const { runtime } = resolveCliConfig(args);

    const db = openDb(runtime.dbPath, { fileMustExist: true });
    try {
      const index = new VectorIndex(db, { collection: runtime.collection, dimension: runtime.embeddingDimension });
      const description = await index.describe();
      const chapters = description.status === 'unavailable' ? [] : await index.listChapters();

      if (args.includes('--json')) {
        console.log(JSON.stringify({ ...description, chapters }, null, 2));
        return;
      }
      console.log(`Collection: ${description.collection}`);
      console.log(`Status:     ${description.status}`);
      console.log(`Passages:   ${description.count}`);
      console.log(`Dimension:  ${description.dimension} (${description.distanceMetric})`);
      console.log(`Chapters:   ${chapters.length > 0 ? chapters.join(', ') : '-'}`);
    } finally {
      closeDb(db);
    }
  },
};
