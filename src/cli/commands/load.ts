import type { Command } from '../types.js';
import { closeDb, openDb } from '../../storage/db.js';
import { loadPassageFile } from '../../storage/passage-loader.js';
import { VectorIndex } from '../../storage/vector-index.js';
import { STORAGE_OPTIONS, positionalArgs, resolveCliConfig, UsageError } from '../utils.js';

export const loadCommand: Command = {
  name: 'load',
  description: 'Build or update the index from an embeddings file',
  usage: 'studyrag load <embeddings.json> [options]',
  options: { '--clear': "Delete the collection's passages first", ...STORAGE_OPTIONS },
  handler: async (args) => {
    const [file] = positionalArgs(args);
    if (!file) {
      throw new UsageError('Embeddings file required');
    }

    const { runtime } = resolveCliConfig(args);
    const { passages } = loadPassageFile(file);

    const db = openDb(runtime.dbPath);
    try {
      const index = new VectorIndex(db, { collection: runtime.collection, dimension: runtime.embeddingDimension });
      if (args.includes('--clear')) {
        const removed = await index.clear();
        console.log(`Cleared ${removed} passages from ${runtime.collection}.`);
      }
      const { inserted, updated } = await index.upsert(passages);
      console.log(`Indexed ${passages.length} passages into ${runtime.collection} (${inserted} new, ${updated} updated).`);
    } finally {
      closeDb(db);
    }
  },
};
