/**
 * Merges domain list files into one sorted, deduplicated list.
 *
 * Usage: tsx src/scripts/build-list.ts <output> <input> [input...]
 *
 * The output may also be one of the inputs, e.g. to re-sort a list in place.
 */

import { ListLoaderService } from '../services/list-loader.service.js';
import { logger } from '../services/logger.service.js';

async function buildList(output: string, inputs: string[]): Promise<void> {
  const loader = new ListLoaderService();

  const merged = await loader.mergeLists(inputs);
  const saved = await loader.saveList(output, merged);

  logger.info(`Wrote ${saved.length} domains from ${inputs.length} file(s) to ${output}`, {
    filePath: output,
    count: saved.length,
  });
}

const [output, ...inputs] = process.argv.slice(2);

if (!output || inputs.length === 0) {
  logger.error('Usage: build-list <output> <input> [input...]');
  process.exit(1);
}

buildList(output, inputs).catch((error: unknown) => {
  logger.error('List build failed', { error });
  process.exit(1);
});
