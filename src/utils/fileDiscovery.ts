import fs from 'node:fs';
import path from 'node:path';
import { globSync } from 'glob';
import { createLogger } from './logger';

const logger = createLogger({ component: 'FileDiscovery' });

/**
 * Resolve a data path into the export files to load.
 * A file resolves to itself; a directory to every *.json below it, sorted.
 */
export function discoverExportFiles(dataPath: string): string[] {
  if (!fs.existsSync(dataPath)) {
    logger.error({ dataPath }, 'Data path does not exist');
    return [];
  }

  if (fs.statSync(dataPath).isFile()) {
    return [dataPath];
  }

  const files = globSync('**/*.json', { cwd: dataPath, nodir: true })
    .map((file) => path.join(dataPath, file))
    .sort();

  if (files.length === 0) {
    logger.error({ dataPath }, 'No JSON files found');
  } else {
    logger.info({ dataPath, fileCount: files.length }, `Found ${files.length} JSON files to process`);
  }

  return files;
}
