import { createWriteStream } from 'fs';
import { pipeline } from 'stream/promises';
import { Open } from 'unzipper';
import { ErrorCode, TransientError, isArchiveError, isLocalIoFailure } from '../utils';

/**
 * Write the CSV held in a downloaded archive to `outputPath`. The first
 * `.csv` entry wins; an archive without one falls back to its first file.
 * Damaged archives raise a retryable INVALID_ARCHIVE error.
 */
export async function extractCsv(archivePath: string, outputPath: string): Promise<void> {
  try {
    const directory = await Open.file(archivePath);
    const files = directory.files.filter((file) => file.type === 'File');
    const entry = files.find((file) => file.path.toLowerCase().endsWith('.csv')) ?? files[0];
    if (!entry) {
      throw new TransientError('Archive contains no data file', { archivePath }, ErrorCode.INVALID_ARCHIVE);
    }

    await pipeline(entry.stream(), createWriteStream(outputPath, { flags: 'w' }));
  } catch (error) {
    if (isArchiveError(error) || isLocalIoFailure(error)) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new TransientError(`Failed to extract archive: ${message}`, { archivePath }, ErrorCode.INVALID_ARCHIVE);
  }
}
