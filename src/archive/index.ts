export { ArchiveClient, classifyStatus } from './client';
export { extractCsv } from './extract';
export type { ArchiveSource, ArchiveClientOptions, StatusClass } from './client';
export { INTERVAL_CATALOG, intervalsFor, isSupportedInterval } from './intervals';
export {
  DEFAULT_ARCHIVE_BASE_URL,
  createIdentifier,
  archiveFileName,
  localFileName,
  identifierKey,
  remoteUrl,
  localPath,
} from './resource';
