export { DownloadManager } from "./downloader";
export type { DownloadManagerDeps, DownloadRunOptions } from "./downloader";
export { baseFilenameForUrl, FilenameRegistry, shortHash, truncateUtf8 } from "./filenameRegistry";
export { FileSystemStorage, PART_SUFFIX } from "./storage";
export type { DocumentStorage } from "./storage";
