export const FILE_DOWNLOAD_EVENT = "cowrie.session.file_download";
export const FILE_UPLOAD_EVENT = "cowrie.session.file_upload";

/**
 * One event as emitted by the honeypot. Only `eventid` is guaranteed;
 * file events also carry `shasum` and `outfile`, session-scoped events
 * carry `session`.
 */
export interface SessionRecord {
  eventid: string;
  shasum?: unknown;
  outfile?: unknown;
  session?: unknown;
  [field: string]: unknown;
}

export type ArtifactKind = "download" | "upload";

export interface RecordSink {
  write(record: SessionRecord): Promise<void>;
}

export type UploadState =
  | "not_checked"
  | "checking"
  | "exists"
  | "not_exists"
  | "uploading"
  | "done"
  | "failed";

export type UploadOutcome = "skipped_seen" | "exists_remote" | "uploaded";

export interface SinkStats {
  received: number;
  uploaded: number;
  skippedSeen: number;
  skippedRemote: number;
  dropped: number;
  failed: number;
  cacheSize: number;
}

export interface ObservableSink extends RecordSink {
  stats(): SinkStats;
}
