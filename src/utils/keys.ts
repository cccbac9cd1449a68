import type { ArtifactKind } from "../models/record.model";

const NAMESPACES: Record<ArtifactKind, string> = {
  download: "downloads",
  upload: "uploads",
};

export function normalizeKeyPrefix(prefix: string | undefined): string {
  if (!prefix) return "";

  const trimmed = prefix.trim().replace(/^\/+/, "");
  if (!trimmed) return "";

  return trimmed.endsWith("/") ? trimmed : `${trimmed}/`;
}

export function artifactKey(
  prefix: string,
  kind: ArtifactKind,
  shasum: string,
): string {
  return `${prefix}${NAMESPACES[kind]}/${shasum}`;
}

export function eventKey(
  prefix: string,
  sessionId: string,
  contentSha256: string,
): string {
  return `${prefix}events/${sessionId}-${contentSha256}`;
}
