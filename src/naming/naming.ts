import { DEFAULT_ARCHITECTURE, ENGINE_INFO, engineInfo, type EngineTable } from "../matrix/engines.js";

export const GCS_URL_BASENAME = "https://storage.googleapis.com/";
export const LATEST_VERSION_SUFFIX = "latest.version";
export const LATEST_VERSION_CONTENT_TYPE = "text/plain";

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** `YYYYMMDDHHMM` in UTC. */
export function formatTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes())
  );
}

/** `YYYYMMDD` in UTC. */
export function formatReportDate(date: Date): string {
  return formatTimestamp(date).slice(0, 8);
}

export function stampedName(project: string, sanitizer: string, timestamp: string): string {
  return [project, sanitizer, timestamp].join("-");
}

export function archiveName(project: string, sanitizer: string, timestamp: string): string {
  return stampedName(project, sanitizer, timestamp) + ".zip";
}

export function srcmapName(project: string, sanitizer: string, timestamp: string): string {
  return stampedName(project, sanitizer, timestamp) + ".srcmap.json";
}

export function latestVersionName(project: string, sanitizer: string): string {
  return [project, sanitizer, LATEST_VERSION_SUFFIX].join("-");
}

export function targetsListFilename(sanitizer: string): string {
  return `targets.list.${sanitizer}`;
}

/**
 * Bucket for an engine's builds. Testing buckets carry `-testing`; any
 * architecture other than x86_64 is appended as `-<arch>`.
 */
export function uploadBucket(
  engine: string,
  architecture: string,
  testing: boolean,
  table: EngineTable = ENGINE_INFO,
): string {
  const info = engineInfo(engine, table);
  if (!info) throw new Error(`Unknown fuzzing engine: ${engine}`);
  let bucket = info.uploadBucket;
  if (testing) bucket += "-testing";
  if (architecture !== DEFAULT_ARCHITECTURE) bucket += "-" + architecture;
  return bucket;
}

/** Object path, relative to the storage host, that signed urls are issued for. */
export function uploadPath(bucket: string, project: string, file: string): string {
  return `/${bucket}/${project}/${file}`;
}

export function targetsListPath(bucket: string, project: string, sanitizer: string): string {
  return uploadPath(bucket, project, targetsListFilename(sanitizer));
}

export function logsUrl(buildId: string, imageProject: string): string {
  return (
    "https://console.developers.google.com/logs/viewer?" +
    `resource=build%2Fbuild_id%2F${buildId}&project=${imageProject}`
  );
}
