import { MalformedEventError } from '../errors';
import { StorageEventRecord } from '../types/events';
import logger from './logger';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringAt(source: unknown, ...path: string[]): string | undefined {
  let current: unknown = source;
  for (const segment of path) {
    if (!isObject(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return typeof current === 'string' ? current : undefined;
}

/**
 * S3 delivers object keys form-encoded, spaces arrive as `+`.
 */
export function decodeObjectKey(rawKey: string): string {
  const spaced = rawKey.replace(/\+/g, ' ');
  try {
    return decodeURIComponent(spaced);
  } catch (error) {
    throw new MalformedEventError(`Object key is not valid URL encoding: ${rawKey}`, { objectKey: rawKey }, error);
  }
}

/**
 * Extracts bucket, key and event name from the first record of an S3 notification.
 */
export function decodeStorageEvent(raw: unknown): StorageEventRecord {
  if (!isObject(raw) || !Array.isArray(raw.Records)) {
    throw new MalformedEventError('Notification has no Records array');
  }

  const records: unknown[] = raw.Records;
  if (records.length === 0) {
    throw new MalformedEventError('Notification contains no records');
  }
  if (records.length > 1) {
    logger.warn(`Notification contains ${records.length} records, only the first is handled`, {
      recordCount: records.length
    });
  }

  const record = records[0];
  const eventName = stringAt(record, 'eventName');
  const bucketName = stringAt(record, 's3', 'bucket', 'name');
  const rawKey = stringAt(record, 's3', 'object', 'key');

  const missing = [
    eventName === undefined ? 'eventName' : null,
    bucketName === undefined ? 's3.bucket.name' : null,
    rawKey === undefined ? 's3.object.key' : null
  ].filter((field): field is string => field !== null);

  if (eventName === undefined || bucketName === undefined || rawKey === undefined) {
    throw new MalformedEventError(`Notification record is missing ${missing.join(', ')}`, { missing });
  }

  return {
    eventName,
    bucketName,
    objectKey: decodeObjectKey(rawKey),
    awsRegion: stringAt(record, 'awsRegion')
  };
}
