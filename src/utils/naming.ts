export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const pad = (value: number): string => String(value).padStart(2, '0');

/** UTC `YYYY-MM-DD-HH-mm-ss`, sortable as a string. */
export function formatTimestamp(date: Date): string {
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds())
  ].join('-');
}

export type ResourceKind = 'model' | 'endpoint-config' | 'endpoint';

const KIND_SUFFIX: Record<ResourceKind, string> = {
  'model': 'serverless',
  'endpoint-config': 'serverless-epc',
  'endpoint': 'serverless-ep'
};

/**
 * e.g. `xgboost-serverless-epc-2024-04-22-20-51-18`
 */
export function resourceName(prefix: string, kind: ResourceKind, date: Date): string {
  return `${prefix}-${KIND_SUFFIX[kind]}-${formatTimestamp(date)}`;
}
