import { createGunzip } from 'node:zlib';
import type { Readable } from 'node:stream';
import { createInterface } from 'node:readline';
import { unmarshall } from '@aws-sdk/util-dynamodb';
import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import { log } from '../../engine/logger';

const ATTRIBUTE_TYPES = new Set(['S', 'N', 'B', 'SS', 'NS', 'BS', 'M', 'L', 'NULL', 'BOOL']);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

const isAttributeValue = (value: unknown): boolean => {
  if (!isRecord(value)) return false;
  const keys = Object.keys(value);
  return keys.length === 1 && ATTRIBUTE_TYPES.has(keys[0]);
};

export const isAttributeMap = (value: unknown): value is Record<string, AttributeValue> =>
  isRecord(value) && Object.values(value).every(isAttributeValue);

let errorLogCount = 0;
const MAX_ERROR_LOGS = 10;

const reportMalformed = (line: string, reason: string): void => {
  if (errorLogCount >= MAX_ERROR_LOGS) return;
  log.warn(`[dynamodb-export] ${reason}: ${line.slice(0, 200)}`);
  errorLogCount++;
  if (errorLogCount === MAX_ERROR_LOGS) {
    log.warn('[dynamodb-export] Suppressing further malformed line warnings...');
  }
};

/**
 * Parse one line of a DynamoDB export: { "Item": { "id": { "S": "..." }, ... } }.
 * Returns null for blank or malformed lines.
 */
export const parseExportLine = (line: string): Record<string, unknown> | null => {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    reportMalformed(trimmed, err instanceof Error ? err.message : 'invalid JSON');
    return null;
  }

  const item = isRecord(parsed) && 'Item' in parsed ? parsed.Item : parsed;
  if (!isAttributeMap(item)) {
    reportMalformed(trimmed, 'not a DynamoDB item');
    return null;
  }
  return unmarshall(item);
};

export type ExportLine = {
  lineNumber: number;
  record: Record<string, unknown>;
};

/**
 * Stream the records of one export file. Line numbers count every line, skipped or not.
 */
export async function* readExportLines(body: Readable, gzipped = true): AsyncGenerator<ExportLine> {
  const input = gzipped ? body.pipe(createGunzip()) : body;
  const rl = createInterface({
    input,
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;
    const record = parseExportLine(line);
    if (record) {
      yield { lineNumber, record };
    }
  }
}
