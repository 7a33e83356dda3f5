import { StoredRecord } from './measurement.types';

/**
 * Wire form of a StoredRecord. Dates are rendered as ISO-8601 UTC.
 */
export interface StoredRecordResponse {
  id: string;
  kind: string;
  value: number;
  timestamp: string;
  source: string | null;
  createdAt: string;
}

export function toStoredRecordResponse(record: StoredRecord): StoredRecordResponse {
  return {
    id: record.id,
    kind: record.kind,
    value: record.value,
    timestamp: record.timestamp.toISOString(),
    source: record.source,
    createdAt: record.createdAt.toISOString(),
  };
}
