import { asRecord, isRecord } from '../../sdk/values.js';

export type RecordEventName = 'record_created' | 'record_updated' | 'record_deleted';

export const RECORD_EVENTS: readonly RecordEventName[] = ['record_created', 'record_updated', 'record_deleted'];

export function isRecordEvent(value: string): value is RecordEventName {
  return RECORD_EVENTS.some((event) => event === value);
}

export interface ChangedRecord {
  table_id: string;
  record_id: string;
  created_time?: string;
  fields?: Record<string, unknown>;
  previous_fields?: Record<string, unknown>;
  changed_fields?: string[];
}

function tables(payload: Record<string, unknown>): Array<[string, Record<string, unknown>]> {
  return Object.entries(asRecord(payload.changedTablesById)).map(([id, table]) => [id, asRecord(table)]);
}

/**
 * Flatten the records of one kind out of a batch of webhook payloads.
 */
export function collectRecords(payloads: Record<string, unknown>[], kind: RecordEventName): ChangedRecord[] {
  const records: ChangedRecord[] = [];

  for (const payload of payloads) {
    for (const [tableId, table] of tables(payload)) {
      if (kind === 'record_created') {
        for (const [recordId, value] of Object.entries(asRecord(table.createdRecordsById))) {
          const record = asRecord(value);
          records.push({
            table_id: tableId,
            record_id: recordId,
            created_time: typeof record.createdTime === 'string' ? record.createdTime : undefined,
            fields: asRecord(record.cellValuesByFieldId),
          });
        }
      } else if (kind === 'record_updated') {
        for (const [recordId, value] of Object.entries(asRecord(table.changedRecordsById))) {
          const record = asRecord(value);
          const current = asRecord(asRecord(record.current).cellValuesByFieldId);
          records.push({
            table_id: tableId,
            record_id: recordId,
            fields: current,
            previous_fields: asRecord(asRecord(record.previous).cellValuesByFieldId),
            changed_fields: Object.keys(current),
          });
        }
      } else {
        const destroyed = Array.isArray(table.destroyedRecordIds) ? table.destroyedRecordIds : [];
        for (const recordId of destroyed) {
          if (typeof recordId === 'string') {
            records.push({ table_id: tableId, record_id: recordId });
          }
        }
      }
    }
  }

  return records;
}

/** Record events present in a batch of payloads, in RECORD_EVENTS order. */
export function presentRecordEvents(payloads: Record<string, unknown>[]): RecordEventName[] {
  return RECORD_EVENTS.filter((kind) => collectRecords(payloads, kind).length > 0);
}

function stringifyCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export function matchesTables(record: ChangedRecord, tableIds: string[]): boolean {
  return tableIds.length === 0 || tableIds.includes(record.table_id);
}

export function matchesChangedFields(record: ChangedRecord, required: string[]): boolean {
  if (required.length === 0) return true;
  const changed = record.changed_fields ?? [];
  return required.some((field) => changed.includes(field));
}

export function matchesFieldKeywords(record: ChangedRecord, fieldName: string | undefined, keywords: string[]): boolean {
  if (!fieldName || keywords.length === 0) return true;
  const value = isRecord(record.fields) ? record.fields[fieldName] : undefined;
  const text = stringifyCell(value).toLowerCase();
  if (!text) return false;
  return keywords.some((keyword) => text.includes(keyword));
}
