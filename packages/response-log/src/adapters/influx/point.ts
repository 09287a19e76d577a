import { FieldType, type IPoint, type ISchemaOptions } from "influx"
import type { LogRecord, LogRecordFields, LogRecordTags } from "../../ports/log-record"

export const TAG_KEYS = ["namespace", "path", "method"] as const satisfies ReadonlyArray<
  keyof LogRecordTags
>

export const FIELD_KEYS = [
  "remote_addr",
  "headers",
  "full_path",
  "query_string",
  "payload",
  "status_code",
  "response",
  "response_content_type",
  "response_time",
] as const satisfies ReadonlyArray<keyof LogRecordFields>

export const FIELD_TYPES = {
  remote_addr: FieldType.STRING,
  headers: FieldType.STRING,
  full_path: FieldType.STRING,
  query_string: FieldType.STRING,
  payload: FieldType.STRING,
  status_code: FieldType.INTEGER,
  response: FieldType.STRING,
  response_content_type: FieldType.STRING,
  response_time: FieldType.FLOAT,
} as const satisfies Record<keyof LogRecordFields, FieldType>

/** Line protocol cannot carry empty tag values, so those tags are left out. */
export function presentTags(tags: LogRecordTags): Record<string, string> {
  return Object.fromEntries(Object.entries(tags).filter(([, value]) => value.length > 0))
}

export function toPoint(record: LogRecord): IPoint {
  return {
    measurement: record.measurement,
    timestamp: record.time,
    tags: presentTags(record.tags),
    fields: { ...record.fields },
  }
}

export function measurementSchema(measurement: string, database: string): ISchemaOptions {
  return {
    database,
    measurement,
    tags: [...TAG_KEYS],
    fields: { ...FIELD_TYPES },
  }
}
