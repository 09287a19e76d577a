import { escape, FieldType } from "influx"
import type { LogRecord, LogRecordFields } from "../../ports/log-record"
import { FIELD_KEYS, FIELD_TYPES, presentTags } from "./point"

/** String field values escape only `"` and `\`. */
function quoteString(value: string): string {
  return `"${value.replace(/["\\]/g, "\\$&")}"`
}

function formatField(key: keyof LogRecordFields, value: string | number): string {
  if (typeof value === "string") return quoteString(value)
  return FIELD_TYPES[key] === FieldType.INTEGER ? `${Math.trunc(value)}i` : String(value)
}

/**
 * Serializes a record as one InfluxDB line with a nanosecond timestamp.
 *
 * @example
 * `response_log,path=/check,method=GET remote_addr="",...,status_code=200i,... 1700000000000000000`
 */
export function toLine(record: LogRecord): string {
  const series = [
    escape.measurement(record.measurement),
    ...Object.entries(presentTags(record.tags)).map(
      ([key, value]) => `${escape.tag(key)}=${escape.tag(value)}`,
    ),
  ].join(",")

  const fields = FIELD_KEYS.map(
    (key) => `${escape.tag(key)}=${formatField(key, record.fields[key])}`,
  ).join(",")

  return `${series} ${fields} ${record.time.getTime()}000000`
}
