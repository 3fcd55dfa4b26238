import type { JsonValue } from "./json-value"

export type JsonEncoderName = "bytes" | "text"

export interface JsonEncoder {
  readonly name: JsonEncoderName

  dumps(value: JsonValue): string | Uint8Array
  loads(data: string | Uint8Array): unknown
}
