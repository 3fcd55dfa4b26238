import type { JsonEncoder, JsonEncoderName } from "../../ports/json-encoder"
import type { JsonValue } from "../../ports/json-value"

const utf8Encoder = new TextEncoder()
const utf8Decoder = new TextDecoder("utf-8", { fatal: true })

/** Encodes straight to UTF-8 bytes. */
export const bytesJsonEncoder: JsonEncoder = {
  name: "bytes",
  dumps: (value: JsonValue) => utf8Encoder.encode(JSON.stringify(value)),
  loads: (data: string | Uint8Array) =>
    JSON.parse(typeof data === "string" ? data : utf8Decoder.decode(data)),
}

export const textJsonEncoder: JsonEncoder = {
  name: "text",
  dumps: (value: JsonValue) => JSON.stringify(value),
  loads: (data: string | Uint8Array) =>
    JSON.parse(typeof data === "string" ? data : utf8Decoder.decode(data)),
}

const encoders: Readonly<Record<JsonEncoderName, JsonEncoder>> = {
  bytes: bytesJsonEncoder,
  text: textJsonEncoder,
}

/**
 * Picks the encoder once, at configuration time. `bytes` is the default.
 */
export function selectJsonEncoder(preference: JsonEncoderName = "bytes"): JsonEncoder {
  return encoders[preference]
}
