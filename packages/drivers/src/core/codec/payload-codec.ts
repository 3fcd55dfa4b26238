import type { JsonEncoder } from "../../ports/json-encoder"
import type { JsonValue } from "../../ports/json-value"

const utf8Decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Hides whether the active encoder produces bytes or text: transport code
 * only ever sees strings.
 */
export class PayloadCodec {
  constructor(readonly encoder: JsonEncoder) {}

  encode(value: JsonValue): string {
    const out = this.encoder.dumps(value)

    return typeof out === "string" ? out : utf8Decoder.decode(out)
  }

  decode(text: string): unknown {
    return this.encoder.loads(text)
  }
}
