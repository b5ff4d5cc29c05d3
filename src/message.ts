export type MessageKind = "text" | "binary";

/** One frame payload, shared as-is by every subscriber that receives it. */
export interface Message {
  readonly kind: MessageKind;
  readonly data: Buffer;
}

export function textMessage(data: string | Buffer): Message {
  return {
    kind: "text",
    data: typeof data === "string" ? Buffer.from(data, "utf8") : data
  };
}

/** Raw bytes, e.g. a JPEG camera frame. */
export function binaryMessage(data: Buffer): Message {
  return { kind: "binary", data };
}
