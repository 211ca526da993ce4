// src/lib/bufferUtils.ts

// exceljs hands back an ArrayBuffer-like value; express wants a Node Buffer
export function toNodeBuffer(buf: unknown): Buffer {
  if (Buffer.isBuffer(buf)) return buf;
  if (buf instanceof ArrayBuffer) return Buffer.from(new Uint8Array(buf));
  if (ArrayBuffer.isView(buf)) return Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);
  throw new TypeError(`Cannot convert ${typeof buf} to a Buffer`);
}
