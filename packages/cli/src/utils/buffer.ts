/**
 * Copy file bytes into a standalone ArrayBuffer for the core parsers.
 * Node Buffers may share a larger pooled ArrayBuffer.
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
    const copy = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(copy).set(bytes);
    return copy;
}
