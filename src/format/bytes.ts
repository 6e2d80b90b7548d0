/**
 * Combine header and payload into a single buffer.
 */
export function combineHeaderAndPayload(
  header: Uint8Array,
  payload: Uint8Array
): Uint8Array {
  const result = new Uint8Array(header.length + payload.length);
  result.set(header, 0);
  result.set(payload, header.length);
  return result;
}
