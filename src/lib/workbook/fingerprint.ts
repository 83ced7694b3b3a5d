const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

// FNV-1a; identifies identical uploads within a session, not a security hash.
export const fingerprintBytes = (bytes: Uint8Array): string => {
  let hash = FNV_OFFSET;
  for (let index = 0; index < bytes.length; index += 1) {
    hash ^= bytes[index];
    hash = Math.imul(hash, FNV_PRIME);
  }
  return `${bytes.length.toString(16)}-${(hash >>> 0).toString(16).padStart(8, "0")}`;
};
